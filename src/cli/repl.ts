/**
 * fieldquery REPL (簡易)
 *
 * 目的:
 * - 1行のクエリを入力し、正規形テキストと該当件数/ids を即時表示する。:q で終了。
 * - データは --data に相当する環境変数 FIELDQUERY_DATA から読み込む（JSON配列）。
 *
 * 使い方:
 *   FIELDQUERY_DATA=examples/catalog.json fieldquery repl
 *
 * コマンド:
 *   :q                 終了
 *   :mode <mode>       出力モード変更（text|repr|json|sql|fields|result、既定 result）
 *   :ignore on|off     テキスト大小無視の切替
 *   :locale <bcp47>    ロケール設定（例: tr, fr、空でクリア）
 */

import process from 'node:process';
import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import { parse } from '../parser/index.ts';
import { toQueryString } from '../query/render.ts';
import { buildPredicate } from '../evaluator/evaluator.ts';
import { FieldQueryError } from '../errors/errors.ts';
import { PRINT_MODES, describeQuery, evaluationOptions, isPrintMode, loadRecords, summarize } from './shared.ts';
import type { PrintMode } from './shared.ts';

export async function startRepl(): Promise<void> {
  const dataPath = process.env['FIELDQUERY_DATA'];
  if (!dataPath) {
    console.error('REPL error: FIELDQUERY_DATA environment variable is required (path to JSON array).');
    process.exit(1);
  }
  const records = await loadRecords(dataPath);

  let mode: PrintMode = 'result';
  let ignoreCase = false;
  let locale: string | undefined = undefined;

  const rl = readline.createInterface({ input, output, prompt: 'fieldquery> ' });
  rl.prompt();

  for await (const line of rl) {
    const text = line.trim();
    if (text === '') {
      rl.prompt();
      continue;
    }
    if (text === ':q') break;

    // 設定コマンド
    if (text.startsWith(':mode ')) {
      const m = text.slice(6).trim();
      if (isPrintMode(m)) {
        mode = m;
        console.log(`mode = ${mode}`);
      } else {
        console.log(`usage: :mode ${PRINT_MODES.join('|')}`);
      }
      rl.prompt();
      continue;
    }
    if (text.startsWith(':ignore ')) {
      const v = text.slice(8).trim();
      if (v === 'on') ignoreCase = true;
      else if (v === 'off') ignoreCase = false;
      else console.log('usage: :ignore on|off');
      console.log(`ignoreCase = ${ignoreCase}`);
      rl.prompt();
      continue;
    }
    if (text.startsWith(':locale')) {
      const v = text.slice(7).trim();
      locale = v || undefined;
      console.log(`locale = ${locale ?? '(unset)'}`);
      rl.prompt();
      continue;
    }

    try {
      const { query } = parse(text);
      if (mode === 'result') {
        const pred = buildPredicate(query, evaluationOptions(ignoreCase, locale, []));
        console.log(toQueryString(query));
        console.log(summarize(records.filter(pred)));
      } else {
        console.log(describeQuery(query, mode, { table: 'records' }));
      }
    } catch (err: unknown) {
      // 1行の失敗では REPL を終了しない
      if (err instanceof FieldQueryError) console.error(`[${err.code}] ${err.message}`);
      else throw err;
    }

    rl.prompt();
  }

  rl.close();
}
