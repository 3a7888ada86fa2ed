/// <reference types="node" />
/**
 * fieldquery CLI
 *
 * 目的:
 * - クエリ文字列を受け取り、正規形テキスト / 再構成表現 / JSON木 / SQL / 参照フィールド / 評価結果を出力する。
 * - 入力は --query／--query-file／STDIN のいずれか。データは JSON 配列ファイル（--data）か SQLite DB（--db）。
 *
 * 使い方:
 *   echo 'tags:ocean AND depth:[* TO 200]' | fieldquery --data examples/catalog.json --print result
 *   fieldquery --query 'site:"Station B" -status:retired' --print sql --table samples --default-field title
 *   fieldquery --db catalog.db --table samples --default-field title --query 'title:ridge*'
 *   fieldquery repl   // 対話モード（簡易REPL）
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';
import Database from 'better-sqlite3';
import { parse } from '../parser/index.ts';
import { buildPredicate } from '../evaluator/evaluator.ts';
import { selectMatching } from '../adapters/sqlite/index.ts';
import type { SqlOptions } from '../adapters/sqlite/index.ts';
import { createSqliteClient } from '../adapters/sqlite/client.ts';
import { FieldQueryError } from '../errors/errors.ts';
import { PRINT_MODES, isPrintMode, describeQuery, evaluationOptions, loadRecords, summarize } from './shared.ts';
import type { PrintMode } from './shared.ts';

type Args = {
  cmd?: 'run' | 'repl';
  data?: string;
  db?: string;
  table?: string;
  defaultFields: string[];
  query?: string;
  queryFile?: string;
  print?: PrintMode;
  ignoreCase?: boolean;
  locale?: string;
};

function printHelp(): void {
  console.log(`fieldquery CLI

Usage:
  echo 'tags:ocean AND depth:[* TO 200]' | fieldquery --data examples/catalog.json --print result
  fieldquery --query 'site:"Station B"' --print sql --table samples
  fieldquery --db catalog.db --table samples --query 'title:ridge*'
  fieldquery repl

Options:
  --query "<query>"        Inline query string
  --query-file <path>      File containing the query
  --print <mode>           ${PRINT_MODES.join('|')} (default: result)
  --data <path>            JSON array file (result mode)
  --db <path>              SQLite database file (result mode, with --table)
  --table <name>           Table name for sql/--db
  --default-field <name>   Field searched by unnamed terms (repeatable)
  --ignore-case            Case-insensitive text matching
  --locale <bcp47>         Locale for text matching (e.g., tr, fr)
`);
}

function nextValueOrExit(argv: string[], idxRef: { i: number }, flag: string): string {
  idxRef.i++;
  const v = argv[idxRef.i];
  if (typeof v === 'string' && v.length > 0 && !v.startsWith('--')) return v;
  console.error(`Error: ${flag} requires a value`);
  printHelp();
  process.exit(1);
}

function parseArgs(argv: string[]): Args {
  const args: Args = { defaultFields: [] };
  const ref = { i: 1 };
  // サブコマンド風に "repl" を認識
  if (argv[2] === 'repl') {
    args.cmd = 'repl';
    return args;
  }
  while (++ref.i < argv.length) {
    const a = argv[ref.i];
    if (a === '--data') args.data = nextValueOrExit(argv, ref, '--data');
    else if (a === '--db') args.db = nextValueOrExit(argv, ref, '--db');
    else if (a === '--table') args.table = nextValueOrExit(argv, ref, '--table');
    else if (a === '--default-field') args.defaultFields.push(nextValueOrExit(argv, ref, '--default-field'));
    else if (a === '--query') args.query = nextValueOrExit(argv, ref, '--query');
    else if (a === '--query-file') args.queryFile = nextValueOrExit(argv, ref, '--query-file');
    else if (a === '--print') {
      const v = nextValueOrExit(argv, ref, '--print');
      if (isPrintMode(v)) args.print = v;
      else {
        console.error(`Error: --print must be one of ${PRINT_MODES.map((m) => `"${m}"`).join(' | ')} (got "${v}")`);
        printHelp();
        process.exit(1);
      }
    } else if (a === '--ignore-case') args.ignoreCase = true;
    else if (a === '--locale') args.locale = nextValueOrExit(argv, ref, '--locale');
    else if (a === '--help' || a === '-h') {
      printHelp();
      process.exit(0);
    } else {
      console.error(`Unknown option: ${a}`);
      printHelp();
      process.exit(1);
    }
  }
  return args;
}

async function readQueryText(args: Args): Promise<string> {
  if (args.query) return args.query;
  if (args.queryFile) return (await fs.readFile(path.resolve(args.queryFile), 'utf8')).trim();
  // STDIN
  if (!process.stdin.isTTY) {
    return await new Promise<string>((resolve, reject) => {
      let buf = '';
      process.stdin.setEncoding('utf8');
      process.stdin.on('data', (chunk) => {
        buf += chunk;
      });
      process.stdin.on('end', () => resolve(buf.trim()));
      process.stdin.on('error', reject);
    });
  }
  console.error('Error: --query or --query-file or STDIN is required');
  printHelp();
  process.exit(1);
}

async function runOnce(args: Args): Promise<void> {
  const text = await readQueryText(args);
  const { query } = parse(text);
  const sqlOptions: SqlOptions = { table: args.table ?? 'records', defaultColumns: args.defaultFields };

  const mode = args.print ?? 'result';
  if (mode !== 'result') {
    console.log(describeQuery(query, mode, sqlOptions));
    return;
  }

  if (args.db) {
    if (!args.table) {
      console.error('Error: --table <name> is required with --db');
      process.exit(1);
    }
    const db = new Database(path.resolve(args.db), { readonly: true, fileMustExist: true });
    try {
      console.log(summarize(await selectMatching(createSqliteClient(db), query, sqlOptions)));
    } finally {
      db.close();
    }
    return;
  }

  if (!args.data) {
    console.error('Error: --data <path> or --db <path> is required for --print result');
    printHelp();
    process.exit(1);
  }
  const records = await loadRecords(args.data);
  const pred = buildPredicate(query, evaluationOptions(args.ignoreCase ?? false, args.locale, args.defaultFields));
  console.log(summarize(records.filter(pred)));
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv);
  if (args.cmd === 'repl') {
    const { startRepl } = await import('./repl.ts');
    await startRepl();
    return;
  }
  await runOnce(args);
}

main().catch((err: unknown) => {
  if (err instanceof FieldQueryError) console.error(`fieldquery error [${err.code}]: ${err.message}`);
  else console.error('fieldquery error:', err);
  process.exit(1);
});
