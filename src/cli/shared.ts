// src/cli/shared.ts
// CLI と REPL で共用する入出力ヘルパー

import fs from 'node:fs/promises';
import path from 'node:path';
import { toQueryString } from '../query/render.ts';
import { toRepr } from '../query/repr.ts';
import { collectFieldNames } from '../query/analysis.ts';
import type { Query } from '../query/types.ts';
import type { CatalogRecord, EvaluateOptions } from '../evaluator/evaluator.ts';
import { queryToSql } from '../adapters/sqlite/index.ts';
import type { SqlOptions } from '../adapters/sqlite/index.ts';

export const PRINT_MODES = ['text', 'repr', 'json', 'sql', 'fields', 'result'] as const;
export type PrintMode = (typeof PRINT_MODES)[number];

export function isPrintMode(v: string): v is PrintMode {
  return PRINT_MODES.some((m) => m === v);
}

// JSON 配列のデータファイルを読み、オブジェクトの要素だけを返す
export async function loadRecords(file: string): Promise<CatalogRecord[]> {
  const raw = await fs.readFile(path.resolve(file), 'utf8');
  const data: unknown = JSON.parse(raw);
  if (!Array.isArray(data)) {
    throw new Error('data file must contain a JSON array (got non-array root).');
  }
  return data.filter(isRecord);
}

function isRecord(value: unknown): value is CatalogRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function evaluationOptions(ignoreCase: boolean, locale: string | undefined, defaultFields: string[]): EvaluateOptions {
  const options: EvaluateOptions = { ignoreCase };
  if (locale !== undefined) options.locale = locale;
  if (defaultFields.length > 0) options.defaultFields = defaultFields;
  return options;
}

// 評価結果の要約（件数・id・先頭5件）
export function summarize(rows: readonly Record<string, unknown>[]): string {
  return JSON.stringify(
    {
      count: rows.length,
      ids: rows.map((r) => r['id']).filter((x) => x !== undefined),
      sample: rows.slice(0, 5),
    },
    null,
    2,
  );
}

// 結果以外の出力モード（CLI と REPL で共用）
export function describeQuery(query: Query, mode: Exclude<PrintMode, 'result'>, sqlOptions: SqlOptions): string {
  switch (mode) {
    case 'text':
      return toQueryString(query);
    case 'repr':
      return toRepr(query);
    case 'json':
      return JSON.stringify(query, null, 2);
    case 'fields':
      return collectFieldNames(query).join('\n');
    case 'sql':
      return JSON.stringify(queryToSql(query, sqlOptions), null, 2);
  }
}

