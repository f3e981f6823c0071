/**
 * 永続化ストア（CSV ファイル）
 *
 * @description date,series,value の3列 CSV を全件読み込み / 全件書き換えする。
 * 書き込みは一時ファイル + rename で行い、途中終了しても既存ファイルは壊れない
 */

import { promises as fs } from 'fs';
import path from 'path';
import { parseCsvLines, formatCsvRow } from './csv';
import { DATASET_COLUMNS, type Observation } from './types';
import { createLogger } from '../utils/logger';

const logger = createLogger({ module: 'dataset-store' });

/** YYYY-MM-DD（時刻部分は旧形式との互換のため許容して捨てる） */
const DATE_CELL = /^(\d{4})-(\d{2})-(\d{2})(?:[ T]00:00:00)?$/;

/**
 * ストアが読めない / 形式が壊れている
 */
export class DatasetCorruptError extends Error {
  constructor(
    public readonly filePath: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(`Dataset ${filePath} is unreadable: ${detail}`, options);
    this.name = 'DatasetCorruptError';
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function normalizeDateCell(cell: string): string | null {
  const match = DATE_CELL.exec(cell);
  if (!match) {
    return null;
  }
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  if (date.getUTCMonth() !== Number(m) - 1 || date.getUTCDate() !== Number(d)) {
    return null;
  }
  return `${y}-${m}-${d}`;
}

/**
 * CSV テキストを観測値に変換
 *
 * @throws {DatasetCorruptError} ヘッダーや値が不正な場合
 */
export function parseDatasetCsv(csvText: string, filePath = '<memory>'): Observation[] {
  const rows = parseCsvLines(csvText);
  if (rows.length === 0) {
    return [];
  }

  const header = rows[0].map((h) => h.toLowerCase());
  if (header.join(',') !== DATASET_COLUMNS.join(',')) {
    throw new DatasetCorruptError(filePath, `unexpected header "${rows[0].join(',')}"`);
  }

  const observations: Observation[] = [];
  for (let i = 1; i < rows.length; i++) {
    const cells = rows[i];
    const line = i + 1;
    if (cells.length !== DATASET_COLUMNS.length) {
      throw new DatasetCorruptError(filePath, `line ${line} has ${cells.length} columns`);
    }

    const [dateCell, series, valueCell] = cells;
    const date = normalizeDateCell(dateCell);
    if (!date) {
      throw new DatasetCorruptError(filePath, `line ${line} has invalid date "${dateCell}"`);
    }
    if (!series) {
      throw new DatasetCorruptError(filePath, `line ${line} has empty series`);
    }
    const value = valueCell === '' ? NaN : Number(valueCell);
    if (!Number.isFinite(value)) {
      throw new DatasetCorruptError(filePath, `line ${line} has invalid value "${valueCell}"`);
    }

    observations.push({ date, series, value });
  }

  return observations;
}

/**
 * 観測値を CSV テキストに変換（並び順はそのまま）
 */
export function serializeDataset(observations: readonly Observation[]): string {
  const lines = [formatCsvRow(DATASET_COLUMNS)];
  for (const obs of observations) {
    lines.push(formatCsvRow([obs.date, obs.series, obs.value]));
  }
  return `${lines.join('\n')}\n`;
}

/**
 * ストアを全件読み込む
 *
 * @returns ファイルが存在しない場合は null
 * @throws {DatasetCorruptError} 読めない・形式が不正な場合
 */
export async function readDataset(filePath: string): Promise<Observation[] | null> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    const detail = error instanceof Error ? error.message : String(error);
    throw new DatasetCorruptError(filePath, detail, { cause: error });
  }
  return parseDatasetCsv(text, filePath);
}

/**
 * ストアを全件書き換える（ディレクトリがなければ作成）
 *
 * @returns 書き込んだ行数
 */
export async function writeDataset(
  filePath: string,
  observations: readonly Observation[]
): Promise<number> {
  await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });

  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    await fs.writeFile(tmpPath, serializeDataset(observations), 'utf-8');
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    // 後始末の失敗で書き込みエラーを上書きしない
    await fs.rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
      logger.warn('Failed to remove temporary dataset file', { tmpPath, error: cleanupError });
    });
    throw error;
  }

  return observations.length;
}
