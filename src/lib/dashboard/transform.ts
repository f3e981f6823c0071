/**
 * ダッシュボード用の絞り込み・変換
 *
 * @description 年範囲 / 系列での絞り込み、縦持ち → 横持ち変換、CSV エクスポート
 */

import { BLS_SERIES, getSeriesLabel, type MetricFormat } from '../bls/series-config';
import { formatCsvRow } from '../store/csv';
import type { Observation } from '../store/types';

export interface YearBounds {
  min: number;
  max: number;
}

export interface YearRange {
  from: number;
  to: number;
}

/** 横持ち1行（1日付） */
export interface WideRow {
  date: string;
  values: Record<string, number | undefined>;
}

export interface WideTable {
  /** 系列キー（列順） */
  columns: string[];
  rows: WideRow[];
}

function yearOf(date: string): number {
  return Number(date.slice(0, 4));
}

/**
 * 年範囲（両端含む）で絞り込み
 */
export function filterByYearRange(
  rows: readonly Observation[],
  from: number,
  to: number
): Observation[] {
  return rows.filter((r) => {
    const year = yearOf(r.date);
    return year >= from && year <= to;
  });
}

/**
 * 系列キーで絞り込み
 */
export function filterBySeries(
  rows: readonly Observation[],
  seriesKeys: readonly string[]
): Observation[] {
  const keys = new Set(seriesKeys);
  return rows.filter((r) => keys.has(r.series));
}

/**
 * データに含まれる年の最小・最大
 */
export function getYearBounds(rows: readonly Observation[]): YearBounds | null {
  if (rows.length === 0) {
    return null;
  }
  let min = Infinity;
  let max = -Infinity;
  for (const r of rows) {
    const year = yearOf(r.date);
    min = Math.min(min, year);
    max = Math.max(max, year);
  }
  return { min, max };
}

/**
 * 表示する年範囲を決定
 *
 * クエリ指定があればデータ範囲内に丸め、なければ直近 defaultYears 年（未指定なら全期間）
 */
export function resolveYearRange(
  bounds: YearBounds,
  query: { from?: number; to?: number },
  defaultYears?: number
): YearRange {
  const clamp = (y: number) => Math.min(bounds.max, Math.max(bounds.min, y));

  const defaultFrom = defaultYears
    ? Math.max(bounds.min, bounds.max - defaultYears + 1)
    : bounds.min;

  let from = clamp(query.from ?? defaultFrom);
  let to = clamp(query.to ?? bounds.max);
  if (from > to) {
    [from, to] = [to, from];
  }
  return { from, to };
}

/**
 * 最新日付の各系列の値
 */
export function latestObservations(
  rows: readonly Observation[]
): { date: string; values: Record<string, number> } | null {
  if (rows.length === 0) {
    return null;
  }

  const date = rows.reduce((max, r) => (r.date > max ? r.date : max), rows[0].date);
  const values: Record<string, number> = {};
  for (const r of rows) {
    if (r.date === date) {
      values[r.series] = r.value;
    }
  }
  return { date, values };
}

/**
 * 縦持ち (date, series, value) → 横持ち（1日付1行、1系列1列）
 *
 * 列順は系列キーの辞書順
 */
export function pivotWide(rows: readonly Observation[]): WideTable {
  const byDate = new Map<string, WideRow>();
  const columns = new Set<string>();

  for (const r of rows) {
    columns.add(r.series);
    let wide = byDate.get(r.date);
    if (!wide) {
      wide = { date: r.date, values: {} };
      byDate.set(r.date, wide);
    }
    wide.values[r.series] = r.value;
  }

  return {
    columns: [...columns].sort(),
    rows: [...byDate.values()].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0)),
  };
}

/**
 * エクスポート用の横持ち CSV
 *
 * 列: Date + 登録済み5系列（キーの辞書順、表示ラベル）+ 未登録系列（キーそのまま）
 */
export function toWideCsv(rows: readonly Observation[]): string {
  const table = pivotWide(rows);

  const registered = BLS_SERIES.map((s) => s.key).sort();
  const registeredSet = new Set<string>(registered);
  const columns = [
    ...registered,
    ...table.columns.filter((key) => !registeredSet.has(key)),
  ];

  const lines = [formatCsvRow(['Date', ...columns.map(getSeriesLabel)])];
  for (const row of table.rows) {
    lines.push(
      formatCsvRow([row.date, ...columns.map((key) => row.values[key] ?? '')])
    );
  }
  return `${lines.join('\n')}\n`;
}

/**
 * メトリクス表示用のフォーマット
 */
export function formatMetric(value: number, format: MetricFormat): string {
  if (format === 'integer') {
    return value.toLocaleString('en-US', { maximumFractionDigits: 0 });
  }
  return value.toFixed(1);
}

const monthYearFormatter = new Intl.DateTimeFormat('en-US', {
  month: 'long',
  year: 'numeric',
  timeZone: 'UTC',
});

/**
 * YYYY-MM-DD → "March 2024"
 */
export function formatMonthYear(date: string): string {
  const [y, m] = date.split('-').map(Number);
  return monthYearFormatter.format(new Date(Date.UTC(y, m - 1, 1)));
}
