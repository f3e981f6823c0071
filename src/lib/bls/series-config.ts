/**
 * BLS 取得対象系列の定義
 *
 * @description 5系列の内部キー・BLS series ID・表示ラベル
 */

/** ダッシュボードのタブ分類 */
export type SeriesCategory = 'employment' | 'wages_hours' | 'utilization';

/** メトリクス表示形式 */
export type MetricFormat = 'integer' | 'decimal1';

export interface BlsSeriesConfig {
  /** 内部キー（CSV の series 列） */
  key: string;
  /** BLS series ID（API にそのまま渡す） */
  seriesId: string;
  /** 表示ラベル */
  label: string;
  /** タブ分類 */
  category: SeriesCategory;
  /** チャートの縦軸ラベル */
  axisLabel: string;
  /** メトリクス表示形式 */
  format: MetricFormat;
}

/**
 * BLS 5系列の定義
 */
export const BLS_SERIES = [
  { key: 'nonfarm_employment',        seriesId: 'CES0000000001', label: 'Nonfarm Employment (Thousands)',     category: 'employment',  axisLabel: 'Employment (Thousands)', format: 'integer' },
  { key: 'unemployment_rate',         seriesId: 'LNS14000000',   label: 'Unemployment Rate (%)',              category: 'employment',  axisLabel: 'Unemployment Rate (%)',  format: 'decimal1' },
  { key: 'labor_force_participation', seriesId: 'LNS11300000',   label: 'Labor Force Participation Rate (%)', category: 'utilization', axisLabel: 'Percent (%)',            format: 'decimal1' },
  { key: 'avg_hourly_earnings',       seriesId: 'CES0500000003', label: 'Average Hourly Earnings ($)',        category: 'wages_hours', axisLabel: 'Dollars ($)',            format: 'decimal1' },
  { key: 'avg_weekly_hours',          seriesId: 'CES0500000002', label: 'Average Weekly Hours',               category: 'wages_hours', axisLabel: 'Hours',                  format: 'decimal1' },
] as const satisfies readonly BlsSeriesConfig[];

/** 登録済み系列キー */
export type SeriesKey = (typeof BLS_SERIES)[number]['key'];

/** 系列レジストリ（テストではモックレジストリを渡す） */
export type SeriesRegistry = readonly BlsSeriesConfig[];

const LABELS: ReadonlyMap<string, string> = new Map(
  BLS_SERIES.map((s) => [s.key, s.label])
);

/**
 * 表示ラベルを取得（未登録キーはそのまま返す）
 */
export function getSeriesLabel(key: string): string {
  return LABELS.get(key) ?? key;
}

/**
 * キーから系列定義を取得
 */
export function findSeries(
  key: string,
  registry: SeriesRegistry = BLS_SERIES
): BlsSeriesConfig | undefined {
  return registry.find((s) => s.key === key);
}

/**
 * 登録済み系列キーかどうか
 */
export function isKnownSeries(key: string): key is SeriesKey {
  return LABELS.has(key);
}

/**
 * 登録済みキーと未登録キーに分ける（順序は保持）
 */
export function partitionSeriesKeys(keys: readonly string[]): {
  known: SeriesKey[];
  unknown: string[];
} {
  const known: SeriesKey[] = [];
  const unknown: string[] = [];
  for (const key of keys) {
    if (isKnownSeries(key)) {
      known.push(key);
    } else {
      unknown.push(key);
    }
  }
  return { known, unknown };
}
