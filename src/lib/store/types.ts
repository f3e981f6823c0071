/**
 * 永続化データセットの型定義
 */

/**
 * 1観測値（識別キー = date + series）
 */
export interface Observation {
  /** 月初日 (YYYY-MM-01) */
  date: string;
  /** 系列キー。旧バージョンの未登録キーもそのまま保持する */
  series: string;
  value: number;
}

/** CSV ヘッダー（列順固定） */
export const DATASET_COLUMNS = ['date', 'series', 'value'] as const;
