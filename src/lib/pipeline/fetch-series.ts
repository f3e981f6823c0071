/**
 * 系列単位の取得（部分失敗を結果型で表現）
 *
 * @description 1系列の失敗を例外として投げず、失敗理由つきの結果として返す。
 * 他系列の取得は継続される
 */

import type { BlsSeriesConfig } from '../bls/series-config';
import type { ParsedBlsPoint } from '../bls/types';
import type { Logger } from '../utils/logger';

/** getSeriesPoints を持つクライアント（テストでは差し替え） */
export interface SeriesPointSource {
  getSeriesPoints(
    seriesId: string,
    startYear: number,
    endYear?: number
  ): Promise<{ points: ParsedBlsPoint[]; skippedCount: number }>;
}

export type SeriesFetchResult =
  | {
      ok: true;
      series: BlsSeriesConfig;
      points: ParsedBlsPoint[];
      skippedCount: number;
    }
  | {
      ok: false;
      series: BlsSeriesConfig;
      reason: string;
    };

/**
 * 1系列を取得する。例外は捕捉して ok: false を返す
 */
export async function fetchSeriesPoints(
  source: SeriesPointSource,
  series: BlsSeriesConfig,
  startYear: number,
  endYear: number,
  logger: Logger
): Promise<SeriesFetchResult> {
  try {
    const { points, skippedCount } = await source.getSeriesPoints(
      series.seriesId,
      startYear,
      endYear
    );
    return { ok: true, series, points, skippedCount };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.error('Failed to fetch BLS series', {
      seriesKey: series.key,
      seriesId: series.seriesId,
      error,
    });
    return { ok: false, series, reason };
  }
}
