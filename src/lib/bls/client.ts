/**
 * BLS Public Data API クライアント
 *
 * @description レート制限、リトライ、タイムアウト、ログ対応
 * @see https://www.bls.gov/developers/api_signature_v2.htm
 */

import { z } from 'zod';
import { RateLimiter } from '../utils/rate-limiter';
import { fetchWithRetry, NonRetryableError } from '../utils/retry';
import { createLogger, type LogContext, type Logger } from '../utils/logger';
import type {
  BlsDatum,
  BlsTimeseriesRequest,
  BlsTimeseriesResponse,
  ParsedBlsPoint,
} from './types';

export const BLS_API_URL = 'https://api.bls.gov/publicAPI/v2/timeseries/data/';

/** BLS 正常応答ステータス */
const STATUS_SUCCEEDED = 'REQUEST_SUCCEEDED';

/** 月次期間コード（M13 = 年平均は含まない） */
const MONTHLY_PERIOD = /^M(0[1-9]|1[0-2])$/;

/** 観測値1件の最低限の形 */
const BlsDatumSchema = z.object({
  year: z.string(),
  period: z.string(),
  value: z.string(),
}) satisfies z.ZodType<Pick<BlsDatum, 'year' | 'period' | 'value'>>;

export interface BlsClientOptions {
  /** 登録キー（省略時は環境変数 BLS_API_KEY、未設定なら無登録で呼ぶ） */
  apiKey?: string;
  /** リクエストタイムアウト（ミリ秒、デフォルト: 30000） */
  timeoutMs?: number;
  /** ロガーコンテキスト */
  logContext?: LogContext;
}

export interface SeriesPointsResult {
  /** (日付, 値) の列。API の並び（新しい順）のまま */
  points: ParsedBlsPoint[];
  /** 数値変換できずスキップした件数 */
  skippedCount: number;
}

/**
 * 期間コードを月 (1-12) に変換。月次以外は null
 */
export function parseMonthlyPeriod(period: string): number | null {
  const match = MONTHLY_PERIOD.exec(period);
  return match ? Number(match[1]) : null;
}

/**
 * 年と月から YYYY-MM-01 を生成
 */
export function toMonthStart(year: number, month: number): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-01`;
}

/**
 * BLS API クライアント
 */
export class BlsClient {
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options?: BlsClientOptions) {
    this.apiKey = options?.apiKey ?? (process.env.BLS_API_KEY || undefined);
    this.timeoutMs = options?.timeoutMs ?? 30000;
    this.logger = createLogger({ module: 'bls-client', ...options?.logContext });
  }

  /**
   * timeseries/data に POST する
   */
  private async request(body: BlsTimeseriesRequest): Promise<BlsTimeseriesResponse> {
    await getBlsRateLimiter().acquire();

    this.logger.debug('BLS API request', {
      seriesIds: body.seriesid,
      startYear: body.startyear,
      endYear: body.endyear,
    });

    try {
      const response = await fetchWithRetry(
        BLS_API_URL,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            'Accept': 'application/json',
          },
          body: JSON.stringify(body),
          signal: AbortSignal.timeout(this.timeoutMs),
        },
        {
          maxRetries: 3,
          baseDelayMs: 1000,
          maxDelayMs: 16000,
          onRetry: (attempt, error, delayMs) => {
            this.logger.warn('BLS API request retry', {
              seriesIds: body.seriesid,
              attempt,
              delayMs,
              error,
            });
          },
        }
      );

      const data = (await response.json()) as BlsTimeseriesResponse;

      // BLS は HTTP 200 でも status で失敗を返す
      if (data.status !== STATUS_SUCCEEDED) {
        const detail = data.message?.join(' ') || 'no message';
        throw new NonRetryableError(`BLS API returned ${data.status}: ${detail}`);
      }

      return data;
    } catch (error) {
      this.logger.error('BLS API request failed', {
        seriesIds: body.seriesid,
        ...(error instanceof NonRetryableError ? { statusCode: error.statusCode } : {}),
        error,
      });
      throw error;
    }
  }

  /**
   * 1系列の月次観測値を取得
   *
   * @param seriesId BLS series ID (例: 'LNS14000000')
   * @param startYear 取得開始年（含む）
   * @param endYear 取得終了年（含む、省略時は今年）
   */
  async getSeriesPoints(
    seriesId: string,
    startYear: number,
    endYear: number = new Date().getFullYear()
  ): Promise<SeriesPointsResult> {
    if (!Number.isInteger(startYear) || !Number.isInteger(endYear) || startYear > endYear) {
      throw new RangeError(`Invalid year range: ${startYear}-${endYear}`);
    }

    const body: BlsTimeseriesRequest = {
      seriesid: [seriesId],
      startyear: String(startYear),
      endyear: String(endYear),
      ...(this.apiKey ? { registrationkey: this.apiKey } : {}),
    };

    const response = await this.request(body);

    const data = response.Results?.series?.[0]?.data;
    if (!Array.isArray(data)) {
      throw new Error(`BLS response for ${seriesId} is missing Results.series[0].data`);
    }

    let skippedCount = 0;
    const points: ParsedBlsPoint[] = [];

    for (const raw of data) {
      const parsed = BlsDatumSchema.safeParse(raw);
      if (!parsed.success) {
        skippedCount++;
        this.logger.warn('BLS observation is malformed', {
          seriesId,
          issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
        });
        continue;
      }

      const item = parsed.data;
      const month = parseMonthlyPeriod(item.period);
      if (month === null) {
        continue;
      }

      const year = /^\d{4}$/.test(item.year) ? Number(item.year) : NaN;
      // Number('') は 0 になるため空文字を先に弾く
      const value = item.value.trim() === '' ? NaN : Number(item.value);
      if (!Number.isInteger(year) || !Number.isFinite(value)) {
        skippedCount++;
        this.logger.warn('BLS observation has non-numeric value', {
          seriesId,
          year: item.year,
          period: item.period,
          value: item.value,
        });
        continue;
      }

      points.push({ date: toMonthStart(year, month), value });
    }

    this.logger.info('BLS observations fetched', {
      seriesId,
      total: data.length,
      valid: points.length,
      skipped: skippedCount,
    });

    return { points, skippedCount };
  }
}

// ============================================
// シングルトン レートリミッター
// ============================================

let blsRateLimiter: RateLimiter | null = null;

/**
 * BLS API 用のレートリミッターを取得
 * 公式制限: 10秒あたり50リクエスト / 登録キーありで1日500クエリ
 */
export function getBlsRateLimiter(): RateLimiter {
  if (!blsRateLimiter) {
    blsRateLimiter = new RateLimiter({
      requestsPerMinute: 25,
      minIntervalMs: 500,
    });
  }
  return blsRateLimiter;
}

export function createBlsClient(options?: BlsClientOptions): BlsClient {
  return new BlsClient(options);
}
