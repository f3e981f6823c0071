/**
 * 指数バックオフリトライユーティリティ
 *
 * @description 429/5xx エラーおよびネットワークエラー時に指数バックオフでリトライ
 */

/** デフォルトのリトライ対象ステータスコード */
export const DEFAULT_RETRY_STATUS_CODES: readonly number[] = [429, 500, 502, 503, 504];

export interface RetryOptions {
  /** 最大リトライ回数（デフォルト: 3） */
  maxRetries?: number;
  /** 基本遅延時間（ミリ秒、デフォルト: 500） */
  baseDelayMs?: number;
  /** 最大遅延時間（ミリ秒、デフォルト: 16000） */
  maxDelayMs?: number;
  /** ジッター幅（ミリ秒、デフォルト: 100） */
  jitterMs?: number;
  /** リトライ対象のステータスコード */
  retryStatusCodes?: readonly number[];
  /** リトライ時のコールバック */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

/**
 * リトライ可能なエラー
 */
export class RetryableError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RetryableError';
  }
}

/**
 * リトライ不可能なエラー（即座に失敗）
 */
export class NonRetryableError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'NonRetryableError';
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * ジッター付きの遅延時間を計算
 */
function calculateDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitterMs: number
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  return cappedDelay + Math.random() * jitterMs;
}

/**
 * undici の fetch 失敗（DNS、接続断など）は TypeError('fetch failed') で届く
 */
function isNetworkError(error: Error): boolean {
  return error.name === 'TypeError' && error.message.includes('fetch');
}

function hasRetryableStatus(error: Error, retryStatusCodes: readonly number[]): boolean {
  if (!('statusCode' in error)) {
    return false;
  }
  const { statusCode } = error;
  return typeof statusCode === 'number' && retryStatusCodes.includes(statusCode);
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * 指数バックオフリトライでラップされた関数を実行
 *
 * @example
 * ```typescript
 * const data = await withRetry(
 *   async () => {
 *     const response = await fetch(url);
 *     if (!response.ok) {
 *       throw new RetryableError('Request failed', response.status);
 *     }
 *     return response.json();
 *   },
 *   { maxRetries: 3, baseDelayMs: 1000 }
 * );
 * ```
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options?: RetryOptions
): Promise<T> {
  const {
    maxRetries = 3,
    baseDelayMs = 500,
    maxDelayMs = 16000,
    jitterMs = 100,
    retryStatusCodes = DEFAULT_RETRY_STATUS_CODES,
    onRetry,
  } = options ?? {};

  let attempt = 0;

  for (;;) {
    try {
      return await fn();
    } catch (caught) {
      const error = toError(caught);

      if (error instanceof NonRetryableError || attempt >= maxRetries) {
        throw error;
      }

      const isRetryable =
        error instanceof RetryableError ||
        hasRetryableStatus(error, retryStatusCodes) ||
        isNetworkError(error);

      if (!isRetryable) {
        throw error;
      }

      const delayMs = calculateDelay(attempt, baseDelayMs, maxDelayMs, jitterMs);
      attempt++;
      onRetry?.(attempt, error, delayMs);
      await sleep(delayMs);
    }
  }
}

/**
 * fetch をリトライ付きでラップ
 *
 * @example
 * ```typescript
 * const response = await fetchWithRetry('https://api.bls.gov/publicAPI/v2/timeseries/data/', {
 *   method: 'POST',
 *   headers: { 'Content-Type': 'application/json' },
 *   body: JSON.stringify({ seriesid: ['LNS14000000'] }),
 * });
 * ```
 */
export async function fetchWithRetry(
  url: string,
  init?: RequestInit,
  retryOptions?: RetryOptions
): Promise<Response> {
  const retryStatusCodes = retryOptions?.retryStatusCodes ?? DEFAULT_RETRY_STATUS_CODES;

  return withRetry(async () => {
    const response = await fetch(url, init);

    if (!response.ok) {
      const message = `HTTP ${response.status}: ${response.statusText}`;
      if (retryStatusCodes.includes(response.status)) {
        throw new RetryableError(message, response.status);
      }
      throw new NonRetryableError(message, response.status);
    }

    return response;
  }, retryOptions);
}
