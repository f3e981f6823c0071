/**
 * utils/retry.ts のユニットテスト
 *
 * BLS クライアントが依存する挙動（429/5xx とネットワーク断のリトライ、
 * それ以外の即時失敗、cause の保持）を確認する
 */

import { vi, describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  DEFAULT_RETRY_STATUS_CODES,
  NonRetryableError,
  RetryableError,
  fetchWithRetry,
  withRetry,
} from '@/lib/utils/retry';

const BLS_URL = 'https://api.bls.gov/publicAPI/v2/timeseries/data/';

function blsResponse(status: number, statusText: string): Response {
  return new Response(status === 200 ? '{"status":"REQUEST_SUCCEEDED"}' : statusText, {
    status,
    statusText,
  });
}

describe('retry.ts', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('エラークラス', () => {
    it('cause をオプションで受け取り保持する', () => {
      const cause = new TypeError('fetch failed');
      const error = new RetryableError('HTTP 503: Service Unavailable', 503, { cause });

      expect(error.name).toBe('RetryableError');
      expect(error.statusCode).toBe(503);
      expect(error.cause).toBe(cause);
    });

    it('NonRetryableError は statusCode なしでも作れる', () => {
      const error = new NonRetryableError('BLS API returned REQUEST_NOT_PROCESSED: no message');

      expect(error.name).toBe('NonRetryableError');
      expect(error.statusCode).toBeUndefined();
      expect(error.cause).toBeUndefined();
    });
  });

  it('デフォルトのリトライ対象は 429 と 5xx', () => {
    expect(DEFAULT_RETRY_STATUS_CODES).toEqual([429, 500, 502, 503, 504]);
  });

  describe('withRetry', () => {
    it('デフォルトは3回リトライ（計4回）で諦める', async () => {
      const fn = vi.fn().mockRejectedValue(new RetryableError('HTTP 503: Service Unavailable', 503));

      const settled = withRetry(fn, { jitterMs: 0 }).catch((e: unknown) => e);
      await vi.runAllTimersAsync();

      const error = await settled;
      expect(error).toBeInstanceOf(RetryableError);
      expect(fn).toHaveBeenCalledTimes(4);
    });

    it('デフォルトの待機は 500ms から倍々', async () => {
      const onRetry = vi.fn();
      const fn = vi
        .fn()
        .mockRejectedValueOnce(new RetryableError('HTTP 429: Too Many Requests', 429))
        .mockRejectedValueOnce(new RetryableError('HTTP 429: Too Many Requests', 429))
        .mockResolvedValue('ok');

      const pending = withRetry(fn, { jitterMs: 0, onRetry });
      await vi.advanceTimersByTimeAsync(500);
      await vi.advanceTimersByTimeAsync(1000);

      await expect(pending).resolves.toBe('ok');
      expect(onRetry.mock.calls.map(([attempt, , delayMs]) => [attempt, delayMs])).toEqual([
        [1, 500],
        [2, 1000],
      ]);
    });

    it('undici のネットワーク断 TypeError("fetch failed") はリトライする', async () => {
      const fn = vi
        .fn()
        .mockRejectedValueOnce(new TypeError('fetch failed', { cause: new Error('ECONNRESET') }))
        .mockResolvedValue('ok');

      const pending = withRetry(fn, { baseDelayMs: 1000, jitterMs: 0 });
      await vi.advanceTimersByTimeAsync(1000);

      await expect(pending).resolves.toBe('ok');
      expect(fn).toHaveBeenCalledTimes(2);
    });

    it('fetch と無関係な TypeError やタイムアウトはリトライしない', async () => {
      const typeError = vi.fn().mockRejectedValue(new TypeError("Cannot read properties of null (reading 'trim')"));
      const timeout = vi
        .fn()
        .mockRejectedValue(new DOMException('The operation was aborted due to timeout', 'TimeoutError'));

      await expect(withRetry(typeError)).rejects.toThrow(TypeError);
      await expect(withRetry(timeout)).rejects.toMatchObject({ name: 'TimeoutError' });
      expect(typeError).toHaveBeenCalledTimes(1);
      expect(timeout).toHaveBeenCalledTimes(1);
    });

    it('NonRetryableError は残り回数があっても即失敗', async () => {
      const fn = vi
        .fn()
        .mockRejectedValue(new NonRetryableError('BLS API returned REQUEST_NOT_PROCESSED: Daily threshold exceeded.'));

      await expect(withRetry(fn, { maxRetries: 3 })).rejects.toThrow('Daily threshold exceeded.');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('statusCode を持つ任意のエラーも対象コードならリトライする', async () => {
      const fn = vi
        .fn()
        .mockRejectedValueOnce(Object.assign(new Error('upstream'), { statusCode: 502 }))
        .mockRejectedValueOnce(Object.assign(new Error('bad request'), { statusCode: 400 }));

      const settled = withRetry(fn, { baseDelayMs: 10, jitterMs: 0 }).catch((e: unknown) => e);
      await vi.runAllTimersAsync();

      await expect(settled).resolves.toMatchObject({ message: 'bad request', statusCode: 400 });
      expect(fn).toHaveBeenCalledTimes(2);
    });
  });

  describe('fetchWithRetry', () => {
    it('BLS が 503 を返したら待ってから再送する', async () => {
      vi.stubGlobal(
        'fetch',
        vi
          .fn()
          .mockResolvedValueOnce(blsResponse(503, 'Service Unavailable'))
          .mockResolvedValueOnce(blsResponse(200, 'OK'))
      );
      const init = { method: 'POST', body: '{"seriesid":["LNS14000000"]}' };

      const pending = fetchWithRetry(BLS_URL, init, { baseDelayMs: 1000, jitterMs: 0 });
      await vi.advanceTimersByTimeAsync(1000);

      const response = await pending;
      expect(response.status).toBe(200);
      expect(fetch).toHaveBeenCalledTimes(2);
      expect(fetch).toHaveBeenNthCalledWith(2, BLS_URL, init);
    });

    it('404 は HTTP ステータスつきの NonRetryableError', async () => {
      vi.stubGlobal('fetch', vi.fn().mockResolvedValue(blsResponse(404, 'Not Found')));

      const error = await fetchWithRetry(BLS_URL).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NonRetryableError);
      expect(error).toMatchObject({ message: 'HTTP 404: Not Found', statusCode: 404 });
      expect(fetch).toHaveBeenCalledTimes(1);
    });

    it('retryStatusCodes を絞ると 503 も即失敗', async () => {
      vi.stubGlobal('fetch', vi.fn().mockResolvedValue(blsResponse(503, 'Service Unavailable')));

      await expect(fetchWithRetry(BLS_URL, undefined, { retryStatusCodes: [429] })).rejects.toThrow(
        'HTTP 503: Service Unavailable'
      );
      expect(fetch).toHaveBeenCalledTimes(1);
    });
  });
});
