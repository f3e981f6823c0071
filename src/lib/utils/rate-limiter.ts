/**
 * API レート制限
 *
 * @description トークンバケットと最小間隔で外部 API へのリクエストを間引く。
 * acquire() は呼び出し順に1件ずつ通す
 */

export interface RateLimiterOptions {
  /** 1分あたりの最大リクエスト数（バケット容量を兼ねる、デフォルト: 60） */
  requestsPerMinute?: number;
  /** 最小リクエスト間隔（ミリ秒、デフォルト: 1000） */
  minIntervalMs?: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class RateLimiter {
  private readonly requestsPerMinute: number;
  private readonly minIntervalMs: number;
  private tokens: number;
  private refilledAt: number;
  private lastAcquiredAt = -Infinity;
  private turn: Promise<void> = Promise.resolve();

  constructor(options?: RateLimiterOptions) {
    this.requestsPerMinute = options?.requestsPerMinute ?? 60;
    this.minIntervalMs = options?.minIntervalMs ?? 1000;
    this.tokens = this.requestsPerMinute;
    this.refilledAt = Date.now();
  }

  /**
   * リクエスト実行前に呼ぶ。トークンと間隔が空くまで待つ
   */
  acquire(): Promise<void> {
    const next = this.turn.then(() => this.take());
    this.turn = next;
    return next;
  }

  private async take(): Promise<void> {
    const waitMs = this.waitMs();
    if (waitMs > 0) {
      await sleep(waitMs);
    }
    this.refill();
    this.tokens -= 1;
    this.lastAcquiredAt = Date.now();
  }

  private refill(): void {
    const now = Date.now();
    const added = ((now - this.refilledAt) * this.requestsPerMinute) / 60000;
    this.tokens = Math.min(this.requestsPerMinute, this.tokens + added);
    this.refilledAt = now;
  }

  private waitMs(): number {
    this.refill();
    const intervalWait = this.lastAcquiredAt + this.minIntervalMs - Date.now();
    const tokenWait =
      this.tokens >= 1 ? 0 : Math.ceil(((1 - this.tokens) * 60000) / this.requestsPerMinute);
    return Math.max(0, intervalWait, tokenWait);
  }
}
