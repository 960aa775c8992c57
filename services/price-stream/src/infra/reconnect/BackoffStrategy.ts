/**
 * 再接続ポリシー
 *
 * - mode: 'fixed' は常に baseDelayMs、'exponential' は baseDelayMs * 2^n（maxDelayMs で頭打ち）
 * - maxAttempts: 連続失敗で諦めるまでの試行回数。Infinity で無制限
 */
export interface RetryPolicy {
  readonly mode: 'fixed' | 'exponential';
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly maxAttempts: number;
}

/**
 * 固定 1 秒間隔・無制限の再試行。
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  mode: 'fixed',
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  maxAttempts: Number.POSITIVE_INFINITY,
};

/**
 * インフラ層: バックオフ戦略の実装
 *
 * RetryPolicy に従って次の再接続までの遅延を計算し、試行回数を数える。
 */
export class BackoffStrategy {
  private attempt = 0;

  constructor(private readonly policy: RetryPolicy = DEFAULT_RETRY_POLICY) {}

  /**
   * 次の再接続までの遅延時間（ミリ秒）を取得し、試行回数を 1 進める。
   */
  getNextDelay(): number {
    const delay =
      this.policy.mode === 'fixed'
        ? this.policy.baseDelayMs
        : Math.min(this.policy.baseDelayMs * 2 ** this.attempt, this.policy.maxDelayMs);
    this.attempt += 1;
    return delay;
  }

  /**
   * これまでに払い出した遅延の数（= 予定済みの再試行回数）。
   */
  get attempts(): number {
    return this.attempt;
  }

  /**
   * maxAttempts を使い切ったか。
   */
  get exhausted(): boolean {
    return this.attempt >= this.policy.maxAttempts;
  }

  /**
   * バックオフカウンターをリセットする。
   * 接続成功時に呼び出される。
   */
  reset(): void {
    this.attempt = 0;
  }
}
