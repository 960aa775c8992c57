import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { BackoffStrategy, DEFAULT_RETRY_POLICY, type RetryPolicy } from '@/infra/reconnect/BackoffStrategy';

export interface ReconnectManagerOptions {
  /** 再試行ポリシー（未指定なら固定 1 秒・無制限） */
  policy?: RetryPolicy;
  /** メトリクスのラベル（銘柄コード） */
  label?: string;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
  /** maxAttempts を使い切ったときに 1 回だけ呼ばれる */
  onExhausted?: () => void;
}

/**
 * インフラ層: 再接続スケジューラ（connect 関数を受け取って再試行）
 *
 * 責務: 再接続のスケジュール管理。接続関数を受け取り、失敗時はポリシーに従って再試行する。
 */
export class ReconnectManager {
  private readonly backoff: BackoffStrategy;
  private readonly logger: Logger;
  private readonly label: string;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private stopped = false;

  /**
   * @param connectFn 再接続時に実行する接続関数
   */
  constructor(
    private readonly connectFn: () => Promise<void>,
    private readonly options: ReconnectManagerOptions = {}
  ) {
    this.backoff = new BackoffStrategy(options.policy ?? DEFAULT_RETRY_POLICY);
    this.label = options.label ?? 'unknown';
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'ReconnectManager', label: this.label });
  }

  /**
   * 再接続をスケジュールする。
   * 停止済み、または試行回数を使い切っている場合は何もしない（後者は onExhausted を呼ぶ）。
   */
  scheduleReconnect(): void {
    if (this.stopped) {
      return;
    }
    if (this.backoff.exhausted) {
      this.stopped = true;
      this.logger.error('Reconnect attempts exhausted', { attempts: this.backoff.attempts });
      this.options.onExhausted?.();
      return;
    }

    const delay = this.backoff.getNextDelay();
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
    }
    this.logger.info('Reconnect scheduled', { delay, attempt: this.backoff.attempts });
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      void this.safeConnect();
    }, delay);
  }

  /**
   * 再接続管理を停止する。予約済みのタイマーも取り消す。
   */
  stop(): void {
    this.stopped = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  /**
   * 接続成功後に呼ぶ。停止状態を解除し、バックオフを最初からやり直す。
   */
  reset(): void {
    this.stopped = false;
    this.backoff.reset();
  }

  /**
   * 再接続タイマーが予約されているか。
   */
  get pending(): boolean {
    return this.reconnectTimer !== null;
  }

  /**
   * 安全に接続を試みる。
   * 成功時はバックオフをリセットし、失敗時は再接続をスケジュールする。
   */
  private async safeConnect(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.options.metricsCollector?.incrementReconnect(this.label);

    try {
      await this.connectFn();
      this.backoff.reset();
    } catch (error) {
      this.logger.error('Reconnect attempt failed', { err: error });
      this.scheduleReconnect();
    }
  }
}
