/**
 * メトリクスレジストリの最小インターフェース
 * prom-client の Registry 型を抽象化
 */
export interface MetricsRegistry {
  contentType: string;
}

/**
 * メトリクス収集インターフェース
 *
 * 責務: 配信パイプラインのカウンタとゲージを抽象化する。
 * 実装は infra/metrics/PrometheusMetricsCollector。
 */
export interface MetricsCollector {
  /**
   * 上流から受信したティック数をカウント
   * @param symbol 銘柄コード（BTCUSD など）
   */
  incrementTicksReceived(symbol: string): void;

  /**
   * 購読者への配信成功数をカウント
   */
  incrementDelivered(symbol: string): void;

  /**
   * 購読者への配信失敗数をカウント
   */
  incrementDeliveryFailed(symbol: string): void;

  /**
   * エラー数をカウント
   * @param errorType エラータイプ（parse_error, connect_failure, reconnect_exhausted など）
   */
  incrementError(errorType: string): void;

  /**
   * 再接続試行回数をカウント
   */
  incrementReconnect(symbol: string): void;

  /**
   * 稼働中の上流コネクタ数を設定
   */
  setActiveConnectors(count: number): void;

  /**
   * 購読関係（subscriberId × symbol）の総数を設定
   */
  setSubscriptions(count: number): void;

  /**
   * Prometheus 形式のメトリクス文字列を取得
   */
  getMetrics(): Promise<string>;

  /**
   * メトリクスレジストリを取得（HTTP サーバーで使用）
   */
  getRegistry(): MetricsRegistry;
}
