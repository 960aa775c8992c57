/**
 * 銘柄単位の上流接続への関心（参照カウント）を管理する契約。
 * 実装は application/services/FeedConnectionPool。
 */
export interface ConnectionPool {
  /**
   * 関心を 1 つ増やす。0 → 1 のときだけ上流に接続する。
   * @throws {UnsupportedSymbolError}
   * @throws {ConnectFailureError}
   */
  acquire(symbol: string): Promise<void>;

  /**
   * 関心を 1 つ減らす。1 → 0 のときだけ上流を切断する。例外は投げない。
   */
  release(symbol: string): Promise<void>;
}
