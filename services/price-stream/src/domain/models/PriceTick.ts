/**
 * ドメイン層: 正規化された価格ティック
 *
 * 上流フィードから受信した 1 件の価格観測値。取引所固有の形式はアダプタで吸収済み。
 * 生成後は不変（Object.freeze）として扱う。
 */
export interface PriceTick {
  /** 銘柄コード（正規化済み、例: 'BTCUSD'） */
  readonly symbol: string;
  /** 価格（取引所が送ってきた 10 進文字列をそのまま保持する） */
  readonly value: string;
  /** 観測時刻（エポックミリ秒） */
  readonly observedAt: number;
}

/**
 * 不変の PriceTick を生成する。
 * @param symbol 正規化済みの銘柄コード
 * @param value 10 進文字列の価格
 * @param observedAt 観測時刻（エポックミリ秒）
 */
export function createPriceTick(symbol: string, value: string, observedAt: number): PriceTick {
  return Object.freeze({ symbol, value, observedAt });
}
