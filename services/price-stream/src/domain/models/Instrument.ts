/**
 * 取扱銘柄の種別。
 */
export type InstrumentType = 'forex' | 'crypto';

/**
 * 取扱銘柄の定義。
 */
export interface Instrument {
  readonly symbol: string;
  readonly name: string;
  readonly type: InstrumentType;
}
