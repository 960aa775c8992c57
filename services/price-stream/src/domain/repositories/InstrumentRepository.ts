import type { Instrument } from '@/domain/models/Instrument';

/**
 * 取扱銘柄テーブルの読み取りインターフェイス（インフラ層で実装される）。
 */
export interface InstrumentRepository {
  /**
   * すべての銘柄を返す。
   */
  findAll(): readonly Instrument[];

  /**
   * 銘柄コードで検索する（大文字小文字は区別しない）。
   * @param symbol 銘柄コード
   * @returns 見つからない場合は undefined
   */
  findBySymbol(symbol: string): Instrument | undefined;
}
