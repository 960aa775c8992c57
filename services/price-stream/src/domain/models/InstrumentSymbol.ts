import { InvalidSymbolError } from '@/domain/errors/PriceStreamError';

/**
 * 銘柄コードを正規化する（前後の空白除去 + 大文字化）。
 * マップのキーや比較はすべてこの形式で行う。
 * @param raw クライアントやアダプタから渡された銘柄コード
 * @returns 正規化済みの銘柄コード
 * @throws {InvalidSymbolError} 空文字の場合
 */
export function normalizeSymbol(raw: string): string {
  const symbol = raw.trim().toUpperCase();
  if (symbol.length === 0) {
    throw new InvalidSymbolError(raw);
  }
  return symbol;
}
