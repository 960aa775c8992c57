import type { Instrument } from '@/domain/models/Instrument';
import type { InstrumentRepository } from '@/domain/repositories/InstrumentRepository';

export const DEFAULT_INSTRUMENTS: readonly Instrument[] = [
  { symbol: 'EURUSD', name: 'Euro/US Dollar', type: 'forex' },
  { symbol: 'USDJPY', name: 'US Dollar/Japanese Yen', type: 'forex' },
  { symbol: 'BTCUSD', name: 'Bitcoin/US Dollar', type: 'crypto' },
];

/**
 * インフラ層: 読み取り専用の銘柄テーブル
 *
 * 起動時に渡された一覧を凍結して保持する。プロセス全体のシングルトンにはしない。
 */
export class InMemoryInstrumentRepository implements InstrumentRepository {
  private readonly instruments: readonly Instrument[];
  private readonly bySymbol: ReadonlyMap<string, Instrument>;

  constructor(instruments: readonly Instrument[] = DEFAULT_INSTRUMENTS) {
    this.instruments = Object.freeze(instruments.map((instrument) => Object.freeze({ ...instrument })));
    this.bySymbol = new Map(this.instruments.map((instrument) => [instrument.symbol.toUpperCase(), instrument]));
  }

  findAll(): readonly Instrument[] {
    return this.instruments;
  }

  findBySymbol(symbol: string): Instrument | undefined {
    return this.bySymbol.get(symbol.trim().toUpperCase());
  }
}
