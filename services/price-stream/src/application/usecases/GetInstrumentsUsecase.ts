import type { Instrument } from '@/domain/models/Instrument';
import type { InstrumentRepository } from '@/domain/repositories/InstrumentRepository';

/**
 * アプリケーション層: 銘柄一覧の取得
 */
export class GetInstrumentsUsecase {
  constructor(private readonly repository: InstrumentRepository) {}

  execute(): readonly Instrument[] {
    return this.repository.findAll();
  }

  findBySymbol(symbol: string): Instrument | undefined {
    return this.repository.findBySymbol(symbol);
  }
}
