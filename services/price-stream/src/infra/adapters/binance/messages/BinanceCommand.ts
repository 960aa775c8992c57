/**
 * Binance WebSocket API に送信する購読コマンド。
 * params は `<vendorSymbol>@aggTrade` 形式のストリーム名。
 */
export interface BinanceCommand {
  method: 'SUBSCRIBE' | 'UNSUBSCRIBE';
  params: string[];
  id: number;
}
