/**
 * ログに付与する構造化メタデータ。
 * エラーは `{ err: error }` の形で渡す（pino の標準シリアライザが展開する）。
 */
export type LogMeta = Record<string, unknown>;

/**
 * ロガーインターフェース
 *
 * 実装は pino（infra/logger/PinoLogger）。各コンポーネントは
 * `child({ component })` で自分の名前を付けた子ロガーを使う。
 */
export interface Logger {
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;

  /**
   * コンテキスト（component, symbol, subscriberId など）を固定した子ロガーを作成する。
   * @param bindings 子ロガーのすべての行に付与する値
   */
  child(bindings: LogMeta): Logger;
}
