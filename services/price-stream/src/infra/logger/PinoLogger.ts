import pino from 'pino';
import type { LogMeta, Logger } from '@/application/interfaces/Logger';

export interface PinoLoggerOptions {
  level?: string;
  pretty?: boolean;
}

/**
 * pino を使用したロガー実装
 *
 * 開発環境では `pino-pretty` で人間可読形式、本番環境では JSON 形式で出力する。
 * 子ロガーも同じクラスで包むので、呼び出し側からは区別できない。
 */
export class PinoLogger implements Logger {
  private readonly pinoLogger: pino.Logger;

  /**
   * @param options ログレベルと出力形式
   * @param instance 既存の pino インスタンス（child() から渡される）
   */
  constructor(options?: PinoLoggerOptions, instance?: pino.Logger) {
    this.pinoLogger = instance ?? PinoLogger.createRoot(options);
  }

  debug(msg: string, meta?: LogMeta): void {
    this.pinoLogger.debug(meta ?? {}, msg);
  }

  info(msg: string, meta?: LogMeta): void {
    this.pinoLogger.info(meta ?? {}, msg);
  }

  warn(msg: string, meta?: LogMeta): void {
    this.pinoLogger.warn(meta ?? {}, msg);
  }

  error(msg: string, meta?: LogMeta): void {
    this.pinoLogger.error(meta ?? {}, msg);
  }

  child(bindings: LogMeta): Logger {
    return new PinoLogger(undefined, this.pinoLogger.child(bindings));
  }

  private static createRoot(options?: PinoLoggerOptions): pino.Logger {
    const level = options?.level ?? process.env.LOG_LEVEL ?? 'info';
    const usePretty = options?.pretty ?? process.env.NODE_ENV !== 'production';

    if (!usePretty) {
      return pino({ level });
    }

    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      },
    });
  }
}
