import type { Logger } from '@/application/interfaces/Logger';
import { PinoLogger } from './PinoLogger';

/**
 * ロガーファクトリー
 *
 * プロセス全体で 1 つのルートロガーを共有する。各コンポーネントは
 * `LoggerFactory.create().child({ component: '...' })` で子ロガーを作る。
 */
class LoggerFactory {
  private static instance: Logger | null = null;

  /**
   * ルートロガーを取得または作成
   *
   * 環境変数:
   * - `LOG_LEVEL`: ログレベル（debug, info, warn, error）。デフォルトは `info`
   * - `NODE_ENV`: production では JSON、test では JSON（pino-pretty のワーカーを起動しない）、それ以外は pretty
   */
  static create(): Logger {
    if (LoggerFactory.instance === null) {
      const env = process.env.NODE_ENV;
      const pretty = env !== 'production' && env !== 'test';
      LoggerFactory.instance = new PinoLogger({ level: process.env.LOG_LEVEL, pretty });
    }

    return LoggerFactory.instance;
  }

  /**
   * ロガーインスタンスをリセット（主にテスト用）
   */
  static reset(): void {
    LoggerFactory.instance = null;
  }
}

export { LoggerFactory };
