import { getCurrentConfig, type LogLevel } from '../config/index.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * スコープ付きロガー
 *
 * 出力先はconsole（stderr側）。利用者向けメッセージはコンソールポート経由で出すので、
 * ここには診断情報だけを流す。レベルは observability.logging.level を呼び出し毎に参照する。
 */
export function createLogger(
  scope: string,
  resolveLevel: () => LogLevel = () => getCurrentConfig().observability.logging.level
): Logger {
  const emit = (level: LogLevel, message: string, context?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[resolveLevel()]) {
      return;
    }
    const line = `[${level}] ${scope}: ${message}`;
    if (context) {
      console.error(line, context);
    } else {
      console.error(line);
    }
  };

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, context) => emit('error', message, context)
  };
}
