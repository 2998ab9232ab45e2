/**
 * 统一日志工具
 * 生产环境默认只输出 info 及以上级别，可通过 LOG_LEVEL 覆盖
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogArgs = unknown[];

export interface Logger {
  debug: (...args: LogArgs) => void;
  log: (...args: LogArgs) => void;
  info: (...args: LogArgs) => void;
  warn: (...args: LogArgs) => void;
  error: (...args: LogArgs) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * 从环境变量解析日志级别
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  if (raw && isLogLevel(raw)) {
    return raw;
  }
  return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

export interface LoggerOptions {
  level?: LogLevel;
  /** 输出目标，默认 console */
  sink?: Pick<Console, 'debug' | 'log' | 'info' | 'warn' | 'error'>;
}

export function createLogger({ level = resolveLogLevel(), sink = console }: LoggerOptions = {}): Logger {
  const enabled = (target: LogLevel) => LEVEL_ORDER[target] >= LEVEL_ORDER[level];

  return {
    /**
     * 调试信息
     */
    debug: (...args: LogArgs): void => {
      if (enabled('debug')) {
        sink.debug('[DEBUG]', ...args);
      }
    },

    /**
     * 普通日志 - 与 info 同级
     */
    log: (...args: LogArgs): void => {
      if (enabled('info')) {
        sink.log('[LOG]', ...args);
      }
    },

    info: (...args: LogArgs): void => {
      if (enabled('info')) {
        sink.info('[INFO]', ...args);
      }
    },

    warn: (...args: LogArgs): void => {
      if (enabled('warn')) {
        sink.warn('[WARN]', ...args);
      }
    },

    /**
     * 错误日志 - 始终输出
     */
    error: (...args: LogArgs): void => {
      sink.error('[ERROR]', ...args);
    },
  };
}

export const logger = createLogger();

export default logger;
