// Build logging

/**
 * Structured logger interface used while building manifests and containers.
 * Implementations can route to console, file, or external services.
 */
export type BuildLogger = {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
};

/**
 * Default console logger implementation
 */
export const consoleLogger: BuildLogger = {
  debug(message: string, data?: Record<string, unknown>) {
    console.debug(`[DEBUG] ${message}`, data ?? '');
  },
  info(message: string, data?: Record<string, unknown>) {
    console.info(`[INFO] ${message}`, data ?? '');
  },
  warn(message: string, data?: Record<string, unknown>) {
    console.warn(`[WARN] ${message}`, data ?? '');
  },
  error(message: string, data?: Record<string, unknown>) {
    console.error(`[ERROR] ${message}`, data ?? '');
  },
};

/**
 * Silent logger for testing
 */
export const silentLogger: BuildLogger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

/**
 * Create a capturing logger that stores log entries for inspection
 */
export type LogEntry = {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  data?: Record<string, unknown>;
  timestamp: string;
};

export function createCapturingLogger(): BuildLogger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];

  const log = (level: LogEntry['level']) => (message: string, data?: Record<string, unknown>) => {
    entries.push({
      level,
      message,
      data,
      timestamp: new Date().toISOString(),
    });
  };

  return {
    entries,
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}
