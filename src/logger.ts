export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
}

export function isVerbose(): boolean {
  return process.env.TRANSLATOR_VERBOSE === 'true' || process.argv.includes('--verbose');
}

function format(scope: string, message: string, data?: LogData): string {
  const suffix = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : '';
  return `[${scope}] ${message}${suffix}`;
}

/**
 * Scoped stderr logger. Debug and info lines are written only in verbose mode.
 */
export function createLogger(scope: string): Logger {
  return {
    debug(message, data) {
      if (isVerbose()) console.error(format(scope, message, data));
    },
    info(message, data) {
      if (isVerbose()) console.error(format(scope, message, data));
    },
    warn(message, data) {
      console.warn(format(scope, message, data));
    },
    error(message, data) {
      console.error(format(scope, message, data));
    },
  };
}
