export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let debugOverride = false;

export function isTruthyFlag(value: string | undefined): boolean {
  return ['1', 'true', 'yes', 'on'].includes((value ?? '').trim().toLowerCase());
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK;
}

function currentLevel(): LogLevel {
  const raw = (process.env.HIGHLIGHT_REEL_LOG_LEVEL ?? '').trim().toLowerCase();
  const level = isLogLevel(raw) ? raw : 'info';
  if (level === 'silent') return level;
  if (debugOverride || isTruthyFlag(process.env.HIGHLIGHT_REEL_DEBUG)) return 'debug';
  return level;
}

/** Turns on debug output for every scope (config.debug / --debug) */
export function setDebugLogging(enabled: boolean): void {
  debugOverride = enabled;
}

export function isDebugEnabled(): boolean {
  return currentLevel() === 'debug';
}

class Logger {
  constructor(private readonly scope: string) {}

  private enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[currentLevel()];
  }

  debug(...args: unknown[]): void {
    if (this.enabled('debug')) {
      console.debug(`[${this.scope}]`, ...args);
    }
  }

  info(...args: unknown[]): void {
    if (this.enabled('info')) {
      console.info(`[${this.scope}]`, ...args);
    }
  }

  warn(...args: unknown[]): void {
    if (this.enabled('warn')) {
      console.warn(`[${this.scope}]`, ...args);
    }
  }

  error(...args: unknown[]): void {
    if (this.enabled('error')) {
      console.error(`[${this.scope}]`, ...args);
    }
  }
}

export type { Logger };

export function createLogger(scope: string): Logger {
  return new Logger(scope);
}
