/**
 * Prefixed console logger shared by crawler, services and workers.
 * LOG_LEVEL (debug, info, warn, error, silent) sets the threshold; read on
 * every call so tests and the CLI can change it at run time.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 50,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

export function currentLogLevel(): LogLevel {
  const configured = (process.env.LOG_LEVEL ?? '').trim().toLowerCase();
  return isLogLevel(configured) ? configured : 'info';
}

/**
 * One line for an error and its causes: "fetch failed <- ECONNRESET"
 */
export function describeError(error: unknown): string {
  const parts: string[] = [];
  let current: unknown = error;
  while (current !== undefined && current !== null && parts.length < 5) {
    if (current instanceof Error) {
      parts.push(current.message);
      current = current.cause;
    } else {
      parts.push(String(current));
      break;
    }
  }
  return parts.join(' <- ');
}

export class Logger {
  private prefix: string;

  constructor(prefix: string = 'TourExport') {
    this.prefix = prefix;
  }

  /** Logger for a sub-component: [Parent:child] */
  child(name: string): Logger {
    return new Logger(`${this.prefix}:${name}`);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[currentLogLevel()];
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled('info')) console.log(`[${this.prefix}] ${message}`, ...args);
  }

  error(message: string, error?: unknown): void {
    if (!this.enabled('error')) return;
    if (error === undefined) {
      console.error(`[${this.prefix}] ERROR: ${message}`);
    } else {
      console.error(`[${this.prefix}] ERROR: ${message.replace(/:\s*$/, '')}: ${describeError(error)}`);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled('warn')) console.warn(`[${this.prefix}] WARN: ${message}`, ...args);
  }

  success(message: string, ...args: unknown[]): void {
    if (this.enabled('info')) console.log(`[${this.prefix}] ✅ ${message}`, ...args);
  }

  // Extraction misses and per-request chatter
  debug(message: string, ...args: unknown[]): void {
    if (this.enabled('debug')) console.debug(`[${this.prefix}] DEBUG: ${message}`, ...args);
  }
}
