/**
 * Protocol logging.
 *
 * Every entry is one JSON line: `info` for committed operations, `warn` for
 * rejected ones, `error` for store faults. Warnings and errors go to stderr. The facade
 * binds the registry id with `child()`, so each line names the deployment it
 * came from.
 */

// ── Log Levels ──

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LevelLabel = Uppercase<LogLevelName>;

// ── Logger Interface ──

/** Context values must survive `JSON.stringify` */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Logger whose entries always carry `bindings` in their context */
  child(bindings: Record<string, unknown>): Logger;
}

// ── Structured Log Entry ──

export interface LogEntry {
  timestamp: string;
  level: LevelLabel;
  module: string;
  message: string;
  context?: Record<string, unknown>;
}

// ── Global State ──

let globalLogLevel: LogLevel = LogLevel.INFO;
let logOutput: (entry: LogEntry) => void = defaultOutput;

function defaultOutput(entry: LogEntry): void {
  const line = JSON.stringify(entry);
  if (entry.level === 'ERROR' || entry.level === 'WARN') {
    process.stderr.write(line + '\n');
  } else {
    process.stdout.write(line + '\n');
  }
}

export function setGlobalLogLevel(level: LogLevel): void {
  globalLogLevel = level;
}

export function getGlobalLogLevel(): LogLevel {
  return globalLogLevel;
}

/** Route entries somewhere other than stdout/stderr; tests capture them here. */
export function setLogOutput(fn: (entry: LogEntry) => void): void {
  logOutput = fn;
}

export function resetLogOutput(): void {
  logOutput = defaultOutput;
}

const LEVEL_NAMES: Record<LogLevel, LevelLabel> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

/** Map a configured level name (`COTERIE_LOG_LEVEL`) to its threshold */
export function parseLogLevel(name: LogLevelName): LogLevel {
  return LEVELS_BY_NAME[name];
}

// ── Console Logger ──

/**
 * Writes through the shared output. A logger built without its own level
 * follows the global one, which `createProtocol` sets from configuration.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private module: string,
    private level?: LogLevel,
    private bindings: Record<string, unknown> = {},
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.WARN, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.ERROR, message, context);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ConsoleLogger(this.module, this.level, { ...this.bindings, ...bindings });
  }

  private emit(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const effectiveLevel = this.level ?? globalLogLevel;
    if (level < effectiveLevel) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      module: this.module,
      message,
    };
    // call-site context overrides bindings of the same name
    const merged = { ...this.bindings, ...context };
    if (Object.keys(merged).length > 0) {
      entry.context = merged;
    }
    logOutput(entry);
  }
}

export function createLogger(module: string, level?: LogLevel): Logger {
  return new ConsoleLogger(module, level);
}
