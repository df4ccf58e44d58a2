/**
 * Structured logging for the Mooring client.
 *
 * Every entry is a flat JSON object. Loggers form a tree: `child()` appends
 * to the component path (`updater`, `updater.lookup`) and binds fields such
 * as the target path a lookup is resolving.
 *
 * @packageDocumentation
 */

// ─── Levels ─────────────────────────────────────────────────────────────────────

/** Verbosity threshold. Entries below a logger's level are dropped. */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  /** Drops every entry. */
  SILENT = 4,
}

/** Level names as they appear in the `level` field of an entry. */
export type LogLevelName = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

type Fields = Record<string, unknown>;

/**
 * One emitted entry. Bound fields come first, then per-call fields; the
 * four reserved keys below always reflect the logger that emitted it.
 */
export interface LogEntry {
  level: LogLevelName;
  message: string;
  timestamp: string;
  component?: string;
  [key: string]: unknown;
}

export type LogOutput = (entry: LogEntry) => void;

/** Writes one JSON line per entry to stderr. */
export const stderrOutput: LogOutput = (entry) => {
  process.stderr.write(`${JSON.stringify(entry)}\n`);
};

export interface LoggerOptions {
  /** Defaults to {@link LogLevel.INFO}. */
  level?: LogLevel;
  component?: string;
  fields?: Fields;
  /** Defaults to {@link stderrOutput}. */
  output?: LogOutput;
}

// ─── Logger ─────────────────────────────────────────────────────────────────────

/**
 * ```ts
 * const log = createLogger({ level: LogLevel.DEBUG, component: 'updater' });
 * log.info('Root rotated', { version: 4 });
 * log.child('lookup', { targetPath: 'tool/v1.bin' }).debug('Found target', { role: 'releases' });
 * ```
 */
export class Logger {
  readonly level: LogLevel;
  readonly component: string | undefined;
  private readonly fields: Fields;
  private readonly output: LogOutput;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.component = options.component;
    this.fields = { ...options.fields };
    this.output = options.output ?? stderrOutput;
  }

  /** Whether entries at `level` reach the output. */
  isEnabled(level: LogLevel): boolean {
    return level !== LogLevel.SILENT && level >= this.level;
  }

  debug(message: string, fields?: Fields): void {
    this.emit(LogLevel.DEBUG, 'DEBUG', message, fields);
  }

  info(message: string, fields?: Fields): void {
    this.emit(LogLevel.INFO, 'INFO', message, fields);
  }

  warn(message: string, fields?: Fields): void {
    this.emit(LogLevel.WARN, 'WARN', message, fields);
  }

  error(message: string, fields?: Fields): void {
    this.emit(LogLevel.ERROR, 'ERROR', message, fields);
  }

  /** A logger under `<component>.<name>` that shares level and output and adds `fields`. */
  child(name: string, fields?: Fields): Logger {
    return new Logger({
      level: this.level,
      component: this.component === undefined ? name : `${this.component}.${name}`,
      fields: { ...this.fields, ...fields },
      output: this.output,
    });
  }

  private emit(level: LogLevel, name: LogLevelName, message: string, fields?: Fields): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const entry: LogEntry = { ...this.fields, ...fields, level: name, message, timestamp: new Date().toISOString() };
    if (this.component !== undefined) {
      entry.component = this.component;
    }
    this.output(entry);
  }
}

export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}

/** INFO-level logger on stderr, used when a caller passes none. */
export const defaultLogger: Logger = createLogger();
