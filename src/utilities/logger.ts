/**
 * Registry Logger
 *
 * Leveled logging scoped to a registry component and, where there is one,
 * the tool being registered, resolved or invoked. Scope lives on the entry
 * itself so sinks and tests can filter on it without digging through data.
 *
 * Usage:
 *   const log = createComponentLogger('Invoker');
 *   log.forTool('send_email').warn('Tool call failed', { error: 'timeout' });
 */

// ─── Types ───────────────────────────────────────────────────────────

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogScope {
  component?: string;
  tool?: string;
}

export interface LogEntry extends LogScope {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  level?: LogLevel;
  sinks?: LogSink[];
  scope?: LogScope;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

// ─── Sinks ───────────────────────────────────────────────────────────

/** Human-readable lines on stdout/stderr */
export class ConsoleSink implements LogSink {
  write(entry: LogEntry): void {
    const parts = [`[${entry.timestamp}]`, `[${entry.level.toUpperCase()}]`];
    if (entry.component) parts.push(`[${entry.component}]`);
    if (entry.tool) parts.push(`(${entry.tool})`);
    parts.push(entry.message);
    if (entry.data && Object.keys(entry.data).length > 0) parts.push(JSON.stringify(entry.data));
    const line = parts.join(' ');

    if (entry.level === 'error') {
      // eslint-disable-next-line no-console
      console.error(line);
    } else if (entry.level === 'warn') {
      // eslint-disable-next-line no-console
      console.warn(line);
    } else {
      // eslint-disable-next-line no-console
      console.log(line);
    }
  }
}

export interface EntryFilter extends LogScope {
  /** Minimum level */
  level?: LogLevel;
  /** Newest N entries */
  limit?: number;
}

/** Bounded in-process buffer, queried by tests and diagnostics */
export class MemorySink implements LogSink {
  private buffer: LogEntry[] = [];

  constructor(private readonly maxSize = 1000) {}

  write(entry: LogEntry): void {
    this.buffer.push(entry);
    if (this.buffer.length > this.maxSize) {
      this.buffer.shift();
    }
  }

  getEntries(filter: EntryFilter = {}): LogEntry[] {
    const minPriority = filter.level ? LEVEL_PRIORITY[filter.level] : 0;
    const entries = this.buffer.filter(
      (e) =>
        LEVEL_PRIORITY[e.level] >= minPriority &&
        (filter.component === undefined || e.component === filter.component) &&
        (filter.tool === undefined || e.tool === filter.tool)
    );
    return filter.limit ? entries.slice(-filter.limit) : entries;
  }

  clear(): void {
    this.buffer = [];
  }

  get size(): number {
    return this.buffer.length;
  }
}

// ─── Logger ──────────────────────────────────────────────────────────

export class StructuredLogger {
  private minLevel: LogLevel;
  private readonly sinks: LogSink[];
  private readonly scope: LogScope;
  private sinkFailures = 0;

  constructor(config: LoggerConfig = {}) {
    this.minLevel = config.level ?? 'info';
    this.sinks = config.sinks ?? [new ConsoleSink()];
    this.scope = config.scope ?? {};
  }

  /**
   * Child sharing this logger's sinks. Its level starts at `level` (or this
   * logger's) and changes independently afterwards.
   */
  child(scope: LogScope = {}, level: LogLevel = this.minLevel): StructuredLogger {
    return new StructuredLogger({ level, sinks: this.sinks, scope: { ...this.scope, ...scope } });
  }

  forComponent(component: string): StructuredLogger {
    return this.child({ component });
  }

  forTool(tool: string): StructuredLogger {
    return this.child({ tool });
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  get level(): LogLevel {
    return this.minLevel;
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.log('trace', message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  /** Number of sink writes that threw */
  get failedWrites(): number {
    return this.sinkFailures;
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.scope,
      ...(data && { data }),
    };

    for (const sink of this.sinks) {
      try {
        sink.write(entry);
      } catch {
        // A failing sink must not take the caller down with it
        this.sinkFailures++;
      }
    }
  }
}

// ─── Global instance ─────────────────────────────────────────────────

/**
 * Parent of every component logger created without an explicit one.
 * Console at 'info' until `configureLogger()` replaces it.
 */
export let logger = new StructuredLogger();

export function configureLogger(config: LoggerConfig): void {
  logger = new StructuredLogger(config);
}

export function createComponentLogger(component: string): StructuredLogger {
  return logger.forComponent(component);
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
