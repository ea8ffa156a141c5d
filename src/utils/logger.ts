export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

export type LogSink = (line: string) => void;

/** Receives every line that passes the level check, e.g. an MCP session. */
export type LogForwarder = (level: LogLevel, loggerName: string, data: unknown) => Promise<void>;

export class Logger {
  private currentLevel: LogLevel;
  private sink: LogSink;
  private readonly forwarders = new Set<LogForwarder>();

  private readonly levels: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warning: 2,
    error: 3,
  };

  constructor(level: LogLevel = 'info', sink?: LogSink) {
    this.currentLevel = level;
    // eslint-disable-next-line no-console
    this.sink = sink ?? ((line) => console.log(line));
  }

  setLevel(level: string): void {
    if (this.isValidLevel(level)) {
      this.currentLevel = level;
    }
  }

  getLevel(): LogLevel {
    return this.currentLevel;
  }

  setSink(sink: LogSink): void {
    this.sink = sink;
  }

  /** Returns a function that detaches the forwarder again. */
  attach(forward: LogForwarder): () => void {
    this.forwarders.add(forward);
    return () => {
      this.forwarders.delete(forward);
    };
  }

  private isValidLevel(level: string): level is LogLevel {
    return Object.hasOwn(this.levels, level);
  }

  private shouldLog(level: LogLevel): boolean {
    return this.levels[level] >= this.levels[this.currentLevel];
  }

  private log(level: LogLevel, loggerName: string, data: unknown): void {
    if (!this.shouldLog(level)) {
      return;
    }
    const timestamp = new Date().toISOString();
    const payload = typeof data === 'object' ? JSON.stringify(data) : String(data);
    this.sink(`[${timestamp}] ${level.toUpperCase()} ${loggerName}: ${payload}`);

    for (const forward of this.forwarders) {
      void forward(level, loggerName, data).catch((error: unknown) => {
        const reason = error instanceof Error ? error.message : String(error);
        this.sink(`[${new Date().toISOString()}] ERROR logger: forwarding failed: ${reason}`);
      });
    }
  }

  debug(loggerName: string, data?: unknown): void {
    this.log('debug', loggerName, data ?? {});
  }
  info(loggerName: string, data?: unknown): void {
    this.log('info', loggerName, data ?? {});
  }
  warning(loggerName: string, data?: unknown): void {
    this.log('warning', loggerName, data ?? {});
  }
  error(loggerName: string, data?: unknown): void {
    this.log('error', loggerName, data ?? {});
  }
}

export const logger = new Logger();
