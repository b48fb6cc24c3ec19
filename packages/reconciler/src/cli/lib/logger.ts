/**
 * Make-Ready Structured Logging
 *
 * Structured logging with JSON output for machine consumption and
 * human-readable output for interactive use. One logger is created per
 * batch invocation and handed to the engine explicitly; per-pole work logs
 * through `child({ pole })` so every entry carries its pole.
 *
 * @module cli/lib/logger
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log entry metadata
 */
export interface LogMetadata {
  readonly [key: string]: unknown;
}

/**
 * Structured log entry for JSON output
 */
export interface StructuredLogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly message: string;
  readonly command?: string;
  readonly duration_ms?: number;
  readonly [key: string]: unknown;
}

/**
 * Destination for formatted lines; defaults to the console
 */
export type LogSink = (level: LogLevel, line: string) => void;

/**
 * Logger configuration
 */
export interface CLILoggerConfig {
  /** Minimum log level to output */
  readonly level: LogLevel;
  /** Output as JSON */
  readonly json: boolean;
  /** Command name for context */
  readonly command?: string;
  /** Service name */
  readonly service?: string;
  /** Metadata merged into every entry */
  readonly context?: LogMetadata;
  /** Output destination */
  readonly sink?: LogSink;
  /** Disable ANSI colors in human output */
  readonly plain?: boolean;
}

/**
 * Progress tracking options
 */
export interface ProgressOptions {
  total: number;
  current: number;
  label?: string;
  metadata?: LogMetadata;
}

// ============================================================================
// Constants
// ============================================================================

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * ANSI color codes for terminal output
 */
const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
};

// ============================================================================
// CLI Logger Class
// ============================================================================

/**
 * CLI Logger with structured JSON and human-readable output
 */
export class CLILogger {
  private readonly config: CLILoggerConfig;
  private startTime: number;
  private commandContext: string | null;

  constructor(config: CLILoggerConfig) {
    this.config = {
      service: 'make-ready',
      ...config,
    };
    this.startTime = Date.now();
    this.commandContext = config.command ?? null;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private getElapsedMs(): number {
    return Date.now() - this.startTime;
  }

  private mergedMetadata(metadata?: LogMetadata): LogMetadata {
    return { ...this.config.context, ...metadata };
  }

  private paint(color: string, text: string): string {
    return this.config.plain ? text : `${color}${text}${COLORS.reset}`;
  }

  private formatJson(level: LogLevel, message: string, metadata: LogMetadata): string {
    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.config.service && { service: this.config.service }),
      ...(this.commandContext && { command: this.commandContext }),
      ...metadata,
    };
    return JSON.stringify(entry);
  }

  private formatHuman(level: LogLevel, message: string, metadata: LogMetadata): string {
    let line = `${this.paint(COLORS.dim, new Date().toISOString())} `;
    line += `${this.paint(LEVEL_COLORS[level], LEVEL_LABELS[level])} `;
    line += message;

    const entries = Object.entries(metadata);
    if (entries.length > 0) {
      const metaStr = entries
        .map(([key, value]) => {
          const valueStr = typeof value === 'object' ? JSON.stringify(value) : String(value);
          return `${this.paint(COLORS.cyan, key)}=${valueStr}`;
        })
        .join(' ');
      line += ` ${this.paint(COLORS.dim, `(${metaStr})`)}`;
    }

    return line;
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(level)) return;

    const merged = this.mergedMetadata(metadata);
    const formatted = this.config.json
      ? this.formatJson(level, message, merged)
      : this.formatHuman(level, message, merged);

    (this.config.sink ?? consoleSink)(level, formatted);
  }

  /**
   * Set command context for subsequent log entries
   */
  setCommand(command: string): void {
    this.commandContext = command;
    this.startTime = Date.now();
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', message, metadata);
  }

  /**
   * Log command start
   */
  commandStart(command: string, options?: LogMetadata): void {
    this.setCommand(command);
    this.info(`Starting ${command}`, options);
  }

  /**
   * Log command completion with duration
   */
  commandEnd(success: boolean, metadata?: LogMetadata): void {
    const elapsed = this.getElapsedMs();
    const baseMetadata = { duration_ms: elapsed, ...metadata };

    if (success) {
      this.info(`Command completed in ${formatDuration(elapsed)}`, baseMetadata);
    } else {
      this.error(`Command failed after ${formatDuration(elapsed)}`, baseMetadata);
    }
  }

  /**
   * Log progress for long-running batches
   */
  progress(options: ProgressOptions): void {
    const { total, current, label, metadata } = options;
    const percent = total > 0 ? Math.round((current / total) * 100) : 0;
    this.debug('Progress', { current, total, percent, label, ...metadata });
  }

  /**
   * Create a child logger whose entries carry additional context
   */
  child(context: LogMetadata): CLILogger {
    return new CLILogger({
      ...this.config,
      command: this.commandContext ?? undefined,
      context: { ...this.config.context, ...context },
    });
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a CLI logger with the given configuration
 */
export function createCLILogger(config: Partial<CLILoggerConfig> = {}): CLILogger {
  return new CLILogger({
    level: config.level ?? 'info',
    json: config.json ?? false,
    command: config.command,
    service: config.service ?? 'make-ready',
    context: config.context,
    sink: config.sink,
    plain: config.plain,
  });
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds for display
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  } else {
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(1);
    return `${minutes}m ${seconds}s`;
  }
}
