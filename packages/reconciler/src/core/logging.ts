/**
 * Engine logging context
 *
 * The engine logs through whatever logger the caller passes in; it holds no
 * logger of its own. `CLILogger` satisfies this interface.
 *
 * @module core/logging
 */

export type LogFields = Readonly<Record<string, unknown>>;

export interface EngineLogger {
  debug(message: string, metadata?: LogFields): void;
  info(message: string, metadata?: LogFields): void;
  warn(message: string, metadata?: LogFields): void;
  error(message: string, metadata?: LogFields): void;
  child(context: LogFields): EngineLogger;
}

const noop = (): void => {};

/**
 * Logger that discards everything (default when the caller passes none)
 */
export const silentLogger: EngineLogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  child: () => silentLogger,
};
