/**
 * Logger setup: logfmt lines on stderr, so stdout stays free for output
 */

import { Layer, LogLevel, Logger } from "effect";

export interface LoggingOptions {
  /** Log per-entry stage transitions */
  readonly verbose?: boolean;
  /** Drop everything; used by tests */
  readonly silent?: boolean;
}

export function logLevelFor(options: LoggingOptions): LogLevel.LogLevel {
  if (options.silent === true) return LogLevel.None;
  return options.verbose === true ? LogLevel.Debug : LogLevel.Info;
}

/**
 * Layer installing the logfmt logger at the requested level
 *
 * @example
 * ```typescript
 * await Effect.runPromise(program.pipe(Effect.provide(loggingLayer({ verbose: true }))));
 * ```
 */
export function loggingLayer(options: LoggingOptions = {}): Layer.Layer<never> {
  return Layer.merge(
    Logger.replace(Logger.defaultLogger, Logger.withConsoleError(Logger.logfmtLogger)),
    Logger.minimumLogLevel(logLevelFor(options))
  );
}
