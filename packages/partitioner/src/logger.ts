/**
 * JSON logging for partitionkit
 *
 * Structured JSON output with error, warn, info and debug levels. Partitioning
 * strategies never log; the registry and router above them do.
 */

/**
 * Log levels supported by the logger
 * 'silent' disables all logging
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug'

/**
 * Numeric values for log level comparison
 */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
	silent: -1,
	error: 0,
	warn: 1,
	info: 2,
	debug: 3,
}

export type LogContext = Record<string, unknown>

/**
 * Logger interface for structured logging
 */
export interface Logger {
	/**
	 * Log an error message
	 */
	error(message: string, context?: LogContext): void

	/**
	 * Log a warning message
	 */
	warn(message: string, context?: LogContext): void

	/**
	 * Log an info message
	 */
	info(message: string, context?: LogContext): void

	/**
	 * Log a debug message
	 */
	debug(message: string, context?: LogContext): void

	/**
	 * Create a child logger with additional default context
	 */
	child(defaultContext: LogContext): Logger
}

/**
 * Options accepted by components that log
 */
export interface LoggingOptions {
	/** Logger instance (optional, defaults to no-op) */
	logger?: Logger
	/** Log level when using the default JSON logger */
	logLevel?: LogLevel
}

/**
 * JSON console logger implementation
 */
class JsonLogger implements Logger {
	private readonly level: LogLevel
	private readonly defaultContext: LogContext

	constructor(level: LogLevel, defaultContext: LogContext) {
		this.level = level
		this.defaultContext = defaultContext
	}

	private shouldLog(level: LogLevel): boolean {
		return LOG_LEVEL_VALUES[level] <= LOG_LEVEL_VALUES[this.level]
	}

	private log(level: LogLevel, message: string, context?: LogContext): void {
		if (!this.shouldLog(level)) {
			return
		}

		const output = JSON.stringify({
			level,
			message,
			timestamp: new Date().toISOString(),
			...this.defaultContext,
			...context,
		})

		if (level === 'error') {
			console.error(output)
		} else {
			console.log(output)
		}
	}

	error(message: string, context?: LogContext): void {
		this.log('error', message, context)
	}

	warn(message: string, context?: LogContext): void {
		this.log('warn', message, context)
	}

	info(message: string, context?: LogContext): void {
		this.log('info', message, context)
	}

	debug(message: string, context?: LogContext): void {
		this.log('debug', message, context)
	}

	child(defaultContext: LogContext): Logger {
		return new JsonLogger(this.level, { ...this.defaultContext, ...defaultContext })
	}
}

/**
 * No-op logger that discards all log messages
 */
class NoopLogger implements Logger {
	error(): void {
		// no-op
	}

	warn(): void {
		// no-op
	}

	info(): void {
		// no-op
	}

	debug(): void {
		// no-op
	}

	child(): Logger {
		return this
	}
}

/**
 * Create a JSON console logger
 *
 * @param level - Minimum log level to output (default: 'info')
 * @param defaultContext - Context merged into every entry
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug')
 * logger.debug('partitioner created', { topic: 'orders' })
 * // Output: {"level":"debug","message":"partitioner created","timestamp":"...","topic":"orders"}
 * ```
 */
export function createLogger(level: LogLevel = 'info', defaultContext: LogContext = {}): Logger {
	return new JsonLogger(level, defaultContext)
}

/**
 * No-op logger instance for when logging is disabled
 */
export const noopLogger: Logger = new NoopLogger()

/**
 * Pick the logger for a component: an injected logger wins, then a JSON
 * logger at `logLevel`, then the no-op logger.
 */
export function resolveLogger(options: LoggingOptions, context: LogContext): Logger {
	if (options.logger) {
		return options.logger.child(context)
	}
	if (options.logLevel && options.logLevel !== 'silent') {
		return createLogger(options.logLevel, context)
	}
	return noopLogger
}
