/**
 * Log level enum
 * Defines the severity levels for logging
 */
export enum LogLevel {
	DEBUG = 'debug',
	INFO = 'info',
	WARN = 'warn',
	ERROR = 'error',
}

export type LogContext = Record<string, unknown>;

/**
 * Logger interface
 * Diagnostics only: what the user asked for is written through the output sink
 */
export interface ILogger {
	debug(message: string, context?: LogContext): void;
	info(message: string, context?: LogContext): void;
	warn(message: string, context?: LogContext): void;
	error(message: string, context?: LogContext): void;
}

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

/**
 * Console logger implementation
 */
export class ConsoleLogger implements ILogger {
	/**
	 * Minimum level that is written
	 * @private
	 */
	private readonly level: LogLevel;

	/**
	 * Creates a new console logger
	 * @param level - Minimum log level to display
	 */
	constructor(level: LogLevel = LogLevel.WARN) {
		this.level = level;
	}

	debug(message: string, context?: LogContext): void {
		if (this.shouldLog(LogLevel.DEBUG)) {
			console.debug(`[DEBUG] ${message}`, context ?? '');
		}
	}

	info(message: string, context?: LogContext): void {
		if (this.shouldLog(LogLevel.INFO)) {
			console.info(`[INFO] ${message}`, context ?? '');
		}
	}

	warn(message: string, context?: LogContext): void {
		if (this.shouldLog(LogLevel.WARN)) {
			console.warn(`[WARN] ${message}`, context ?? '');
		}
	}

	error(message: string, context?: LogContext): void {
		if (this.shouldLog(LogLevel.ERROR)) {
			console.error(`[ERROR] ${message}`, context ?? '');
		}
	}

	/**
	 * Checks if a message with the given level should be logged
	 * @private
	 */
	private shouldLog(messageLevel: LogLevel): boolean {
		return LEVEL_ORDER.indexOf(messageLevel) >= LEVEL_ORDER.indexOf(this.level);
	}
}

/**
 * Maps a configured level name ('DEBUG', 'INFO', ...) onto a LogLevel
 */
export function toLogLevel(name: 'DEBUG' | 'INFO' | 'WARN' | 'ERROR'): LogLevel {
	switch (name) {
		case 'DEBUG':
			return LogLevel.DEBUG;
		case 'INFO':
			return LogLevel.INFO;
		case 'WARN':
			return LogLevel.WARN;
		case 'ERROR':
			return LogLevel.ERROR;
	}
}
