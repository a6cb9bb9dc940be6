import type { ILogger, LogContext } from '../logging/logger';
import { Result } from '../result/result';

/**
 * Error categories, each mapped onto a process exit code
 */
export enum ErrorType {
	USAGE = 'USAGE',
	FILE_ACCESS = 'FILE_ACCESS',
	SYSTEM = 'SYSTEM',
}

export const EXIT_CODES: Readonly<Record<ErrorType, number>> = {
	[ErrorType.USAGE]: 2,
	[ErrorType.FILE_ACCESS]: 1,
	[ErrorType.SYSTEM]: 1,
};

/**
 * Structured error information
 */
export interface ErrorInfo {
	type: ErrorType;
	code: string;
	message: string;
	context?: LogContext;
	originalError?: Error;
}

/**
 * Raised when the dictionary file cannot be opened or read.
 * Unlike unparseable content this is never recovered from.
 */
export class DictionaryFileError extends Error {
	readonly type = ErrorType.FILE_ACCESS;

	constructor(
		readonly path: string,
		readonly reason: unknown
	) {
		super(`Unable to read dictionary file at ${path}: ${describeReason(reason)}`);
		this.name = 'DictionaryFileError';
	}
}

/**
 * Raised when the command line asks for something the current configuration forbids
 */
export class UsageError extends Error {
	readonly type = ErrorType.USAGE;

	constructor(message: string) {
		super(message);
		this.name = 'UsageError';
	}
}

/**
 * Unified error handler for consistent reporting across the CLI
 */
export class ErrorHandler {
	constructor(private readonly logger: ILogger) {}

	/**
	 * Handle and log an error, returning a failed Result
	 */
	handleError<T>(
		error: unknown,
		type: ErrorType,
		code: string,
		message: string,
		context?: LogContext
	): Result<T> {
		const errorInfo = this.createErrorInfo(error, type, code, message, context);
		this.logError(errorInfo);
		return Result.failure(new Error(errorInfo.message));
	}

	/**
	 * Report an error that ends the run and return the exit code to use
	 */
	handleFatal(error: unknown, context?: LogContext): number {
		const type = classify(error);
		const message = error instanceof Error ? error.message : String(error);
		this.handleError(error, type, `${type}_FATAL`, message, context);
		return EXIT_CODES[type];
	}

	private createErrorInfo(
		error: unknown,
		type: ErrorType,
		code: string,
		message: string,
		context?: LogContext
	): ErrorInfo {
		return {
			type,
			code,
			message,
			context,
			originalError: error instanceof Error ? error : new Error(String(error)),
		};
	}

	private logError(errorInfo: ErrorInfo): void {
		this.logger.error(errorInfo.message, {
			type: errorInfo.type,
			code: errorInfo.code,
			context: errorInfo.context,
			error: errorInfo.originalError?.message,
		});
	}
}

function classify(error: unknown): ErrorType {
	if (error instanceof DictionaryFileError || error instanceof UsageError) {
		return error.type;
	}
	return ErrorType.SYSTEM;
}

function describeReason(reason: unknown): string {
	return reason instanceof Error ? reason.message : String(reason);
}
