/**
 * Outcome of an operation that can succeed or fail without throwing
 */
export class Result<T, E extends Error = Error> {
	/**
	 * Whether the operation was successful
	 */
	readonly success: boolean;

	/**
	 * Result data (only set when success is true)
	 */
	readonly data?: T;

	/**
	 * Failure reason (only set when success is false)
	 */
	readonly error?: E;

	private constructor(success: boolean, data?: T, error?: E) {
		this.success = success;
		this.data = data;
		this.error = error;
	}

	static success<T, E extends Error = Error>(data: T): Result<T, E> {
		return new Result<T, E>(true, data);
	}

	static failure<T, E extends Error = Error>(error: E): Result<T, E> {
		return new Result<T, E>(false, undefined, error);
	}

	/**
	 * Returns the data of a successful result, or the value built by `fallback`
	 * @param fallback - Called with the failure reason when the result failed
	 */
	unwrapOr(fallback: (error: E) => T): T {
		if (this.success && this.data !== undefined) {
			return this.data;
		}
		return fallback(this.failureReason());
	}

	onSuccess(fn: (data: T) => void): Result<T, E> {
		if (this.success && this.data !== undefined) {
			fn(this.data);
		}
		return this;
	}

	private failureReason(): E {
		if (this.error) {
			return this.error;
		}
		throw new Error('Result holds neither data nor an error');
	}
}
