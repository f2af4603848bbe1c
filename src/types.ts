/**
 * Type representing a value that can be either synchronous or a Promise.
 * Used throughout the library to support both sync and async factories/finalizers.
 */
export type PromiseOrValue<T> = T | Promise<T>;

/**
 * Narrows a value returned by user code to a promise.
 * @internal
 */
export function isPromise<T>(value: PromiseOrValue<T>): value is Promise<T> {
	return value instanceof Promise;
}
