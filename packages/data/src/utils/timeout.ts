import { ProviderTimeoutError } from "@tapearchive/core";

/**
 * Reject with `ProviderTimeoutError` when `promise` has not settled after
 * `timeoutMs`. Without a timeout the promise is returned untouched.
 */
export const withTimeout = <T>(
	promise: Promise<T>,
	timeoutMs: number | undefined,
	operation: string
): Promise<T> => {
	if (timeoutMs === undefined) {
		return promise;
	}
	return new Promise<T>((resolve, reject) => {
		const timer = setTimeout(() => {
			reject(new ProviderTimeoutError(operation, timeoutMs));
		}, timeoutMs);
		void promise.then(
			(value) => {
				clearTimeout(timer);
				resolve(value);
			},
			(error: unknown) => {
				clearTimeout(timer);
				reject(error);
			}
		);
	});
};
