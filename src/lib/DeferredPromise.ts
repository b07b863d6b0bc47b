export interface DeferredPromise<T> extends Promise<T> {
	resolve(value: T | PromiseLike<T>): void;
	reject(reason?: unknown): void;
	/** Whether resolve or reject has been called */
	isSettled(): boolean;
}

function normalizeReason(reason?: unknown): Error {
	if (reason instanceof Error) return reason;
	if (typeof reason === "string") return new Error(reason);
	return new Error(reason == undefined ? "the promise was rejected" : String(reason));
}

/**
 * Creates a promise that is settled from the outside. Settling it a second time has no effect
 */
export function createDeferredPromise<T>(): DeferredPromise<T> {
	// the executor runs synchronously and replaces these
	let res: (value: T | PromiseLike<T>) => void = () => undefined;
	let rej: (reason: Error) => void = () => undefined;
	let settled = false;

	const promise = new Promise<T>((resolve, reject) => {
		res = resolve;
		rej = reject;
	});

	return Object.assign(promise, {
		resolve(value: T | PromiseLike<T>): void {
			if (settled) return;
			settled = true;
			res(value);
		},
		reject(reason?: unknown): void {
			if (settled) return;
			settled = true;
			rej(normalizeReason(reason));
		},
		isSettled(): boolean {
			return settled;
		},
	});
}
