import { TeardownError, WireboxError } from './errors.js';
import { isPromise, PromiseOrValue } from './types.js';

export type Release = () => PromiseOrValue<void>;

/**
 * Ordered stack of release callbacks for the resources a scope has opened.
 *
 * Closing pops and runs every callback in reverse acquisition order. A failing
 * callback does not stop the others; all failures are reported together in a
 * single TeardownError once the stack is empty.
 */
export class ExitStack {
	private readonly releases: Release[] = [];

	get size(): number {
		return this.releases.length;
	}

	push(release: Release): void {
		this.releases.push(release);
	}

	/**
	 * @throws {TeardownError} If any release callback throws or rejects
	 */
	async close(): Promise<void> {
		const failures: unknown[] = [];

		for (
			let release = this.releases.pop();
			release !== undefined;
			release = this.releases.pop()
		) {
			try {
				await release();
			} catch (error) {
				failures.push(error);
			}
		}

		if (failures.length > 0) {
			throw new TeardownError(failures);
		}
	}

	/**
	 * Runs every release callback without suspending. A callback that returns
	 * a Promise is recorded as a failure.
	 *
	 * @throws {TeardownError} If any release callback throws or returns a Promise
	 */
	closeSync(): void {
		const failures: unknown[] = [];

		for (
			let release = this.releases.pop();
			release !== undefined;
			release = this.releases.pop()
		) {
			try {
				const result = release();
				if (isPromise(result)) {
					void result.catch(() => undefined);
					failures.push(
						new WireboxError(
							'An asynchronous finalizer cannot run in a synchronous scope'
						)
					);
				}
			} catch (error) {
				failures.push(error);
			}
		}

		if (failures.length > 0) {
			throw new TeardownError(failures);
		}
	}
}
