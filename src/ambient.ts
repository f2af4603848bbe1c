import { AsyncLocalStorage } from 'node:async_hooks';
import type { Container } from './container.js';
import { NoAmbientContainerError } from './errors.js';

const storage = new AsyncLocalStorage<Container>();

/**
 * Makes a container the current one for the call chain of `fn`, including
 * every async continuation it starts. The previous value is restored when
 * `fn` returns or throws.
 *
 * Meant for integration layers (request handlers, job runners) that need to
 * reach the container without threading it through every call.
 *
 * @example
 * ```typescript
 * app.use((req, res, next) => runWithContainer(container, next));
 *
 * // somewhere down the call chain
 * const scope = currentContainer().context('request');
 * ```
 */
export function runWithContainer<R>(container: Container, fn: () => R): R {
	return storage.run(container, fn);
}

/**
 * @throws {NoAmbientContainerError} If called outside of `runWithContainer()`
 */
export function currentContainer(): Container {
	const container = storage.getStore();
	if (container === undefined) {
		throw new NoAmbientContainerError(
			'No container is installed for the current call chain'
		);
	}
	return container;
}

export function tryCurrentContainer(): Container | undefined {
	return storage.getStore();
}
