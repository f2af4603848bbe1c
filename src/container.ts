import { ContainerClosedError, ScopeExitError } from './errors.js';
import { Provider } from './provider.js';
import { Registry } from './registry.js';
import { Resolver } from './resolver.js';
import { RootScope, Scope, ScopeName, SyncScope } from './scope.js';
import { AnyTag } from './tag.js';
import { PromiseOrValue } from './types.js';

/**
 * Closes after a failed callback. The callback's error is rethrown, unless
 * closing fails too.
 */
async function closeAfterFailure(
	error: unknown,
	close: () => Promise<void>
): Promise<never> {
	try {
		await close();
	} catch (teardown) {
		throw new ScopeExitError(error, teardown);
	}
	throw error;
}

function closeAfterFailureSync(error: unknown, close: () => void): never {
	try {
		close();
	} catch (teardown) {
		throw new ScopeExitError(error, teardown);
	}
	throw error;
}

/**
 * Dependency injection container.
 *
 * Owns the provider registry and the singleton scope. Values are resolved
 * through child scopes created with `context()` or `syncContext()`; closing
 * the container finalizes every singleton it produced.
 *
 * @example
 * ```typescript
 * class Database {
 *   query(sql: string) { return []; }
 *   close() {}
 * }
 *
 * class UserService {
 *   constructor(private db: Database) {}
 *   getUsers() { return this.db.query('SELECT * FROM users'); }
 * }
 *
 * const container = new Container().register(
 *   Provider.singleton(Database, {
 *     create: () => new Database(),
 *     cleanup: (db) => db.close(),
 *   }),
 *   Provider.service(UserService, [Database]),
 * );
 *
 * await container.use(async () => {
 *   const users = await container.withContext((scope) =>
 *     scope.resolve(UserService)
 *   );
 * });
 * ```
 */
export class Container {
	private readonly registry = new Registry();
	private readonly resolver = new Resolver(this.registry);
	private readonly root = new RootScope(this.resolver);

	/**
	 * Every registered binding, in registration order.
	 */
	get providers(): ReadonlyMap<AnyTag, readonly Provider[]> {
		return this.registry.providers;
	}

	get isClosed(): boolean {
		return this.root.state !== 'active';
	}

	/**
	 * Registers providers in order.
	 *
	 * @throws {DuplicateRegistrationError} If a provider repeats an existing implementation,
	 * or adds a second implementation to a single-binding tag
	 * @throws {RegistryLockedError} If any scope has already resolved against this container
	 */
	register(...providers: Provider[]): this {
		this.registry.register(...providers);
		return this;
	}

	/**
	 * Like `register()`, but a provider whose tag and implementation are
	 * already registered is skipped instead of rejected.
	 */
	tryRegister(...providers: Provider[]): this {
		this.registry.tryRegister(...providers);
		return this;
	}

	/**
	 * Returns the provider used to resolve a tag: the last registered one.
	 *
	 * @throws {ProviderNotFoundError} If no provider is registered for the tag
	 */
	getProvider(tag: AnyTag): Provider {
		return this.registry.getProvider(tag);
	}

	getProviders(tag: AnyTag): readonly Provider[] {
		return this.registry.getProviders(tag);
	}

	has(tag: AnyTag): boolean {
		return this.registry.has(tag);
	}

	/**
	 * Eagerly checks the registered graph for missing providers, lifetime
	 * mismatches and cycles, without constructing anything.
	 *
	 * @throws {ProviderNotFoundError}
	 * @throws {LifetimeMismatchError}
	 * @throws {CyclicDependencyError}
	 */
	validate(): void {
		this.resolver.validate();
	}

	/**
	 * Creates a child scope whose providers may suspend.
	 *
	 * @param name - Identifier for the scope (for debugging)
	 * @throws {ContainerClosedError} If the container has been closed
	 */
	context(name: ScopeName = 'context'): Scope {
		this.assertOpen();
		return new Scope(name, this.resolver, this.root);
	}

	/**
	 * Creates a blocking child scope.
	 *
	 * @param name - Identifier for the scope (for debugging)
	 * @throws {ContainerClosedError} If the container has been closed
	 */
	syncContext(name: ScopeName = 'context'): SyncScope {
		this.assertOpen();
		return new SyncScope(name, this.resolver, this.root);
	}

	/**
	 * Opens a scope, runs the callback with it, then closes the scope.
	 *
	 * The scope is always closed after the callback completes, even if it throws.
	 *
	 * @throws {ScopeExitError} If the callback throws and closing fails as well
	 *
	 * @example
	 * ```typescript
	 * const users = await container.withContext(async (scope) => {
	 *   const service = await scope.resolve(UserService);
	 *   return service.getUsers();
	 * });
	 * ```
	 */
	async withContext<R>(
		fn: (scope: Scope) => PromiseOrValue<R>,
		name?: ScopeName
	): Promise<R> {
		const scope = this.context(name);
		let result: R;
		try {
			result = await fn(scope);
		} catch (error) {
			return closeAfterFailure(error, () => scope.close());
		}
		await scope.close();
		return result;
	}

	/**
	 * Blocking counterpart of `withContext()`.
	 */
	withSyncContext<R>(fn: (scope: SyncScope) => R, name?: ScopeName): R {
		const scope = this.syncContext(name);
		let result: R;
		try {
			result = fn(scope);
		} catch (error) {
			return closeAfterFailureSync(error, () => scope.close());
		}
		scope.close();
		return result;
	}

	/**
	 * Runs the callback with this container, then closes the container.
	 *
	 * The container is always closed after the callback completes, even if it throws.
	 *
	 * @throws {ScopeExitError} If the callback throws and closing fails as well
	 * @throws {TeardownError} If any singleton finalizer fails
	 */
	async use<R>(fn: (container: this) => PromiseOrValue<R>): Promise<R> {
		let result: R;
		try {
			result = await fn(this);
		} catch (error) {
			return closeAfterFailure(error, () => this.close());
		}
		await this.close();
		return result;
	}

	/**
	 * Blocking counterpart of `use()`.
	 */
	useSync<R>(fn: (container: this) => R): R {
		let result: R;
		try {
			result = fn(this);
		} catch (error) {
			return closeAfterFailureSync(error, () => this.closeSync());
		}
		this.closeSync();
		return result;
	}

	/**
	 * Closes the singleton scope, finalizing every singleton resource in
	 * reverse order of acquisition. Calling it again does nothing.
	 *
	 * @throws {TeardownError} If any finalizer fails; all finalizers still run
	 */
	close(): Promise<void> {
		return this.root.close();
	}

	/**
	 * Blocking counterpart of `close()`.
	 */
	closeSync(): void {
		this.root.closeSync();
	}

	private assertOpen(): void {
		if (this.isClosed) {
			throw new ContainerClosedError(
				'Cannot create scopes from a closed container'
			);
		}
	}
}
