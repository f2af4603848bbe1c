import {
	ContainerClosedError,
	ScopeClosedError,
	WireboxError,
} from './errors.js';
import { ExitStack } from './exit-stack.js';
import type { Provider } from './provider.js';
import type { Resolver } from './resolver.js';
import { AnyTag, TagType, TagTypes } from './tag.js';

/**
 * Scope identifier, used in error messages.
 */
export type ScopeName = string | symbol;

/**
 * Lifecycle state of a scope. A scope is active from the moment it is created;
 * only an active scope resolves.
 */
export type ScopeState = 'active' | 'closing' | 'closed';

/**
 * State shared by every kind of scope: the cache of resolved values, the
 * in-flight constructions and the exit stack of opened resources.
 */
export abstract class BaseScope {
	/** @internal */
	readonly cache = new Map<Provider, unknown>();
	/** @internal */
	readonly pending = new Map<Provider, Promise<unknown>>();
	/** @internal */
	readonly exitStack = new ExitStack();
	/**
	 * The container's singleton scope; the scope itself for the root.
	 * @internal
	 */
	readonly root: BaseScope;

	private currentState: ScopeState = 'active';
	private closing: Promise<void> | undefined;

	protected constructor(
		readonly name: ScopeName,
		protected readonly resolver: Resolver,
		root: BaseScope | null
	) {
		this.root = root ?? this;
	}

	get state(): ScopeState {
		return this.currentState;
	}

	/**
	 * @internal
	 */
	assertActive(): void {
		if (this.currentState !== 'active') {
			throw this.closedError();
		}
	}

	/**
	 * The error raised when this scope is used after it started closing.
	 * @internal
	 */
	abstract closedError(cause?: unknown): WireboxError;

	/**
	 * Tears the scope down once. A second call while closing shares the first
	 * teardown; a call after it completed does nothing.
	 */
	protected closeAsync(): Promise<void> {
		if (this.currentState === 'closed') {
			return Promise.resolve();
		}
		if (this.closing === undefined) {
			this.closing = this.teardown();
		}
		return this.closing;
	}

	protected closeSyncOnce(): void {
		if (this.currentState !== 'active') {
			return;
		}
		this.currentState = 'closing';
		try {
			this.exitStack.closeSync();
		} finally {
			this.cache.clear();
			this.currentState = 'closed';
		}
	}

	private async teardown(): Promise<void> {
		this.currentState = 'closing';
		try {
			// In-flight constructions release or register their resources first
			await Promise.allSettled(this.pending.values());
			await this.exitStack.close();
		} finally {
			this.cache.clear();
			this.currentState = 'closed';
		}
	}
}

/**
 * A resolution session whose providers may suspend.
 *
 * Caches scoped values, owns the teardown of every resource it opened and
 * delegates singletons to the container.
 *
 * @example
 * ```typescript
 * const scope = container.context('request');
 * try {
 *   const users = await scope.resolve(UserService);
 *   await users.list();
 * } finally {
 *   await scope.close();
 * }
 * ```
 */
export class Scope extends BaseScope {
	/**
	 * @internal - Use Container.context()
	 */
	constructor(name: ScopeName, resolver: Resolver, root: BaseScope) {
		super(name, resolver, root);
	}

	/**
	 * Resolves a value, constructing it and its dependencies if necessary.
	 *
	 * @throws {ScopeClosedError} If the scope is closing or closed
	 * @throws {ContainerClosedError} If a singleton is needed after the container closed
	 * @throws {ProviderNotFoundError} If any tag in the graph has no provider
	 * @throws {CyclicDependencyError} If a dependency chain comes back to itself
	 * @throws {LifetimeMismatchError} If a singleton depends on a shorter-lived provider
	 * @throws {ProviderCreationError} If a construction strategy fails
	 */
	async resolve<T extends AnyTag>(tag: T): Promise<TagType<T>> {
		return this.resolver.resolve(tag, this) as Promise<TagType<T>>;
	}

	/**
	 * Resolves several tags one after another, in the given order.
	 */
	async resolveAll<const T extends readonly AnyTag[]>(
		...tags: T
	): Promise<TagTypes<T>> {
		const values: unknown[] = [];
		for (const tag of tags) {
			values.push(await this.resolve(tag));
		}
		return values as TagTypes<T>;
	}

	/**
	 * Resolves every provider registered for a multi-binding tag, in
	 * registration order. Returns an empty list when there are none.
	 */
	async resolveMany<T extends AnyTag>(tag: T): Promise<TagType<T>[]> {
		return this.resolver.resolveMany(tag, this) as Promise<TagType<T>[]>;
	}

	/**
	 * Finalizes every resource this scope opened, in reverse order.
	 *
	 * @throws {TeardownError} If any finalizer failed; all finalizers still ran
	 */
	close(): Promise<void> {
		return this.closeAsync();
	}

	override closedError(cause?: unknown): WireboxError {
		return new ScopeClosedError(
			`Cannot resolve from scope ${String(this.name)} after it was closed`,
			{ cause }
		);
	}
}

/**
 * A blocking resolution session. Same contract as `Scope`, but every
 * provider in the graph must construct and finalize without suspending.
 *
 * @example
 * ```typescript
 * container.withSyncContext((scope) => {
 *   const settings = scope.resolve(Settings);
 * });
 * ```
 */
export class SyncScope extends BaseScope {
	/**
	 * @internal - Use Container.syncContext()
	 */
	constructor(name: ScopeName, resolver: Resolver, root: BaseScope) {
		super(name, resolver, root);
	}

	/**
	 * @throws {SyncResolutionError} If a provider in the graph suspends
	 * @see Scope.resolve for the other failure modes
	 */
	resolve<T extends AnyTag>(tag: T): TagType<T> {
		return this.resolver.resolveSync(tag, this) as TagType<T>;
	}

	resolveAll<const T extends readonly AnyTag[]>(...tags: T): TagTypes<T> {
		const values: unknown[] = tags.map((tag) => this.resolve(tag));
		return values as TagTypes<T>;
	}

	resolveMany<T extends AnyTag>(tag: T): TagType<T>[] {
		return this.resolver.resolveManySync(tag, this) as TagType<T>[];
	}

	/**
	 * @throws {TeardownError} If any finalizer failed or returned a Promise
	 */
	close(): void {
		this.closeSyncOnce();
	}

	override closedError(cause?: unknown): WireboxError {
		return new ScopeClosedError(
			`Cannot resolve from scope ${String(this.name)} after it was closed`,
			{ cause }
		);
	}
}

/**
 * The container-owned scope that holds singletons.
 * @internal
 */
export class RootScope extends BaseScope {
	constructor(resolver: Resolver) {
		super('singleton', resolver, null);
	}

	close(): Promise<void> {
		return this.closeAsync();
	}

	closeSync(): void {
		this.closeSyncOnce();
	}

	override closedError(cause?: unknown): WireboxError {
		return new ContainerClosedError(
			'Cannot resolve singletons from a closed container',
			{ cause }
		);
	}
}
