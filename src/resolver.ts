import {
	CyclicDependencyError,
	LifetimeMismatchError,
	SyncResolutionError,
} from './errors.js';
import { Lifetime, Opened, Provider } from './provider.js';
import type { Registry } from './registry.js';
import type { BaseScope } from './scope.js';
import { AnyTag } from './tag.js';

/**
 * Fails when a singleton depends on a provider that lives shorter than it.
 * @internal
 */
function assertLifetime(provider: Provider, dependency: Provider): void {
	if (
		provider.lifetime === Lifetime.Singleton &&
		dependency.lifetime !== Lifetime.Singleton
	) {
		throw new LifetimeMismatchError(
			provider.tag,
			provider.lifetime,
			dependency.tag,
			dependency.lifetime
		);
	}
}

/**
 * Recursively resolves providers and their declared dependencies.
 *
 * The resolver is stateless apart from the registry: caches, in-flight
 * constructions and exit stacks live on the scopes it is handed. Singleton
 * providers are always built in, cached in and torn down by the root scope.
 *
 * `chain` carries the tags currently being resolved along one call chain and
 * is what cycle detection runs against.
 *
 * @internal
 */
export class Resolver {
	/** Providers whose static dependency graph is known to be acyclic. */
	private readonly acyclic = new Set<Provider>();

	constructor(private readonly registry: Registry) {}

	async resolve(
		tag: AnyTag,
		scope: BaseScope,
		chain: readonly AnyTag[] = []
	): Promise<unknown> {
		const provider = this.select(tag, scope, chain);
		return this.resolveProvider(provider, scope, chain);
	}

	/**
	 * Resolves every provider registered for a tag, in registration order.
	 */
	async resolveMany(tag: AnyTag, scope: BaseScope): Promise<unknown[]> {
		scope.assertActive();
		this.registry.lock();
		const values: unknown[] = [];
		for (const provider of this.registry.getProviders(tag)) {
			values.push(await this.resolveProvider(provider, scope, []));
		}
		return values;
	}

	resolveSync(
		tag: AnyTag,
		scope: BaseScope,
		chain: readonly AnyTag[] = []
	): unknown {
		const provider = this.select(tag, scope, chain);
		return this.resolveProviderSync(provider, scope, chain);
	}

	resolveManySync(tag: AnyTag, scope: BaseScope): unknown[] {
		scope.assertActive();
		this.registry.lock();
		return this.registry
			.getProviders(tag)
			.map((provider) => this.resolveProviderSync(provider, scope, []));
	}

	/**
	 * Checks the whole registry without constructing anything: every
	 * dependency has a provider, no singleton depends on a shorter-lived
	 * provider, and no dependency chain is cyclic.
	 */
	validate(): void {
		const validated = new Set<Provider>();
		for (const providers of this.registry.providers.values()) {
			for (const provider of providers) {
				this.validateProvider(provider, [], validated);
			}
		}
	}

	private validateProvider(
		provider: Provider,
		chain: readonly AnyTag[],
		validated: Set<Provider>
	): void {
		if (validated.has(provider)) {
			return;
		}
		const nextChain = [...chain, provider.tag];
		for (const dependency of provider.dependencies) {
			if (nextChain.includes(dependency)) {
				throw new CyclicDependencyError(dependency, nextChain);
			}
			const dependencyProvider = this.registry.getProvider(dependency);
			assertLifetime(provider, dependencyProvider);
			this.validateProvider(dependencyProvider, nextChain, validated);
		}
		validated.add(provider);
	}

	/**
	 * Walks the registered dependency graph below a provider once, before it
	 * is first constructed. Catches cycles split across concurrent call
	 * chains that wait on each other's in-flight constructions.
	 */
	private assertAcyclic(provider: Provider, chain: readonly AnyTag[]): void {
		if (this.acyclic.has(provider)) {
			return;
		}
		const nextChain = [...chain, provider.tag];
		for (const dependency of provider.dependencies) {
			if (nextChain.includes(dependency)) {
				throw new CyclicDependencyError(dependency, nextChain);
			}
			const providers = this.registry.getProviders(dependency);
			const dependencyProvider = providers[providers.length - 1];
			// Missing providers are reported by the resolution itself
			if (dependencyProvider !== undefined) {
				this.assertAcyclic(dependencyProvider, nextChain);
			}
		}
		this.acyclic.add(provider);
	}

	private select(
		tag: AnyTag,
		scope: BaseScope,
		chain: readonly AnyTag[]
	): Provider {
		scope.assertActive();
		if (chain.includes(tag)) {
			throw new CyclicDependencyError(tag, chain);
		}
		this.registry.lock();
		return this.registry.getProvider(tag);
	}

	private ownerOf(provider: Provider, scope: BaseScope): BaseScope {
		if (provider.lifetime !== Lifetime.Singleton) {
			return scope;
		}
		scope.root.assertActive();
		return scope.root;
	}

	private resolveProvider(
		provider: Provider,
		scope: BaseScope,
		chain: readonly AnyTag[]
	): Promise<unknown> {
		const owner = this.ownerOf(provider, scope);
		this.assertAcyclic(provider, []);
		if (provider.lifetime === Lifetime.Transient) {
			return this.create(provider, owner, chain);
		}

		if (owner.cache.has(provider)) {
			return Promise.resolve(owner.cache.get(provider));
		}

		const pending = owner.pending.get(provider);
		if (pending !== undefined) {
			return pending;
		}

		const instance = (async () => {
			try {
				const value = await this.create(provider, owner, chain);
				// Its release is already on the exit stack the closing scope drains
				owner.assertActive();
				owner.cache.set(provider, value);
				return value;
			} finally {
				// Failed constructions are not cached, a later resolution retries
				owner.pending.delete(provider);
			}
		})();

		// Register the in-flight construction before yielding, so concurrent
		// requests share it and the provider is constructed at most once.
		owner.pending.set(provider, instance);
		return instance;
	}

	private async create(
		provider: Provider,
		owner: BaseScope,
		chain: readonly AnyTag[]
	): Promise<unknown> {
		const nextChain = [...chain, provider.tag];
		const args: unknown[] = [];
		for (const dependency of provider.dependencies) {
			const dependencyProvider = this.select(dependency, owner, nextChain);
			assertLifetime(provider, dependencyProvider);
			args.push(
				await this.resolveProvider(dependencyProvider, owner, nextChain)
			);
		}

		return this.adopt(owner, await provider.open(args));
	}

	/**
	 * Hands an opened resource to its owner. A resource that finished opening
	 * after its owner started closing is released at once.
	 */
	private async adopt(
		owner: BaseScope,
		opened: Opened<unknown>
	): Promise<unknown> {
		if (owner.state === 'active') {
			if (opened.release !== undefined) {
				owner.exitStack.push(opened.release);
			}
			return opened.value;
		}

		let failure: unknown;
		try {
			await opened.release?.();
		} catch (error) {
			failure = error;
		}
		throw owner.closedError(failure);
	}

	private resolveProviderSync(
		provider: Provider,
		scope: BaseScope,
		chain: readonly AnyTag[]
	): unknown {
		const owner = this.ownerOf(provider, scope);
		this.assertAcyclic(provider, []);
		if (provider.lifetime === Lifetime.Transient) {
			return this.createSync(provider, owner, chain);
		}

		if (owner.cache.has(provider)) {
			return owner.cache.get(provider);
		}

		if (owner.pending.has(provider)) {
			throw new SyncResolutionError(
				provider.tag,
				'it is being created by an asynchronous scope'
			);
		}

		const value = this.createSync(provider, owner, chain);
		owner.cache.set(provider, value);
		return value;
	}

	private createSync(
		provider: Provider,
		owner: BaseScope,
		chain: readonly AnyTag[]
	): unknown {
		const nextChain = [...chain, provider.tag];
		const args = provider.dependencies.map((dependency) => {
			const dependencyProvider = this.select(dependency, owner, nextChain);
			assertLifetime(provider, dependencyProvider);
			return this.resolveProviderSync(dependencyProvider, owner, nextChain);
		});

		const opened = provider.openSync(args);
		if (opened.release !== undefined) {
			owner.exitStack.push(opened.release);
		}
		return opened.value;
	}
}
