import {
	DuplicateRegistrationError,
	ProviderNotFoundError,
	RegistryLockedError,
} from './errors.js';
import { Provider } from './provider.js';
import { AnyTag } from './tag.js';

/**
 * Mapping from tag to the ordered list of providers registered for it.
 *
 * A tag is single-binding unless every provider registered for it is declared
 * with `multi: true`. The registry is locked by the first resolution; it is
 * not guarded against registration interleaving with resolution.
 */
export class Registry {
	private readonly bindings = new Map<AnyTag, Provider[]>();
	private locked = false;

	/**
	 * Read-only view of every binding, in registration order.
	 */
	get providers(): ReadonlyMap<AnyTag, readonly Provider[]> {
		return this.bindings;
	}

	get isLocked(): boolean {
		return this.locked;
	}

	/**
	 * Rejects every later registration. Called when resolution starts.
	 */
	lock(): void {
		this.locked = true;
	}

	has(tag: AnyTag): boolean {
		return this.bindings.has(tag);
	}

	/**
	 * Registers providers in order.
	 *
	 * @throws {DuplicateRegistrationError} If a provider repeats an existing implementation,
	 * or adds a second implementation to a single-binding tag
	 * @throws {RegistryLockedError} If resolution has already started
	 */
	register(...providers: Provider[]): void {
		for (const provider of providers) {
			this.add(provider, false);
		}
	}

	/**
	 * Registers providers in order, skipping any whose tag and implementation
	 * are already registered together.
	 *
	 * @throws {DuplicateRegistrationError} If a provider adds a second implementation to a single-binding tag
	 * @throws {RegistryLockedError} If resolution has already started
	 */
	tryRegister(...providers: Provider[]): void {
		for (const provider of providers) {
			this.add(provider, true);
		}
	}

	/**
	 * Returns the provider for a tag. When several are registered, the last
	 * registered one wins.
	 *
	 * @throws {ProviderNotFoundError} If no provider is registered for the tag
	 */
	getProvider(tag: AnyTag): Provider {
		const providers = this.bindings.get(tag);
		const provider = providers?.[providers.length - 1];
		if (provider === undefined) {
			throw new ProviderNotFoundError(tag);
		}
		return provider;
	}

	/**
	 * Returns every provider for a tag in registration order, or an empty list.
	 */
	getProviders(tag: AnyTag): readonly Provider[] {
		return this.bindings.get(tag) ?? [];
	}

	private add(provider: Provider, skipExisting: boolean): void {
		if (this.locked) {
			throw new RegistryLockedError(provider.tag);
		}

		const existing = this.bindings.get(provider.tag) ?? [];
		if (existing.some((p) => p.implementation === provider.implementation)) {
			if (skipExisting) {
				return;
			}
			throw new DuplicateRegistrationError(provider.tag, true);
		}

		const acceptsMany = provider.multi && existing.every((p) => p.multi);
		if (existing.length > 0 && !acceptsMany) {
			throw new DuplicateRegistrationError(provider.tag, false);
		}

		this.bindings.set(provider.tag, [...existing, provider]);
	}
}
