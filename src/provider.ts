import {
	ProviderCreationError,
	ResourceProtocolError,
	SyncResolutionError,
	WireboxError,
} from './errors.js';
import {
	AnyTag,
	ServiceTag,
	Tag,
	TagId,
	TagType,
	TagTypes,
	ValueTag,
} from './tag.js';
import { isPromise, PromiseOrValue } from './types.js';

/**
 * How long a provided value lives and which scope owns its teardown.
 *
 * - `Transient`: constructed on every resolution, never cached. Resources it
 *   opens are still torn down by the scope that resolved it.
 * - `Scoped`: at most one instance per scope, torn down when the scope closes.
 * - `Singleton`: at most one instance per container, torn down when the
 *   container closes.
 */
export const Lifetime = {
	Transient: 'transient',
	Scoped: 'scoped',
	Singleton: 'singleton',
} as const;

export type Lifetime = (typeof Lifetime)[keyof typeof Lifetime];

/**
 * Factory function that creates a value from its resolved dependencies.
 *
 * Dependencies are passed positionally, in the order they were declared.
 * Can be synchronous or asynchronous.
 */
export type Factory<T, TArgs extends readonly unknown[]> = (
	...args: TArgs
) => PromiseOrValue<T>;

/**
 * Cleanup function called when the owning scope closes.
 */
export type Finalizer<T> = (instance: T) => PromiseOrValue<void>;

/**
 * A resource with an explicit create/cleanup pair.
 *
 * Can be implemented as a class for complex lifecycle logic.
 */
export interface ResourceLifecycle<T, TArgs extends readonly unknown[]> {
	create: Factory<T, TArgs>;
	cleanup?: Finalizer<T>;
}

/**
 * A resource expressed as a generator that yields its value exactly once.
 *
 * Code before the `yield` opens the resource; code after it runs on teardown.
 *
 * @example
 * ```typescript
 * Provider.scoped(Connection, {
 *   generator: async function* (settings) {
 *     const connection = await connect(settings.url);
 *     try {
 *       yield connection;
 *     } finally {
 *       await connection.end();
 *     }
 *   },
 * }, [Settings]);
 * ```
 */
export interface ResourceGenerator<T, TArgs extends readonly unknown[]> {
	generator: (
		...args: TArgs
	) => Generator<T, void, undefined> | AsyncGenerator<T, void, undefined>;
}

/**
 * Valid construction strategy for a provider: a factory function, a
 * lifecycle object, or a generator resource.
 */
export type ProviderSpec<T, TArgs extends readonly unknown[]> =
	| Factory<T, TArgs>
	| ResourceLifecycle<T, TArgs>
	| ResourceGenerator<T, TArgs>;

export type ProviderOptions = {
	/**
	 * Declares that the type accepts several providers. Every provider
	 * registered for the type must opt in.
	 */
	multi?: boolean;
};

export type ServiceOptions<T> = ProviderOptions & {
	lifetime?: Lifetime;
	cleanup?: Finalizer<T>;
};

/**
 * Which construction strategy a provider uses.
 */
export type Strategy = 'value' | 'factory' | 'resource';

/**
 * A value produced by a provider, together with the closure that releases it.
 * @internal
 */
export interface Opened<T> {
	value: T;
	release?: () => PromiseOrValue<void>;
}

/**
 * Maps constructor parameters to the tags that can satisfy them.
 * @internal
 */
type DepsFor<TParams extends readonly unknown[]> = {
	readonly [K in keyof TParams]:
		| ServiceTag<TParams[K]>
		| ValueTag<TagId, TParams[K]>;
};

type AnyIterator =
	| Generator<unknown, void, undefined>
	| AsyncGenerator<unknown, void, undefined>;

type ErasedSpec =
	| { kind: 'value'; value: unknown }
	| { kind: 'factory'; call: (args: unknown[]) => unknown }
	| {
			kind: 'lifecycle';
			create: (args: unknown[]) => unknown;
			cleanup: ((instance: unknown) => PromiseOrValue<void>) | undefined;
	  }
	| { kind: 'generator'; start: (args: unknown[]) => AnyIterator };

function isAsyncIterator(
	iterator: AnyIterator
): iterator is AsyncGenerator<unknown, void, undefined> {
	return Symbol.asyncIterator in iterator;
}

/**
 * Converts the public, typed spec into the positional form the resolver calls.
 * @internal
 */
function erase<T, TArgs extends readonly unknown[]>(
	spec: ProviderSpec<T, TArgs>
): { spec: ErasedSpec; implementation: unknown } {
	if (typeof spec === 'function') {
		const factory = spec;
		return {
			spec: {
				kind: 'factory',
				call: (args) => factory(...(args as unknown as TArgs)),
			},
			implementation: factory,
		};
	}
	if ('generator' in spec) {
		const generator = spec.generator;
		return {
			spec: {
				kind: 'generator',
				start: (args) => generator(...(args as unknown as TArgs)),
			},
			implementation: generator,
		};
	}
	// Called as methods to keep 'this' for class-based lifecycles
	const lifecycle = spec;
	return {
		spec: {
			kind: 'lifecycle',
			create: (args) => lifecycle.create(...(args as unknown as TArgs)),
			cleanup:
				lifecycle.cleanup === undefined
					? undefined
					: (instance) => lifecycle.cleanup?.(instance as T),
		},
		implementation: lifecycle,
	};
}

/**
 * Describes one way to produce a value for a tag: its construction strategy,
 * its declared dependencies and its lifetime.
 *
 * Create providers with the static helpers and hand them to
 * `Container.register()`.
 *
 * @template TTag - The tag this provider produces
 *
 * @example
 * ```typescript
 * const Settings = Tag.of('Settings')<{ url: string }>();
 *
 * container.register(
 *   Provider.object(Settings, { url: 'postgres://localhost/app' }),
 *   Provider.singleton(Pool, (settings) => new Pool(settings.url), [Settings]),
 *   Provider.service(UserRepository, [Pool]),
 * );
 * ```
 */
export class Provider<TTag extends AnyTag = AnyTag> {
	private constructor(
		readonly tag: TTag,
		readonly lifetime: Lifetime,
		readonly dependencies: readonly AnyTag[],
		readonly implementation: unknown,
		private readonly spec: ErasedSpec,
		readonly multi: boolean
	) {
		dependencies.forEach((dependency, index) => {
			if (!Tag.isTag(dependency)) {
				throw new WireboxError(
					`Dependency at position ${index} of ${Tag.id(tag)} is not a tag`,
					{ detail: { tag: Tag.id(tag), position: index } }
				);
			}
		});
	}

	/**
	 * Provides an existing value. The value is never torn down.
	 */
	static object<TTag extends AnyTag>(
		tag: TTag,
		value: TagType<TTag>,
		options: ProviderOptions = {}
	): Provider<TTag> {
		return new Provider(
			tag,
			Lifetime.Singleton,
			[],
			value,
			{ kind: 'value', value },
			options.multi ?? false
		);
	}

	/**
	 * Provides one value per scope.
	 */
	static scoped<
		TTag extends AnyTag,
		const TDeps extends readonly AnyTag[] = [],
	>(
		tag: TTag,
		spec: ProviderSpec<TagType<TTag>, TagTypes<TDeps>>,
		dependencies?: TDeps,
		options?: ProviderOptions
	): Provider<TTag> {
		return Provider.fromSpec(tag, Lifetime.Scoped, spec, dependencies, options);
	}

	/**
	 * Provides one value for the whole container.
	 *
	 * Its dependencies must be singletons as well.
	 */
	static singleton<
		TTag extends AnyTag,
		const TDeps extends readonly AnyTag[] = [],
	>(
		tag: TTag,
		spec: ProviderSpec<TagType<TTag>, TagTypes<TDeps>>,
		dependencies?: TDeps,
		options?: ProviderOptions
	): Provider<TTag> {
		return Provider.fromSpec(
			tag,
			Lifetime.Singleton,
			spec,
			dependencies,
			options
		);
	}

	/**
	 * Provides a new value on every resolution.
	 */
	static transient<
		TTag extends AnyTag,
		const TDeps extends readonly AnyTag[] = [],
	>(
		tag: TTag,
		spec: ProviderSpec<TagType<TTag>, TagTypes<TDeps>>,
		dependencies?: TDeps,
		options?: ProviderOptions
	): Provider<TTag> {
		return Provider.fromSpec(
			tag,
			Lifetime.Transient,
			spec,
			dependencies,
			options
		);
	}

	/**
	 * Provides a class instance, constructed with `new cls(...dependencies)`.
	 *
	 * The dependencies must match the constructor parameters in order;
	 * this is checked at compile time. Defaults to the scoped lifetime.
	 *
	 * @example
	 * ```typescript
	 * class UserService {
	 *   constructor(private repository: UserRepository, private clock: Clock) {}
	 * }
	 *
	 * Provider.service(UserService, [UserRepository, Clock]);
	 * ```
	 */
	static service<
		TClass extends ServiceTag,
		const TDeps extends readonly AnyTag[],
	>(
		cls: TClass,
		dependencies: TDeps & DepsFor<ConstructorParameters<TClass>>,
		options: ServiceOptions<TagType<TClass>> = {}
	): Provider<TClass> {
		const call = (args: unknown[]): unknown => new cls(...args);
		const cleanup = options.cleanup;
		return new Provider(
			cls,
			options.lifetime ?? Lifetime.Scoped,
			dependencies,
			cls,
			cleanup === undefined
				? { kind: 'factory', call }
				: {
						kind: 'lifecycle',
						create: call,
						cleanup: (instance) => cleanup(instance as TagType<TClass>),
					},
			options.multi ?? false
		);
	}

	private static fromSpec<TTag extends AnyTag, TArgs extends readonly unknown[]>(
		tag: TTag,
		lifetime: Lifetime,
		spec: ProviderSpec<TagType<TTag>, TArgs>,
		dependencies: readonly AnyTag[] | undefined,
		options: ProviderOptions = {}
	): Provider<TTag> {
		const erased = erase(spec);
		return new Provider(
			tag,
			lifetime,
			dependencies ?? [],
			erased.implementation,
			erased.spec,
			options.multi ?? false
		);
	}

	get strategy(): Strategy {
		switch (this.spec.kind) {
			case 'value':
				return 'value';
			case 'factory':
				return 'factory';
			case 'lifecycle':
				return this.spec.cleanup === undefined ? 'factory' : 'resource';
			case 'generator':
				return 'resource';
		}
	}

	/**
	 * Runs the construction strategy, suspending where the strategy does.
	 * @internal
	 */
	async open(args: unknown[]): Promise<Opened<unknown>> {
		const spec = this.spec;
		switch (spec.kind) {
			case 'value':
				return { value: spec.value };
			case 'factory':
				return { value: await this.attempt(async () => spec.call(args)) };
			case 'lifecycle': {
				const value = await this.attempt(async () => spec.create(args));
				const cleanup = spec.cleanup;
				return cleanup === undefined
					? { value }
					: { value, release: () => cleanup(value) };
			}
			case 'generator': {
				const iterator = this.attemptSync(() => spec.start(args));
				const first = await this.attempt(async () =>
					isAsyncIterator(iterator) ? iterator.next() : iterator.next()
				);
				if (first.done === true) {
					throw this.noValueError();
				}
				return {
					value: first.value,
					release: async () => {
						if (isAsyncIterator(iterator)) {
							if ((await iterator.next()).done !== true) {
								await iterator.return(undefined);
								throw this.secondYieldError();
							}
						} else if (iterator.next().done !== true) {
							iterator.return(undefined);
							throw this.secondYieldError();
						}
					},
				};
			}
		}
	}

	/**
	 * Runs the construction strategy without suspending.
	 * @throws {SyncResolutionError} If the strategy returns a Promise or is an async generator
	 * @internal
	 */
	openSync(args: unknown[]): Opened<unknown> {
		const spec = this.spec;
		switch (spec.kind) {
			case 'value':
				return { value: spec.value };
			case 'factory':
				return { value: this.settled(this.attemptSync(() => spec.call(args))) };
			case 'lifecycle': {
				const value = this.settled(this.attemptSync(() => spec.create(args)));
				const cleanup = spec.cleanup;
				return cleanup === undefined
					? { value }
					: { value, release: () => cleanup(value) };
			}
			case 'generator': {
				const iterator = this.attemptSync(() => spec.start(args));
				if (isAsyncIterator(iterator)) {
					throw new SyncResolutionError(
						this.tag,
						'its resource is an async generator'
					);
				}
				const first = this.attemptSync(() => iterator.next());
				if (first.done === true) {
					throw this.noValueError();
				}
				return {
					value: first.value,
					release: () => {
						if (iterator.next().done !== true) {
							iterator.return(undefined);
							throw this.secondYieldError();
						}
					},
				};
			}
		}
	}

	private settled(value: unknown): unknown {
		if (isPromise(value)) {
			// Reported below; a later rejection has nowhere else to go
			void value.catch(() => undefined);
			throw new SyncResolutionError(this.tag, 'its factory returned a Promise');
		}
		return value;
	}

	private async attempt<R>(fn: () => Promise<R>): Promise<R> {
		try {
			return await fn();
		} catch (error) {
			throw new ProviderCreationError(this.tag, error);
		}
	}

	private attemptSync<R>(fn: () => R): R {
		try {
			return fn();
		} catch (error) {
			throw new ProviderCreationError(this.tag, error);
		}
	}

	private noValueError(): ResourceProtocolError {
		return new ResourceProtocolError(
			`Resource generator for ${Tag.id(this.tag)} finished without yielding a value`,
			{ detail: { tag: Tag.id(this.tag) } }
		);
	}

	private secondYieldError(): ResourceProtocolError {
		return new ResourceProtocolError(
			`Resource generator for ${Tag.id(this.tag)} yielded more than once`,
			{ detail: { tag: Tag.id(this.tag) } }
		);
	}
}
