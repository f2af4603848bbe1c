import { AnyTag, Tag } from './tag.js';

export type ErrorDump = {
	name: string;
	message: string;
	stack?: string;
	detail: Record<string, unknown>;
	cause?: unknown;
};

export type WireboxErrorOptions = {
	cause?: unknown;
	detail?: Record<string, unknown>;
};

/**
 * Base error class for all library errors.
 *
 * Every error carries a structured `detail` record and can be dumped to a
 * plain object, which is how host applications are expected to log them.
 *
 * @example Catching library errors
 * ```typescript
 * try {
 *   await scope.resolve(SomeService);
 * } catch (error) {
 *   if (error instanceof WireboxError) {
 *     logger.error(error.message, error.dump());
 *   }
 * }
 * ```
 */
export class WireboxError extends Error {
	detail: Record<string, unknown> | undefined;

	constructor(message: string, { cause, detail }: WireboxErrorOptions = {}) {
		super(message, { cause });
		this.name = this.constructor.name;
		this.detail = detail;
		if (cause instanceof Error && cause.stack !== undefined) {
			this.stack = `${this.stack ?? ''}\nCaused by: ${cause.stack}`;
		}
	}

	static ensure(error: unknown): WireboxError {
		return error instanceof WireboxError
			? error
			: new WireboxError('An unknown error occurred', { cause: error });
	}

	dump(): ErrorDump {
		return {
			name: this.name,
			message: this.message,
			stack: this.stack,
			detail: this.detail ?? {},
			cause: this.dumpCause(this.cause),
		};
	}

	dumps(): string {
		return JSON.stringify(this.dump());
	}

	/**
	 * Recursively extract cause chain from any Error.
	 */
	private dumpCause(cause: unknown): unknown {
		if (cause instanceof WireboxError) {
			return cause.dump();
		}

		if (cause instanceof Error) {
			const result: Record<string, unknown> = {
				name: cause.name,
				message: cause.message,
			};

			if ('cause' in cause && cause.cause !== undefined) {
				result.cause = this.dumpCause(cause.cause);
			}

			return result;
		}

		return cause;
	}
}

/**
 * Error thrown when a provider cannot be added to a tag's binding list.
 *
 * Either the exact same implementation is already registered for the tag, or
 * a different implementation is registered and the tag is single-binding.
 * Use `tryRegister()` to make re-registration of the same implementation a no-op.
 *
 * @example
 * ```typescript
 * container.register(Provider.scoped(Port, () => 1));
 * container.register(Provider.scoped(Port, () => 2)); // throws
 * ```
 */
export class DuplicateRegistrationError extends WireboxError {
	/**
	 * @internal
	 * @param tag - The tag that already has a binding
	 * @param sameImplementation - Whether the rejected provider repeats an existing implementation
	 */
	constructor(tag: AnyTag, sameImplementation: boolean) {
		super(
			sameImplementation
				? `Provider for type ${Tag.id(tag)} with same implementation already registered`
				: `Provider for type ${Tag.id(tag)} already registered and the type does not accept multiple providers`,
			{ detail: { tag: Tag.id(tag), sameImplementation } }
		);
	}
}

/**
 * Error thrown when registering providers on a registry that has already been
 * resolved against.
 *
 * Registration is a single-writer step that must complete before the first
 * resolution, since cached instances would otherwise disagree with the registry.
 */
export class RegistryLockedError extends WireboxError {
	constructor(tag: AnyTag) {
		super(
			`Cannot register a provider for type ${Tag.id(tag)} after resolution has started`,
			{ detail: { tag: Tag.id(tag) } }
		);
	}
}

/**
 * Error thrown when looking up or resolving a type that has no registered provider.
 *
 * It indicates a programming error where the provider setup is incomplete.
 *
 * @example
 * ```typescript
 * try {
 *   await scope.resolve(UnregisteredService);
 * } catch (error) {
 *   if (error instanceof ProviderNotFoundError) {
 *     console.error(error.message); // "Providers for type UnregisteredService not found"
 *   }
 * }
 * ```
 */
export class ProviderNotFoundError extends WireboxError {
	constructor(tag: AnyTag) {
		super(`Providers for type ${Tag.id(tag)} not found`, {
			detail: { tag: Tag.id(tag) },
		});
	}
}

/**
 * Error thrown when a dependency chain comes back to a type that is still
 * being resolved.
 *
 * The message and `detail.dependencyChain` name the full cycle.
 *
 * @example
 * ```typescript
 * // A depends on B, B depends on A
 * await scope.resolve(A);
 * // CyclicDependencyError: Cyclic dependency detected for A: A -> B -> A
 * ```
 */
export class CyclicDependencyError extends WireboxError {
	/**
	 * @internal
	 * @param tag - The tag where the cycle closed
	 * @param dependencyChain - The tags being resolved when the cycle was found
	 */
	constructor(tag: AnyTag, dependencyChain: readonly AnyTag[]) {
		const chain = dependencyChain.map((t) => Tag.id(t)).join(' -> ');
		super(
			`Cyclic dependency detected for ${Tag.id(tag)}: ${chain} -> ${Tag.id(tag)}`,
			{
				detail: {
					tag: Tag.id(tag),
					dependencyChain: dependencyChain.map((t) => Tag.id(t)),
				},
			}
		);
	}
}

/**
 * Error thrown when a longer-lived provider declares a dependency on a
 * shorter-lived one, e.g. a singleton depending on a scoped value.
 */
export class LifetimeMismatchError extends WireboxError {
	constructor(
		tag: AnyTag,
		lifetime: string,
		dependency: AnyTag,
		dependencyLifetime: string
	) {
		super(
			`${lifetime} provider for ${Tag.id(tag)} cannot depend on ${dependencyLifetime} provider for ${Tag.id(dependency)}`,
			{
				detail: {
					tag: Tag.id(tag),
					lifetime,
					dependency: Tag.id(dependency),
					dependencyLifetime,
				},
			}
		);
	}
}

/**
 * Error thrown when a provider's construction strategy throws or rejects.
 *
 * The original error is preserved as the `cause` property.
 *
 * @example
 * ```typescript
 * container.register(
 *   Provider.scoped(Database, () => {
 *     throw new Error('Database connection failed');
 *   })
 * );
 *
 * try {
 *   await scope.resolve(Database);
 * } catch (error) {
 *   if (error instanceof ProviderCreationError) {
 *     console.error(error.getRootCause()); // Error: Database connection failed
 *   }
 * }
 * ```
 */
export class ProviderCreationError extends WireboxError {
	constructor(tag: AnyTag, error: unknown) {
		super(`Error creating instance of ${Tag.id(tag)}`, {
			cause: error,
			detail: {
				tag: Tag.id(tag),
			},
		});
	}

	/**
	 * Unwraps nested ProviderCreationErrors down to the error that started the failure.
	 */
	getRootCause(): unknown {
		let current: unknown = this.cause;

		while (
			current instanceof ProviderCreationError &&
			current.cause !== undefined
		) {
			current = current.cause;
		}

		return current;
	}
}

/**
 * Error thrown when a generator-based resource breaks the open/close protocol:
 * it finishes without yielding a value, or yields a second time on teardown.
 */
export class ResourceProtocolError extends WireboxError {}

/**
 * Error thrown when a synchronous scope meets a provider that suspends.
 *
 * This happens when a factory returns a Promise, when a resource is an async
 * generator, or when a singleton is still being created by an async scope.
 */
export class SyncResolutionError extends WireboxError {
	constructor(tag: AnyTag, reason: string) {
		super(
			`Cannot resolve ${Tag.id(tag)} in a synchronous scope: ${reason}`,
			{ detail: { tag: Tag.id(tag) } }
		);
	}
}

/**
 * Error thrown when resolving from a scope that is closing or closed.
 */
export class ScopeClosedError extends WireboxError {}

/**
 * Error thrown when using a container whose singleton scope has been closed.
 */
export class ContainerClosedError extends WireboxError {}

/**
 * Error thrown by `currentContainer()` outside of `runWithContainer()`.
 */
export class NoAmbientContainerError extends WireboxError {}

/**
 * Error thrown when one or more finalizers fail while a scope is closing.
 *
 * Teardown never stops at the first failure: every pending finalizer is
 * attempted, then a single TeardownError reports all failures in the order
 * they were raised. The first failure is also exposed as `cause`.
 *
 * @example
 * ```typescript
 * try {
 *   await scope.close();
 * } catch (error) {
 *   if (error instanceof TeardownError) {
 *     console.error(error.getRootCauses());
 *   }
 * }
 * ```
 */
export class TeardownError extends WireboxError {
	/**
	 * @internal
	 * @param errors - Errors thrown by individual finalizers, in the order they were raised
	 */
	constructor(private readonly errors: unknown[]) {
		const wrapped = errors.map((error) => WireboxError.ensure(error));
		super(
			`${errors.length} finalizer(s) failed while closing the scope`,
			{
				cause: errors[0],
				detail: {
					errors: wrapped.map((error) => error.dump()),
				},
			}
		);
	}

	/**
	 * Returns the errors that occurred during teardown, at least one.
	 */
	getRootCauses(): unknown[] {
		return this.errors;
	}
}

/**
 * Error thrown by `withContext()` and `use()` when the callback fails and
 * closing afterwards fails too.
 *
 * `cause` is the callback's error; `teardown` is the failure raised while closing.
 */
export class ScopeExitError extends WireboxError {
	constructor(
		error: unknown,
		readonly teardown: unknown
	) {
		super('Callback failed and closing afterwards failed as well', {
			cause: error,
			detail: { teardown: WireboxError.ensure(teardown).dump() },
		});
	}
}
