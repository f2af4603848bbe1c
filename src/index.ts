// Container
export { Container } from './container.js';

// Scope
export { Scope, SyncScope } from './scope.js';
export type { BaseScope, ScopeName, ScopeState } from './scope.js';

// Provider
export { Lifetime, Provider } from './provider.js';
export type {
	Factory,
	Finalizer,
	ProviderOptions,
	ProviderSpec,
	ResourceGenerator,
	ResourceLifecycle,
	ServiceOptions,
	Strategy,
} from './provider.js';

// Registry
export { Registry } from './registry.js';

// Ambient container
export {
	currentContainer,
	runWithContainer,
	tryCurrentContainer,
} from './ambient.js';

// Errors
export {
	ContainerClosedError,
	CyclicDependencyError,
	DuplicateRegistrationError,
	LifetimeMismatchError,
	NoAmbientContainerError,
	ProviderCreationError,
	ProviderNotFoundError,
	RegistryLockedError,
	ResourceProtocolError,
	ScopeClosedError,
	ScopeExitError,
	SyncResolutionError,
	TeardownError,
	WireboxError,
} from './errors.js';
export type { ErrorDump } from './errors.js';

// Tag
export { Tag } from './tag.js';
export type {
	AnyTag,
	ServiceTag,
	TagId,
	TagType,
	TagTypes,
	ValueTag,
} from './tag.js';

// Types
export type { PromiseOrValue } from './types.js';
