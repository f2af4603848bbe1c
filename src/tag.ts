/**
 * Type representing a tag identifier (string or symbol).
 */
export type TagId = string | symbol;

/**
 * Symbol used to identify ValueTag objects at runtime.
 * @internal
 */
export const ValueTagIdKey = 'wirebox/ValueTagIdKey';

/**
 * Symbol used to carry the phantom type for ValueTag.
 * @internal
 */
export const TagTypeKey = 'wirebox/TagTypeKey';

/**
 * A ServiceTag is any class constructor.
 *
 * Any class can be used directly as a type key without special markers.
 *
 * @template T - The type of instances created by this class
 *
 * @example
 * ```typescript
 * class UserRepository {
 *   constructor(private db: Database) {}
 * }
 *
 * container.register(Provider.service(UserRepository, [Database]));
 * ```
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type ServiceTag<T = unknown> = new (...args: any[]) => T;

/**
 * A ValueTag represents a non-class type key (primitives, objects, functions,
 * or a parametrized identity such as "list of numbers").
 *
 * ValueTags use phantom types to maintain type safety while being
 * distinguishable at runtime through their reference identity.
 *
 * @template Id - The identifier for this tag (string or symbol)
 * @template T - The type of the value this tag represents
 *
 * @example
 * ```typescript
 * const Port = Tag.of('Port')<number>();
 * const Ids = Tag.of('list<number>')<number[]>();
 *
 * container.register(Provider.object(Port, 8080));
 * ```
 */
export interface ValueTag<Id extends TagId, T> {
	readonly [ValueTagIdKey]: Id;
	readonly [TagTypeKey]: T;
}

/**
 * Union type representing any valid type key.
 *
 * A tag can be either:
 * - A class constructor (ServiceTag) - for class-based dependencies
 * - A ValueTag - for everything else
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AnyTag = ServiceTag | ValueTag<TagId, any>;

/**
 * Extracts the instance/value type from any tag.
 *
 * @example
 * ```typescript
 * class UserService { ... }
 * const ConfigTag = Tag.of('Config')<{ url: string }>();
 *
 * type A = TagType<typeof UserService>;  // UserService
 * type B = TagType<typeof ConfigTag>;    // { url: string }
 * ```
 */
export type TagType<T extends AnyTag> =
	// eslint-disable-next-line @typescript-eslint/no-explicit-any
	T extends new (...args: any[]) => infer Instance
		? Instance
		: // eslint-disable-next-line @typescript-eslint/no-explicit-any
			T extends ValueTag<any, infer Value>
			? Value
			: never;

/**
 * Maps a tuple of tags to the tuple of values they resolve to.
 */
export type TagTypes<T extends readonly AnyTag[]> = {
	-readonly [K in keyof T]: TagType<T[K]>;
};

/**
 * Helper to get an object property safely.
 * @internal
 */
// eslint-disable-next-line @typescript-eslint/no-unnecessary-type-parameters
function getKey<T>(obj: unknown, key: string): T | undefined {
	if (obj === null || obj === undefined) return undefined;
	return (obj as Record<string, T>)[key];
}

/**
 * Utility object for creating and working with tags.
 */
export const Tag = {
	/**
	 * Creates a ValueTag factory for non-class type keys.
	 *
	 * Every call produces a new, distinct key even for the same id.
	 *
	 * @example
	 * ```typescript
	 * const ApiKeyTag = Tag.of('ApiKey')<string>();
	 * const SettingsTag = Tag.of('Settings')<{ dbUrl: string }>();
	 * ```
	 */
	of: <Id extends TagId>(id: Id) => {
		return <T>(): ValueTag<Id, T> =>
			({
				[ValueTagIdKey]: id,
				[TagTypeKey]: undefined as T,
			}) as ValueTag<Id, T>;
	},

	/**
	 * Gets a string identifier for any tag, used for error messages.
	 *
	 * For classes: uses static `Tag` property if present, otherwise `constructor.name`
	 * For ValueTags: uses the tag's id
	 */
	id: (tag: AnyTag): string => {
		if (typeof tag === 'function') {
			const customTag = getKey<string>(tag, 'Tag');
			if (customTag !== undefined) {
				return customTag;
			}
			return tag.name || 'AnonymousClass';
		}
		return String(tag[ValueTagIdKey]);
	},

	/**
	 * Type guard to check if a value is a ServiceTag (class constructor).
	 *
	 * Returns false for arrow functions since they cannot be used with `new`.
	 */
	isServiceTag: (x: unknown): x is ServiceTag => {
		if (typeof x !== 'function') {
			return false;
		}
		// Arrow functions have no prototype
		return getKey(x, 'prototype') !== undefined;
	},

	/**
	 * Type guard to check if a value is a ValueTag.
	 */
	// eslint-disable-next-line @typescript-eslint/no-explicit-any
	isValueTag: (x: unknown): x is ValueTag<TagId, any> => {
		return (
			typeof x === 'object' &&
			x !== null &&
			getKey(x, ValueTagIdKey) !== undefined
		);
	},

	/**
	 * Type guard to check if a value is any kind of tag (ServiceTag or ValueTag).
	 */
	isTag: (x: unknown): x is AnyTag => {
		return Tag.isServiceTag(x) || Tag.isValueTag(x);
	},
};
