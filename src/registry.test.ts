import { describe, expect, it } from 'vitest';
import {
	DuplicateRegistrationError,
	ProviderNotFoundError,
	RegistryLockedError,
} from './errors.js';
import { Provider } from './provider.js';
import { Registry } from './registry.js';
import { Tag } from './tag.js';

describe('Registry', () => {
	it('should return an empty list for unknown types', () => {
		const registry = new Registry();
		const Port = Tag.of('Port')<number>();

		expect(registry.getProviders(Port)).toEqual([]);
		expect(registry.has(Port)).toBe(false);
	});

	it('should throw when looking up a single provider that is missing', () => {
		const registry = new Registry();
		class UserService {}

		expect(() => registry.getProvider(UserService)).toThrow(
			ProviderNotFoundError
		);
		expect(() => registry.getProvider(UserService)).toThrow(
			'Providers for type UserService not found'
		);
	});

	it('should reject the same implementation twice', () => {
		const registry = new Registry();
		const Answer = Tag.of('int')<number>();
		registry.register(Provider.object(Answer, 42));

		expect(() => registry.register(Provider.object(Answer, 42))).toThrow(
			'Provider for type int with same implementation already registered'
		);
	});

	it('should skip the same implementation with tryRegister()', () => {
		const registry = new Registry();
		const Answer = Tag.of('int')<number>();
		const first = Provider.object(Answer, 42);
		registry.register(first);

		registry.tryRegister(Provider.object(Answer, 42));

		expect(registry.getProviders(Answer)).toEqual([first]);
	});

	it('should reject a second implementation of a single-binding type', () => {
		const registry = new Registry();
		const Answer = Tag.of('int')<number>();
		registry.register(Provider.scoped(Answer, () => 1));

		expect(() => registry.register(Provider.scoped(Answer, () => 2))).toThrow(
			DuplicateRegistrationError
		);
		expect(() =>
			registry.tryRegister(Provider.scoped(Answer, () => 2))
		).toThrow(DuplicateRegistrationError);
	});

	it('should keep every multi provider in registration order', () => {
		const registry = new Registry();
		const Plugin = Tag.of('Plugin')<string>();
		const first = Provider.scoped(Plugin, () => 'audit', [], { multi: true });
		const second = Provider.scoped(Plugin, () => 'metrics', [], {
			multi: true,
		});

		registry.register(first, second);

		expect(registry.getProviders(Plugin)).toEqual([first, second]);
		expect(registry.getProvider(Plugin)).toBe(second);
	});

	it('should require every provider of a type to be multi', () => {
		const registry = new Registry();
		const Plugin = Tag.of('Plugin')<string>();
		registry.register(Provider.scoped(Plugin, () => 'audit'));

		expect(() =>
			registry.register(
				Provider.scoped(Plugin, () => 'metrics', [], { multi: true })
			)
		).toThrow(
			'Provider for type Plugin already registered and the type does not accept multiple providers'
		);
	});

	it('should reject registration once locked', () => {
		const registry = new Registry();
		const Port = Tag.of('Port')<number>();

		registry.lock();

		expect(registry.isLocked).toBe(true);
		expect(() => registry.register(Provider.object(Port, 1))).toThrow(
			RegistryLockedError
		);
		expect(registry.has(Port)).toBe(false);
	});

	it('should treat equal ids as different types', () => {
		const registry = new Registry();
		const Numbers = Tag.of('list')<number[]>();
		const Strings = Tag.of('list')<string[]>();

		registry.register(
			Provider.object(Numbers, [1, 2]),
			Provider.object(Strings, ['a'])
		);

		expect(registry.providers.size).toBe(2);
		expect(registry.getProvider(Numbers).implementation).toEqual([1, 2]);
		expect(registry.getProvider(Strings).implementation).toEqual(['a']);
	});
});
