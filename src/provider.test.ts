import { describe, expect, it, vi } from 'vitest';
import {
	ProviderCreationError,
	ResourceProtocolError,
	SyncResolutionError,
	WireboxError,
} from './errors.js';
import { Lifetime, Provider } from './provider.js';
import { type AnyTag, Tag } from './tag.js';

describe('Provider', () => {
	describe('helpers', () => {
		it('should give object providers the singleton lifetime', () => {
			const Port = Tag.of('Port')<number>();

			const provider = Provider.object(Port, 8080);

			expect(provider.lifetime).toBe(Lifetime.Singleton);
			expect(provider.strategy).toBe('value');
			expect(provider.dependencies).toEqual([]);
			expect(provider.implementation).toBe(8080);
			expect(provider.multi).toBe(false);
		});

		it('should record lifetime and dependencies in declared order', () => {
			const Host = Tag.of('Host')<string>();
			const Port = Tag.of('Port')<number>();
			const Url = Tag.of('Url')<string>();
			const factory = (host: string, port: number) => `${host}:${port}`;

			const provider = Provider.transient(Url, factory, [Host, Port], {
				multi: true,
			});

			expect(provider.lifetime).toBe(Lifetime.Transient);
			expect(provider.dependencies).toEqual([Host, Port]);
			expect(provider.implementation).toBe(factory);
			expect(provider.multi).toBe(true);
		});

		it('should default services to the scoped lifetime', () => {
			class Clock {}
			class Greeter {
				constructor(readonly clock: Clock) {}
			}

			const provider = Provider.service(Greeter, [Clock]);

			expect(provider.lifetime).toBe(Lifetime.Scoped);
			expect(provider.implementation).toBe(Greeter);
			expect(provider.strategy).toBe('factory');
		});

		it('should turn a service with cleanup into a resource', () => {
			class Pool {
				end() {}
			}

			const provider = Provider.service(Pool, [], {
				lifetime: Lifetime.Singleton,
				cleanup: (pool) => pool.end(),
			});

			expect(provider.lifetime).toBe(Lifetime.Singleton);
			expect(provider.strategy).toBe('resource');
		});

		it('should classify strategies', () => {
			const Value = Tag.of('Value')<number>();

			expect(Provider.scoped(Value, () => 1).strategy).toBe('factory');
			expect(Provider.scoped(Value, { create: () => 1 }).strategy).toBe(
				'factory'
			);
			expect(
				Provider.scoped(Value, { create: () => 1, cleanup: () => {} })
					.strategy
			).toBe('resource');
			expect(
				Provider.scoped(Value, {
					generator: function* () {
						yield 1;
					},
				}).strategy
			).toBe('resource');
		});

		it('should reject dependencies that are not tags', () => {
			const Value = Tag.of('Value')<number>();
			// Untyped input, as it would arrive from plain JavaScript
			const dependencies: AnyTag[] = JSON.parse('["Port"]');

			expect(() => Provider.scoped(Value, () => 1, dependencies)).toThrow(
				'Dependency at position 0 of Value is not a tag'
			);
		});
	});

	describe('open()', () => {
		it('should pass arguments positionally to factories', async () => {
			const Url = Tag.of('Url')<string>();
			const provider = Provider.scoped(
				Url,
				(host: string, port: number) => `${host}:${port}`,
				[Tag.of('Host')<string>(), Tag.of('Port')<number>()]
			);

			const opened = await provider.open(['localhost', 5432]);

			expect(opened.value).toBe('localhost:5432');
			expect(opened.release).toBeUndefined();
		});

		it('should await async factories', async () => {
			const Value = Tag.of('Value')<number>();
			const provider = Provider.scoped(Value, async () => 42);

			expect((await provider.open([])).value).toBe(42);
		});

		it('should keep this for class-based lifecycles', async () => {
			const Value = Tag.of('Value')<number>();
			class Counter {
				released: number[] = [];
				private next = 10;

				create() {
					return this.next++;
				}

				cleanup(value: number) {
					this.released.push(value);
				}
			}
			const lifecycle = new Counter();
			const provider = Provider.scoped(Value, lifecycle);

			const opened = await provider.open([]);
			await opened.release?.();

			expect(opened.value).toBe(10);
			expect(lifecycle.released).toEqual([10]);
		});

		it('should run generator teardown on release', async () => {
			const Value = Tag.of('Value')<string>();
			const events: string[] = [];
			const provider = Provider.scoped(Value, {
				generator: async function* () {
					events.push('open');
					yield 'connection';
					events.push('close');
				},
			});

			const opened = await provider.open([]);
			expect(opened.value).toBe('connection');
			expect(events).toEqual(['open']);

			await opened.release?.();
			expect(events).toEqual(['open', 'close']);
		});

		it('should wrap factory failures', async () => {
			const Value = Tag.of('Value')<number>();
			const failure = new Error('boom');
			const provider = Provider.scoped(Value, () => {
				throw failure;
			});

			try {
				await provider.open([]);
				expect.fail('Should have thrown');
			} catch (error) {
				expect(error).toBeInstanceOf(ProviderCreationError);
				expect((error as ProviderCreationError).cause).toBe(failure);
			}
		});

		it('should reject generators that never yield', async () => {
			const Value = Tag.of('Value')<number>();
			const provider = Provider.scoped(Value, {
				generator: function* () {},
			});

			await expect(provider.open([])).rejects.toThrow(
				'Resource generator for Value finished without yielding a value'
			);
		});

		it('should reject generators that yield twice and still finalize them', async () => {
			const Value = Tag.of('Value')<number>();
			const events: string[] = [];
			const provider = Provider.scoped(Value, {
				generator: async function* () {
					try {
						yield 1;
						yield 2;
					} finally {
						events.push('finally');
					}
				},
			});

			const opened = await provider.open([]);

			await expect(opened.release?.()).rejects.toThrow(
				ResourceProtocolError
			);
			expect(events).toEqual(['finally']);
		});
	});

	describe('openSync()', () => {
		it('should construct without suspending', () => {
			const cleanup = vi.fn();
			const Value = Tag.of('Value')<number>();
			const provider = Provider.scoped(Value, { create: () => 7, cleanup });

			const opened = provider.openSync([]);
			void opened.release?.();

			expect(opened.value).toBe(7);
			expect(cleanup).toHaveBeenCalledWith(7);
		});

		it('should refuse factories that return a Promise', () => {
			const Value = Tag.of('Value')<number>();
			const provider = Provider.scoped(Value, async () => 1);

			expect(() => provider.openSync([])).toThrow(
				'Cannot resolve Value in a synchronous scope: its factory returned a Promise'
			);
		});

		it('should refuse async generators', () => {
			const Value = Tag.of('Value')<number>();
			const provider = Provider.scoped(Value, {
				generator: async function* () {
					yield 1;
				},
			});

			expect(() => provider.openSync([])).toThrow(SyncResolutionError);
		});

		it('should throw the protocol error for a second yield', () => {
			const Value = Tag.of('Value')<number>();
			const events: string[] = [];
			const provider = Provider.scoped(Value, {
				generator: function* () {
					try {
						yield 1;
						yield 2;
					} finally {
						events.push('finally');
					}
				},
			});

			const opened = provider.openSync([]);

			expect(opened.value).toBe(1);
			expect(() => opened.release?.()).toThrow(
				'Resource generator for Value yielded more than once'
			);
			expect(events).toEqual(['finally']);
		});

		it('should wrap thrown errors in a WireboxError subclass', () => {
			const Value = Tag.of('Value')<number>();
			const provider = Provider.scoped(Value, () => {
				throw new Error('boom');
			});

			expect(() => provider.openSync([])).toThrow(WireboxError);
			expect(() => provider.openSync([])).toThrow(
				'Error creating instance of Value'
			);
		});
	});
});
