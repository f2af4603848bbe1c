import { describe, expect, it } from 'vitest';
import { type AnyTag, Tag, type TagTypes, ValueTagIdKey } from './tag.js';

describe('Tag', () => {
	describe('Tag.of()', () => {
		it('should create a ValueTag carrying its id', () => {
			const Port = Tag.of('Port')<number>();

			expect(Port[ValueTagIdKey]).toBe('Port');
		});

		it('should create distinct keys for the same id', () => {
			const First = Tag.of('list<number>')<number[]>();
			const Second = Tag.of('list<number>')<number[]>();

			expect(First).not.toBe(Second);
			expect(Tag.id(First)).toBe(Tag.id(Second));
		});

		it('should work as a Map key by identity', () => {
			const Numbers = Tag.of('list<number>')<number[]>();
			const Strings = Tag.of('list<string>')<string[]>();
			const map = new Map<AnyTag, string>([
				[Numbers, 'numbers'],
				[Strings, 'strings'],
			]);

			expect(map.get(Numbers)).toBe('numbers');
			expect(map.get(Strings)).toBe('strings');
		});
	});

	describe('Tag.id()', () => {
		it('should return the class name', () => {
			class UserService {}

			expect(Tag.id(UserService)).toBe('UserService');
		});

		it('should prefer a static Tag property', () => {
			class ApiClient {
				static readonly Tag = 'billing.ApiClient';
			}

			expect(Tag.id(ApiClient)).toBe('billing.ApiClient');
		});

		it('should stringify symbol ids', () => {
			const Secret = Tag.of(Symbol('secret'))<string>();

			expect(Tag.id(Secret)).toBe('Symbol(secret)');
		});
	});

	describe('guards', () => {
		it('should recognise classes and value tags', () => {
			class Service {}
			const Value = Tag.of('value')<string>();

			expect(Tag.isServiceTag(Service)).toBe(true);
			expect(Tag.isValueTag(Value)).toBe(true);
			expect(Tag.isTag(Service)).toBe(true);
			expect(Tag.isTag(Value)).toBe(true);
		});

		it('should reject arrow functions, plain objects and primitives', () => {
			expect(Tag.isTag(() => 1)).toBe(false);
			expect(Tag.isTag({ id: 'x' })).toBe(false);
			expect(Tag.isTag('Port')).toBe(false);
			expect(Tag.isTag(null)).toBe(false);
			expect(Tag.isTag(undefined)).toBe(false);
		});
	});

	describe('TagTypes', () => {
		it('should map a tuple of tags to their values', () => {
			class Clock {
				now() {
					return 0;
				}
			}
			const _Port = Tag.of('Port')<number>();

			const values: TagTypes<readonly [typeof Clock, typeof _Port]> = [
				new Clock(),
				8080,
			];

			expect(values[0].now()).toBe(0);
			expect(values[1]).toBe(8080);
		});
	});
});
