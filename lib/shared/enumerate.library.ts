import { isArray, isObject } from './type.library.js';
import { ownKeys, ownValues, ownEntries } from './reflection.library.js';
import type { Prettify, Property } from './type.library.js';

/**
 * The intent of this module is to provide a Javascript-supported syntax for an object to behave as an Enum.
 * It can be used instead of Typescript's Enum (which is not supported in vanilla JS)
 */

/**
 * This is the prototype for an Enum object.
 * It contains just the methods / symbols we need.
 */
const ENUM = Object.create(null, {
	count: value(function (this: Property<unknown>) { return ownKeys(this).length }),
	keys: value(function (this: Property<unknown>) { return ownKeys(this) }),
	values: value(function (this: Property<unknown>) { return ownValues(this) }),
	entries: value(function (this: Property<unknown>) { return ownEntries(this) }),
	keyOf: value(function (this: Property<unknown>, search: unknown) { return ownEntries(this).filter(([, val]) => val === search)[0]?.[0] }),
	toString: value(function (this: Property<unknown>) { return JSON.stringify({ ...this }) }),
	[Symbol.toStringTag]: value('Enumify'),
	[Symbol.iterator]: value(function (this: Property<unknown>) { return ownEntries(this)[Symbol.iterator](); }),
})

/** define a Descriptor for an Enum's method */
function value(value: PropertyDescriptor["value"]) {
	return Object.assign({ enumerable: false, configurable: false, writable: false } as const, { value } as const);
}

type Wrap<T extends Property<unknown>> = Readonly<T> & Methods<T>

/** extend the Enum object with 'helper' methods */
type Methods<T extends Property<unknown>> = {
	/** count of Enum keys */																	count(): number;
	/** array of Enum keys */																	keys(): (keyof T)[];
	/** array of Enum values */																values(): T[keyof T][];
	/** tuple of Enum entries */															entries(): { [K in keyof T]: [K, T[K]] }[keyof T][];
	/** reverse lookup of Enum key by value */								keyOf(value: T[keyof T]): keyof T | undefined;
	/** stringify method */																		toString(): string;
	/** Iterator for Enum */																	[Symbol.iterator](): Iterator<[keyof T, T[keyof T]]>;
}

export namespace Enum {
	export type keys<T extends Property<unknown>> = Exclude<keyof T, keyof Methods<T>>
	export type values<T extends Property<unknown>> = T[Enum.keys<T>]
}

/**
 * function to return an 'enum-like' object (that we can use until Javascript implements its own)
 * with useful helper-methods on the prototype
 */
export function enumify<const T extends Property<unknown>>(list: T): Prettify<Wrap<T>> {
	if (isArray(list) || !isObject(list))
		throw new Error(`enumify requires an object as input`);

	return Object.create(ENUM, Object.getOwnPropertyDescriptors({ ...list }));
}

/**
 * Example of usage
 *
 * const WIDTH = enumify({ UINT8: 8, UINT16: 16 });
 * type WIDTH = Enum.values<typeof WIDTH>
 *
 * WIDTH.keys()																							// UINT8 | UINT16
 * WIDTH.values()																						// 8 | 16
 * WIDTH.keyOf(16)																					// UINT16
 */
