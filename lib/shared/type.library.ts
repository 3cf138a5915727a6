/** the actual type reported by ECMAScript */
const protoType = (obj?: unknown) => Object.prototype.toString.call(obj).slice(8, -1);

/**
 * return an object's type as a ProperCase string.
 * if instance, return Class name
 */
export const getType = (obj?: unknown): Types => {
	const type = protoType(obj);

	switch (true) {
		case type === 'Object':
			const name = isRecordLike(obj)
				? obj.constructor?.name || 'Object'									// some Objects do not have a constructor method
				: 'Object'

			return isTypeName(name) ? name : 'Object';

		default:
			return isTypeName(type) ? type : 'Object';
	}
}

/** assert value is one of a list of Types */
export const isType = (obj: unknown, ...types: Types[]) => types.includes(getType(obj));

/** Type-Guards: assert \<obj> is of \<type> */
export const isString = (obj?: unknown): obj is string => isType(obj, 'String');
export const isNumber = (obj?: unknown): obj is number => isType(obj, 'Number');
export const isDigit = (obj?: unknown): obj is number | bigint => isType(obj, 'Number', 'BigInt');
export const isBoolean = (obj?: unknown): obj is boolean => isType(obj, 'Boolean');
export const isArray = (obj?: unknown): obj is unknown[] => isType(obj, 'Array');
export const isObject = (obj?: unknown): obj is Record<string, unknown> => isType(obj, 'Object');

export const isNullish = (obj?: unknown): obj is Nullish => isType(obj, 'Null', 'Undefined');
export const isUndefined = (obj?: unknown): obj is undefined => isType(obj, 'Undefined');
export const isDefined = <T>(obj: T): obj is NonNullable<T> => !isNullish(obj);

export const nullToValue = <T, R>(obj: T, value: R) => obj ?? value;

export function assertNever(val: never): never { throw new Error(`Unexpected object: ${String(val)}`) };

/** narrow an unknown to an object with (possibly) a constructor */
function isRecordLike(obj: unknown): obj is { constructor?: { name?: string } } {
	return typeof obj === 'object' && obj !== null;
}

function isTypeName(name: string): name is Types {
	return TYPES.some(type => type === name);
}

/** bottom value */
export type Nullish = null | undefined | void;

export type KeyOf<T> = keyof T;
export type ValueOf<T> = T[keyof T];

/** Generic Record */
export type Property<T> = Record<PropertyKey, T>

export type Prettify<T> = { [K in keyof T]: T[K]; } & {}

const TYPES = [
	'String',
	'Number',
	'BigInt',
	'Boolean',
	'Object',
	'Array',
	'Null',
	'Undefined',
	'Date',
	'Function',
	'Map',
	'Set',
	'Symbol',
	'Error',

	'Enumify',
	'Calendar',
	'TimeZone',
	'Offset',
	'TransitionRule',
	'DstZone',
	'CalendarDate',
	'CalendarDateTime',
	'FixedDateTime',
] as const
export type Types = typeof TYPES[number]

// DeepReadonly type for type safety
export type Secure<T> = T extends (infer R)[]
	? SecureArray<R>
	: T extends Function
	? T
	: T extends object
	? SecureObject<T>
	: T

interface SecureArray<T> extends ReadonlyArray<Secure<T>> { }

type SecureObject<T> = {
	readonly [K in keyof T]: Secure<T[K]>;
}
