import { isDefined, isString } from './type.library.js';

/**
 * persistent settings live in the process environment, as a JSON string under {key}.
 * a malformed value is reported as absent.
 */

/** get storage */
export function getStore(key: string): unknown {
	const store = process.env[key];

	if (!isString(store))
		return void 0;

	try {
		return JSON.parse(store);																// rebuild object from its stringified representation
	} catch {
		return void 0;
	}
}

/** set / delete storage */
export function setStore<T>(key: string, val?: T) {
	const stash = isDefined(val) ? JSON.stringify(val) : void 0;

	isDefined(stash)
		? (process.env[key] = stash)
		: (delete process.env[key])
}
