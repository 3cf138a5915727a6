import { isString, isObject, isNullish, isDigit, nullToValue } from './type.library.js';

// General <string> functions

const regexp = /\$\{(\d)\}/g;																// pattern to find "${digit}" parameter markers
type Sprintf = {
	(fmt: string, ...msg: unknown[]): string;									// either a format-string, followed by arguments
	(...msg: unknown[]): string;															// or just an array of arguments
}
/**
 * use sprintf-style formatting on a string.
 */
export const sprintf: Sprintf = (fmt?: unknown, ...msg: unknown[]) => {
	let sfmt = asString(fmt);																	// avoid mutate fmt

	if (!isString(fmt)) {																			// might be an Object
		msg.unshift(fmt);																				// push to start of msg[]
		sfmt = '';																							// reset the string-format
	}

	let cnt = 0;																							// if the format does not contain a corresponding '${digit}' then re-construct the parameters
	sfmt = sfmt.replace(/%[sjd]/g, _ => `\${${cnt++}}`);			// flip all the %s, %d or %j to a ${digit} parameter

	const params = Array.from(sfmt.matchAll(regexp))
		.map(match => Number(match[1]))													// which parameters are in the fmt
	msg.forEach((_, idx) => {
		if (!params.includes(idx))															// if more args than params
			sfmt += `${sfmt.length === 0 ? '' : ', '}\${${idx}}`	//  append a dummy params to fmt
	})

	return sfmt.replace(regexp, (_, idx) => asString(msg[Number(idx)]));
}

/** stringify a value for display */
export const asString = (str?: unknown): string => {
	switch (true) {
		case isNullish(str):
			return '';
		case isString(str):
			return str;
		case isObject(str):
			return JSON.stringify(str, (_key, val) => typeof val === 'bigint' ? `${val}n` : val);
		default:
			return String(str);
	}
}

/**
 * pad a string with leading character
 * @param		nbr	input value to pad
 * @param		len	fill-length (default: 2)
 * @param		fill	character (default \<space> for string and \<zero> for number)
 * @returns	fixed-length string padded on the left with fill-character
 */
export const pad = (nbr: string | number | bigint = 0, len = 2, fill?: string | number) =>
	nbr.toString().padStart(len, nullToValue(fill, isDigit(nbr) ? '0' : ' ').toString());
