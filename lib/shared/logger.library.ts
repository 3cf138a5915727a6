import { sprintf } from './string.library.js';
import { isString, type ValueOf } from './type.library.js';

const Level = {
	Log: 'log',
	Debug: 'debug',
	Info: 'info',
	Warn: 'warn',
	Error: 'error',
} as const
export type Logger = ValueOf<typeof Level>;

/** console[method]() formatter */
export const lprintf = (method: Logger, name: string = '', fmt?: unknown, ...msg: unknown[]) => {
	const log = sprintf(fmt, ...msg);
	const sep = isString(fmt) && (fmt.includes(':') || msg.length === 0)
		? '.'
		: ': '
	const info = `${name}${sep}${log}`;

	console[method](info);
	return info;
}
