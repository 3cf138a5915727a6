import { Static } from './shared/class.library.js';
import { sprintf } from './shared/string.library.js';
import { lprintf, type Logger } from './shared/logger.library.js';
import { getStore, setStore } from './shared/storage.library.js';
import { secure } from './shared/reflection.library.js';
import { isBoolean, isObject, isString } from './shared/type.library.js';
import { CALENDAR } from './almanac.enum.js';

// #region Const variables ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

const VERSION = '0.1.0';																		// semantic version
const STORAGEKEY = '_Almanac_';															// for stash in persistent storage

/** Reasonable default options for initial Almanac config */
const Default = {
	version: VERSION,
	debug: false,
	catch: false,
	calendar: CALENDAR.Gregorian,
	timeZone: 'UTC',
} as const satisfies Almanac.Config

// #endregion Const variables

/**
 * Rejection of an argument that cannot be recovered algorithmically
 * (an invalid sign, an offset of sixteen hours or more, an unknown hash width, ...)
 */
export class ParameterError extends RangeError {
	constructor(component: string, message: string) {
		super(sprintf('%s: %s', component, message));
		this.name = 'ParameterError';
	}
}

/**
 * library-wide settings.
 * Almanac.config is set from
 * a) reasonable default values, then
 * b) persistent storage (a JSON string in process.env), then
 * c) 'init' argument values
 */
export class Almanac extends Static {
	static #config: Almanac.Config = Almanac.#setConfig(Default, Almanac.read());

	/** merge and validate {options} over a {base} config */
	static #setConfig(base: Almanac.Config, ...options: Almanac.Options[]): Almanac.Config {
		const config: Almanac.Config = { ...base };

		options.forEach(option => {
			if (isBoolean(option.debug))
				config.debug = option.debug;
			if (isBoolean(option.catch))
				config.catch = option.catch;
			if (isCalendar(option.calendar))
				config.calendar = option.calendar;
			if (isString(option.timeZone) && option.timeZone.length > 0)
				config.timeZone = option.timeZone;
		})

		return secure(config);
	}

	/** set a default configuration for subsequent instances; no options resets to default */
	static init(options: Almanac.Options = {}) {
		Almanac.#config = Object.keys(options).length === 0
			? Almanac.#setConfig(Default, Almanac.read())
			: Almanac.#setConfig(Almanac.#config, options);

		Almanac.info('Almanac', 'init: %j', Almanac.#config);
		return Almanac.config;
	}

	/** read Options from persistent storage */
	static read(): Almanac.Options {
		const store = getStore(STORAGEKEY);

		return isObject(store)
			? {
				debug: isBoolean(store.debug) ? store.debug : void 0,
				catch: isBoolean(store.catch) ? store.catch : void 0,
				calendar: isCalendar(store.calendar) ? store.calendar : void 0,
				timeZone: isString(store.timeZone) ? store.timeZone : void 0,
			}
			: {}
	}

	/** write Options into persistent storage */
	static write(options?: Almanac.Options) {
		setStore(STORAGEKEY, options);
	}

	/** current config */
	static get config() {
		return Almanac.#config;
	}

	/** initial default settings */
	static get default(): Almanac.Config {
		return { ...Default }
	}

	/** use debug:boolean to determine if console() */
	static info(component: string, ...msg: unknown[]) { Almanac.#debug('info', component, ...msg) }
	static warn(component: string, ...msg: unknown[]) { Almanac.#debug('warn', component, ...msg) }
	static error(component: string, ...msg: unknown[]) { Almanac.#debug('error', component, ...msg) }
	static #debug(method: Logger, component: string, fmt?: unknown, ...msg: unknown[]) {
		if (Almanac.#config.debug)
			lprintf(method, component, fmt, ...msg);
	}

	/**
	 * use catch:boolean to determine whether to throw or return.
	 * with {catch} the error is reported as a warning and the caller receives undefined
	 */
	static catch(component: string, message: string): undefined {
		if (Almanac.#config.catch) {
			lprintf('warn', component, message);									// catch, but warn {error}
			return void 0;
		}

		Almanac.error(component, message);											// assume {error}
		throw new ParameterError(component, message);
	}

	/** run {fn}, sending a ParameterError it raises through Almanac.catch */
	static attempt<T>(component: string, fn: () => T): T | undefined {
		try {
			return fn();
		} catch (err) {
			if (err instanceof ParameterError)
				return Almanac.catch(component, err.message);
			throw err;
		}
	}
}

function isCalendar(name: unknown): name is CALENDAR {
	return CALENDAR.values().some(cal => cal === name);
}

// #region Almanac types ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
export namespace Almanac {
	/** the Options Object passed to Almanac.init({}) or held in storage */
	export type Options = Partial<{													// allowable settings to override configuration
		/** additional console output for tracking */						debug: boolean;
		/** catch or throw Errors */														catch: boolean;
		/** default calendar for new dates */										calendar: CALENDAR;
		/** default zone name for new dates */									timeZone: string;
	}>

	export interface Config extends Required<Options> {
		/** semantic version */																	version: string;
	}
}
// #endregion Almanac types
