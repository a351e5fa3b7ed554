import { parseArgs, type ParseArgsConfig } from 'node:util';

import { DEFAULT_CONFIG, LOG_LEVELS } from './constants.ts';
import { set, settingOf, unset } from './setting.ts';
import type { CliArgs, LogLevel, TlsArgs } from './types.d.ts';
import { printValue } from './utils.ts';

type OptionsConfig = NonNullable<ParseArgsConfig['options']>;
type ArgValue = string | boolean | Array<string | boolean> | undefined;

export const SUBCOMMAND_TLS = 'tls';

const GLOBAL_OPTIONS: OptionsConfig = {
	help: { type: 'boolean' },
	version: { type: 'boolean' },
	config: { type: 'string' },
	path: { type: 'string' },
	port: { type: 'string', short: 'p' },
	addr: { type: 'string', short: 'a' },
	'disable-compression': { type: 'boolean' },
	'not-found': { type: 'string' },
	ok: { type: 'boolean' },
	verbose: { type: 'boolean', short: 'v', multiple: true },
	quiet: { type: 'boolean', short: 'q', multiple: true },
	'log-path': { type: 'string' },
	'log-max-files': { type: 'string' },
};

const TLS_OPTIONS: OptionsConfig = {
	cert: { type: 'string', short: 'c' },
	key: { type: 'string', short: 'k' },
	'redirect-http': { type: 'boolean' },
};

/**
One group of command line arguments: the global options,
or the options following a subcommand.
*/
export class ArgsSection {
	#args: string[];
	#config: OptionsConfig;
	#pos: string[];
	#val: Record<string, ArgValue>;

	constructor(args: string[], config: OptionsConfig) {
		this.#args = args;
		this.#config = config;
		const { positionals, values } = parseArgs({
			args: this.#cleanArgs(args),
			options: config,
			strict: false,
			allowPositionals: true,
		});
		this.#val = values;
		this.#pos = positionals;
	}

	/**
	parseArgs treats '-abc=xyz' by splitting all characters and returns
	{a:true, b:true, c:true, '=': true, …}
	Repeated verbosity flags ('-vvv') are expanded,
	other short combos are set aside and reported as unknown.
	*/
	#cleanArgs(args: string[]): string[] {
		const clean: string[] = [];
		const shortEqual = /^-[a-z]=/i;
		const shortCombo = /^-[a-z\d]{2,}/i;
		const repeated = /^-(v+|q+)$/;
		for (const arg of args) {
			if (arg === '--') break;
			if (arg.startsWith('-')) {
				if (shortEqual.test(arg)) {
					const index = arg.indexOf('=');
					clean.push(arg.slice(0, index), arg.slice(index + 1));
					continue;
				} else if (repeated.test(arg)) {
					clean.push(...arg.slice(1).split('').map((char) => `-${char}`));
					continue;
				} else if (shortCombo.test(arg)) {
					continue;
				}
			}
			clean.push(arg);
		}
		return clean;
	}

	#rawKeys() {
		const keys: string[] = [];
		for (const arg of this.#args) {
			if (arg === '--') break;
			if (!optionLike(arg) || /^-(v+|q+)$/.test(arg)) continue;
			const name = arg.includes('=') ? arg.slice(0, arg.indexOf('=')).trim() : arg.trim();
			if (!keys.includes(name)) keys.push(name);
		}
		return keys;
	}

	positionals(): string[] {
		return [...this.#pos];
	}

	get(name: string): ArgValue {
		return this.#val[name];
	}

	bool(name: string): boolean | undefined {
		const value = this.get(name);
		if (typeof value === 'boolean') return value;
	}

	count(name: string): number {
		const value = this.get(name);
		if (Array.isArray(value)) return value.filter((item) => item === true).length;
		return value === true ? 1 : 0;
	}

	str(name: string, onError?: (msg: string) => void): string | undefined {
		const value = this.get(name);
		if (typeof value === 'string') return value.trim();
		// parseArgs gives 'true' for string options without a value in non-strict mode
		if (value === true) onError?.(`missing value for --${name}`);
	}

	data() {
		return structuredClone({ pos: this.#pos, val: this.#val });
	}

	unknown(): string[] {
		const known: string[] = [];
		for (const [key, opt] of Object.entries(this.#config)) {
			known.push(`--${key}`);
			if (opt.short) known.push(`-${opt.short}`);
		}
		return this.#rawKeys().filter((name) => !known.includes(name));
	}
}

export class CLIArgs {
	#global: ArgsSection;
	#tls?: ArgsSection;

	constructor(args: string[]) {
		const { global, tls } = splitSubcommand(args);
		this.#global = new ArgsSection(global, GLOBAL_OPTIONS);
		if (tls) {
			this.#tls = new ArgsSection(tls, TLS_OPTIONS);
		}
	}

	get hasTls(): boolean {
		return this.#tls != null;
	}

	bool(name: string): boolean | undefined {
		return this.#global.bool(name);
	}

	data() {
		return {
			global: this.#global.data(),
			tls: this.#tls?.data(),
		};
	}

	values(onError?: (msg: string) => void): CliArgs {
		const global = this.#global;
		const invalid = (optName: string, input: unknown) => {
			onError?.(`invalid ${optName} value: ${printValue(input)}`);
		};
		const str = (name: string) => settingOf(global.str(name, onError));
		const flag = (name: string) => (global.bool(name) ? set(true) : unset);

		const result: CliArgs = {
			config: str('config'),
			path: str('path'),
			port: unset,
			addr: str('addr'),
			disableCompression: flag('disable-compression'),
			notFound: str('not-found'),
			ok: flag('ok'),
			logLevel: unset,
			logPath: str('log-path'),
			logMaxFiles: unset,
			tls: unset,
		};

		// args that require extra parsing
		const port = global.str('port', onError);
		if (port != null) {
			const value = parsePort(port);
			if (value != null) result.port = set(value);
			else invalid('--port', port);
		}

		const maxFiles = global.str('log-max-files', onError);
		if (maxFiles != null) {
			const value = parsePositiveInt(maxFiles);
			if (value != null) result.logMaxFiles = set(value);
			else invalid('--log-max-files', maxFiles);
		}

		const delta = global.count('verbose') - global.count('quiet');
		if (delta !== 0) {
			result.logLevel = set(shiftLogLevel(DEFAULT_CONFIG.logLevel, delta));
		}

		if (this.#tls) {
			const tls = this.#tls;
			const tlsArgs: TlsArgs = {
				cert: settingOf(tls.str('cert', onError)),
				key: settingOf(tls.str('key', onError)),
				redirectHttp: tls.bool('redirect-http') ? set(true) : unset,
			};
			result.tls = set(tlsArgs);
			for (const name of tls.unknown()) {
				onError?.(`unknown option '${name}' for '${SUBCOMMAND_TLS}'`);
			}
			for (const arg of tls.positionals()) {
				onError?.(`unexpected argument ${printValue(arg)}`);
			}
		}

		for (const name of global.unknown()) {
			onError?.(`unknown option '${name}'`);
		}
		for (const arg of global.positionals()) {
			onError?.(`unexpected argument ${printValue(arg)}`);
		}

		return result;
	}
}

function optionLike(name: string) {
	name = name.trim();
	return name.startsWith('-') && /\s/.test(name) === false;
}

function optionTakesValue(arg: string, config: OptionsConfig): boolean {
	if (arg.includes('=')) return false;
	if (arg.startsWith('--')) {
		return config[arg.slice(2)]?.type === 'string';
	}
	if (/^-[a-z]$/i.test(arg)) {
		const char = arg.slice(1);
		return Object.values(config).some((opt) => opt.short === char && opt.type === 'string');
	}
	return false;
}

/**
Split the arguments before and after the 'tls' subcommand,
skipping values of global options (e.g. '--path tls').
*/
export function splitSubcommand(args: string[]): { global: string[]; tls?: string[] } {
	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (arg === '--') break;
		if (arg === SUBCOMMAND_TLS) {
			return { global: args.slice(0, i), tls: args.slice(i + 1) };
		}
		if (optionTakesValue(arg, GLOBAL_OPTIONS)) i++;
	}
	return { global: args };
}

export function parsePort(input: string): number | undefined {
	if (!/^\d{1,5}$/.test(input)) return;
	const port = parseInt(input, 10);
	if (port <= 65_535) return port;
}

export function parsePositiveInt(input: string): number | undefined {
	if (!/^\d+$/.test(input)) return;
	const value = parseInt(input, 10);
	if (Number.isSafeInteger(value) && value > 0) return value;
}

/**
Move a log level up (more verbose) or down (quieter) by a number of steps.
*/
export function shiftLogLevel(level: LogLevel, delta: number): LogLevel {
	const index = LOG_LEVELS.indexOf(level) + delta;
	return LOG_LEVELS[Math.min(LOG_LEVELS.length - 1, Math.max(0, index))];
}
