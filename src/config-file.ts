import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { parse, stringify, TomlError } from 'smol-toml';

import { LOG_LEVELS } from './constants.ts';
import { ConfigError } from './errors.ts';
import type { ConfigFile, EffectiveConfig, LogLevel } from './types.d.ts';
import { printValue } from './utils.ts';

// parse() returns a narrower table type depending on its options
type TomlTable = Record<string, unknown>;

export const CONFIG_FILE_HEADER = '# Configuration for servedir\n# Command line arguments override the values below.\n';

export async function loadConfigFile(filePath: string): Promise<ConfigFile> {
	let text: string;
	try {
		text = await readFile(filePath, 'utf8');
	} catch (err) {
		throw new ConfigError('ParseFailure', `cannot read configuration file: ${filePath}`, {
			field: 'config',
			path: filePath,
			cause: err,
		});
	}
	return parseConfigFile(text, filePath);
}

export function parseConfigFile(text: string, filePath = '<config>'): ConfigFile {
	let table: TomlTable;
	try {
		table = parse(text);
	} catch (err) {
		const detail = err instanceof TomlError ? err.message : String(err);
		throw new ConfigError('ParseFailure', `invalid TOML in ${filePath}\n${detail}`, {
			field: 'config',
			path: filePath,
			cause: err,
		});
	}

	const reader = new TableReader(table, filePath);
	const config: ConfigFile = {
		path: reader.str('path'),
		port: reader.int('port'),
		addr: reader.str('addr'),
		disable_compression: reader.bool('disable_compression'),
		not_found: reader.str('not_found'),
		ok: reader.bool('ok'),
		log_level: reader.level('log_level'),
		log_path: reader.str('log_path'),
		log_max_files: reader.int('log_max_files'),
	};

	const tls = reader.table('tls');
	if (tls) {
		const tlsReader = new TableReader(tls, filePath, 'tls.');
		config.tls = dropUndefined({
			cert: tlsReader.str('cert'),
			key: tlsReader.str('key'),
			redirect_http: tlsReader.bool('redirect_http'),
		});
	}

	return dropUndefined(config);
}

export function toConfigFile(config: EffectiveConfig): ConfigFile {
	const file: ConfigFile = {
		path: config.path,
		port: config.port,
		addr: config.addr,
		disable_compression: !config.compression,
		not_found: config.notFound,
		ok: config.ok,
		log_level: config.logLevel,
		log_path: config.logPath,
		log_max_files: config.logMaxFiles,
	};
	if (config.tls) {
		file.tls = {
			cert: config.tls.cert,
			key: config.tls.key,
			redirect_http: config.tls.redirectHttp,
		};
	}
	return dropUndefined(file);
}

export function serializeConfigFile(config: EffectiveConfig): string {
	return `${CONFIG_FILE_HEADER}\n${stringify(toConfigFile(config))}\n`;
}

export async function writeConfigFile(filePath: string, config: EffectiveConfig): Promise<void> {
	try {
		await mkdir(dirname(filePath), { recursive: true });
		await writeFile(filePath, serializeConfigFile(config), { flag: 'wx' });
	} catch (err) {
		throw new ConfigError('WriteFailure', `cannot write configuration file: ${filePath}`, {
			field: 'config',
			path: filePath,
			cause: err,
		});
	}
}

class TableReader {
	#table: TomlTable;
	#file: string;
	#prefix: string;

	constructor(table: TomlTable, file: string, prefix = '') {
		this.#table = table;
		this.#file = file;
		this.#prefix = prefix;
	}

	#invalid(key: string, expected: string, value: unknown): never {
		const field = this.#prefix + key;
		throw new ConfigError(
			'ParseFailure',
			`invalid ${field} value in ${this.#file}: ${printValue(value)} (expected ${expected})`,
			{ field, path: this.#file },
		);
	}

	bool(key: string): boolean | undefined {
		const value = this.#table[key];
		if (typeof value === 'undefined') return;
		if (typeof value === 'boolean') return value;
		this.#invalid(key, 'a boolean', value);
	}

	int(key: string): number | undefined {
		const value = this.#table[key];
		if (typeof value === 'undefined') return;
		if (typeof value === 'number' && Number.isSafeInteger(value)) return value;
		this.#invalid(key, 'an integer', value);
	}

	level(key: string): LogLevel | undefined {
		const value = this.#table[key];
		if (typeof value === 'undefined') return;
		const level = LOG_LEVELS.find((name) => name === value);
		if (level) return level;
		this.#invalid(key, LOG_LEVELS.join(' | '), value);
	}

	str(key: string): string | undefined {
		const value = this.#table[key];
		if (typeof value === 'undefined') return;
		if (typeof value === 'string' && value.trim() !== '') return value;
		this.#invalid(key, 'a non-empty string', value);
	}

	table(key: string): TomlTable | undefined {
		const value = this.#table[key];
		if (typeof value === 'undefined') return;
		if (isTable(value)) return value;
		this.#invalid(key, 'a table', value);
	}
}

function isTable(value: unknown): value is TomlTable {
	return value != null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date);
}

function dropUndefined<T extends object>(obj: T): T {
	for (const key of Object.keys(obj)) {
		if (Reflect.get(obj, key) === undefined) Reflect.deleteProperty(obj, key);
	}
	return obj;
}
