import { isIP } from 'node:net';
import { resolve } from 'node:path';
import { cwd as processCwd } from 'node:process';

import { loadConfigFile, writeConfigFile } from './config-file.ts';
import { DEFAULT_CONFIG } from './constants.ts';
import { ConfigError } from './errors.ts';
import { checkAccess, type AccessStatus } from './fs-utils.ts';
import { pick, settingOf, unset, valueOr } from './setting.ts';
import type { CliArgs, ConfigFile, EffectiveConfig, Setting, TlsConfig } from './types.d.ts';
import { printValue } from './utils.ts';

export interface ResolveOptions {
	/** Base directory for relative paths (default: process.cwd()) */
	cwd?: string;
	/** Called after a missing configuration file was written */
	onConfigCreated?: (filePath: string) => void;
}

/**
Merge command line arguments over the configuration file (if any),
validate the result and return the frozen runtime configuration.
When `--config` points to a missing file, it is created once from the
resolved configuration; an existing file is never rewritten.
*/
export async function resolveConfig(
	args: CliArgs,
	options: ResolveOptions = {},
): Promise<EffectiveConfig> {
	const cwd = options.cwd ?? processCwd();
	const configPath = args.config.set ? resolve(cwd, args.config.value) : undefined;

	let file: ConfigFile = {};
	let createFile = false;
	if (configPath != null) {
		const status = await checkAccess(configPath, 'file');
		if (status === 'ok') {
			file = await loadConfigFile(configPath);
		} else if (status === 'missing') {
			createFile = true;
		} else {
			throw pathError('config', configPath, status);
		}
	}

	const config = mergeConfig(args, file, cwd);
	await validateConfig(config);

	if (configPath != null && createFile) {
		await writeConfigFile(configPath, config);
		options.onConfigCreated?.(configPath);
	}

	return freezeConfig(config);
}

/**
Field by field merge: a value set on the command line wins,
then the configuration file's value, then the default.
*/
export function mergeConfig(args: CliArgs, file: ConfigFile, cwd: string): EffectiveConfig {
	const toPath = (setting: Setting<string>) => (setting.set ? resolve(cwd, setting.value) : undefined);

	return {
		path: resolve(cwd, valueOr(pick(args.path, settingOf(file.path)), '.')),
		addr: valueOr(pick(args.addr, settingOf(file.addr)), DEFAULT_CONFIG.addr),
		port: valueOr(pick(args.port, settingOf(file.port)), DEFAULT_CONFIG.port),
		compression: !valueOr(
			pick(args.disableCompression, settingOf(file.disable_compression)),
			!DEFAULT_CONFIG.compression,
		),
		notFound: toPath(pick(args.notFound, settingOf(file.not_found))),
		ok: valueOr(pick(args.ok, settingOf(file.ok)), DEFAULT_CONFIG.ok),
		logLevel: valueOr(pick(args.logLevel, settingOf(file.log_level)), DEFAULT_CONFIG.logLevel),
		logPath: toPath(pick(args.logPath, settingOf(file.log_path))),
		logMaxFiles: valueOr(pick(args.logMaxFiles, settingOf(file.log_max_files)), DEFAULT_CONFIG.logMaxFiles),
		tls: mergeTls(args, file, cwd),
	};
}

/**
Both sources may hold a partial TLS section; cert and key are checked
for completeness in validateConfig.
*/
function mergeTls(args: CliArgs, file: ConfigFile, cwd: string): TlsConfig | undefined {
	const cli = args.tls.set ? args.tls.value : undefined;
	if (cli == null && file.tls == null) return;

	const cert = pick(cli?.cert ?? unset, settingOf(file.tls?.cert));
	const key = pick(cli?.key ?? unset, settingOf(file.tls?.key));
	const redirectHttp = pick(cli?.redirectHttp ?? unset, settingOf(file.tls?.redirect_http));

	return {
		// empty strings are reported as an incomplete TLS configuration
		cert: cert.set ? resolve(cwd, cert.value) : '',
		key: key.set ? resolve(cwd, key.value) : '',
		redirectHttp: valueOr(redirectHttp, false),
	};
}

export async function validateConfig(config: EffectiveConfig): Promise<void> {
	if (config.ok && config.notFound == null) {
		throw new ConfigError('InvalidCombination', `'ok' requires 'not_found' to be set`, {
			field: 'ok',
		});
	}

	if (config.tls) {
		const missing = [
			config.tls.cert === '' ? 'cert' : undefined,
			config.tls.key === '' ? 'key' : undefined,
		].filter((name) => name != null);
		if (missing.length) {
			throw new ConfigError(
				'IncompleteTls',
				`TLS requires both 'cert' and 'key' (missing: ${missing.join(', ')})`,
				{ field: `tls.${missing[0]}` },
			);
		}
	}

	if (isIP(config.addr) === 0) {
		throw new ConfigError('ParseFailure', `invalid addr value: ${printValue(config.addr)}`, {
			field: 'addr',
		});
	}

	if (!Number.isSafeInteger(config.port) || config.port < 0 || config.port > 65_535) {
		throw new ConfigError('ParseFailure', `invalid port value: ${printValue(config.port)}`, {
			field: 'port',
		});
	}

	if (!Number.isSafeInteger(config.logMaxFiles) || config.logMaxFiles < 1) {
		throw new ConfigError(
			'ParseFailure',
			`invalid log_max_files value: ${printValue(config.logMaxFiles)}`,
			{ field: 'log_max_files' },
		);
	}

	const checks: Array<[field: string, path: string | undefined, kind: 'dir' | 'file']> = [
		['path', config.path, 'dir'],
		['not_found', config.notFound, 'file'],
		['tls.cert', config.tls?.cert, 'file'],
		['tls.key', config.tls?.key, 'file'],
	];
	for (const [field, filePath, kind] of checks) {
		if (filePath == null) continue;
		const status = await checkAccess(filePath, kind);
		if (status !== 'ok') throw pathError(field, filePath, status, kind);
	}

	// the log directory is created on startup when missing
	if (config.logPath != null) {
		const status = await checkAccess(config.logPath, 'dir', { write: true });
		if (status === 'wrong-kind' || status === 'denied') {
			throw pathError('log_path', config.logPath, status, 'dir');
		}
	}
}

function pathError(
	field: string,
	filePath: string,
	status: Exclude<AccessStatus, 'ok'>,
	kind: 'dir' | 'file' = 'file',
): ConfigError {
	if (status === 'missing') {
		return new ConfigError('PathNotFound', `${field}: no such file or directory: ${filePath}`, {
			field,
			path: filePath,
		});
	}
	const reason = status === 'denied' ? 'permission denied' : `not a ${kind === 'dir' ? 'directory' : 'file'}`;
	return new ConfigError('InvalidPath', `${field}: ${reason}: ${filePath}`, {
		field,
		path: filePath,
	});
}

function freezeConfig(config: EffectiveConfig): EffectiveConfig {
	if (config.tls) Object.freeze(config.tls);
	return Object.freeze(config);
}
