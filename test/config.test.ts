import { chmod, readFile } from 'node:fs/promises';
import { platform } from 'node:os';
import { getuid } from 'node:process';
import { afterAll, expect, suite, test } from 'vitest';

import { parseConfigFile } from '../src/config-file.ts';
import { mergeConfig, resolveConfig } from '../src/config.ts';
import { ConfigError } from '../src/errors.ts';
import { set, unset } from '../src/setting.ts';
import type { CliArgs, TlsArgs } from '../src/types.d.ts';
import { blankArgs, fsFixture } from './shared.ts';

async function resolveError(promise: Promise<unknown>): Promise<ConfigError> {
	try {
		await promise;
	} catch (err) {
		if (err instanceof ConfigError) return err;
		throw err;
	}
	throw new Error('Expected a ConfigError');
}

function tlsArgs(overrides: Partial<TlsArgs> = {}): CliArgs['tls'] {
	return set({ cert: unset, key: unset, redirectHttp: unset, ...overrides });
}

suite('mergeConfig', () => {
	const cwd = '/home/user/project';

	test('uses defaults when nothing is set', () => {
		expect(mergeConfig(blankArgs(), {}, cwd)).toEqual({
			path: cwd,
			addr: '127.0.0.1',
			port: 3000,
			compression: true,
			notFound: undefined,
			ok: false,
			logLevel: 'info',
			logPath: undefined,
			logMaxFiles: 7,
			tls: undefined,
		});
	});

	test('command line values win over file values, field by field', () => {
		const config = mergeConfig(
			blankArgs({ port: set(4000), ok: set(true) }),
			{ port: 5000, addr: '0.0.0.0', path: 'site', not_found: 'site/404.html', ok: false },
			cwd,
		);
		expect(config.port).toBe(4000);
		expect(config.ok).toBe(true);
		expect(config.addr).toBe('0.0.0.0');
		expect(config.path).toBe('/home/user/project/site');
		expect(config.notFound).toBe('/home/user/project/site/404.html');
	});

	test('disable_compression maps to compression', () => {
		expect(mergeConfig(blankArgs(), { disable_compression: true }, cwd).compression).toBe(false);
		expect(
			mergeConfig(blankArgs({ disableCompression: set(true) }), { disable_compression: false }, cwd)
				.compression,
		).toBe(false);
	});

	test('tls settings merge one field at a time', () => {
		const config = mergeConfig(
			blankArgs({ tls: tlsArgs({ redirectHttp: set(true) }) }),
			{ tls: { cert: 'cert.pem', key: '/etc/ssl/key.pem' } },
			cwd,
		);
		expect(config.tls).toEqual({
			cert: '/home/user/project/cert.pem',
			key: '/etc/ssl/key.pem',
			redirectHttp: true,
		});
	});

	test('missing tls files are left empty', () => {
		const config = mergeConfig(blankArgs({ tls: tlsArgs({ cert: set('c.pem') }) }), {}, cwd);
		expect(config.tls).toEqual({ cert: '/home/user/project/c.pem', key: '', redirectHttp: false });
	});
});

suite('resolveConfig', async () => {
	const { fixture, path } = await fsFixture({
		'index.html': '<h1>Hello</h1>',
		'site/index.html': '<h1>Site</h1>',
		'site/404.html': '<h1>Not found</h1>',
		'tls/cert.pem': 'placeholder certificate',
		'tls/key.pem': 'placeholder key',
		'existing.toml': 'port = 5000\naddr = "0.0.0.0"\npath = "site"\n',
		'conf-dir/.keep': '',
		'readonly-logs/.keep': '',
	});
	const cwd = path``;

	afterAll(() => fixture.rm());

	test('defaults serve the working directory', async () => {
		const config = await resolveConfig(blankArgs(), { cwd });
		expect(config.path).toBe(cwd);
		expect(config.port).toBe(3000);
		expect(config.addr).toBe('127.0.0.1');
		expect(config.tls).toBe(undefined);
		expect(Object.isFrozen(config)).toBe(true);
	});

	test('reads an existing file without rewriting it', async () => {
		const before = await readFile(path`existing.toml`, 'utf8');
		const config = await resolveConfig(
			blankArgs({ config: set('existing.toml'), port: set(4000) }),
			{ cwd },
		);
		expect(config.port).toBe(4000);
		expect(config.addr).toBe('0.0.0.0');
		expect(config.path).toBe(path`site`);
		expect(await readFile(path`existing.toml`, 'utf8')).toBe(before);
	});

	test('creates a missing file once, then reads it back', async () => {
		const created: string[] = [];
		const onConfigCreated = (filePath: string) => created.push(filePath);

		const first = await resolveConfig(
			blankArgs({ config: set('new/servedir.toml'), port: set(4000), path: set('site') }),
			{ cwd, onConfigCreated },
		);
		expect(first.port).toBe(4000);
		expect(created).toEqual([path`new/servedir.toml`]);

		const text = await readFile(path`new/servedir.toml`, 'utf8');
		expect(parseConfigFile(text)).toMatchObject({ port: 4000, path: path`site` });

		const second = await resolveConfig(blankArgs({ config: set('new/servedir.toml') }), {
			cwd,
			onConfigCreated,
		});
		expect(second).toEqual(first);
		expect(created).toHaveLength(1);
		expect(await readFile(path`new/servedir.toml`, 'utf8')).toBe(text);
	});

	test('ok requires not_found', async () => {
		const error = await resolveError(
			resolveConfig(blankArgs({ config: set('invalid.toml'), ok: set(true) }), { cwd }),
		);
		expect(error.code).toBe('InvalidCombination');
		expect(error.field).toBe('ok');
		// nothing is written for an invalid configuration
		await expect(readFile(path`invalid.toml`, 'utf8')).rejects.toMatchObject({ code: 'ENOENT' });
	});

	test('ok with not_found overrides the 404 status', async () => {
		const config = await resolveConfig(
			blankArgs({ path: set('site'), notFound: set('site/404.html'), ok: set(true) }),
			{ cwd },
		);
		expect(config.ok).toBe(true);
		expect(config.notFound).toBe(path`site/404.html`);
	});

	test('tls needs both cert and key', async () => {
		const noKey = await resolveError(
			resolveConfig(blankArgs({ tls: tlsArgs({ cert: set('tls/cert.pem') }) }), { cwd }),
		);
		expect(noKey.code).toBe('IncompleteTls');
		expect(noKey.field).toBe('tls.key');
		expect(noKey.message).toBe(`TLS requires both 'cert' and 'key' (missing: key)`);

		const noFiles = await resolveError(resolveConfig(blankArgs({ tls: tlsArgs() }), { cwd }));
		expect(noFiles.field).toBe('tls.cert');
		expect(noFiles.message).toBe(`TLS requires both 'cert' and 'key' (missing: cert, key)`);
	});

	test('tls files are resolved and checked', async () => {
		const config = await resolveConfig(
			blankArgs({
				port: set(443),
				tls: tlsArgs({ cert: set('tls/cert.pem'), key: set('tls/key.pem'), redirectHttp: set(true) }),
			}),
			{ cwd },
		);
		expect(config.tls).toEqual({
			cert: path`tls/cert.pem`,
			key: path`tls/key.pem`,
			redirectHttp: true,
		});
		expect(Object.isFrozen(config.tls)).toBe(true);

		const error = await resolveError(
			resolveConfig(
				blankArgs({ tls: tlsArgs({ cert: set('tls/cert.pem'), key: set('tls/nope.pem') }) }),
				{ cwd },
			),
		);
		expect(error.code).toBe('PathNotFound');
		expect(error.field).toBe('tls.key');
	});

	test('missing paths are reported', async () => {
		const error = await resolveError(resolveConfig(blankArgs({ path: set('missing') }), { cwd }));
		expect(error.code).toBe('PathNotFound');
		expect(error.field).toBe('path');
		expect(error.path).toBe(path`missing`);
		expect(error.message).toBe(`path: no such file or directory: ${path`missing`}`);
	});

	test('paths of the wrong kind are reported', async () => {
		const notDir = await resolveError(resolveConfig(blankArgs({ path: set('index.html') }), { cwd }));
		expect(notDir.code).toBe('InvalidPath');
		expect(notDir.message).toBe(`path: not a directory: ${path`index.html`}`);

		const notFile = await resolveError(resolveConfig(blankArgs({ notFound: set('site') }), { cwd }));
		expect(notFile.code).toBe('InvalidPath');
		expect(notFile.message).toBe(`not_found: not a file: ${path`site`}`);

		const configDir = await resolveError(
			resolveConfig(blankArgs({ config: set('conf-dir') }), { cwd }),
		);
		expect(configDir.code).toBe('InvalidPath');
		expect(configDir.field).toBe('config');
	});

	test('invalid addresses are rejected', async () => {
		const error = await resolveError(resolveConfig(blankArgs({ addr: set('localhost') }), { cwd }));
		expect(error.code).toBe('ParseFailure');
		expect(error.field).toBe('addr');
	});

	test('log_path may be created later but must not be a file', async () => {
		const config = await resolveConfig(blankArgs({ logPath: set('logs') }), { cwd });
		expect(config.logPath).toBe(path`logs`);

		const error = await resolveError(resolveConfig(blankArgs({ logPath: set('index.html') }), { cwd }));
		expect(error.code).toBe('InvalidPath');
		expect(error.field).toBe('log_path');
	});

	test('log_path must be writable', async () => {
		// permission bits do not apply to root
		if (platform() === 'win32' || getuid?.() === 0) return;
		await chmod(path`readonly-logs`, 0o555);
		try {
			const error = await resolveError(
				resolveConfig(blankArgs({ logPath: set('readonly-logs') }), { cwd }),
			);
			expect(error.code).toBe('InvalidPath');
			expect(error.field).toBe('log_path');
			expect(error.message).toBe(`log_path: permission denied: ${path`readonly-logs`}`);
		} finally {
			await chmod(path`readonly-logs`, 0o755);
		}
	});

	test('file parse errors are reported', async () => {
		await fixture.writeFile('broken.toml', 'port = "eighty"\n');
		const error = await resolveError(resolveConfig(blankArgs({ config: set('broken.toml') }), { cwd }));
		expect(error.code).toBe('ParseFailure');
		expect(error.field).toBe('port');
	});
});
