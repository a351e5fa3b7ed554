import { watch, type FSWatcher } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { createSecureContext } from 'node:tls';

import { StartupError } from './errors.ts';
import type { Logger } from './logger.ts';
import type { TlsConfig } from './types.d.ts';

export interface TlsMaterial {
	cert: Buffer;
	key: Buffer;
}

/** Anything that can swap its certificate at runtime, like https.Server */
export interface SecureContextTarget {
	setSecureContext(options: TlsMaterial): void;
}

const MAX_RETRY_DELAY = 30_000;

/**
Read the PEM certificate and key, and check that they can be used
together to create a secure context.
*/
export async function loadTlsMaterial({ cert, key }: Pick<TlsConfig, 'cert' | 'key'>): Promise<TlsMaterial> {
	let material: TlsMaterial;
	try {
		const [certData, keyData] = await Promise.all([readFile(cert), readFile(key)]);
		material = { cert: certData, key: keyData };
	} catch (err) {
		throw new StartupError('TlsLoadError', `cannot read TLS files: ${messageOf(err)}`, err);
	}
	try {
		createSecureContext(material);
	} catch (err) {
		throw new StartupError(
			'TlsLoadError',
			`invalid TLS certificate or key (cert: ${cert}, key: ${key}): ${messageOf(err)}`,
			err,
		);
	}
	return material;
}

/**
Reload the certificate and key when one of the files changes.
Failed reloads are retried with a doubling delay, reset after a success.
*/
export class CertificateWatcher {
	#tls: TlsConfig;
	#target: SecureContextTarget;
	#logger?: Logger;
	#debounceMs: number;
	#load: (tls: TlsConfig) => Promise<TlsMaterial>;
	#watchers = new Map<string, FSWatcher>();
	#timer: NodeJS.Timeout | null = null;
	#delay = 1;
	#closed = false;

	reloadCount = 0;

	constructor({
		tls,
		target,
		logger,
		debounceMs = 100,
		load = loadTlsMaterial,
	}: {
		tls: TlsConfig;
		target: SecureContextTarget;
		logger?: Logger;
		debounceMs?: number;
		load?: (tls: TlsConfig) => Promise<TlsMaterial>;
	}) {
		this.#tls = tls;
		this.#target = target;
		this.#logger = logger;
		this.#debounceMs = debounceMs;
		this.#load = load;
	}

	get retryDelay(): number {
		return this.#delay;
	}

	get watching(): boolean {
		return this.#watchers.size > 0;
	}

	start() {
		for (const filePath of new Set([this.#tls.cert, this.#tls.key])) {
			this.#watch(filePath);
		}
	}

	#watch(filePath: string) {
		this.#watchers.get(filePath)?.close();
		const watcher = watch(filePath, (eventType) => {
			// editors and certbot replace files: follow the new file
			if (eventType === 'rename') this.#rewatch(filePath);
			this.#schedule(this.#debounceMs);
		});
		watcher.on('error', (err) => {
			void this.#logger?.error(`certificate watcher error: ${err.message}`);
		});
		this.#watchers.set(filePath, watcher);
	}

	#rewatch(filePath: string) {
		try {
			this.#watch(filePath);
		} catch {
			// the file may not exist yet, the reload retry will find it
			this.#watchers.get(filePath)?.close();
			this.#watchers.delete(filePath);
		}
	}

	#schedule(delay: number) {
		if (this.#closed) return;
		if (this.#timer) clearTimeout(this.#timer);
		this.#timer = setTimeout(() => {
			this.#timer = null;
			this.reload().catch((err: unknown) => {
				void this.#logger?.error(`certificate reload failed: ${messageOf(err)}`);
			});
		}, delay);
	}

	async reload(): Promise<boolean> {
		void this.#logger?.write('info', 'reloading TLS certificate');
		try {
			const material = await this.#load(this.#tls);
			this.#target.setSecureContext(material);
		} catch (err) {
			this.#delay = Math.min(this.#delay * 2, MAX_RETRY_DELAY);
			void this.#logger?.error(`TLS reload error: ${messageOf(err)}`);
			void this.#logger?.write('debug', `retrying TLS reload in ${this.#delay}ms`);
			this.#schedule(this.#delay);
			return false;
		}

		this.#delay = 1;
		this.reloadCount++;
		for (const filePath of new Set([this.#tls.cert, this.#tls.key])) {
			if (!this.#closed && !this.#watchers.has(filePath)) this.#rewatch(filePath);
		}
		void this.#logger?.write('info', 'TLS certificate reloaded');
		return true;
	}

	close() {
		this.#closed = true;
		if (this.#timer) {
			clearTimeout(this.#timer);
			this.#timer = null;
		}
		for (const watcher of this.#watchers.values()) watcher.close();
		this.#watchers.clear();
	}
}

function messageOf(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
