import { isAbsolute, join, resolve } from 'node:path';
import { platform } from 'node:process';

import { ServingError } from './errors.ts';
import { getKind, getRealpath } from './fs-utils.ts';
import type { Disposition, EffectiveConfig, FSKind } from './types.d.ts';
import { isSubpath, trimSlash } from './utils.ts';

export const INDEX_FILE = 'index.html';

/**
Decides what to answer for a request path, from the runtime configuration
and the files under the root directory.
*/
export class ServingPolicy {
	#root: string;
	#realRoot?: string;
	#notFound?: string;
	#ok: boolean;

	constructor({ path, notFound, ok }: Pick<EffectiveConfig, 'path' | 'notFound' | 'ok'>) {
		if (typeof path !== 'string' || !isAbsolute(path)) {
			throw new Error('Expected absolute root path');
		}
		this.#root = path.length > 1 ? trimSlash(path, { end: true }) : path;
		this.#notFound = notFound;
		this.#ok = ok && notFound != null;
	}

	get root(): string {
		return this.#root;
	}

	/**
	@param urlPath raw request path, still percent-encoded and without query string
	@throws {ServingError} when the path cannot be decoded or leaves the root directory
	*/
	async decide(urlPath: string): Promise<Disposition> {
		const filePath = this.resolvePath(urlPath);
		const kind = await this.#realKind(filePath);

		if (kind === 'file') {
			return { kind: 'serve', filePath };
		}

		if (kind === 'dir') {
			if (!urlPath.endsWith('/')) {
				// a location starting with '//' or '/\' would point to another host
				const location = `/${urlPath.replace(/^[/\\]+/, '').replace(/\/{2,}/g, '/')}/`;
				return { kind: 'redirect', location };
			}
			const indexPath = join(filePath, INDEX_FILE);
			if ((await this.#realKind(indexPath)) === 'file') {
				return { kind: 'serve', filePath: indexPath };
			}
		}

		return this.fallback();
	}

	fallback(): Disposition {
		if (this.#notFound != null) {
			return this.#ok
				? { kind: 'ok-override', filePath: this.#notFound }
				: { kind: 'not-found-with-body', filePath: this.#notFound };
		}
		return { kind: 'not-found-empty' };
	}

	/**
	Decode a request path and resolve it against the root directory.
	*/
	resolvePath(urlPath: string): string {
		let decoded: string;
		try {
			decoded = decodeURIComponent(urlPath);
		} catch {
			throw new ServingError('MalformedPath', `Invalid URL encoding: '${urlPath}'`);
		}
		if (decoded.includes('\0')) {
			throw new ServingError('MalformedPath', `Invalid URL path: '${urlPath}'`);
		}

		// windows paths use both separators, posix file names may contain a backslash
		const localPath = platform === 'win32' ? decoded.replaceAll('\\', '/') : decoded;
		const filePath = resolve(this.#root, `.${localPath.startsWith('/') ? '' : '/'}${localPath}`);
		if (!this.withinRoot(filePath)) {
			throw new ServingError('OutOfRoot', `Path is outside of the served directory: '${urlPath}'`);
		}
		return filePath;
	}

	withinRoot(filePath: string): boolean {
		return isSubpath(this.#root, filePath);
	}

	/**
	Kind of a path after following symlinks. Paths whose real location
	is outside of the root directory are treated as missing.
	*/
	async #realKind(filePath: string): Promise<FSKind> {
		const realPath = await getRealpath(filePath);
		if (realPath == null) return null;
		this.#realRoot ??= (await getRealpath(this.#root)) ?? this.#root;
		if (!isSubpath(this.#realRoot, realPath)) return null;
		return getKind(realPath);
	}
}
