import { env } from 'node:process';
import { isAbsolute, relative, sep as dirSep } from 'node:path';

export function clamp(value: number, min: number, max: number): number {
	if (typeof value !== 'number') value = min;
	return Math.min(max, Math.max(min, value));
}

export function errorList() {
	const list: string[] = [];
	const fn: { (msg: string): void; list: string[] } = (msg = '') => list.push(msg);
	fn.list = list;
	return fn;
}

export function fwdSlash(input: string = ''): string {
	return input.replace(/\\/g, '/').replace(/\/{2,}/g, '/');
}

export function getEnv(key: string): string {
	return env[key] ?? '';
}

export function getLocalPath(root: string, filePath: string): string | null {
	if (isSubpath(root, filePath)) {
		return trimSlash(filePath.slice(trimSlash(root, { end: true }).length), {
			start: true,
			end: true,
		});
	}
	return null;
}

export function headerCase(name: string): string {
	return name.replace(/((^|\b|_)[a-z])/g, (s) => s.toUpperCase());
}

export function isPrivateIPv4(address?: string) {
	if (!address) return false;
	const bytes = address.split('.').map(Number);
	if (bytes.length !== 4) return false;
	for (const byte of bytes) {
		if (!(byte >= 0 && byte <= 255)) return false;
	}
	return (
		// 10/8
		bytes[0] === 10 ||
		// 172.16/12
		(bytes[0] === 172 && bytes[1] >= 16 && bytes[1] < 32) ||
		// 192.168/16
		(bytes[0] === 192 && bytes[1] === 168)
	);
}

/**
Check that an absolute path is the parent path or one of its descendants.
Both paths must already be normalized.
*/
export function isSubpath(parent: string, filePath: string): boolean {
	if (!isAbsolute(parent) || !isAbsolute(filePath)) return false;
	const rel = relative(parent, filePath);
	if (rel === '') return true;
	return rel !== '..' && !rel.startsWith(`..${dirSep}`) && !isAbsolute(rel);
}

export function printValue(input: unknown) {
	if (typeof input === 'object') {
		return JSON.stringify(input);
	} else if (typeof input === 'string') {
		return `'${input.replaceAll("'", "\\'")}'`;
	}
	return String(input);
}

export function trimSlash(
	input: string = '',
	config: { start?: boolean; end?: boolean } = { start: true, end: true },
) {
	if (config.start === true) input = input.replace(/^[/\\]/, '');
	if (config.end === true) input = input.replace(/[/\\]$/, '');
	return input;
}

export function withResolvers<T = unknown>() {
	const noop = () => {};
	let resolve: (value: T | PromiseLike<T>) => void = noop;
	let reject: (reason?: unknown) => void = noop;
	const promise = new Promise<T>((res, rej) => {
		resolve = res;
		reject = rej;
	});
	return { promise, resolve, reject };
}
