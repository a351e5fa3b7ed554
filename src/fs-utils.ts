import { access, constants, lstat, realpath, stat } from 'node:fs/promises';

import type { FSKind } from './types.d.ts';

export type AccessStatus = 'ok' | 'missing' | 'wrong-kind' | 'denied';

/**
Check that a path exists (following symlinks), has the expected kind,
and can be read. Directories also need the x permission.
With `write`, the path must be writable too.
*/
export async function checkAccess(
	filePath: string,
	kind: 'dir' | 'file',
	{ write = false }: { write?: boolean } = {},
): Promise<AccessStatus> {
	try {
		const stats = await stat(filePath);
		const isKind = kind === 'dir' ? stats.isDirectory() : stats.isFile();
		if (!isKind) return 'wrong-kind';
		let mode = kind === 'dir' ? constants.R_OK | constants.X_OK : constants.R_OK;
		if (write) mode |= constants.W_OK;
		await access(filePath, mode);
		return 'ok';
	} catch (err) {
		const code = errorCode(err);
		if (code === 'ENOENT' || code === 'ENOTDIR') return 'missing';
		if (code === 'EACCES' || code === 'EPERM') return 'denied';
		throw err;
	}
}

export function errorCode(err: unknown): string | undefined {
	if (err != null && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
		return err.code;
	}
}

export async function getKind(filePath: string): Promise<FSKind> {
	try {
		const stats = await lstat(filePath);
		return statsKind(stats);
	} catch {
		return null;
	}
}

export async function getRealpath(filePath: string): Promise<string | null> {
	try {
		const real = await realpath(filePath);
		return real;
	} catch {
		return null;
	}
}

function statsKind(stats: {
	isSymbolicLink?(): boolean;
	isDirectory?(): boolean;
	isFile?(): boolean;
}): FSKind {
	if (stats.isSymbolicLink?.()) return 'link';
	if (stats.isDirectory?.()) return 'dir';
	else if (stats.isFile?.()) return 'file';
	return null;
}
