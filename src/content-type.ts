import type { FileHandle } from 'node:fs/promises';
import { basename } from 'node:path';
import { charset, lookup } from 'mime-types';

const DEFAULT_BIN = 'application/octet-stream';
const DEFAULT_TEXT = 'text/plain';

/** Compressible types outside of 'text/*' */
const TEXT_TYPES = [
	'application/javascript',
	'application/json',
	'application/ld+json',
	'application/manifest+json',
	'application/wasm',
	'application/xhtml+xml',
	'application/xml',
	'image/svg+xml',
	'image/x-icon',
];

export class TypeResult {
	type: string;
	charset: string;

	constructor(type: string, charset: string = '') {
		this.type = type;
		this.charset = charset;
	}

	get group(): 'text' | 'bin' {
		return isTextType(this.type) ? 'text' : 'bin';
	}

	toString(): string {
		return this.charset ? `${this.type}; charset=${this.charset}` : this.type;
	}
}

/**
Content type from the file name, or sniffed from the first bytes
of the file when the extension is unknown.
*/
export async function getContentType({
	path,
	handle,
}: {
	path?: string;
	handle?: FileHandle;
}): Promise<TypeResult> {
	if (path) {
		const type = typeForFilePath(path);
		if (type.type !== DEFAULT_BIN || !handle) {
			return type;
		}
	}
	if (handle) {
		return typeForFile(handle);
	}
	return new TypeResult(DEFAULT_BIN);
}

export function typeForFilePath(filePath: string): TypeResult {
	const type = lookup(basename(filePath));
	if (type === false) {
		return new TypeResult(DEFAULT_BIN);
	}
	const encoding = charset(type);
	return new TypeResult(type, encoding ? encoding.toLowerCase() : '');
}

async function typeForFile(handle: FileHandle): Promise<TypeResult> {
	const { buffer, bytesRead } = await handle.read({
		buffer: new Uint8Array(1500),
		position: 0,
	});
	const header = buffer.subarray(0, bytesRead);
	if (bytesRead > 0 && !isBinHeader(header)) {
		return new TypeResult(DEFAULT_TEXT, 'utf-8');
	}
	return new TypeResult(DEFAULT_BIN);
}

/**
Detect binary data by looking for control bytes that text files don't use.
*/
export function isBinHeader(bytes: Uint8Array): boolean {
	return bytes.some((byte) => isBinDataByte(byte));
}

export function isBinDataByte(byte: number): boolean {
	// allow tab, line feed, form feed, carriage return and escape
	if (byte === 0x09 || byte === 0x0a || byte === 0x0c || byte === 0x0d || byte === 0x1b) {
		return false;
	}
	return byte < 0x20 || byte === 0x7f;
}

export function isTextType(type: string): boolean {
	return (
		type.startsWith('text/') ||
		type.endsWith('+json') ||
		type.endsWith('+xml') ||
		TEXT_TYPES.includes(type)
	);
}
