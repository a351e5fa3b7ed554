import { createReadStream, type ReadStream } from 'node:fs';
import { open, type FileHandle } from 'node:fs/promises';
import type { Transform } from 'node:stream';
import {
	constants as zlibConstants,
	createBrotliCompress,
	createDeflate,
	createGzip,
} from 'node:zlib';

import { MAX_COMPRESS_SIZE, MIN_COMPRESS_SIZE, SUPPORTED_METHODS } from './constants.ts';
import { getContentType, typeForFilePath } from './content-type.ts';
import { ServingError } from './errors.ts';
import { errorCode } from './fs-utils.ts';
import { ServingPolicy } from './policy.ts';
import type { Disposition, EffectiveConfig, Request, Response, ResMetaData } from './types.d.ts';
import { getLocalPath, headerCase } from './utils.ts';

export type Encoding = 'br' | 'gzip' | 'deflate';

/** Supported encodings, in order of preference */
export const ENCODINGS: Encoding[] = ['br', 'gzip', 'deflate'];

interface Config {
	req: Request;
	res: Response;
	policy: ServingPolicy;
	config: Pick<EffectiveConfig, 'compression'>;
}

interface Payload {
	body?: ReadStream;
	isText?: boolean;
	statSize?: number;
}

export class RequestHandler {
	#req: Config['req'];
	#res: Config['res'];
	#policy: Config['policy'];
	#config: Config['config'];
	#filePath: string | null = null;

	timing: ResMetaData['timing'] = { start: Date.now() };
	urlPath: string;
	search: string;
	error?: Error | string;

	_canStream = true;

	constructor({ req, res, policy, config }: Config) {
		this.#req = req;
		this.#res = res;
		this.#policy = policy;
		this.#config = config;

		// keep the raw path: URL parsing would normalize '..' segments away
		const rawUrl = req.url ?? '';
		const queryIndex = rawUrl.search(/[?#]/);
		this.urlPath = queryIndex >= 0 ? rawUrl.slice(0, queryIndex) : rawUrl;
		const hashIndex = rawUrl.indexOf('#');
		this.search =
			queryIndex >= 0 && rawUrl[queryIndex] === '?'
				? rawUrl.slice(queryIndex, hashIndex > queryIndex ? hashIndex : undefined)
				: '';

		res.on('close', () => {
			this.timing.close = Date.now();
		});
	}

	get headers() {
		return this.#res.getHeaders();
	}

	get localPath() {
		if (this.#filePath) {
			return getLocalPath(this.#policy.root, this.#filePath) ?? this.#filePath;
		}
		return null;
	}

	get method() {
		return this.#req.method ?? '';
	}

	get status() {
		return this.#res.statusCode;
	}
	set status(code) {
		if (this.#res.headersSent) return;
		this.#res.statusCode = code;
	}

	async process() {
		// bail for unsupported http methods
		if (!SUPPORTED_METHODS.includes(this.method)) {
			this.status = 405;
			this.error = new Error(`HTTP method ${this.method} is not supported`);
			this.#header('allow', SUPPORTED_METHODS.join(', '));
			return this.#sendEmpty();
		}

		if (this.method === 'OPTIONS') {
			this.status = 204;
			this.#header('allow', SUPPORTED_METHODS.join(', '));
			return this.#sendEmpty();
		}

		if (!this.urlPath.startsWith('/')) {
			this.status = 400;
			this.error = new Error(`Invalid URL path: '${this.urlPath}'`);
			return this.#sendEmpty();
		}

		let disposition: Disposition;
		try {
			disposition = await this.#policy.decide(this.urlPath);
		} catch (err) {
			if (!(err instanceof ServingError)) throw err;
			this.status = err.status;
			this.error = err;
			return this.#sendEmpty();
		}

		switch (disposition.kind) {
			case 'serve':
			case 'ok-override':
				return this.#sendFile(disposition.filePath, 200);
			case 'not-found-with-body':
				return this.#sendFile(disposition.filePath, 404);
			case 'not-found-empty':
				this.status = 404;
				return this.#sendEmpty();
			case 'redirect':
				return this.#redirect(`${disposition.location}${this.search}`);
		}
	}

	#redirect(location: string) {
		this.status = 307;
		this.#header('location', location);
		return this.#sendEmpty();
	}

	async #sendFile(filePath: string, status: number) {
		let handle: FileHandle | undefined;
		let data: Payload = {};
		let contentType = '';
		let failed = false;

		this.#filePath = filePath;
		this.status = status;

		try {
			// check that we can open the file (especially on windows where it might be busy)
			handle = await open(filePath);
			const type = await getContentType({ path: filePath, handle });
			contentType = type.toString();
			data = {
				isText: type.group === 'text',
				statSize: (await handle.stat()).size,
			};
		} catch (err) {
			failed = true;
			const code = errorCode(err);
			this.status = code === 'ENOENT' ? 404 : code === 'EACCES' || code === 'EBUSY' ? 403 : 500;
			this.error = err instanceof Error ? err : String(err);
		} finally {
			await handle?.close();
		}

		if (failed) {
			return this.#sendEmpty();
		}

		this.#header('content-type', contentType || typeForFilePath(filePath).toString());

		if (this.method !== 'HEAD' && this._canStream) {
			data.body = createReadStream(filePath, { autoClose: true, start: 0 });
		}

		return this.#send(data);
	}

	#sendEmpty() {
		this.timing.send = Date.now();
		this.#header('content-length', '0');
		this.#res.end();
	}

	#send({ body, isText = false, statSize }: Payload = {}) {
		this.timing.send = Date.now();

		// stop early if possible
		if (this.#req.destroyed) {
			body?.destroy();
			this.#res.end();
			return;
		}

		const compressible = this.#config.compression && isText;
		if (compressible) {
			this.#header('vary', 'Accept-Encoding');
		}
		const encoding = compressible
			? pickEncoding({ headers: this.#req.headers, statSize })
			: undefined;

		// No content-length when compressing: we can't use the stat size,
		// and compressing all at once would defeat streaming and/or run out of memory
		if (encoding) {
			this.#header('content-encoding', encoding);
		} else if (typeof statSize === 'number') {
			this.#header('content-length', String(statSize));
		}

		if (this.method === 'HEAD' || body == null) {
			this.#res.end();
			return;
		}

		body.on('error', (err) => {
			this.error = err;
			this.#res.destroy(err);
		});

		if (encoding) {
			body.pipe(createEncoder(encoding, statSize)).pipe(this.#res);
		} else {
			body.pipe(this.#res);
		}
	}

	#header(name: string, value: null | number | string | string[], normalizeCase = true) {
		if (this.#res.headersSent) return;
		if (normalizeCase) name = headerCase(name);
		if (typeof value === 'number') value = String(value);
		if (value === null) {
			this.#res.removeHeader(name);
		} else {
			this.#res.setHeader(name, value);
		}
	}

	data(): ResMetaData {
		return {
			status: this.status,
			method: this.method,
			url: `${this.urlPath}${this.search}`,
			urlPath: this.urlPath,
			localPath: this.localPath,
			timing: structuredClone(this.timing),
			error: this.error,
		};
	}
}

function createEncoder(encoding: Encoding, size?: number): Transform {
	if (encoding === 'br') {
		const params: Record<number, number> = {
			[zlibConstants.BROTLI_PARAM_MODE]: zlibConstants.BROTLI_MODE_TEXT,
			[zlibConstants.BROTLI_PARAM_QUALITY]: 4,
		};
		if (typeof size === 'number') {
			params[zlibConstants.BROTLI_PARAM_SIZE_HINT] = size;
		}
		return createBrotliCompress({ params });
	}
	return encoding === 'gzip' ? createGzip() : createDeflate();
}

/**
Pick the preferred encoding accepted by the client, if the response size
is worth compressing. Encodings with 'q=0' are refused.
*/
export function pickEncoding({
	headers,
	statSize = 0,
}: {
	headers: Request['headers'];
	statSize?: number;
}): Encoding | undefined {
	if (statSize < MIN_COMPRESS_SIZE || statSize > MAX_COMPRESS_SIZE) return;

	const accepted = new Map<string, number>();
	for (const header of pickHeader(headers, 'accept-encoding')) {
		for (const item of header.split(',')) {
			const [name, ...params] = item.split(';').map((s) => s.trim().toLowerCase());
			if (!name) continue;
			const qParam = params.find((p) => p.startsWith('q='));
			const q = qParam ? Number(qParam.slice(2)) : 1;
			accepted.set(name, Number.isFinite(q) ? q : 0);
		}
	}

	for (const encoding of ENCODINGS) {
		const q = accepted.get(encoding) ?? accepted.get('*');
		if (q != null && q > 0) return encoding;
	}
}

function pickHeader(headers: Request['headers'], name: string): string[] {
	const value = headers[name];
	return typeof value === 'string' ? [value] : (value ?? []);
}
