import { afterAll, expect, suite, test } from 'vitest';

import { pickEncoding, RequestHandler } from '../src/handler.ts';
import { ServingPolicy } from '../src/policy.ts';
import type { EffectiveConfig } from '../src/types.d.ts';
import { fsFixture, mockReqRes } from './shared.ts';

const allowMethods = 'GET, HEAD, OPTIONS';

function handlerContext(
	config: Pick<EffectiveConfig, 'path' | 'notFound' | 'ok' | 'compression'>,
): (method: string, url: string, headers?: Record<string, string | string[]>) => RequestHandler {
	const policy = new ServingPolicy(config);
	return (method, url, headers) => {
		const { req, res } = mockReqRes(method, url, headers);
		const handler = new RequestHandler({ req, res, policy, config });
		handler._canStream = false;
		return handler;
	};
}

suite('RequestHandler', async () => {
	const css = 'body { color: rebeccapurple; }\n'.repeat(4);
	const { fixture, path } = await fsFixture({
		'outside.txt': 'secret',
		'root/index.html': '<h1>Hello World</h1>',
		'root/404.html': '<h1>Not found</h1>',
		'root/style.css': css,
		'root/image.png': 'PNG',
		'root/section/index.html': '<h1>Section</h1>',
	});

	afterAll(() => fixture.rm());

	const root = path`root`;
	const request = handlerContext({ path: root, notFound: undefined, ok: false, compression: true });

	test('starts with a 200 status', () => {
		const handler = request('GET', '/');
		expect(handler.method).toBe('GET');
		expect(handler.urlPath).toBe('/');
		expect(handler.status).toBe(200);
		expect(handler.localPath).toBe(null);
	});

	test('keeps the raw path and query string', () => {
		const handler = request('GET', '/a/../b?x=1#frag');
		expect(handler.urlPath).toBe('/a/../b');
		expect(handler.search).toBe('?x=1');
	});

	for (const method of ['PUT', 'DELETE', 'POST']) {
		test(`${method} method is unsupported`, async () => {
			const handler = request(method, '/index.html');
			await handler.process();
			expect(handler.status).toBe(405);
			expect(handler.headers).toEqual({ allow: allowMethods, 'content-length': '0' });
			expect(handler.localPath).toBe(null);
		});
	}

	test('OPTIONS lists allowed methods', async () => {
		const handler = request('OPTIONS', '*');
		await handler.process();
		expect(handler.status).toBe(204);
		expect(handler.headers).toEqual({ allow: allowMethods, 'content-length': '0' });
	});

	test('GET returns 400 for paths without a leading slash', async () => {
		const handler = request('GET', 'index.html');
		await handler.process();
		expect(handler.status).toBe(400);
	});

	test('GET serves a file', async () => {
		const handler = request('GET', '/index.html');
		await handler.process();
		expect(handler.status).toBe(200);
		expect(handler.localPath).toBe('index.html');
		expect(handler.headers).toEqual({
			'content-type': 'text/html; charset=utf-8',
			vary: 'Accept-Encoding',
			'content-length': '20',
		});
	});

	test('GET serves index.html for directories', async () => {
		const handler = request('GET', '/section/');
		await handler.process();
		expect(handler.status).toBe(200);
		expect(handler.localPath).toBe('section/index.html');
	});

	test('GET redirects directories to a trailing slash', async () => {
		const handler = request('GET', '/section?page=2');
		await handler.process();
		expect(handler.status).toBe(307);
		expect(handler.headers.location).toBe('/section/?page=2');
		expect(handler.headers['content-length']).toBe('0');
	});

	test('directory redirects drop repeated slashes and the fragment', async () => {
		const handler = request('GET', '//section?page=2#top');
		await handler.process();
		expect(handler.status).toBe(307);
		expect(handler.headers.location).toBe('/section/?page=2');
	});

	test('GET returns an empty 404 for unknown paths', async () => {
		const handler = request('GET', '/nope.html');
		await handler.process();
		expect(handler.status).toBe(404);
		expect(handler.headers).toEqual({ 'content-length': '0' });
	});

	test('GET rejects paths outside of the root', async () => {
		for (const url of ['/../outside.txt', '/section/%2e%2e/%2e%2e/outside.txt']) {
			const handler = request('GET', url);
			await handler.process();
			expect(handler.status).toBe(403);
			expect(handler.headers).toEqual({ 'content-length': '0' });
			expect(handler.localPath).toBe(null);
		}
	});

	test('GET returns 400 for invalid URL-encoded chars', async () => {
		const handler = request('GET', '/cool/%E0%A4%A/path');
		await handler.process();
		expect(handler.status).toBe(400);
	});

	test('GET sends the not_found file with a 404 status', async () => {
		const withBody = handlerContext({
			path: root,
			notFound: path`root/404.html`,
			ok: false,
			compression: true,
		});
		const handler = withBody('GET', '/missing');
		await handler.process();
		expect(handler.status).toBe(404);
		expect(handler.localPath).toBe('404.html');
		expect(handler.headers['content-type']).toBe('text/html; charset=utf-8');
		expect(handler.headers['content-length']).toBe('18');
	});

	test('GET sends the not_found file with a 200 status when ok is set', async () => {
		const override = handlerContext({
			path: root,
			notFound: path`root/404.html`,
			ok: true,
			compression: true,
		});
		const handler = override('GET', '/app/route');
		await handler.process();
		expect(handler.status).toBe(200);
		expect(handler.localPath).toBe('404.html');
	});

	test('GET compresses text files when accepted', async () => {
		const handler = request('GET', '/style.css', { 'Accept-Encoding': 'gzip, deflate, br' });
		await handler.process();
		expect(handler.status).toBe(200);
		expect(handler.headers).toEqual({
			'content-type': 'text/css; charset=utf-8',
			vary: 'Accept-Encoding',
			'content-encoding': 'br',
		});
	});

	test('GET does not compress when disabled', async () => {
		const noCompression = handlerContext({
			path: root,
			notFound: undefined,
			ok: false,
			compression: false,
		});
		const handler = noCompression('GET', '/style.css', { 'Accept-Encoding': 'gzip' });
		await handler.process();
		expect(handler.headers).toEqual({
			'content-type': 'text/css; charset=utf-8',
			'content-length': String(css.length),
		});
	});

	test('GET does not compress binary files', async () => {
		const handler = request('GET', '/image.png', { 'Accept-Encoding': 'gzip' });
		await handler.process();
		expect(handler.headers).toEqual({ 'content-type': 'image/png', 'content-length': '3' });
	});

	test('HEAD sends the same headers as GET', async () => {
		const get = request('GET', '/style.css');
		const head = request('HEAD', '/style.css');
		await get.process();
		await head.process();
		expect(head.status).toBe(200);
		expect(head.headers).toEqual(get.headers);
	});

	test('data() describes the request', async () => {
		const handler = request('GET', '/index.html?v=1');
		await handler.process();
		const data = handler.data();
		expect(data.status).toBe(200);
		expect(data.method).toBe('GET');
		expect(data.url).toBe('/index.html?v=1');
		expect(data.urlPath).toBe('/index.html');
		expect(data.localPath).toBe('index.html');
		expect(typeof data.timing.start).toBe('number');
		expect(typeof data.timing.send).toBe('number');
	});
});

suite('pickEncoding', () => {
	const $pick = (header: string | undefined, statSize = 1000) =>
		pickEncoding({ headers: header == null ? {} : { 'accept-encoding': header }, statSize });

	test('prefers br, then gzip, then deflate', () => {
		expect($pick('gzip, deflate, br')).toBe('br');
		expect($pick('deflate, gzip')).toBe('gzip');
		expect($pick('deflate')).toBe('deflate');
	});

	test('accepts wildcards and skips refused encodings', () => {
		expect($pick('*')).toBe('br');
		expect($pick('br;q=0, *')).toBe('gzip');
		expect($pick('br;q=0, gzip;q=0, deflate;q=0.5')).toBe('deflate');
		expect($pick('identity')).toBe(undefined);
	});

	test('requires a header', () => {
		expect($pick(undefined)).toBe(undefined);
		expect($pick('')).toBe(undefined);
	});

	test('skips small and huge responses', () => {
		expect($pick('gzip', 31)).toBe(undefined);
		expect($pick('gzip', 32)).toBe('gzip');
		expect($pick('gzip', 50_000_001)).toBe(undefined);
	});
});
