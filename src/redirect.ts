import type { Request, Response, ResMetaData } from './types.d.ts';

/**
Location of the HTTPS equivalent of a plain HTTP request, or undefined
when the request has no usable Host header. Any port in the Host header
is dropped: the HTTPS listener uses the default port.
*/
export function httpsLocation(req: Pick<Request, 'headers' | 'url'>): string | undefined {
	const host = req.headers.host?.trim();
	if (!host) return;

	let hostname: string;
	try {
		hostname = new URL(`http://${host}`).hostname;
	} catch {
		return;
	}
	if (!hostname) return;

	const path = req.url?.startsWith('/') ? req.url : '/';
	return `https://${hostname}${path}`;
}

export function redirectHandler(req: Request, res: Response): ResMetaData {
	const start = Date.now();
	const location = httpsLocation(req);

	if (location) {
		res.statusCode = 308;
		res.setHeader('Location', location);
	} else {
		res.statusCode = 400;
	}
	res.setHeader('Content-Length', '0');
	res.end();

	return {
		method: req.method ?? '',
		status: res.statusCode,
		url: req.url ?? '',
		urlPath: req.url ?? null,
		localPath: null,
		timing: { start, send: Date.now() },
		error: location ? undefined : 'Missing or invalid Host header',
	};
}
