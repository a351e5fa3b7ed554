import { createServer as createHttpServer, type Server as HttpServer } from 'node:http';
import { createServer as createHttpsServer, type Server as HttpsServer } from 'node:https';
import type { AddressInfo } from 'node:net';

import { HTTP_REDIRECT_PORT, HTTPS_PORT } from './constants.ts';
import { StartupError } from './errors.ts';
import { RequestHandler } from './handler.ts';
import type { Logger } from './logger.ts';
import { ServingPolicy } from './policy.ts';
import { redirectHandler } from './redirect.ts';
import { CertificateWatcher, loadTlsMaterial } from './tls.ts';
import type { EffectiveConfig, Request, Response, Topology } from './types.d.ts';

type Server = HttpServer | HttpsServer;

export interface RunningServer {
	topology: Topology;
	/** Listener serving files, over HTTP or HTTPS */
	main: Server;
	/** Plain HTTP listener redirecting to HTTPS */
	redirect?: HttpServer;
	watcher?: CertificateWatcher;
	address(): AddressInfo | undefined;
	close(): Promise<void>;
}

/**
Choose the listeners to start. The HTTP redirect listener only exists
when HTTPS runs on its standard port.
*/
export function planTopology({ addr, port, tls }: EffectiveConfig): Topology {
	if (!tls) {
		return { kind: 'plain', addr, port };
	}
	if (tls.redirectHttp && port === HTTPS_PORT) {
		return { kind: 'tls-redirect', addr, port, redirectPort: HTTP_REDIRECT_PORT, tls };
	}
	return { kind: 'tls', addr, port, tls, redirectIgnored: tls.redirectHttp };
}

/**
Start the listeners for a configuration. Resolves once every listener
is bound, or rejects with a StartupError after closing the ones that did.
*/
export async function startServer(
	config: EffectiveConfig,
	{ logger }: { logger?: Logger } = {},
): Promise<RunningServer> {
	const topology = planTopology(config);
	const policy = new ServingPolicy(config);
	const listener = fileListener(config, policy, logger);

	let main: Server;
	let redirect: HttpServer | undefined;
	let watcher: CertificateWatcher | undefined;

	if (topology.kind === 'plain') {
		main = createHttpServer(listener);
	} else {
		const material = await loadTlsMaterial(topology.tls);
		const httpsServer = createHttpsServer(material, listener);
		watcher = new CertificateWatcher({ tls: topology.tls, target: httpsServer, logger });
		main = httpsServer;
		if (topology.kind === 'tls-redirect') {
			redirect = createHttpServer((req, res) => {
				void logger?.request(redirectHandler(req, res));
			});
		} else if (topology.redirectIgnored) {
			void logger?.warn(
				`redirect_http is ignored: HTTPS listens on port ${topology.port}, not ${HTTPS_PORT}`,
			);
		}
	}

	const bindings: Array<[Server, number]> = [[main, topology.port]];
	if (redirect && topology.kind === 'tls-redirect') {
		bindings.push([redirect, topology.redirectPort]);
	}

	const results = await Promise.allSettled(
		bindings.map(([server, port]) => listen(server, topology.addr, port)),
	);
	const failed = results.find(
		(result): result is PromiseRejectedResult => result.status === 'rejected',
	);
	if (failed) {
		const bound = bindings.filter((_, index) => results[index]?.status === 'fulfilled');
		await Promise.all(bound.map(([server]) => closeServer(server)));
		throw failed.reason;
	}

	for (const [server] of bindings) {
		server.on('error', (err) => {
			void logger?.error(err);
		});
	}
	watcher?.start();

	return {
		topology,
		main,
		redirect,
		watcher,
		address() {
			const info = main.address();
			return info !== null && typeof info === 'object' ? info : undefined;
		},
		async close() {
			watcher?.close();
			await Promise.all(bindings.map(([server]) => closeServer(server)));
		},
	};
}

function fileListener(
	config: EffectiveConfig,
	policy: ServingPolicy,
	logger?: Logger,
): (req: Request, res: Response) => void {
	return (req, res) => {
		const handler = new RequestHandler({ req, res, policy, config });
		res.on('close', () => {
			void logger?.request(handler.data());
		});
		handler.process().catch((err: unknown) => {
			handler.error = err instanceof Error ? err : String(err);
			if (!res.headersSent) {
				res.statusCode = 500;
				res.setHeader('Content-Length', '0');
			}
			res.end();
		});
	};
}

function listen(server: Server, host: string, port: number): Promise<void> {
	return new Promise((resolve, reject) => {
		const onError = (err: Error) => {
			server.off('listening', onListening);
			reject(new StartupError('BindError', `cannot listen on ${host}:${port}: ${err.message}`, err));
		};
		const onListening = () => {
			server.off('error', onError);
			resolve();
		};
		server.once('error', onError);
		server.once('listening', onListening);
		server.listen({ host, port });
	});
}

function closeServer(server: Server): Promise<void> {
	return new Promise((resolve, reject) => {
		if (!server.listening) return resolve();
		server.close((err) => (err ? reject(err) : resolve()));
		server.closeAllConnections();
	});
}
