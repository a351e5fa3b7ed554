import { isAbsolute } from 'node:path';

import { OptionsError } from './errors.ts';
import { RequestHandler } from './handler.ts';
import { ServingPolicy } from './policy.ts';
import type { EffectiveConfig, Request, Response, ResMetaData } from './types.d.ts';
import { errorList } from './utils.ts';

export { CLIArgs } from './args.ts';
export { mergeConfig, resolveConfig, validateConfig, type ResolveOptions } from './config.ts';
export { parseConfigFile, serializeConfigFile } from './config-file.ts';
export { ConfigError, OptionsError, ServingError, StartupError } from './errors.ts';
export { RequestHandler } from './handler.ts';
export { DailyLogFile } from './log-file.ts';
export { Logger } from './logger.ts';
export { ServingPolicy } from './policy.ts';
export { httpsLocation, redirectHandler } from './redirect.ts';
export { planTopology, startServer, type RunningServer } from './server.ts';
export type * from './types.d.ts';

type MiddlewareOptions = Partial<Pick<EffectiveConfig, 'path' | 'notFound' | 'ok' | 'compression'>>;

/**
Request listener for an existing http server.
Resolves with the request's log data once the response is started.
*/
export function middleware(options: MiddlewareOptions) {
	const onError = errorList();
	const { path, notFound, ok = false, compression = true } = options ?? {};

	if (typeof path !== 'string' || !isAbsolute(path)) {
		onError(`path must be an absolute directory path, received ${JSON.stringify(path)}`);
	}
	if (notFound != null && !isAbsolute(notFound)) {
		onError(`notFound must be an absolute file path, received ${JSON.stringify(notFound)}`);
	}
	if (ok && notFound == null) {
		onError(`ok requires notFound to be set`);
	}
	if (onError.list.length || typeof path !== 'string') {
		throw new OptionsError(onError.list);
	}

	const policy = new ServingPolicy({ path, notFound, ok });

	return async function servedirHandler(req: Request, res: Response): Promise<ResMetaData> {
		const handler = new RequestHandler({ req, res, policy, config: { compression } });
		await handler.process();
		return handler.data();
	};
}
