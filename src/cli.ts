import { createRequire } from 'node:module';
import { homedir, networkInterfaces, type NetworkInterfaceInfo } from 'node:os';
import { sep as dirSep } from 'node:path';
import process, { argv, exit, platform, stdin } from 'node:process';
import { emitKeypressEvents } from 'node:readline';

import { CLIArgs } from './args.ts';
import { resolveConfig } from './config.ts';
import { CLI_OPTIONS, HOSTS, TLS_OPTIONS, type CLIOption } from './constants.ts';
import { ConfigError, StartupError } from './errors.ts';
import { DailyLogFile } from './log-file.ts';
import { color, Logger } from './logger.ts';
import { startServer, type RunningServer } from './server.ts';
import type { EffectiveConfig } from './types.d.ts';
import { clamp, errorList, isPrivateIPv4 } from './utils.ts';

/**
Start servedir with configuration from command line arguments
and the optional configuration file.
*/
export async function run() {
	const stdio = new Logger(process.stdout, process.stderr);
	const args = new CLIArgs(argv.slice(2));

	if (args.bool('version')) {
		await stdio.write('info', readPkgJson().version);
		process.exitCode = 0;
		return;
	} else if (args.bool('help')) {
		await stdio.write('info', `\n${helpPage()}\n`);
		process.exitCode = 0;
		return;
	}

	const onError = errorList();
	const cliArgs = args.values(onError);
	if (onError.list.length) {
		await stdio.error(...onError.list);
		await stdio.error(`Try 'servedir --help' for more information.`);
		process.exitCode = 1;
		return;
	}

	let config: EffectiveConfig;
	try {
		config = await resolveConfig(cliArgs, {
			onConfigCreated: (filePath) => {
				void stdio.write('info', `created configuration file: ${filePath}`);
			},
		});
	} catch (err) {
		if (!(err instanceof ConfigError)) throw err;
		await stdio.error(err.message);
		process.exitCode = 1;
		return;
	}

	let loggers: Awaited<ReturnType<typeof createLogger>>;
	try {
		loggers = await createLogger(config, stdio);
	} catch (err) {
		await stdio.error(
			`cannot open log directory: ${config.logPath}`,
			err instanceof Error ? err : String(err),
		);
		process.exitCode = 1;
		return;
	}

	const cliServer = new CLIServer(config, loggers.logger, { logFile: loggers.logFile, stdio });
	if (!(await cliServer.start())) {
		process.exitCode = 1;
	}
}

async function createLogger(
	config: EffectiveConfig,
	stdio: Logger,
): Promise<{ logger: Logger; logFile?: DailyLogFile }> {
	if (config.logPath == null) {
		return { logger: new Logger(process.stdout, process.stderr, { level: config.logLevel }) };
	}
	const logFile = await DailyLogFile.open({
		directory: config.logPath,
		maxFiles: config.logMaxFiles,
	});
	logFile.on('error', (err) => {
		void stdio.error(err);
	});
	return {
		logger: new Logger(logFile, logFile, { level: config.logLevel, colors: false }),
		logFile,
	};
}

export class CLIServer {
	#config: EffectiveConfig;
	#logger: Logger;
	#logFile?: DailyLogFile;
	#stdio: Logger;
	#localNetworkInfo?: NetworkInterfaceInfo;
	#running?: RunningServer;

	constructor(
		config: EffectiveConfig,
		logger: Logger,
		{ logFile, stdio }: { logFile?: DailyLogFile; stdio?: Logger } = {},
	) {
		this.#config = config;
		this.#logger = logger;
		this.#logFile = logFile;
		this.#stdio = stdio ?? new Logger(process.stdout, process.stderr);
		this.#localNetworkInfo = Object.values(networkInterfaces())
			.flat()
			.find((c) => c?.family === 'IPv4' && isPrivateIPv4(c?.address));
	}

	/**
	Start listening. Resolves with false when the server could not start.
	*/
	async start(): Promise<boolean> {
		try {
			this.#running = await startServer(this.#config, { logger: this.#logger });
		} catch (err) {
			if (!(err instanceof StartupError)) throw err;
			await this.#startupError(err);
			await this.#closeLogFile();
			return false;
		}

		const info = this.headerInfo();
		if (info) {
			void this.#logger.write('header', info, { top: 1, bottom: 1 });
		}
		this.handleSignals();
		this.handleKeyboardInput();
		return true;
	}

	async #startupError(err: StartupError) {
		if (this.#logFile) await this.#logger.error(err.message);
		// the terminal gets startup failures whatever the log destination or level
		const terminal = this.#logFile || !this.#logger.enabled('error') ? this.#stdio : this.#logger;
		await terminal.error(err.message);
	}

	headerInfo() {
		const address = this.#running?.address();
		const topology = this.#running?.topology;
		if (!address || !topology) return;

		const { local, network } = displayHosts({
			configured: this.#config.addr,
			actual: address.address,
			networkAddress: this.#localNetworkInfo?.address,
		});
		const protocol = topology.kind === 'plain' ? 'http' : 'https';
		const data: Array<[string, string]> = [
			['serving', displayRoot(this.#config.path)],
			['local', `${protocol}://${local}:${address.port}`],
		];
		if (network) {
			data.push(['network', `${protocol}://${network}:${address.port}`]);
		}
		if (topology.kind === 'tls-redirect') {
			data.push(['redirect', `http://${local}:${topology.redirectPort}`]);
		}
		const hLength = Math.max(...data.map((r) => r[0].length));
		const lines = data.map(([first, second]) => {
			const header = this.#logger.color.style(first.padStart(hLength), 'bold');
			const value = this.#logger.color.style(second, second.startsWith('http') ? 'underline' : '');
			return `  ${header}  ${value}`;
		});
		return lines.join('\n');
	}

	handleKeyboardInput() {
		if (!stdin.isTTY) return;
		let helpShown = false;
		emitKeypressEvents(stdin);
		stdin.on('keypress', (_str, key: { sequence?: string }) => {
			if (
				// control+c
				key.sequence === '\x03' ||
				// escape
				key.sequence === '\x1B'
			) {
				void this.shutdown();
			} else if (!helpShown) {
				helpShown = true;
				void this.#logger.write('info', 'Hit Control+C or Escape to stop the server.');
			}
		});
		stdin.setRawMode(true);
	}

	#attached = false;
	handleSignals() {
		if (this.#attached) return;
		const onSignal = () => {
			void this.shutdown();
		};
		process.on('SIGBREAK', onSignal);
		process.on('SIGINT', onSignal);
		process.on('SIGTERM', onSignal);
		this.#attached = true;
	}

	#shuttingDown = false;
	shutdown = async () => {
		if (this.#shuttingDown) return;
		this.#shuttingDown = true;

		process.exitCode = 0;
		await this.#logger.write('info', 'Gracefully shutting down...');
		try {
			await this.#running?.close();
		} catch (err) {
			process.exitCode = 1;
			await this.#logger.error(err instanceof Error ? err : String(err));
		}
		await this.#closeLogFile();

		exit();
	};

	async #closeLogFile() {
		const logFile = this.#logFile;
		if (!logFile || logFile.writableEnded) return;
		await new Promise<void>((resolve) => logFile.end(() => resolve()));
	}
}

export function helpPage() {
	const spaces = (count = 0) => ' '.repeat(count);
	const indent = spaces(2);
	const colGap = spaces(4);

	const section = (heading: string = '', lines: string[] = []) => {
		const result = [];
		if (heading.length) result.push(indent + color.style(heading, 'bold'));
		if (lines.length) result.push(lines.map((l) => indent.repeat(2) + l).join('\n'));
		return result.join('\n\n');
	};

	const optionCols = (list: CLIOption[]) => {
		const options = list.map((opt) => {
			const name = opt.arg ? `--${opt.name} <${opt.arg}>` : `--${opt.name}`;
			const title = opt.short ? `-${opt.short}, ${name}` : name;
			const [help1, help2] = opt.help.split('\n');
			return { title, help1, help2 };
		});

		const col1Width = clamp(Math.max(...options.map((opt) => opt.title.length)), 14, 26);

		return options.flatMap(({ title, help1, help2 }) => {
			const col1 = title.padEnd(col1Width) + colGap;
			const line1 = `${col1}${help1}`;
			if (!help2) return [line1];
			return line1.length + help2.length < 80
				? [`${line1} ${color.style(help2, 'gray')}`]
				: [line1, spaces(col1.length) + color.style(help2, 'gray')];
		});
	};

	const cmd = color.style('servedir', 'magentaBright');
	const prompt = color.style('$', 'bold dim');

	return [
		section(`${color.style('servedir', 'magentaBright bold')} — Local HTTP server for static files`),
		section('USAGE', [
			`${prompt} ${cmd} --help`,
			`${prompt} ${cmd} ${color.brackets('options')}`,
			`${prompt} ${cmd} ${color.brackets('options')} tls --cert ${color.brackets('file')} --key ${color.brackets('file')}`,
		]),
		section('OPTIONS', optionCols(CLI_OPTIONS)),
		section('TLS OPTIONS', optionCols(TLS_OPTIONS)),
	].join('\n\n');
}

function displayHosts({
	configured,
	actual,
	networkAddress,
}: {
	configured?: string;
	actual: string;
	networkAddress?: string;
}): { local: string; network?: string } {
	const isLocal = (value: string) => HOSTS.local.includes(value);
	const isUnspec = (value: string) => HOSTS.unspecified.includes(value);

	if (configured && !isUnspec(configured) && !isLocal(configured)) {
		return { local: urlHost(configured) };
	}

	const local = isUnspec(actual) || isLocal(actual) ? 'localhost' : urlHost(actual);
	const showNetwork = !configured || isUnspec(configured);
	return { local, network: showNetwork ? networkAddress : undefined };
}

function urlHost(address: string): string {
	return address.includes(':') ? `[${address}]` : address;
}

/**
Replace the home dir with '~' in path
*/
function displayRoot(root: string): string {
	// skip: not a common windows convention
	if (platform !== 'win32') {
		const prefix = homedir() + dirSep;
		if (root.startsWith(prefix)) {
			return root.replace(prefix, '~' + dirSep);
		}
	}
	return root;
}

function readPkgJson(): { name: string; version: string } {
	const data: unknown = createRequire(import.meta.url)('../package.json');
	if (data && typeof data === 'object' && 'name' in data && 'version' in data) {
		const { name, version } = data;
		if (typeof name === 'string' && typeof version === 'string') {
			return { name, version };
		}
	}
	throw new Error('Invalid package.json');
}
