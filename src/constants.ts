import type { EffectiveConfig, LogLevel } from './types.d.ts';

export const HOSTS = {
	local: ['localhost', '127.0.0.1', '::1'],
	unspecified: ['0.0.0.0', '::'],
};

export const SUPPORTED_METHODS = ['GET', 'HEAD', 'OPTIONS'];

export const MIN_COMPRESS_SIZE = 32;
export const MAX_COMPRESS_SIZE = 50_000_000;

export const HTTPS_PORT = 443;
export const HTTP_REDIRECT_PORT = 80;

export const LOG_FILE_PREFIX = 'servedir';

export const LOG_LEVELS: LogLevel[] = ['off', 'error', 'warn', 'info', 'debug', 'trace'];

export const DEFAULT_CONFIG: Omit<EffectiveConfig, 'path'> = {
	addr: '127.0.0.1',
	port: 3000,
	compression: true,
	notFound: undefined,
	ok: false,
	logLevel: 'info',
	logPath: undefined,
	logMaxFiles: 7,
	tls: undefined,
};

export interface CLIOption {
	name: string;
	short?: string;
	arg?: string;
	help: string;
}

export const CLI_OPTIONS: CLIOption[] = [
	{ name: 'help', help: 'Display this help message' },
	{ name: 'version', help: 'Display the current version of servedir' },
	{
		name: 'config',
		arg: 'path',
		help: 'Path to a TOML configuration file\n(created from the current arguments if missing)',
	},
	{ name: 'path', arg: 'dir', help: 'Directory to serve\n(default: current directory)' },
	{ name: 'port', short: 'p', arg: 'port', help: `Port to listen on\n(default: ${DEFAULT_CONFIG.port})` },
	{ name: 'addr', short: 'a', arg: 'ip', help: `Address to listen on\n(default: ${DEFAULT_CONFIG.addr})` },
	{ name: 'disable-compression', help: 'Do not compress responses' },
	{ name: 'not-found', arg: 'file', help: 'File sent with 404 responses\n(default: empty body)' },
	{ name: 'ok', help: 'Send the --not-found file with 200 OK (single-page apps)' },
	{ name: 'verbose', short: 'v', help: 'Log more (repeatable)' },
	{ name: 'quiet', short: 'q', help: 'Log less (repeatable)' },
	{
		name: 'log-path',
		arg: 'dir',
		help: `Write logs to daily files in this directory\n(${LOG_FILE_PREFIX}.YYYY-MM-DD.log)`,
	},
	{
		name: 'log-max-files',
		arg: 'n',
		help: `Number of daily log files to keep\n(default: ${DEFAULT_CONFIG.logMaxFiles})`,
	},
];

export const TLS_OPTIONS: CLIOption[] = [
	{ name: 'cert', short: 'c', arg: 'file', help: 'PEM certificate file' },
	{ name: 'key', short: 'k', arg: 'file', help: 'PEM private key file' },
	{ name: 'redirect-http', help: 'Redirect port 80 to HTTPS\n(only when listening on port 443)' },
];
