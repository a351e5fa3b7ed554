export type Request = import('node:http').IncomingMessage;
export type Response = import('node:http').ServerResponse<Request>;

export type FSKind = 'dir' | 'file' | 'link' | null;

export type LogLevel = 'off' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
A value that was either explicitly provided or left out by its source.
*/
export type Setting<T> = { set: true; value: T } | { set: false };

export interface TlsArgs {
	cert: Setting<string>;
	key: Setting<string>;
	redirectHttp: Setting<boolean>;
}

export interface CliArgs {
	config: Setting<string>;
	path: Setting<string>;
	port: Setting<number>;
	addr: Setting<string>;
	disableCompression: Setting<boolean>;
	notFound: Setting<string>;
	ok: Setting<boolean>;
	logLevel: Setting<LogLevel>;
	logPath: Setting<string>;
	logMaxFiles: Setting<number>;
	tls: Setting<TlsArgs>;
}

/**
Settings as stored in the TOML configuration file.
Keys use the file's snake_case names.
*/
export type ConfigFile = {
	path?: string;
	port?: number;
	addr?: string;
	disable_compression?: boolean;
	not_found?: string;
	ok?: boolean;
	log_level?: LogLevel;
	log_path?: string;
	log_max_files?: number;
	tls?: {
		cert?: string;
		key?: string;
		redirect_http?: boolean;
	};
};

export interface TlsConfig {
	readonly cert: string;
	readonly key: string;
	readonly redirectHttp: boolean;
}

export interface EffectiveConfig {
	readonly path: string;
	readonly addr: string;
	readonly port: number;
	readonly compression: boolean;
	readonly notFound: string | undefined;
	readonly ok: boolean;
	readonly logLevel: LogLevel;
	readonly logPath: string | undefined;
	readonly logMaxFiles: number;
	readonly tls: TlsConfig | undefined;
}

export type Disposition =
	| { kind: 'serve'; filePath: string }
	| { kind: 'not-found-empty' }
	| { kind: 'not-found-with-body'; filePath: string }
	| { kind: 'ok-override'; filePath: string }
	| { kind: 'redirect'; location: string };

export type Topology =
	| { kind: 'plain'; addr: string; port: number }
	| { kind: 'tls'; addr: string; port: number; tls: TlsConfig; redirectIgnored: boolean }
	| { kind: 'tls-redirect'; addr: string; port: number; redirectPort: number; tls: TlsConfig };

export interface ResMetaData {
	method: string;
	status: number;
	url: string;
	urlPath: string | null;
	localPath: string | null;
	timing: { start: number; send?: number; close?: number };
	error?: Error | string;
}
