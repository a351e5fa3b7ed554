export type ConfigErrorCode =
	| 'InvalidCombination'
	| 'IncompleteTls'
	| 'PathNotFound'
	| 'ParseFailure'
	| 'InvalidPath'
	| 'WriteFailure';

export type ServingErrorCode = 'OutOfRoot' | 'MalformedPath';

export type StartupErrorCode = 'BindError' | 'TlsLoadError';

/**
Configuration could not be resolved. Always reported before any listener starts.
*/
export class ConfigError extends Error {
	code: ConfigErrorCode;
	field?: string;
	path?: string;

	constructor(
		code: ConfigErrorCode,
		message: string,
		details: { field?: string; path?: string; cause?: unknown } = {},
	) {
		super(message, details.cause !== undefined ? { cause: details.cause } : undefined);
		this.name = 'ConfigError';
		this.code = code;
		this.field = details.field;
		this.path = details.path;
	}
}

export class ServingError extends Error {
	code: ServingErrorCode;

	constructor(code: ServingErrorCode, message: string) {
		super(message);
		this.name = 'ServingError';
		this.code = code;
	}

	get status(): number {
		return this.code === 'OutOfRoot' ? 403 : 400;
	}
}

export class StartupError extends Error {
	code: StartupErrorCode;

	constructor(code: StartupErrorCode, message: string, cause?: unknown) {
		super(message, cause !== undefined ? { cause } : undefined);
		this.name = 'StartupError';
		this.code = code;
	}
}

export class OptionsError extends Error {
	list: string[];

	constructor(list: string[]) {
		const message = 'Invalid option(s):\n' + list.map((msg) => `    ${msg}`).join('\n');
		super(message);
		this.name = 'OptionsError';
		this.list = [...list];
	}
}
