import { release } from 'node:os';
import { platform } from 'node:process';
import { type Writable } from 'node:stream';
import { inspect } from 'node:util';

import { LOG_LEVELS } from './constants.ts';
import type { LogLevel, ResMetaData } from './types.d.ts';
import { clamp, fwdSlash, getEnv, trimSlash, withResolvers } from './utils.ts';

type LogGroup = 'header' | 'info' | 'request' | 'warn' | 'error' | 'debug';

interface LogItem {
	group: LogGroup;
	text: string;
	padding: { top: number; bottom: number };
}

const GROUP_LEVEL: Record<LogGroup, LogLevel> = {
	header: 'info',
	info: 'info',
	request: 'info',
	warn: 'warn',
	error: 'error',
	debug: 'debug',
};

export class ColorUtils {
	enabled: boolean;

	constructor(colorEnabled?: boolean) {
		this.enabled = typeof colorEnabled === 'boolean' ? colorEnabled : true;
	}

	/** Wrap text in square brackets, with a comma-separated format for each of the three parts */
	brackets = (text: string, format: string = 'dim,,dim'): string => {
		const [open = '', inner = '', close = ''] = format.split(',');
		return `${this.style('[', open)}${this.style(text, inner)}${this.style(']', close)}`;
	};

	style = (text: string, format: string = ''): string => {
		if (!this.enabled) return text;
		return styleText(format.trim().split(/\s+/g), text);
	};
}

export class Logger {
	#out: { stream: Writable; last?: LogItem };
	#err: { stream: Writable; last?: LogItem };
	#level: LogLevel;
	color: ColorUtils;

	constructor(
		out: Writable,
		err?: Writable,
		options: { level?: LogLevel; colors?: boolean } = {},
	) {
		this.#out = { stream: out };
		this.#err = { stream: err ?? out };
		// share padding state when both groups end up in the same stream
		if (this.#err.stream === this.#out.stream) this.#err = this.#out;
		this.#level = options.level ?? 'info';
		this.color = new ColorUtils(options.colors ?? color.enabled);
	}

	get level(): LogLevel {
		return this.#level;
	}

	enabled(group: LogGroup): boolean {
		return LOG_LEVELS.indexOf(GROUP_LEVEL[group]) <= LOG_LEVELS.indexOf(this.#level);
	}

	async write(
		group: LogItem['group'],
		data: string | string[] = '',
		padding: LogItem['padding'] = { top: 0, bottom: 0 },
	) {
		const item = {
			group,
			text: Array.isArray(data) ? data.join('\n') : data,
			padding,
		};
		if (item.text.trim() === '' || !this.enabled(group)) {
			return;
		}

		const { promise, resolve, reject } = withResolvers<void>();

		const dest = group === 'error' || group === 'warn' ? this.#err : this.#out;
		const text = this.#withPadding(dest.last, item);
		dest.last = item;
		dest.stream.write(text, (err) => {
			if (err) reject(err);
			else resolve();
		});

		return promise;
	}

	error(...errors: Array<string | Error>) {
		return this.write(
			'error',
			errors.map((error) => {
				if (typeof error === 'string') return `servedir: ${error}`;
				else return inspect(error, { colors: this.color.enabled });
			}),
		);
	}

	warn(...messages: string[]) {
		return this.write(
			'warn',
			messages.map((msg) => this.color.style(`servedir: ${msg}`, 'yellow')),
		);
	}

	request(data: ResMetaData) {
		return this.write('request', requestLogLine(data, this.color));
	}

	#withPadding(prev: LogItem | undefined, item: LogItem): string {
		const maxPad = 4;
		let start = '';
		let end = '';
		if (item.padding.top) {
			const count = item.padding.top - (prev?.padding.bottom ?? 0);
			start = '\n'.repeat(clamp(count, 0, maxPad));
		} else if (prev && !prev.padding.bottom && prev.group !== item.group) {
			start = '\n';
		}
		if (item.padding.bottom) {
			end = '\n'.repeat(clamp(item.padding.bottom, 0, maxPad));
		}
		return `${start}${item.text}\n${end}`;
	}
}

export function requestLogLine(
	{ status, method, url, urlPath, localPath, timing, error }: ResMetaData,
	colors: ColorUtils = color,
): string {
	const { start, close } = timing;
	const { style: _, brackets } = colors;

	const isSuccess = status >= 200 && status < 400;
	const timestamp = start ? new Date(start).toTimeString().split(' ')[0]?.padStart(8) : undefined;
	const duration = start && close ? Math.ceil(close - start) : undefined;

	let displayPath = _(urlPath ?? url, 'cyan');
	if (isSuccess && urlPath != null && localPath != null) {
		const parts = pathSuffix(urlPath, localPath);
		if (parts) displayPath = _(parts[0], 'cyan') + brackets(parts[1], 'dim,gray,dim');
	}

	const line = [
		timestamp && _(timestamp, 'dim'),
		_(`${status}`, statusColor(status)),
		_('—', 'dim'),
		_(method, 'cyan'),
		displayPath,
		duration && _(`(${duration}ms)`, 'dim'),
	]
		.filter((s) => typeof s === 'string' && s !== '')
		.join(' ');

	if (!isSuccess && error) {
		return `${line}\n${_(error.toString(), 'red')}`;
	}
	return line;
}

function statusColor(value: number): string {
	if (value >= 200 && value < 300) return 'green';
	if (value >= 400 && value < 600) return 'red';
	return 'gray';
}

function pathSuffix(urlPath: string, localPath: string): [string, string] | undefined {
	const filePath = trimSlash(`/${fwdSlash(localPath)}`, { end: true });
	for (const path of [urlPath, trimSlash(urlPath, { end: true })]) {
		if (filePath !== path && filePath.startsWith(path)) {
			const index = path.length;
			return [filePath.slice(0, index), filePath.slice(index)];
		}
	}
}

/**
Basic implementation of 'node:util' styleText, which only landed in Node 20.12.
*/
function styleText(format: string | string[], text: string): string {
	let before = '';
	let after = '';
	for (const style of Array.isArray(format) ? format : [format]) {
		const codes = inspect.colors[style.trim()];
		if (!codes) continue;
		before = `${before}\x1b[${codes[0]}m`;
		after = `\x1b[${codes[1]}m${after}`;
	}
	return `${before}${text}${after}`;
}

function supportsColor(): boolean {
	if (getEnv('NO_COLOR')) {
		const forceColor = getEnv('FORCE_COLOR');
		return forceColor === 'true' || /^\d$/.test(forceColor);
	}

	// Logic borrowed from supports-color.
	// Windows 10 build 10586 is the first release that supports 256 colors.
	if (platform === 'win32') {
		const [major, _, build] = release().split('.');
		return Number(major) >= 10 && Number(build) >= 10_586;
	}

	// Should work in *nix terminals.
	const term = getEnv('TERM');
	const colorterm = getEnv('COLORTERM');
	return (
		colorterm === 'truecolor' ||
		term === 'xterm-256color' ||
		term === 'xterm-16color' ||
		term === 'xterm-color'
	);
}

export const color = new ColorUtils(supportsColor());
