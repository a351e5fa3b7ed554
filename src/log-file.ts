import { createWriteStream, type WriteStream } from 'node:fs';
import { mkdir, readdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { Writable } from 'node:stream';

import { LOG_FILE_PREFIX } from './constants.ts';

export interface DailyLogFileOptions {
	directory: string;
	maxFiles: number;
	prefix?: string;
	now?: () => Date;
}

/**
Writable stream appending to one log file per day, named
`<prefix>.YYYY-MM-DD.log` (UTC date). When a new file is started,
the oldest files are deleted so that at most `maxFiles` remain.
*/
export class DailyLogFile extends Writable {
	#directory: string;
	#maxFiles: number;
	#prefix: string;
	#now: () => Date;
	#date?: string;
	#stream?: WriteStream;

	constructor({ directory, maxFiles, prefix = LOG_FILE_PREFIX, now }: DailyLogFileOptions) {
		super({ decodeStrings: true });
		this.#directory = directory;
		this.#maxFiles = Math.max(1, maxFiles);
		this.#prefix = prefix;
		this.#now = now ?? (() => new Date());
	}

	/**
	Create the log directory if needed and return the stream.
	*/
	static async open(options: DailyLogFileOptions): Promise<DailyLogFile> {
		await mkdir(options.directory, { recursive: true });
		return new DailyLogFile(options);
	}

	get currentFile(): string | undefined {
		return this.#date ? join(this.#directory, this.fileName(this.#date)) : undefined;
	}

	fileName(date: string): string {
		return `${this.#prefix}.${date}.log`;
	}

	_write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
		const date = this.#now().toISOString().slice(0, 10);
		const ready = date === this.#date && this.#stream ? Promise.resolve() : this.#rotate(date);
		ready.then(
			() => {
				if (this.#stream) this.#stream.write(chunk, callback);
				else callback(new Error('Log file is not open'));
			},
			(err: Error) => callback(err),
		);
	}

	_final(callback: (error?: Error | null) => void) {
		if (this.#stream) {
			this.#stream.end(() => callback());
		} else {
			callback();
		}
	}

	_destroy(error: Error | null, callback: (error?: Error | null) => void) {
		this.#stream?.destroy();
		callback(error);
	}

	async #rotate(date: string) {
		const previous = this.#stream;
		this.#stream = undefined;
		this.#date = undefined;
		if (previous) {
			await new Promise<void>((resolve) => previous.end(() => resolve()));
		}

		const stream = createWriteStream(join(this.#directory, this.fileName(date)), { flags: 'a' });
		await new Promise<void>((resolve, reject) => {
			stream.once('open', () => {
				stream.off('error', reject);
				resolve();
			});
			stream.once('error', reject);
		});
		// later failures (disk full, closed descriptor) end this stream with the error
		stream.on('error', (err) => this.destroy(err));
		this.#stream = stream;
		this.#date = date;
		await this.prune();
	}

	/**
	Delete the oldest log files, keeping the current one
	and the most recent ones up to `maxFiles`.
	*/
	async prune(): Promise<string[]> {
		const current = this.#date ? this.fileName(this.#date) : undefined;
		const pattern = new RegExp(`^${escapeRegExp(this.#prefix)}\\.\\d{4}-\\d{2}-\\d{2}\\.log$`);
		const names = (await readdir(this.#directory))
			.filter((name) => pattern.test(name) && name !== current)
			.sort()
			.reverse();
		const keep = current ? this.#maxFiles - 1 : this.#maxFiles;
		const removed = names.slice(keep);
		await Promise.all(removed.map((name) => rm(join(this.#directory, name), { force: true })));
		return removed;
	}
}

function escapeRegExp(input: string): string {
	return input.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
