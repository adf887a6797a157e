import { mkdir, readFile, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import type { AnnotatedResult, ResultRecord } from '../lib/result.js';

/**
 * What a measurement sees of the scheduler that runs it: its parameters,
 * where its result goes, and a small amount of state kept between runs.
 */
export type TaskContext = {
	readonly name: string;
	readParams (): Promise<unknown>;
	/** `extra` lands at the top level of the output, beside the labelled result. */
	writeResult (result: ResultRecord | AnnotatedResult, extra?: ResultRecord): Promise<void>;
	readState (): Promise<unknown>;
	writeState (state: unknown): Promise<void>;
};

const readStream = async (stream: NodeJS.ReadableStream): Promise<string> => {
	const chunks: Buffer[] = [];

	for await (const chunk of stream) {
		chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
	}

	return Buffer.concat(chunks).toString();
};

const isMissingFile = (error: unknown): boolean => error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Parameters arrive as one JSON document on stdin; the result leaves as one
 * JSON document on stdout. State lives in `<stateDir>/<task>.json`.
 */
export class StdioTaskContext implements TaskContext {
	constructor (
		readonly name: string,
		private readonly stateDir: string,
		private readonly stdin: NodeJS.ReadableStream & { isTTY?: boolean } = process.stdin,
		private readonly stdout: NodeJS.WritableStream = process.stdout,
	) {}

	async readParams (): Promise<unknown> {
		if (this.stdin.isTTY) {
			return {};
		}

		const input = (await readStream(this.stdin)).trim();
		return input ? JSON.parse(input) : {};
	}

	async writeResult (result: ResultRecord | AnnotatedResult, extra: ResultRecord = {}): Promise<void> {
		const document = JSON.stringify({ ...result, ...extra });

		await new Promise<void>((resolve, reject) => {
			this.stdout.write(`${document}\n`, error => error ? reject(error) : resolve());
		});
	}

	async readState (): Promise<unknown> {
		try {
			return JSON.parse(await readFile(this.statePath, 'utf8'));
		} catch (error: unknown) {
			if (isMissingFile(error)) {
				return null;
			}

			throw error;
		}
	}

	async writeState (state: unknown): Promise<void> {
		await mkdir(this.stateDir, { recursive: true });
		await writeFile(this.statePath, JSON.stringify(state));
	}

	private get statePath (): string {
		return path.join(this.stateDir, `${this.name}.json`);
	}
}
