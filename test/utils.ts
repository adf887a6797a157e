import * as path from 'node:path';
import { readFileSync } from 'node:fs';
import { parseSettings, type Settings } from '../src/lib/config.js';
import { ProcessRunner, type ProcessHandle, type ProcessResult, type RunOptions } from '../src/lib/process-runner.js';
import type { AnnotatedResult, ResultRecord } from '../src/lib/result.js';
import type { TaskContext } from '../src/task/context.js';

export const getCmdMock = (name: string): string => readFileSync(path.resolve(`./test/mocks/${name}.txt`)).toString().replace(/\r?\n$/, '');

/** A process outcome as scripted by a test; the runner fills in the command line. */
export type Scripted =
	| { kind: 'completed'; exitCode: number; stdout: string; stderr: string }
	| { kind: 'timeout'; elapsed: number; stdout: string; stderr: string }
	| { kind: 'missing' };

export type Route = (command: string, args: string[]) => Scripted | Promise<Scripted> | undefined;

export const exit = (exitCode: number, stdout = '', stderr = ''): Scripted => ({ kind: 'completed', exitCode, stdout, stderr });

export const timedOut = (elapsed = 1000): Scripted => ({ kind: 'timeout', elapsed, stdout: '', stderr: '' });

export const missing = (): Scripted => ({ kind: 'missing' });

/** Never settles. */
export const hang = (): Promise<Scripted> => new Promise<Scripted>(() => {});

export type RecordedCall = {
	command: string;
	args: string[];
	options: RunOptions;
};

/**
 * Answers every process from a list of routes instead of starting it. The
 * first route that returns an outcome wins; a command no route answers fails
 * the test.
 */
export class FakeProcessRunner extends ProcessRunner {
	readonly calls: RecordedCall[] = [];

	constructor (private readonly routes: Route[]) {
		super();
	}

	override spawn (command: string, args: string[], options: RunOptions = {}): ProcessHandle {
		const commandLine = [ command, ...args ].join(' ');
		this.calls.push({ command, args, options });

		const completion = Promise.resolve().then(async (): Promise<ProcessResult> => {
			for (const route of this.routes) {
				const scripted = await route(command, args);

				if (scripted) {
					return { ...scripted, command: commandLine };
				}
			}

			throw new Error(`Unexpected command: ${commandLine}`);
		});

		return { command: commandLine, args, completion };
	}

	callsTo (command: string): string[][] {
		return this.calls.filter(call => call.command === command).map(call => call.args);
	}
}

export const GATEWAY = '192.168.1.1';

/**
 * A host with every tool installed, a working loopback and gateway, and an
 * Internet connection.
 */
export const healthyHost: Route = (command, args) => {
	if (command === 'which') {
		return exit(0, `/usr/bin/${args[0] ?? ''}`);
	}

	if (command === 'ip') {
		return exit(0, `default via ${GATEWAY} dev eth0 proto dhcp src 192.168.1.20 metric 100`);
	}

	// Connectivity checks send a single echo request.
	if (command === 'ping' && args[0] === '-c' && args[1] === '1' && args[2] === '-w') {
		return exit(0, getCmdMock('ping-single'));
	}

	return undefined;
};

export const fakeRunner = (...routes: Route[]): FakeProcessRunner => new FakeProcessRunner([ ...routes, healthyHost ]);

export const testSettings = (overrides: Record<string, unknown> = {}): Settings => parseSettings({
	connectivity: {
		net: {
			destinations: [ 'net-check.test' ],
		},
	},
	...overrides,
});

export class MemoryTaskContext implements TaskContext {
	readonly results: Array<{ result: ResultRecord | AnnotatedResult; extra: ResultRecord | undefined }> = [];
	state: unknown;

	constructor (
		private readonly params: unknown = {},
		state: unknown = null,
		readonly name = 'test',
	) {
		this.state = state;
	}

	async readParams (): Promise<unknown> {
		return this.params;
	}

	async writeResult (result: ResultRecord | AnnotatedResult, extra?: ResultRecord): Promise<void> {
		this.results.push({ result, extra });
	}

	async readState (): Promise<unknown> {
		return this.state;
	}

	async writeState (state: unknown): Promise<void> {
		this.state = state;
	}

	get lastResult (): ResultRecord | AnnotatedResult | undefined {
		return this.results[this.results.length - 1]?.result;
	}
}

/**
 * Answers `command` by its last argument, the destination of every probe.
 */
export const byDestination = (command: string, answers: Record<string, Scripted | (() => Scripted | Promise<Scripted>)>): Route => (name, args) => {
	if (name !== command) {
		return undefined;
	}

	const answer = answers[args[args.length - 1] ?? ''];
	return typeof answer === 'function' ? answer() : answer;
};

export const notInstalled = (...names: string[]): Route => (command, args) => command === 'which' && names.includes(args[0] ?? '') ? exit(1) : undefined;
