import { execa, type ExecaReturnValue, type Options } from 'execa';
import { isExecaError } from '../helper/execa-error-check.js';
import { scopedLogger } from './logger.js';

const logger = scopedLogger('process-runner');

export type RunOptions = {
	/** Milliseconds after which the process is killed. */
	timeout?: number;
	input?: string;
	env?: Record<string, string>;
};

export type CompletedProcess = {
	kind: 'completed';
	command: string;
	exitCode: number;
	stdout: string;
	stderr: string;
};

export type TimedOutProcess = {
	kind: 'timeout';
	command: string;
	elapsed: number;
	stdout: string;
	stderr: string;
};

export type MissingExecutable = {
	kind: 'missing';
	command: string;
};

export type ProcessResult = CompletedProcess | TimedOutProcess | MissingExecutable;

export type ProcessHandle = {
	command: string;
	args: string[];
	completion: Promise<ProcessResult>;
};

export type Exec = (file: string, args: string[], options: Options) => Promise<ExecaReturnValue>;

const isMissingExecutable = (error: Error): boolean => 'code' in error && error.code === 'ENOENT';

export class ProcessRunner {
	constructor (private readonly exec: Exec = execa) {}

	/**
	 * Starts a process without waiting for it. Both output streams are
	 * collected while it runs, and its exit status is consumed even if the
	 * handle is never joined.
	 */
	spawn (command: string, args: string[], options: RunOptions = {}): ProcessHandle {
		const commandLine = [ command, ...args ].join(' ');
		const startedAt = Date.now();
		let child: Promise<ExecaReturnValue>;

		logger.debug('Spawning process.', { command: commandLine });

		try {
			child = this.exec(command, args, {
				timeout: options.timeout,
				input: options.input,
				env: options.env,
			});
		} catch (error: unknown) {
			child = Promise.reject(error);
		}

		const completion = child.then(
			(result): ProcessResult => ({
				kind: 'completed',
				command: commandLine,
				exitCode: result.exitCode,
				stdout: result.stdout,
				stderr: result.stderr,
			}),
			(error: unknown): ProcessResult => {
				if (!isExecaError(error)) {
					logger.error('Process failed to start.', { command: commandLine, error });
					return { kind: 'completed', command: commandLine, exitCode: -1, stdout: '', stderr: String(error) };
				}

				if (error.timedOut) {
					return {
						kind: 'timeout',
						command: commandLine,
						elapsed: Date.now() - startedAt,
						stdout: error.stdout.toString(),
						stderr: error.stderr.toString(),
					};
				}

				if (isMissingExecutable(error)) {
					return { kind: 'missing', command: commandLine };
				}

				return {
					kind: 'completed',
					command: commandLine,
					// Killed by a signal: no exit code.
					exitCode: typeof error.exitCode === 'number' ? error.exitCode : -1,
					stdout: error.stdout.toString(),
					stderr: error.stderr.toString(),
				};
			},
		);

		return { command: commandLine, args, completion };
	}

	async join (handle: ProcessHandle): Promise<ProcessResult> {
		return handle.completion;
	}

	async run (command: string, args: string[], options: RunOptions = {}): Promise<ProcessResult> {
		return this.join(this.spawn(command, args, options));
	}
}
