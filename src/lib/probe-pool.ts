import _ from 'lodash';
import type { Logger } from 'winston';
import { classifyExit, describeExit, isUsable, type ProbeStatus, type ToolFamily } from './exit-codes.js';
import type { ProcessRunner, ProcessResult, RunOptions } from './process-runner.js';
import type { Target } from './result.js';
import { TaskStatus } from '../task/status.js';

/** Failures logged in full before the rest are summarised. */
const DETAILED_FAILURES = 3;

export type ProbeCommand = {
	command: string;
	args: string[];
	options?: RunOptions;
};

/** Orders the targets of a sequential search. */
export type Shuffle = <T>(items: T[]) => T[];

export type ProbeOutcome<T> = Readonly<{
	target: Target;
	command: string;
	exitCode: number | null;
	timedOut: boolean;
	/** Milliseconds before a timed-out probe was killed. */
	elapsed: number | null;
	stdout: string;
	stderr: string;
	status: ProbeStatus;
	stats: T | null;
}>;

export type PoolResult<T> =
	| { ok: true; successes: Array<ProbeOutcome<T> & { stats: T }>; failures: Array<ProbeOutcome<T>> }
	| { ok: false; status: TaskStatus };

export type Attempt<T> =
	| { kind: 'ok'; value: T }
	| { kind: 'failed' }
	| { kind: 'abort'; status: TaskStatus };

export type SequentialResult<T> =
	| { ok: true; target: Target; value: T }
	| { ok: false; status: TaskStatus };

const toOutcome = <T>(target: Target, family: ToolFamily, result: ProcessResult, parse: (stdout: string) => T | null): ProbeOutcome<T> => {
	if (result.kind === 'missing') {
		return { target, command: result.command, exitCode: null, timedOut: false, elapsed: null, stdout: '', stderr: '', status: 'fatal', stats: null };
	}

	if (result.kind === 'timeout') {
		return { target, command: result.command, exitCode: null, timedOut: true, elapsed: result.elapsed, stdout: result.stdout, stderr: result.stderr, status: 'error', stats: null };
	}

	const status = classifyExit(family, result.exitCode);

	return {
		target,
		command: result.command,
		exitCode: result.exitCode,
		timedOut: false,
		elapsed: null,
		stdout: result.stdout,
		stderr: result.stderr,
		status,
		stats: isUsable(status) ? parse(result.stdout) : null,
	};
};

const hasStats = <T>(outcome: ProbeOutcome<T>): outcome is ProbeOutcome<T> & { stats: T } => outcome.stats !== null;

export class ProbePool {
	constructor (
		private readonly runner: ProcessRunner,
		private readonly logger: Logger,
		private readonly shuffle: Shuffle = _.shuffle,
	) {}

	/**
	 * Starts one probe per target, then waits for all of them. Succeeds when
	 * at least one probe produced usable statistics.
	 */
	async runAll<T> (
		targets: Target[],
		build: (target: Target) => ProbeCommand,
		family: ToolFamily,
		parse: (stdout: string) => T | null,
	): Promise<PoolResult<T>> {
		const handles = targets.map((target) => {
			const { command, args, options } = build(target);
			return { target, handle: this.runner.spawn(command, args, options) };
		});

		const outcomes: Array<ProbeOutcome<T>> = [];

		for (const { target, handle } of handles) {
			outcomes.push(toOutcome(target, family, await this.runner.join(handle), parse));
		}

		const successes = outcomes.filter(hasStats);
		const failures = outcomes.filter(outcome => !hasStats(outcome));

		this.logFailures(family, failures);

		if (successes.length === 0) {
			this.logger.crit('no destinations succeeded', { dests: targets.map(target => target.address) });
			return { ok: false, status: TaskStatus.noHost };
		}

		return { ok: true, successes, failures };
	}

	/**
	 * Tries targets one at a time, in random order, until one of them yields
	 * a value.
	 */
	async trySequentially<T> (targets: Target[], attempt: (target: Target) => Promise<Attempt<T>>): Promise<SequentialResult<T>> {
		const ordered = this.shuffle([ ...targets ]);

		for (const target of ordered) {
			const result = await attempt(target);

			if (result.kind === 'ok') {
				return { ok: true, target, value: result.value };
			}

			if (result.kind === 'abort') {
				return { ok: false, status: result.status };
			}
		}

		this.logger.crit('all queries failed', { dests: ordered.map(target => target.address), status: 'Error' });
		return { ok: false, status: TaskStatus.noHost };
	}

	/**
	 * The first failures are logged in full and the rest summarised, except
	 * timeouts, which are always logged with their elapsed time.
	 */
	private logFailures<T> (family: ToolFamily, failures: Array<ProbeOutcome<T>>) {
		const total = failures.length;
		let summarised = 0;

		failures.forEach((failure, index) => {
			if (failure.timedOut) {
				this.logger.error('probe timed out', {
					dest: failure.target.address,
					status: 'Error (timeout)',
					elapsed: failure.elapsed,
					failure: `(${index + 1}/${total})`,
					args: failure.command,
					stdout: failure.stdout,
					stderr: failure.stderr,
				});

				return;
			}

			if (index >= DETAILED_FAILURES) {
				summarised++;
				return;
			}

			this.logger.error('probe failed', {
				dest: failure.target.address,
				status: failure.exitCode === null ? `Error (${failure.status})` : `Error (${failure.exitCode})`,
				error: failure.exitCode === null ? failure.status : describeExit(family, failure.exitCode),
				failure: `(${index + 1}/${total})`,
				args: failure.command,
				stdout: failure.stdout,
				stderr: failure.stderr,
			});
		});

		if (summarised > 0) {
			this.logger.error('further probes failed', {
				dest: '...',
				status: 'Error (...)',
				failure: `(.../${total})`,
			});
		}
	}
}
