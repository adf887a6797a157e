import type { Logger } from 'winston';
import type { ConnectivitySettings } from './config.js';
import { findMissingExecutable } from './dependencies.js';
import { classifyExit, dispositionOf } from './exit-codes.js';
import { getDefaultGateway } from './gateway.js';
import { scopedLogger } from './logger.js';
import type { ProcessRunner } from './process-runner.js';
import { TaskStatus } from '../task/status.js';

/** ping exit code standing in for a process that could not be run at all. */
const NOT_RUN = -1;

export type GatewayCheckResult = {
	success: boolean;
	attempts: number;
	exitCode: number;
};

export type GateResult = { passed: true } | { passed: false; status: TaskStatus };

type RaceWinner = {
	dest: string;
	result: GatewayCheckResult;
};

type RaceOutcome = {
	winner: RaceWinner | undefined;
	/** Last ping exit code of every destination that gave up. */
	exitCodes: Map<string, number>;
};

const PASSED: GateResult = { passed: true };

const truncate = (destinations: string[]): string[] => destinations.length < 4 ? destinations : [ ...destinations.slice(0, 3), '...' ];

/**
 * Preflight checks run ahead of a measurement: first the LAN (loopback and
 * default gateway), then optionally the Internet (any one of a configured set
 * of hosts).
 */
export class ConnectivityGate {
	constructor (
		private readonly settings: ConnectivitySettings,
		private readonly runner: ProcessRunner,
		private readonly logger: Logger = scopedLogger('connectivity'),
	) {}

	/**
	 * Sends a single echo request and resolves to ping's exit code.
	 */
	async pingOnce (dest: string): Promise<number> {
		const { deadline } = this.settings;
		const result = await this.runner.run('ping', [ '-c', '1', '-w', String(deadline), dest ], { timeout: (deadline + 5) * 1000 });

		if (result.kind === 'timeout') {
			return 1;
		}

		return result.kind === 'completed' ? result.exitCode : NOT_RUN;
	}

	/**
	 * Pings `dest` until one reply arrives, at most `attempts` times. Gives up
	 * early on any failure worse than an unanswered request, or once `signal`
	 * is aborted.
	 */
	async pingUntilSuccess (dest: string, attempts: number, signal?: AbortSignal): Promise<GatewayCheckResult> {
		if (!Number.isInteger(attempts) || attempts < 1) {
			throw new RangeError('attempts must be an integer of at least 1');
		}

		let exitCode = NOT_RUN;
		let count = 0;

		while (count < attempts && !signal?.aborted) {
			count++;
			exitCode = await this.pingOnce(dest);

			if (exitCode === 0) {
				return { success: true, attempts: count, exitCode };
			}

			if (dispositionOf(classifyExit('ping', exitCode)) === 'abort') {
				break;
			}
		}

		return { success: false, attempts: count, exitCode };
	}

	async checkLan (): Promise<GateResult> {
		if (await findMissingExecutable([ 'ping' ], this.runner)) {
			return { passed: false, status: TaskStatus.fileMissing };
		}

		const localhostCode = await this.pingOnce('localhost');

		if (localhostCode !== 0) {
			this.logger.crit('host network interface down', { dest: 'localhost', status: `Error (${localhostCode})` });
			return { passed: false, status: TaskStatus.osError };
		}

		this.logger.debug('localhost reachable', { dest: 'localhost', status: 'OK' });

		const gateway = await getDefaultGateway(this.runner);

		if (!gateway) {
			this.logger.crit('default gateway not found');
			return { passed: false, status: TaskStatus.osError };
		}

		const gatewayUp = await this.pingUntilSuccess(gateway.address, this.settings.lan.attempts);

		if (!gatewayUp.success) {
			this.logger.crit('network gateway inaccessible', {
				dest: 'gateway',
				addr: gateway.address,
				tries: gatewayUp.attempts,
				status: `Error (${gatewayUp.exitCode})`,
			});

			return { passed: false, status: TaskStatus.noHost };
		}

		this.logger.log(gatewayUp.attempts === 1 ? 'debug' : 'warning', 'gateway reachable', {
			dest: 'gateway',
			addr: gateway.address,
			tries: gatewayUp.attempts,
			status: 'OK',
		});

		return PASSED;
	}

	async checkNet (): Promise<GateResult> {
		const lan = await this.checkLan();

		if (!lan.passed) {
			return lan;
		}

		const { disabled, destinations, attempts } = this.settings.net;

		if (disabled || destinations.length === 0) {
			this.logger.debug('internet check disabled');
			return PASSED;
		}

		const { winner, exitCodes } = await this.race(destinations, attempts);

		if (!winner) {
			this.logger.crit('internet inaccessible', {
				dest: truncate(destinations),
				tries: attempts,
				status: 'Error',
				exit_codes: Object.fromEntries(destinations.map(dest => [ dest, exitCodes.get(dest) ?? NOT_RUN ] as const)),
			});

			return { passed: false, status: TaskStatus.noHost };
		}

		this.logger.log(winner.result.attempts === 1 ? 'debug' : 'warning', 'internet reachable', {
			dest: winner.dest,
			tries: winner.result.attempts,
			status: 'OK',
		});

		return PASSED;
	}

	/**
	 * Pings every destination concurrently and settles with the first to
	 * answer, or with undefined once all of them have given up. Losers stop
	 * retrying; their processes still run to completion and are reaped.
	 */
	private async race (destinations: string[], attempts: number): Promise<RaceOutcome> {
		const controller = new AbortController();
		const exitCodes = new Map<string, number>();
		let pending = destinations.length;

		const winner = await new Promise<RaceWinner | undefined>((resolve) => {
			const settleOne = () => {
				pending--;

				if (pending === 0) {
					resolve(undefined);
				}
			};

			for (const dest of destinations) {
				void this.pingUntilSuccess(dest, attempts, controller.signal).then((result) => {
					if (result.success) {
						resolve({ dest, result });
					} else {
						this.logger.debug('internet host unreachable', { dest, tries: result.attempts, status: `Error (${result.exitCode})` });
						exitCodes.set(dest, result.exitCode);
						settleOne();
					}
				}, (error: unknown) => {
					this.logger.error('internet host check failed', { dest, error });
					settleOne();
				});
			}
		});

		controller.abort();

		return { winner, exitCodes };
	}
}
