import type { CommandInterface } from '../types.js';
import { LAST_MILE_DESTINATIONS } from '../constants.js';
import type { Settings } from '../lib/config.js';
import type { ConnectivityGate } from '../lib/connectivity.js';
import { classifyExit, describeExit, isUsable } from '../lib/exit-codes.js';
import { findLastMile, type LastMileResult } from '../lib/last-mile.js';
import { scopedLogger } from '../lib/logger.js';
import { ProbePool, type Attempt, type Shuffle } from '../lib/probe-pool.js';
import type { ProcessRunner } from '../lib/process-runner.js';
import { prefixKeys, shapeResult, toTargets, type Destinations, type Target } from '../lib/result.js';
import { preflight } from '../helper/preflight.js';
import type { TaskContext } from '../task/context.js';
import { boundedReal, destinationCollection, extendSchema, naturalNumber, positiveInt, readParams, type BaseOptions } from '../task/params.js';
import { TaskStatus } from '../task/status.js';
import parsePing, { type PingStats } from './handlers/ping/parse.js';
import { parseTracerouteHops } from './handlers/traceroute/parse.js';
import { argBuilder as pingArgBuilder } from './ping-command.js';

export type LastMileTracerouteOptions = BaseOptions & {
	destinations: Destinations;
	count: number;
	interval: number;
	deadline: number;
};

export const lastMileTracerouteOptionsSchema = (settings: Settings) => extendSchema<LastMileTracerouteOptions>('last_mile_rtt', settings.result, {
	destinations: destinationCollection().default(LAST_MILE_DESTINATIONS),
	count: naturalNumber('count').default(10),
	interval: boundedReal('interval', 'seconds may be no less than 0.002 (2ms)', 0.002).default(0.25),
	deadline: positiveInt('deadline', 'seconds').default(5),
});

const logger = scopedLogger('lml-traceroute-command');

type LastMilePing = {
	lastMile: LastMileResult;
	ping: PingStats;
};

/**
 * Last-mile latency from a plain traceroute, followed by a ping of the
 * last-mile host.
 */
export class LastMileTracerouteCommand implements CommandInterface {
	private readonly pool: ProbePool;

	constructor (
		private readonly settings: Settings,
		private readonly runner: ProcessRunner,
		private readonly gate: ConnectivityGate,
		shuffle?: Shuffle,
	) {
		this.pool = new ProbePool(runner, logger, shuffle);
	}

	async run (context: TaskContext): Promise<TaskStatus> {
		const options = readParams('lml-traceroute', lastMileTracerouteOptionsSchema(this.settings), await context.readParams());
		const blocked = await preflight(this.runner, [ 'traceroute' ], () => this.gate.checkNet());

		if (blocked !== undefined) {
			return blocked;
		}

		const found = await this.pool.trySequentially(toTargets(options.destinations), target => this.measure(options, target));

		if (!found.ok) {
			return found.status;
		}

		const { lastMile, ping } = found.value;
		const results = {
			...prefixKeys('last_mile_ping_', ping),
			...prefixKeys('last_mile_tr_', lastMile.stats),
		};

		const label = found.target.label;
		const shaped = options.result.flat
			? prefixKeys(`${label}_`, results)
			: { [label]: results };

		await context.writeResult(shapeResult(shaped, options.result));
		return TaskStatus.success;
	}

	private async measure (options: LastMileTracerouteOptions, target: Target): Promise<Attempt<LastMilePing>> {
		const timeout = this.settings.commands.timeout * 1000;
		const traceroute = await this.runner.run('traceroute', [ target.address ], { timeout });

		if (traceroute.kind === 'timeout') {
			logger.error('Traceroute timed out.', {
				dest: target.address,
				status: 'Error (timeout)',
				elapsed: traceroute.elapsed,
				stdout: traceroute.stdout,
				stderr: traceroute.stderr,
			});

			return { kind: 'failed' };
		}

		if (traceroute.kind !== 'completed' || classifyExit('traceroute', traceroute.exitCode) !== 'success') {
			logger.error('Traceroute failed.', {
				dest: target.address,
				status: traceroute.kind === 'completed' ? `Error (${traceroute.exitCode})` : 'Error (missing)',
				stdout: traceroute.kind === 'completed' ? traceroute.stdout : '',
				stderr: traceroute.kind === 'completed' ? traceroute.stderr : '',
			});

			return { kind: 'failed' };
		}

		const { hops, anomalies } = parseTracerouteHops(traceroute.stdout);

		for (const line of anomalies) {
			logger.warning('Unexpected traceroute output line.', { dest: target.address, line });
		}

		const search = findLastMile(target.address, hops);

		if (search.kind === 'invalid-address') {
			logger.error('Failed to parse traceroute hop IP address.', { dest: target.address, addr: search.address, stdout: traceroute.stdout });
			return { kind: 'failed' };
		}

		if (search.kind === 'not-found') {
			logger.error('Failed to extract last mile IP from traceroute output.', { dest: target.address, stdout: traceroute.stdout, stderr: traceroute.stderr });
			return { kind: 'failed' };
		}

		const lastMile = search.result;
		const ping = await this.runner.run('ping', pingArgBuilder(options, lastMile.address), { timeout });

		if (ping.kind !== 'completed' || !isUsable(classifyExit('ping', ping.exitCode))) {
			logger.crit('Last mile ping failure.', {
				dest: lastMile.address,
				status: ping.kind === 'completed' ? `Error (${ping.exitCode})` : `Error (${ping.kind})`,
				error: ping.kind === 'completed' ? describeExit('ping', ping.exitCode) : ping.kind,
				...(ping.kind === 'timeout' ? { elapsed: ping.elapsed } : {}),
				stdout: ping.kind === 'missing' ? '' : ping.stdout,
				stderr: ping.kind === 'missing' ? '' : ping.stderr,
			});

			return { kind: 'abort', status: TaskStatus.noHost };
		}

		return { kind: 'ok', value: { lastMile, ping: parsePing(ping.stdout) } };
	}
}
