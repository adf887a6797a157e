import type { CommandInterface } from '../types.js';
import { DEFAULT_DESTINATIONS } from '../constants.js';
import type { Settings } from '../lib/config.js';
import type { ConnectivityGate } from '../lib/connectivity.js';
import { scopedLogger } from '../lib/logger.js';
import { ProbePool } from '../lib/probe-pool.js';
import type { ProcessRunner } from '../lib/process-runner.js';
import { shapeResult, toTargets, type Destinations } from '../lib/result.js';
import { preflight } from '../helper/preflight.js';
import type { TaskContext } from '../task/context.js';
import { destinationCollection, extendSchema, naturalNumber, readParams, type BaseOptions } from '../task/params.js';
import { TaskStatus } from '../task/status.js';
import { parseTracerouteHopCount } from './handlers/traceroute/parse.js';
import { shapeHops } from './hops-command.js';

export type HopsTracerouteOptions = BaseOptions & {
	destinations: Destinations;
	max_hop: number;
	tries: number;
	wait: number;
};

export const hopsTracerouteOptionsSchema = (settings: Settings) => extendSchema<HopsTracerouteOptions>('hops_to_target', settings.result, {
	destinations: destinationCollection().default(DEFAULT_DESTINATIONS),
	max_hop: naturalNumber('max_hop').default(64),
	tries: naturalNumber('tries').default(5),
	wait: naturalNumber('wait').default(2),
});

const logger = scopedLogger('hops-traceroute-command');

// Short options only: long ones differ between traceroute implementations.
export const argBuilder = (options: HopsTracerouteOptions, target: string): string[] => [
	[ '-m', options.max_hop.toString() ],
	[ '-q', options.tries.toString() ],
	[ '-w', options.wait.toString() ],
	target,
].flat();

export class HopsTracerouteCommand implements CommandInterface {
	private readonly pool: ProbePool;

	constructor (
		private readonly settings: Settings,
		private readonly runner: ProcessRunner,
		private readonly gate: ConnectivityGate,
	) {
		this.pool = new ProbePool(runner, logger);
	}

	async run (context: TaskContext): Promise<TaskStatus> {
		const options = readParams('hops-traceroute', hopsTracerouteOptionsSchema(this.settings), await context.readParams());
		const blocked = await preflight(this.runner, [ 'traceroute' ], () => this.gate.checkNet());

		if (blocked !== undefined) {
			return blocked;
		}

		const targets = toTargets(options.destinations);
		const pool = await this.pool.runAll(
			targets,
			target => ({
				command: 'traceroute',
				args: argBuilder(options, target.address),
				options: { timeout: this.settings.commands.timeout * 1000 },
			}),
			'traceroute',
			stdout => parseTracerouteHopCount(stdout) ?? null,
		);

		if (!pool.ok) {
			return pool.status;
		}

		// Failed destinations are reported too, without a hop count.
		const counts = new Map(pool.successes.map(outcome => [ outcome.target.address, outcome.stats ] as const));
		const hops = Object.fromEntries(targets.map((target): [ string, number | null ] => [ target.label, counts.get(target.address) ?? null ]));

		await context.writeResult(shapeResult(shapeHops(hops, options.result.flat), options.result));
		return TaskStatus.success;
	}
}
