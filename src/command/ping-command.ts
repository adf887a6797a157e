import _ from 'lodash';
import type { CommandInterface } from '../types.js';
import { DEFAULT_DESTINATIONS } from '../constants.js';
import type { Settings } from '../lib/config.js';
import type { ConnectivityGate } from '../lib/connectivity.js';
import { scopedLogger } from '../lib/logger.js';
import { ProbePool } from '../lib/probe-pool.js';
import type { ProcessRunner } from '../lib/process-runner.js';
import { shape, toTargets, type Destinations } from '../lib/result.js';
import { preflight } from '../helper/preflight.js';
import type { TaskContext } from '../task/context.js';
import { boundedReal, destinationCollection, extendSchema, naturalNumber, positiveInt, readParams, type BaseOptions } from '../task/params.js';
import { TaskStatus } from '../task/status.js';
import parse from './handlers/ping/parse.js';

export type PingOptions = BaseOptions & {
	destinations: Destinations;
	count: number;
	interval: number;
	deadline: number;
};

export const pingOptionsSchema = (settings: Settings) => extendSchema<PingOptions>('ping_latency', settings.result, {
	destinations: destinationCollection().default(DEFAULT_DESTINATIONS),
	count: naturalNumber('count').default(10),
	interval: boundedReal('interval', 'seconds must not be less than 2ms', 0.002).default(0.25),
	deadline: positiveInt('deadline', 'seconds').default(5),
});

const logger = scopedLogger('ping-command');

export const argBuilder = (options: Pick<PingOptions, 'count' | 'interval' | 'deadline'>, target: string): string[] => [
	[ '-c', options.count.toString() ],
	[ '-i', options.interval.toString() ],
	[ '-w', options.deadline.toString() ],
	target,
].flat();

export class PingCommand implements CommandInterface {
	private readonly pool: ProbePool;

	constructor (
		private readonly settings: Settings,
		private readonly runner: ProcessRunner,
		private readonly gate: ConnectivityGate,
	) {
		this.pool = new ProbePool(runner, logger);
	}

	async run (context: TaskContext): Promise<TaskStatus> {
		const options = readParams('ping', pingOptionsSchema(this.settings), await context.readParams());
		const blocked = await preflight(this.runner, [ 'ping' ], () => this.gate.checkLan());

		if (blocked !== undefined) {
			return blocked;
		}

		const pool = await this.pool.runAll(
			toTargets(options.destinations),
			target => ({
				command: 'ping',
				args: argBuilder(options, target.address),
				options: { timeout: this.settings.commands.timeout * 1000 },
			}),
			'ping',
			parse,
		);

		if (!pool.ok) {
			return pool.status;
		}

		logger.info('Ping finished.', {
			'dest-status': _.countBy([ ...pool.successes, ...pool.failures ], outcome => outcome.exitCode ?? 'none'),
		});

		const results = Object.fromEntries(pool.successes.map(outcome => [ outcome.target.label, outcome.stats ] as const));

		await context.writeResult(shape(results, options.result));
		return TaskStatus.success;
	}
}
