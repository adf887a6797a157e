import _ from 'lodash';
import type { CommandInterface } from '../types.js';
import { DEFAULT_DESTINATIONS } from '../constants.js';
import type { Settings } from '../lib/config.js';
import type { ConnectivityGate } from '../lib/connectivity.js';
import { scopedLogger } from '../lib/logger.js';
import { ProbePool } from '../lib/probe-pool.js';
import type { ProcessRunner } from '../lib/process-runner.js';
import { prefixKeys, shapeResult, toTargets } from '../lib/result.js';
import { preflight } from '../helper/preflight.js';
import type { TaskContext } from '../task/context.js';
import { extendSchema, hostnameList, ipAddress, readParams, type BaseOptions } from '../task/params.js';
import { TaskStatus } from '../task/status.js';
import { ExtractionError, extractTimeMs } from './handlers/dig/parse.js';

export type DnsLatencyOptions = BaseOptions & {
	destinations: string[];
	server: string;
};

export const dnsLatencyOptionsSchema = (settings: Settings) => extendSchema<DnsLatencyOptions>('dns_latency', settings.result, {
	destinations: hostnameList().default(DEFAULT_DESTINATIONS),
	server: ipAddress('server').default('8.8.8.8'),
});

const logger = scopedLogger('dns-latency-command');

export const argBuilder = (options: DnsLatencyOptions, target: string): string[] => [ `@${options.server}`, target, '+yaml' ];

/** Sample standard deviation; 0 for fewer than two values. */
export const stdev = (values: number[]): number => {
	if (values.length < 2) {
		return 0;
	}

	const mean = _.mean(values);
	return Math.sqrt(_.sumBy(values, value => (value - mean) ** 2) / (values.length - 1));
};

export class DnsLatencyCommand implements CommandInterface {
	private readonly pool: ProbePool;

	constructor (
		private readonly settings: Settings,
		private readonly runner: ProcessRunner,
		private readonly gate: ConnectivityGate,
	) {
		this.pool = new ProbePool(runner, logger);
	}

	async run (context: TaskContext): Promise<TaskStatus> {
		const options = readParams('dns-latency', dnsLatencyOptionsSchema(this.settings), await context.readParams());
		const blocked = await preflight(this.runner, [ 'dig' ], () => this.gate.checkNet());

		if (blocked !== undefined) {
			return blocked;
		}

		const pool = await this.pool.runAll(
			toTargets(options.destinations),
			target => ({
				command: 'dig',
				args: argBuilder(options, target.address),
				options: { timeout: this.settings.commands.timeout * 1000 },
			}),
			'dig',
			stdout => stdout,
		);

		if (!pool.ok) {
			return pool.status;
		}

		let times: Array<{ dest: string; ms: number }>;

		try {
			times = pool.successes.map(outcome => ({ dest: outcome.target.address, ms: extractTimeMs(outcome.stats) }));
		} catch (error: unknown) {
			if (error instanceof ExtractionError) {
				logger.crit('Latency extraction error.', { error: error.message, stdout: error.stdout });
				return TaskStatus.softwareError;
			}

			throw error;
		}

		const values = times.map(time => time.ms);
		const results = {
			avg_ms: _.mean(values),
			max_ms: Math.max(...values),
		};

		const fastest = _.minBy(times, time => time.ms);
		const slowest = _.maxBy(times, time => time.ms);

		logger.info('Query latency.', {
			min_label: fastest ? { [fastest.dest]: fastest.ms } : {},
			mean: _.round(results.avg_ms, 1),
			stdev: _.round(stdev(values), 1),
			max_label: slowest ? { [slowest.dest]: slowest.ms } : {},
		});

		const shaped = options.result.flat ? prefixKeys('dns_query_', results) : { dns_query: results };

		await context.writeResult(shapeResult(shaped, options.result));
		return TaskStatus.success;
	}
}
