import type { CommandInterface } from '../types.js';
import { DEFAULT_DESTINATIONS } from '../constants.js';
import type { Settings } from '../lib/config.js';
import type { ConnectivityGate } from '../lib/connectivity.js';
import { resolveAddresses } from '../lib/dns.js';
import { classifyExit, describeExit } from '../lib/exit-codes.js';
import { scopedLogger } from '../lib/logger.js';
import type { ProcessRunner } from '../lib/process-runner.js';
import { shapeResult, toTargets, type Destinations, type ResultRecord } from '../lib/result.js';
import { preflight } from '../helper/preflight.js';
import type { TaskContext } from '../task/context.js';
import { destinationCollection, extendSchema, naturalNumber, positiveInt, readParams, type BaseOptions } from '../task/params.js';
import { TaskStatus } from '../task/status.js';
import parse, { type ScamperTrace } from './handlers/scamper/parse.js';
import { labelOf, needsLookup } from './lml-command.js';

export type HopsOptions = BaseOptions & {
	destinations: Destinations;
	attempts: number;
	timeout: number;
};

export const hopsOptionsSchema = (settings: Settings) => extendSchema<HopsOptions>('hops_to_target', settings.result, {
	destinations: destinationCollection().default(DEFAULT_DESTINATIONS),
	attempts: naturalNumber('attempts').default(1),
	timeout: positiveInt('timeout', 'seconds').default(5),
});

const logger = scopedLogger('hops-command');

export const argBuilder = (options: HopsOptions, targets: string[]): string[] => [
	'-O', 'json',
	'-c', `trace -Q -P icmp-paris -q ${options.attempts} -w ${options.timeout}`,
	...targets.flatMap(target => [ '-i', target ]),
];

/**
 * Hop count of a trace that reached its destination, undefined otherwise.
 */
export const completedHopCount = (trace: ScamperTrace): number | undefined => {
	const lastHop = trace.hops[trace.hops.length - 1];

	if (
		trace.stopReason === 'COMPLETED'
		&& lastHop?.address === trace.dst
		&& lastHop.ttl === trace.hopCount
	) {
		return trace.hopCount;
	}

	return undefined;
};

export class HopsCommand implements CommandInterface {
	constructor (
		private readonly settings: Settings,
		private readonly runner: ProcessRunner,
		private readonly gate: ConnectivityGate,
	) {}

	async run (context: TaskContext): Promise<TaskStatus> {
		const options = readParams('hops', hopsOptionsSchema(this.settings), await context.readParams());
		const executables = needsLookup(options.destinations) ? [ 'scamper', 'dig' ] : [ 'scamper' ];
		const blocked = await preflight(this.runner, executables, () => this.gate.checkNet());

		if (blocked !== undefined) {
			return blocked;
		}

		const lookups = await resolveAddresses(toTargets(options.destinations).map(target => target.address), this.runner);

		for (const failure of lookups.unresolved) {
			logger.error('Domain look-up failure.', { host: failure.host, status: failure.exitCode });
		}

		if (lookups.resolved.size === 0) {
			logger.crit('No addresses to query.', { errors: lookups.unresolved.length });
			return TaskStatus.noHost;
		}

		const targets = [ ...lookups.resolved ];
		const result = await this.runner.run('scamper', argBuilder(options, targets), {
			timeout: this.settings.commands.timeout * 1000,
		});

		if (result.kind !== 'completed' || classifyExit('scamper', result.exitCode) !== 'success') {
			logger.crit('Trace failed.', {
				dests: targets,
				status: result.kind === 'completed' ? `Error (${result.exitCode})` : `Error (${result.kind})`,
				error: result.kind === 'completed' ? describeExit('scamper', result.exitCode) : result.kind,
				...(result.kind === 'timeout' ? { elapsed: result.elapsed } : {}),
				args: result.command,
				stdout: result.kind === 'missing' ? '' : result.stdout,
				stderr: result.kind === 'missing' ? '' : result.stderr,
			});

			return result.kind === 'timeout' ? TaskStatus.noHost : TaskStatus.softwareError;
		}

		const { traces } = parse(result.stdout);
		const traced = new Set(traces.map(trace => trace.dst));
		const unaccounted = targets.filter(target => !traced.has(target));

		if (unaccounted.length > 0) {
			logger.crit('Could not account for destinations in results.', { dests: unaccounted });
			return TaskStatus.softwareError;
		}

		const hopCounts = traces.map(trace => ({ trace, hops: completedHopCount(trace) }));
		const failures = hopCounts.filter(({ hops }) => hops === undefined);

		failures.forEach(({ trace }, index) => {
			logger.error('Trace did not complete.', {
				dest: trace.dst,
				failure: `(${index + 1}/${failures.length})`,
				hop_count: trace.hopCount,
				stop_reason: trace.stopReason,
			});
		});

		const results: Record<string, number> = {};

		for (const { trace, hops } of hopCounts) {
			if (hops !== undefined) {
				results[labelOf(trace.dst, lookups, options.destinations)] = hops;
			}
		}

		if (Object.keys(results).length === 0) {
			logger.crit('No destinations succeeded.');
			return TaskStatus.noHost;
		}

		await context.writeResult(shapeResult(shapeHops(results, options.result.flat), options.result));
		return TaskStatus.success;
	}
}

/**
 * `{ hops_to_<label>: n }` when flat, `{ <label>: { hops: n } }` otherwise.
 */
export const shapeHops = (hops: Record<string, number | null>, flat: boolean): ResultRecord => Object.fromEntries(
	Object.entries(hops).map(([ label, count ]) => flat ? [ `hops_to_${label}`, count ] as const : [ label, { hops: count } ] as const),
);
