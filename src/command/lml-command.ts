import Joi from 'joi';
import { isIP } from 'node:net';
import type { CommandInterface } from '../types.js';
import { LAST_MILE_DESTINATIONS } from '../constants.js';
import type { Settings } from '../lib/config.js';
import type { ConnectivityGate } from '../lib/connectivity.js';
import { resolveAddresses, type AddressLookups } from '../lib/dns.js';
import { classifyExit, describeExit } from '../lib/exit-codes.js';
import { findLastMile, type LastMileResult } from '../lib/last-mile.js';
import { scopedLogger } from '../lib/logger.js';
import { ProbePool, type Attempt, type Shuffle } from '../lib/probe-pool.js';
import type { ProcessRunner } from '../lib/process-runner.js';
import { prefixKeys, shapeResult, toTargets, type Destinations, type ResultRecord, type Target } from '../lib/result.js';
import { preflight } from '../helper/preflight.js';
import type { TaskContext } from '../task/context.js';
import { destinationCollection, extendSchema, naturalNumber, positiveInt, readParams, type BaseOptions } from '../task/params.js';
import { TaskStatus } from '../task/status.js';
import parse, { type ScamperTrace } from './handlers/scamper/parse.js';

export type LastMileOptions = BaseOptions & {
	destinations: Destinations;
	attempts: number;
	timeout: number;
	include: {
		last_mile_ip: boolean;
		source_ip: boolean;
	};
};

export const lastMileOptionsSchema = (settings: Settings) => extendSchema<LastMileOptions>('last_mile_rtt', settings.result, {
	destinations: destinationCollection().default(LAST_MILE_DESTINATIONS),
	attempts: naturalNumber('attempts').default(3),
	timeout: positiveInt('timeout', 'seconds').default(5),
	include: Joi.object({
		last_mile_ip: Joi.boolean().default(false),
		source_ip: Joi.boolean().default(false),
	}).default(),
});

const logger = scopedLogger('lml-command');

type TraceAttempt = {
	trace: ScamperTrace;
	lastMile: LastMileResult;
};

export const argBuilder = (options: LastMileOptions, target: string): string[] => [
	'-O', 'json',
	'-c', `trace -Q -P icmp-paris -q ${options.attempts} -w ${options.timeout}`,
	'-i', target,
];

/**
 * Whether any destination needs a name look-up first.
 */
export const needsLookup = (destinations: Destinations): boolean => toTargets(destinations).some(target => isIP(target.address) === 0);

/**
 * Label of the destination an address was resolved from.
 */
export const labelOf = (address: string, lookups: AddressLookups, destinations: Destinations): string => {
	const [ host = address, ...extraNames ] = lookups.getKeys(address);

	if (extraNames.length > 0) {
		logger.warning('Destination given by multiple hostnames.', { dest: address, hosts: [ host, ...extraNames ] });
	}

	return toTargets(destinations).find(target => target.address === host)?.label ?? host;
};

export class LastMileCommand implements CommandInterface {
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
		const options = readParams('lml', lastMileOptionsSchema(this.settings), await context.readParams());
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

		const targets: Target[] = [ ...lookups.resolved ].map(address => ({ address, label: address }));
		const found = await this.pool.trySequentially(targets, target => this.trace(options, target));

		if (!found.ok) {
			return found.status;
		}

		const { trace, lastMile } = found.value;
		const label = labelOf(lastMile.endpoint, lookups, options.destinations);
		const results: ResultRecord = {};

		if (options.include.last_mile_ip) {
			results['last_mile_tr_addr'] = lastMile.address;
		}

		if (options.include.source_ip) {
			results['last_mile_tr_src'] = trace.src;
		}

		if (!options.result.flat) {
			results['last_mile_tr_rtt_ms'] = lastMile.rtts;
		}

		results['last_mile_tr_rtt_max_ms'] = lastMile.stats.rtt_max_ms;
		results['last_mile_tr_rtt_min_ms'] = lastMile.stats.rtt_min_ms;
		results['last_mile_tr_rtt_median_ms'] = lastMile.stats.rtt_median_ms;

		const shaped = options.result.flat
			? prefixKeys(`${label}_`, results)
			: { [label]: results };

		await context.writeResult(shapeResult(shaped, options.result));
		return TaskStatus.success;
	}

	private async trace (options: LastMileOptions, target: Target): Promise<Attempt<TraceAttempt>> {
		const result = await this.runner.run('scamper', argBuilder(options, target.address), {
			timeout: this.settings.commands.timeout * 1000,
		});

		if (result.kind === 'missing') {
			logger.crit('scamper executable not found');
			return { kind: 'abort', status: TaskStatus.fileMissing };
		}

		if (result.kind === 'timeout') {
			logger.error('Trace timed out.', { dest: target.address, elapsed: result.elapsed, stdout: result.stdout, stderr: result.stderr });
			return { kind: 'failed' };
		}

		if (classifyExit('scamper', result.exitCode) !== 'success') {
			logger.crit('Trace failed.', {
				dest: target.address,
				status: `Error (${result.exitCode})`,
				error: describeExit('scamper', result.exitCode),
				args: result.command,
				stdout: result.stdout,
				stderr: result.stderr,
			});

			return { kind: 'abort', status: TaskStatus.softwareError };
		}

		const { traces, skipped } = parse(result.stdout);
		const [ trace ] = traces;

		if (!trace) {
			logger.crit('No trace record in output.', { dest: target.address, skipped, stdout: result.stdout, stderr: result.stderr });
			return { kind: 'abort', status: TaskStatus.softwareError };
		}

		if (trace.stopReason !== 'COMPLETED') {
			logger.warning('Trace incomplete.', { dest: trace.dst, count: trace.probeCount, stop_reason: trace.stopReason });
		}

		const search = findLastMile(target.address, trace.hops);

		if (search.kind === 'found') {
			return { kind: 'ok', value: { trace, lastMile: search.result } };
		}

		logger.error(search.kind === 'invalid-address' ? 'Hop address is not an IP address.' : 'No result identified.', {
			dest: target.address,
			stdout: result.stdout,
			stderr: result.stderr,
		});

		return { kind: 'failed' };
	}
}
