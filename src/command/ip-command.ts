import got, { RequestError } from 'got';
import { isIP } from 'node:net';
import type { CommandInterface } from '../types.js';
import type { Settings } from '../lib/config.js';
import type { ConnectivityGate } from '../lib/connectivity.js';
import { scopedLogger } from '../lib/logger.js';
import type { ProcessRunner } from '../lib/process-runner.js';
import { shapeResult } from '../lib/result.js';
import { preflight } from '../helper/preflight.js';
import type { TaskContext } from '../task/context.js';
import { extendSchema, readParams, text, type BaseOptions } from '../task/params.js';
import { TaskStatus } from '../task/status.js';

export type IpOptions = BaseOptions & {
	service: string;
};

export const ipOptionsSchema = (settings: Settings) => extendSchema<IpOptions>('ipquery', settings.result, {
	service: text().default('https://api.ipify.org/'),
});

const logger = scopedLogger('ip-command');

/** Longest response body quoted in the log. */
const MAX_CONTENT = 75;

export const truncate = (content: string): string => content.length > MAX_CONTENT ? `${content.slice(0, MAX_CONTENT - 3)}...` : content;

/**
 * Asks a web service for the public IP address of the network.
 */
export class IpCommand implements CommandInterface {
	constructor (
		private readonly settings: Settings,
		private readonly runner: ProcessRunner,
		private readonly gate: ConnectivityGate,
	) {}

	async run (context: TaskContext): Promise<TaskStatus> {
		const options = readParams('ip', ipOptionsSchema(this.settings), await context.readParams());
		const blocked = await preflight(this.runner, [], () => this.gate.checkLan());

		if (blocked !== undefined) {
			return blocked;
		}

		let statusCode: number;
		let body: string;

		try {
			({ statusCode, body } = await got(options.service, {
				throwHttpErrors: false,
				retry: { limit: 0 },
				timeout: { request: this.settings.commands.timeout * 1000 },
			}));
		} catch (error: unknown) {
			if (error instanceof RequestError) {
				logger.crit('Request failed.', { url: options.service, error: error.message });
				return TaskStatus.noHost;
			}

			throw error;
		}

		if (statusCode !== 200) {
			logger.crit(truncate(body), { url: options.service, status: `Error (${statusCode})` });
			return TaskStatus.noHost;
		}

		const address = body.trim();

		if (isIP(address) === 0) {
			logger.crit('Service response error.', { url: options.service, response: body, error: 'not an IP address' });
			return TaskStatus.softwareError;
		}

		await context.writeResult(shapeResult({ ipv4: address }, options.result));
		return TaskStatus.success;
	}
}
