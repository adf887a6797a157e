import type { CommandInterface } from '../types.js';
import type { Settings } from '../lib/config.js';
import type { ConnectivityGate } from '../lib/connectivity.js';
import { scopedLogger } from '../lib/logger.js';
import type { ProcessRunner } from '../lib/process-runner.js';
import { prefixKeys, shapeResult, type ResultRecord } from '../lib/result.js';
import { preflight } from '../helper/preflight.js';
import type { TaskContext } from '../task/context.js';
import { executable, extendSchema, optionalTimeout, readParams, type BaseOptions } from '../task/params.js';
import { TaskStatus } from '../task/status.js';
import parse from './handlers/speedtest/ndt7.js';

export type Ndt7Options = BaseOptions & {
	exec: string;
	timeout: number | false | null;
};

export const ndt7OptionsSchema = (settings: Settings) => extendSchema<Ndt7Options>('ndt7', settings.result, {
	exec: executable('exec').default('ndt7-client'),
	timeout: optionalTimeout().default(45),
});

const logger = scopedLogger('ndt7-command');

export class Ndt7Command implements CommandInterface {
	constructor (
		private readonly settings: Settings,
		private readonly runner: ProcessRunner,
		private readonly gate: ConnectivityGate,
	) {}

	async run (context: TaskContext): Promise<TaskStatus> {
		const options = readParams('ndt7', ndt7OptionsSchema(this.settings), await context.readParams());
		const blocked = await preflight(this.runner, [ options.exec ], () => this.gate.checkNet());

		if (blocked !== undefined) {
			return blocked;
		}

		const result = await this.runner.run(options.exec, [ '-format', 'json' ], {
			timeout: options.timeout ? options.timeout * 1000 : undefined,
		});

		if (result.kind === 'missing') {
			logger.crit(`${options.exec} executable not found`);
			return TaskStatus.fileMissing;
		}

		if (result.kind === 'timeout') {
			logger.crit('Speedtest timed out.', {
				cmd: result.command,
				elapsed: result.elapsed,
				stdout: result.stdout,
				stderr: result.stderr,
				status: 'timeout',
			});

			return TaskStatus.noHost;
		}

		const parsed = parse(result.stdout);

		if (!parsed && result.stdout.trim() === '') {
			logger.crit('No results.', { status: `Error (${result.exitCode})`, stdout: result.stdout, stderr: result.stderr });
			return TaskStatus.noHost;
		}

		if (!parsed) {
			logger.crit('Unreadable results.', { status: `Error (${result.exitCode})`, stdout: result.stdout, stderr: result.stderr });
			return TaskStatus.softwareError;
		}

		if (result.stderr) {
			logger.error('Results despite errors.', { status: `Error (${result.exitCode})`, stdout: result.stdout, stderr: result.stderr });
		}

		logger.info('Speedtest finished.', {
			download: parsed.stats.download,
			upload: parsed.stats.upload,
			bytes_consumed: parsed.meta.total_bytes_consumed,
			uuid_download: parsed.meta.downloaduuid,
		});

		const data: ResultRecord = parsed.stats;
		const shaped = options.result.flat ? prefixKeys('speedtest_ndt7_', data) : { speedtest_ndt7: data };
		const extra: ResultRecord = parsed.meta.total_bytes_consumed ? { test_bytes_consumed: parsed.meta.total_bytes_consumed } : {};

		await context.writeResult(shapeResult(shaped, options.result), extra);
		return TaskStatus.success;
	}
}
