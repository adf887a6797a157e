import Joi from 'joi';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import type { CommandInterface } from '../types.js';
import type { Settings } from '../lib/config.js';
import type { ConnectivityGate } from '../lib/connectivity.js';
import { scopedLogger } from '../lib/logger.js';
import type { ProcessResult, ProcessRunner } from '../lib/process-runner.js';
import { prefixKeys, shapeResult, type ResultRecord } from '../lib/result.js';
import { preflight } from '../helper/preflight.js';
import type { TaskContext } from '../task/context.js';
import { executable, extendSchema, optionalTimeout, readParams, type BaseOptions } from '../task/params.js';
import { TaskStatus } from '../task/status.js';
import parse from './handlers/speedtest/ookla.js';

export type OoklaOptions = BaseOptions & {
	exec: string;
	timeout: number | false | null;
	accept_license: true;
};

export const ooklaOptionsSchema = (settings: Settings) => extendSchema<OoklaOptions>('ookla', settings.result, {
	exec: executable('exec').default('speedtest'),
	timeout: optionalTimeout().default(45),
	accept_license: Joi.valid(true).required()
		.messages({ '*': 'accept_license: Ookla CLI license must be explicitly accepted by specifying the value True' }),
});

/** What the CLI prints to stderr on every run once the license is accepted. */
export const LICENSE_PATTERN = /^=+\n+You may only use this Speedtest software.+\n+License acceptance recorded.\s+Continuing.\s*$/is;

const logger = scopedLogger('ookla-command');

export const argBuilder = (): string[] => [ '--accept-license', '--format', 'json', '--progress', 'no' ];

export class OoklaCommand implements CommandInterface {
	constructor (
		private readonly settings: Settings,
		private readonly runner: ProcessRunner,
		private readonly gate: ConnectivityGate,
	) {}

	async run (context: TaskContext): Promise<TaskStatus> {
		const options = readParams('ookla', ooklaOptionsSchema(this.settings), await context.readParams());
		const blocked = await preflight(this.runner, [ options.exec ], () => this.gate.checkNet());

		if (blocked !== undefined) {
			return blocked;
		}

		const result = await this.speedtest(options);

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

		if (result.stderr && !LICENSE_PATTERN.test(result.stderr)) {
			logger.error('Results despite errors.', { status: `Error (${result.exitCode})`, stdout: result.stdout, stderr: result.stderr });
		}

		logger.info('Speedtest finished.', {
			download: parsed.stats.download,
			upload: parsed.stats.upload,
			bytes_consumed: parsed.meta.total_bytes_consumed,
			url: parsed.meta.url,
		});

		const { pktloss2, ...stats } = parsed.stats;
		const data: ResultRecord = pktloss2 === undefined ? stats : { ...stats, pktloss2 };
		const shaped = options.result.flat ? prefixKeys('speedtest_ookla_', data) : { speedtest_ookla: data };

		await context.writeResult(shapeResult(shaped, options.result), { test_bytes_consumed: parsed.meta.total_bytes_consumed });
		return TaskStatus.success;
	}

	/**
	 * The CLI refuses to run without a HOME to record license acceptance in,
	 * so one is made up when the environment has none.
	 */
	private async speedtest (options: OoklaOptions): Promise<ProcessResult> {
		const home = await mkdtemp(path.join(tmpdir(), 'ookla-'));

		try {
			return await this.runner.run(options.exec, argBuilder(), {
				timeout: options.timeout ? options.timeout * 1000 : undefined,
				env: { HOME: process.env['HOME'] ?? home },
			});
		} finally {
			await rm(home, { recursive: true, force: true });
		}
	}
}
