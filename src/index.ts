#!/usr/bin/env node
import process from 'node:process';
import { createCommand, isTaskName, TASK_NAMES } from './commands.js';
import { InvalidSettingsException } from './command/exception/invalid-options-exception.js';
import { loadSettings, type Settings } from './lib/config.js';
import { scopedLogger } from './lib/logger.js';
import { ProcessRunner } from './lib/process-runner.js';
import { StdioTaskContext } from './task/context.js';
import { runTask } from './task/runner.js';
import { TaskStatus } from './task/status.js';

const logger = scopedLogger('general');

const main = async (argv: string[]): Promise<TaskStatus> => {
	const [ name ] = argv;

	if (!name || !isTaskName(name)) {
		logger.crit(`Usage: netmeasure <task>, where task is one of: ${TASK_NAMES.join(', ')}.`);
		return TaskStatus.confError;
	}

	let settings: Settings;

	try {
		settings = loadSettings();
	} catch (error: unknown) {
		if (error instanceof InvalidSettingsException) {
			logger.crit(error.message);
			return TaskStatus.confError;
		}

		throw error;
	}

	const runner = new ProcessRunner();
	const context = new StdioTaskContext(name, settings.task.stateDir);

	return runTask(createCommand(name, settings, runner), context);
};

main(process.argv.slice(2)).then((status) => {
	process.exitCode = status;
}).catch((error: unknown) => {
	logger.crit('Unexpected failure.', { error });
	process.exitCode = TaskStatus.softwareError;
});
