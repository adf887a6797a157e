import type { CommandInterface } from '../types.js';
import { InvalidOptionsException } from '../command/exception/invalid-options-exception.js';
import { scopedLogger } from '../lib/logger.js';
import type { TaskContext } from './context.js';
import { TaskStatus } from './status.js';

const logger = scopedLogger('task');

/**
 * Runs one measurement and reduces every way it can end to an exit status.
 * Never rejects.
 */
export const runTask = async (command: CommandInterface, context: TaskContext): Promise<TaskStatus> => {
	try {
		const status = await command.run(context);
		logger.debug('Task finished.', { task: context.name, status });
		return status;
	} catch (error: unknown) {
		if (error instanceof InvalidOptionsException) {
			logger.crit(error.message, { task: context.name });
			return TaskStatus.confError;
		}

		if (error instanceof SyntaxError) {
			logger.crit('Task parameters are not valid JSON.', { task: context.name, error: error.message });
			return TaskStatus.confError;
		}

		logger.crit('Task failed.', { task: context.name, error });
		return TaskStatus.softwareError;
	}
};
