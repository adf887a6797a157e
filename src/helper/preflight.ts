import { findMissingExecutable } from '../lib/dependencies.js';
import type { GateResult } from '../lib/connectivity.js';
import type { ProcessRunner } from '../lib/process-runner.js';
import { TaskStatus } from '../task/status.js';

/**
 * Checks that every executable is installed, then runs the connectivity
 * check. Resolves to the status to stop with, or undefined when the
 * measurement may go ahead.
 */
export const preflight = async (
	runner: ProcessRunner,
	executables: string[],
	check: () => Promise<GateResult>,
): Promise<TaskStatus | undefined> => {
	if (await findMissingExecutable(executables, runner)) {
		return TaskStatus.fileMissing;
	}

	const gate = await check();
	return gate.passed ? undefined : gate.status;
};
