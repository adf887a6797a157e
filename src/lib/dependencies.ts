import { ProcessRunner } from './process-runner.js';
import { scopedLogger } from './logger.js';

const logger = scopedLogger('dependencies');

export const isExecutableAvailable = async (name: string, runner: ProcessRunner): Promise<boolean> => {
	const result = await runner.run('which', [ name ]);
	return result.kind === 'completed' && result.exitCode === 0;
};

/**
 * Resolves to the first of `names` that is not on PATH, if any.
 */
export const findMissingExecutable = async (names: string[], runner: ProcessRunner): Promise<string | undefined> => {
	const checks = await Promise.all(names.map(async name => ({ name, available: await isExecutableAvailable(name, runner) })));
	const missing = checks.find(check => !check.available);

	if (missing) {
		logger.crit(`${missing.name} executable not found`);
	}

	return missing?.name;
};
