/**
 * Process exit statuses understood by the scheduler (sysexits.h values).
 */
export const TaskStatus = {
	success: 0,
	noHost: 68,
	softwareError: 70,
	osError: 71,
	fileMissing: 72,
	confError: 78,
} as const;

export type TaskStatus = typeof TaskStatus[keyof typeof TaskStatus];
