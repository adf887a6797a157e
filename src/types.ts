import type { TaskContext } from './task/context.js';
import type { TaskStatus } from './task/status.js';

export type CommandInterface = {
	run (context: TaskContext): Promise<TaskStatus>;
};
