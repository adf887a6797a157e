import type { ExecaError } from 'execa';

export const isExecaError = (error: unknown): error is ExecaError => error instanceof Error && (error as Partial<ExecaError>).stderr !== undefined;
