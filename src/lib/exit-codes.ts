export type ToolFamily = 'ping' | 'dig' | 'scamper' | 'traceroute';

export type ProbeStatus = 'success' | 'partial' | 'no-reply' | 'error' | 'fatal';

export type Disposition = 'proceed' | 'retry' | 'degrade' | 'abort';

type ExitCodeTable = {
	known: Record<number, { status: ProbeStatus; description: string }>;
	otherwise: ProbeStatus;
};

const EXIT_CODES: Record<ToolFamily, ExitCodeTable> = {
	ping: {
		known: {
			0: { status: 'success', description: 'success' },
			// some or all packets went unanswered
			1: { status: 'partial', description: 'no reply' },
			2: { status: 'fatal', description: 'error (e.g. dns or network unreachable)' },
		},
		otherwise: 'error',
	},
	dig: {
		known: {
			0: { status: 'success', description: 'success' },
			1: { status: 'fatal', description: 'usage error' },
			8: { status: 'fatal', description: 'couldn\'t open batch file' },
			9: { status: 'no-reply', description: 'no reply from server' },
			10: { status: 'error', description: 'internal error' },
		},
		otherwise: 'error',
	},
	scamper: {
		known: {
			0: { status: 'success', description: 'success' },
			255: { status: 'fatal', description: 'configuration error' },
		},
		otherwise: 'error',
	},
	traceroute: {
		known: {
			0: { status: 'success', description: 'success' },
		},
		otherwise: 'error',
	},
};

const DISPOSITIONS: Record<ProbeStatus, Disposition> = {
	'success': 'proceed',
	'partial': 'degrade',
	'no-reply': 'retry',
	'error': 'abort',
	'fatal': 'abort',
};

export const classifyExit = (family: ToolFamily, exitCode: number): ProbeStatus => {
	const table = EXIT_CODES[family];
	return table.known[exitCode]?.status ?? table.otherwise;
};

export const describeExit = (family: ToolFamily, exitCode: number): string => EXIT_CODES[family].known[exitCode]?.description ?? '<unidentified>';

export const dispositionOf = (status: ProbeStatus): Disposition => DISPOSITIONS[status];

/**
 * Whether the probe produced output worth parsing.
 */
export const isUsable = (status: ProbeStatus): boolean => {
	const disposition = dispositionOf(status);
	return disposition === 'proceed' || disposition === 'degrade';
};
