import type { ProcessRunner } from './process-runner.js';

const DEFAULT_ROUTE_REG_EXP = /^default\s+via\s+(?<gateway>\S+)(?:.*?\sdev\s+(?<iface>\S+))?/m;

export type DefaultGateway = {
	address: string;
	iface?: string;
};

export const parseDefaultRoute = (rawOutput: string): DefaultGateway | undefined => {
	const groups = DEFAULT_ROUTE_REG_EXP.exec(rawOutput)?.groups;
	const address = groups?.['gateway'];

	if (!address) {
		return undefined;
	}

	return groups?.['iface'] ? { address, iface: groups['iface'] } : { address };
};

/**
 * Reads the IPv4 default gateway from the routing table.
 */
export const getDefaultGateway = async (runner: ProcessRunner): Promise<DefaultGateway | undefined> => {
	const result = await runner.run('ip', [ '-4', 'route', 'show', 'default' ]);

	if (result.kind !== 'completed' || result.exitCode !== 0) {
		return undefined;
	}

	return parseDefaultRoute(result.stdout);
};
