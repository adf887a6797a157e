import { isIP } from 'node:net';
import ipRegex from 'ip-regex';
import type { ProcessHandle, ProcessRunner } from './process-runner.js';

const IP_LINE_REG_EXP = ipRegex({ exact: true });

export type ResolvedAddress = {
	host: string;
	address: string | null;
	/** Exit code of the failed look-up; null when none was run or it succeeded. */
	exitCode: number | null;
};

export class AddressLookups {
	readonly resolved: Set<string>;
	readonly unresolved: ResolvedAddress[];

	constructor (private readonly results: Map<string, ResolvedAddress>) {
		this.resolved = new Set([ ...results.values() ].flatMap(result => result.address === null ? [] : [ result.address ]));
		this.unresolved = [ ...results.values() ].filter(result => result.address === null);
	}

	/**
	 * Hosts that resolved to `address`, in input order.
	 */
	getKeys (address: string): string[] {
		return [ ...this.results.values() ].filter(result => result.address === address).map(result => result.host);
	}
}

const firstAddress = (stdout: string): string | null => {
	// `dig +short` lists CNAME targets ahead of the addresses.
	const line = stdout.split(/\r?\n/).map(l => l.trim()).find(l => IP_LINE_REG_EXP.test(l));
	return line ?? null;
};

/**
 * Resolves hosts to IP addresses. IP literals pass through untouched; every
 * other host gets its own `dig +short` process, all of them started before
 * any is awaited.
 */
export const resolveAddresses = async (hosts: string[], runner: ProcessRunner): Promise<AddressLookups> => {
	const results = new Map<string, ResolvedAddress>();
	const queries = new Map<string, ProcessHandle>();

	for (const host of hosts) {
		if (isIP(host) !== 0) {
			results.set(host, { host, address: host, exitCode: null });
		} else {
			queries.set(host, runner.spawn('dig', [ '+short', host ]));
		}
	}

	for (const [ host, handle ] of queries) {
		const result = await runner.join(handle);

		if (result.kind !== 'completed') {
			results.set(host, { host, address: null, exitCode: null });
		} else if (result.exitCode !== 0) {
			results.set(host, { host, address: null, exitCode: result.exitCode });
		} else {
			results.set(host, { host, address: firstAddress(result.stdout), exitCode: null });
		}
	}

	// Keep input order.
	return new AddressLookups(new Map(hosts.flatMap(host => {
		const result = results.get(host);
		return result ? [[ host, result ] as const] : [];
	})));
};
