import { classifyIp } from './private-ip.js';

/** One answered probe of a traced path. */
export type HopRecord = {
	address: string;
	probeId: number;
	rtt: number;
	ttl: number;
};

export type HopGroup = {
	address: string;
	hops: HopRecord[];
};

export type RttStats = {
	rtt_min_ms: number;
	rtt_median_ms: number;
	rtt_max_ms: number;
};

export type LastMileResult = {
	endpoint: string;
	address: string;
	rtts: number[];
	stats: RttStats;
};

export type LastMileSearch =
	| { kind: 'found'; result: LastMileResult }
	| { kind: 'invalid-address'; address: string }
	| { kind: 'not-found' };

/**
 * Groups consecutive records answered by the same address.
 */
export const groupHops = (hops: HopRecord[]): HopGroup[] => {
	const groups: HopGroup[] = [];

	for (const hop of hops) {
		const last = groups[groups.length - 1];

		if (last?.address === hop.address) {
			last.hops.push(hop);
		} else {
			groups.push({ address: hop.address, hops: [ hop ] });
		}
	}

	return groups;
};

export const median = (values: number[]): number => {
	const sorted = [ ...values ].sort((a, b) => a - b);
	const middle = Math.floor(sorted.length / 2);

	if (sorted.length % 2 === 1) {
		return sorted[middle] ?? Number.NaN;
	}

	return ((sorted[middle - 1] ?? Number.NaN) + (sorted[middle] ?? Number.NaN)) / 2;
};

export const rttStats = (rtts: number[]): RttStats => ({
	rtt_min_ms: Math.min(...rtts),
	rtt_median_ms: median(rtts),
	rtt_max_ms: Math.max(...rtts),
});

/**
 * The last mile is the first hop whose address lies outside private address
 * space.
 */
export const findLastMile = (endpoint: string, hops: HopRecord[]): LastMileSearch => {
	for (const group of groupHops(hops)) {
		const ipClass = classifyIp(group.address);

		if (ipClass === undefined) {
			return { kind: 'invalid-address', address: group.address };
		}

		if (ipClass === 'public') {
			const rtts = group.hops.map(hop => hop.rtt);

			return {
				kind: 'found',
				result: { endpoint, address: group.address, rtts, stats: rttStats(rtts) },
			};
		}
	}

	return { kind: 'not-found' };
};
