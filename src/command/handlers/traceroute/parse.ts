import type { HopRecord } from '../../../lib/last-mile.js';

export type TracerouteParseOutput = {
	hops: HopRecord[];
	/** Lines that were neither hops, titles nor unanswered hops. */
	anomalies: string[];
};

const NEW_LINE_REG_EXP = /\r?\n/;
const TITLE_REG_EXP = /^traceroute(?:6)? to \S+/;
const HOP_LINE_REG_EXP = /^\s*(?<ttl>\d+)\s+(?<rest>.*)$/;
const TOKEN_REG_EXP = /(?<star>\*)|(?<rtt>\d+(?:\.\d+)?)\s*ms(?:\s+![\w<>]*)?|(?<host>[^\s()]+)(?:\s+\((?<ip>[^\s()]+?)(?:%\w+)?\))?/g;

type LineParseOutput = { kind: 'hops'; hops: HopRecord[] } | { kind: 'unanswered' } | { kind: 'anomaly' };

function parseHopLine (ttl: number, rest: string): LineParseOutput {
	const hops: HopRecord[] = [];
	let address: string | undefined;
	let probeId = 0;
	let stars = 0;

	for (const match of rest.matchAll(TOKEN_REG_EXP)) {
		const groups = match.groups ?? {};

		if (groups['star']) {
			probeId++;
			stars++;
		} else if (groups['rtt']) {
			probeId++;

			if (address === undefined) {
				return { kind: 'anomaly' };
			}

			hops.push({ address, probeId, rtt: Number.parseFloat(groups['rtt']), ttl });
		} else if (groups['host']) {
			address = groups['ip'] ?? groups['host'];
		}
	}

	if (hops.length > 0) {
		return { kind: 'hops', hops };
	}

	if (stars > 0 && address === undefined) {
		return { kind: 'unanswered' };
	}

	return { kind: 'anomaly' };
}

/**
 * Reads one record per answered probe from `traceroute` text output. Title
 * lines and unanswered hops (`* * *`) are skipped; anything else that does
 * not parse is returned as an anomaly and parsing carries on.
 */
export function parseTracerouteHops (rawOutput: string): TracerouteParseOutput {
	const output: TracerouteParseOutput = { hops: [], anomalies: [] };

	for (const line of rawOutput.split(NEW_LINE_REG_EXP)) {
		if (line.trim().length === 0 || TITLE_REG_EXP.test(line)) {
			continue;
		}

		const hopLine = HOP_LINE_REG_EXP.exec(line)?.groups;

		if (!hopLine) {
			output.anomalies.push(line);
			continue;
		}

		const parsed = parseHopLine(Number.parseInt(hopLine['ttl'] ?? '', 10), hopLine['rest'] ?? '');

		if (parsed.kind === 'hops') {
			output.hops.push(...parsed.hops);
		} else if (parsed.kind === 'anomaly') {
			output.anomalies.push(line);
		}
	}

	return output;
}

/**
 * Hop number of the final line of a completed trace.
 */
export function parseTracerouteHopCount (rawOutput: string): number | undefined {
	const lines = rawOutput.trim().split(NEW_LINE_REG_EXP);
	const lastLine = lines[lines.length - 1] ?? '';
	const hop = /^\s*(\d+)\s/.exec(lastLine);

	return hop?.[1] === undefined ? undefined : Number.parseInt(hop[1], 10);
}
