import Joi from 'joi';
import type { HopRecord } from '../../../lib/last-mile.js';

export type ScamperTrace = {
	dst: string;
	src: string;
	stopReason: string;
	hopCount: number;
	probeCount: number;
	hops: HopRecord[];
};

export type ScamperParseOutput = {
	traces: ScamperTrace[];
	/** Count of lines that were not trace records. */
	skipped: number;
};

type RawHop = {
	addr: string;
	probe_ttl: number;
	probe_id: number;
	rtt: number;
};

type RawTrace = {
	type: 'trace';
	dst: string;
	src: string;
	stop_reason: string;
	hop_count: number;
	probe_count: number;
	hops: RawHop[];
};

const NEW_LINE_REG_EXP = /\r?\n/;

const traceSchema = Joi.object<RawTrace>({
	type: Joi.string().valid('trace').required(),
	dst: Joi.string().required(),
	src: Joi.string().default(''),
	stop_reason: Joi.string().default(''),
	hop_count: Joi.number().integer().default(0),
	probe_count: Joi.number().integer().default(0),
	hops: Joi.array().items(Joi.object<RawHop>({
		addr: Joi.string().required(),
		probe_ttl: Joi.number().integer().required(),
		probe_id: Joi.number().integer().default(1),
		rtt: Joi.number().required(),
	}).unknown(true)).default([]),
}).unknown(true);

const parseLine = (line: string): unknown => {
	try {
		return JSON.parse(line);
	} catch {
		return undefined;
	}
};

/**
 * Reads trace records from `scamper -O json` output, one JSON object per
 * line. Lines that are not well-formed trace records are skipped.
 */
export default function parse (rawOutput: string): ScamperParseOutput {
	const output: ScamperParseOutput = { traces: [], skipped: 0 };

	for (const line of rawOutput.split(NEW_LINE_REG_EXP)) {
		if (line.trim().length === 0) {
			continue;
		}

		const { error, value } = traceSchema.validate(parseLine(line));

		if (error || !value) {
			output.skipped++;
			continue;
		}

		output.traces.push({
			dst: value.dst,
			src: value.src,
			stopReason: value.stop_reason,
			hopCount: value.hop_count,
			probeCount: value.probe_count,
			hops: value.hops.map(hop => ({
				address: hop.addr,
				probeId: hop.probe_id,
				rtt: hop.rtt,
				ttl: hop.probe_ttl,
			})),
		});
	}

	return output;
}
