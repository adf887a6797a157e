import Joi from 'joi';

export type OoklaStats = {
	/** Mbit/s. */
	download: number;
	/** Mbit/s. */
	upload: number;
	jitter: number;
	latency: number;
	server_host: string;
	server_name: string;
	server_id: number | string;
	pktloss2?: number;
};

export type OoklaParseOutput = {
	stats: OoklaStats;
	meta: {
		total_bytes_consumed: number;
		url: string;
	};
};

type Transfer = {
	bandwidth: number;
	bytes: number;
};

type RawOutput = {
	download: Transfer;
	upload: Transfer;
	ping: {
		jitter: number;
		latency: number;
	};
	server: {
		host: string;
		name: string;
		id: number | string;
	};
	result: {
		url: string;
	};
	packetLoss?: number;
};

const transferSchema = Joi.object<Transfer>({
	bandwidth: Joi.number().required(),
	bytes: Joi.number().required(),
}).unknown(true).required();

const outputSchema = Joi.object<RawOutput>({
	download: transferSchema,
	upload: transferSchema,
	ping: Joi.object({
		jitter: Joi.number().required(),
		latency: Joi.number().required(),
	}).unknown(true).required(),
	server: Joi.object({
		host: Joi.string().required(),
		name: Joi.string().required(),
		id: Joi.alternatives(Joi.number(), Joi.string()).required(),
	}).unknown(true).required(),
	result: Joi.object({
		url: Joi.string().required(),
	}).unknown(true).required(),
	packetLoss: Joi.number(),
}).unknown(true);

// Bandwidth is reported in bytes per second.
const toMbps = (bandwidth: number): number => bandwidth * 8 / 1e6;

const readJson = (rawOutput: string): unknown => {
	try {
		return JSON.parse(rawOutput);
	} catch {
		return undefined;
	}
};

/**
 * Reads the single JSON document printed by `speedtest --format json`.
 * Returns undefined when the output is missing or not shaped as expected.
 */
export default function parse (rawOutput: string): OoklaParseOutput | undefined {
	if (!rawOutput.trim()) {
		return undefined;
	}

	const { error, value } = outputSchema.validate(readJson(rawOutput));

	if (error || !value) {
		return undefined;
	}

	const stats: OoklaStats = {
		download: toMbps(value.download.bandwidth),
		upload: toMbps(value.upload.bandwidth),
		jitter: value.ping.jitter,
		latency: value.ping.latency,
		server_host: value.server.host,
		server_name: value.server.name,
		server_id: value.server.id,
	};

	if (value.packetLoss !== undefined) {
		stats.pktloss2 = value.packetLoss;
	}

	return {
		stats,
		meta: {
			total_bytes_consumed: value.upload.bytes + value.download.bytes,
			url: value.result.url,
		},
	};
}
