import Joi from 'joi';

export type Ndt7Stats = {
	download: number;
	upload: number;
	downloadretrans: number;
	downloadlatency: number;
	server: string;
	server_ip: string;
};

export type Ndt7ParseOutput = {
	stats: Ndt7Stats;
	meta: {
		downloaduuid: string;
		total_bytes_consumed: number;
	};
};

type Measurement = {
	Key: 'measurement';
	Value: {
		Origin: string;
		Test: string;
		AppInfo?: {
			NumBytes: number;
		};
	};
};

type Metric = {
	Value: number;
};

type Summary = {
	ServerFQDN: string;
	ServerIP: string;
	Download: {
		UUID: string;
		Throughput: Metric;
		Retransmission: Metric;
		Latency: Metric;
	};
	Upload: {
		Throughput: Metric;
	};
};

const metricSchema = Joi.object<Metric>({ Value: Joi.number().required() }).unknown(true).required();

const measurementSchema = Joi.object<Measurement>({
	Key: Joi.string().valid('measurement').required(),
	Value: Joi.object({
		Origin: Joi.string().required(),
		Test: Joi.string().required(),
		AppInfo: Joi.object({ NumBytes: Joi.number().required() }).unknown(true),
	}).unknown(true).required(),
}).unknown(true);

const summarySchema = Joi.object<Summary>({
	ServerFQDN: Joi.string().required(),
	ServerIP: Joi.string().required(),
	Download: Joi.object({
		UUID: Joi.string().required(),
		Throughput: metricSchema,
		Retransmission: metricSchema,
		Latency: metricSchema,
	}).unknown(true).required(),
	Upload: Joi.object({
		Throughput: metricSchema,
	}).unknown(true).required(),
}).unknown(true);

const NEW_LINE_REG_EXP = /\r?\n/;

const readJsonLines = (rawOutput: string): unknown[] | undefined => {
	try {
		return rawOutput.split(NEW_LINE_REG_EXP).filter(line => line.trim()).map((line): unknown => JSON.parse(line));
	} catch {
		return undefined;
	}
};

/**
 * Bytes moved by one test, as of the client's last progress report on it.
 */
const bytesOf = (statuses: unknown[], test: 'download' | 'upload'): number => {
	for (const status of [ ...statuses ].reverse()) {
		const { error, value } = measurementSchema.validate(status);

		if (!error && value.Value.Origin === 'client' && value.Value.Test === test) {
			return value.Value.AppInfo?.NumBytes ?? 0;
		}
	}

	return 0;
};

/**
 * Reads `ndt7-client -format json` output: progress lines followed by one
 * summary line. Returns undefined when the output is not shaped as expected.
 */
export default function parse (rawOutput: string): Ndt7ParseOutput | undefined {
	const lines = readJsonLines(rawOutput);

	if (!lines || lines.length === 0) {
		return undefined;
	}

	const statuses = lines.slice(0, -1);
	const { error, value: summary } = summarySchema.validate(lines[lines.length - 1]);

	if (error || !summary) {
		return undefined;
	}

	return {
		stats: {
			download: summary.Download.Throughput.Value,
			upload: summary.Upload.Throughput.Value,
			downloadretrans: summary.Download.Retransmission.Value,
			downloadlatency: summary.Download.Latency.Value,
			server: summary.ServerFQDN,
			server_ip: summary.ServerIP,
		},
		meta: {
			downloaduuid: summary.Download.UUID,
			total_bytes_consumed: bytesOf(statuses, 'download') + bytesOf(statuses, 'upload'),
		},
	};
}
