import Joi from 'joi';
import { parse as parseYaml } from 'yaml';

export class ExtractionError extends Error {
	constructor (message: string, readonly stdout: string) {
		super(message);
		this.name = 'ExtractionError';
	}
}

type DigMessage = {
	message: {
		query_time: Date;
		response_time: Date;
	};
};

// `dig +yaml` prints a list holding one entry per message.
const outputSchema = Joi.array<DigMessage[]>().length(1).items(Joi.object<DigMessage>({
	message: Joi.object({
		query_time: Joi.date().required(),
		response_time: Joi.date().required(),
	}).unknown(true).required(),
}).unknown(true));

const readYaml = (stdout: string): unknown => {
	try {
		// The timestamps are tagged `!!timestamp`, a YAML 1.1 type.
		return parseYaml(stdout, { version: '1.1' });
	} catch {
		throw new ExtractionError('unexpected output', stdout);
	}
};

/**
 * Query latency in milliseconds, from the query and response timestamps of
 * `dig +yaml` output.
 */
export function extractTimeMs (stdout: string): number {
	const data = readYaml(stdout);

	if (!Array.isArray(data) || data.length !== 1) {
		throw new ExtractionError('unexpected output', stdout);
	}

	const { error, value } = outputSchema.validate(data);
	const [ entry ] = error ? [] : value;

	if (!entry) {
		throw new ExtractionError('unexpected structure', stdout);
	}

	return entry.message.response_time.getTime() - entry.message.query_time.getTime();
}
