import Joi from 'joi';
import type { ResultDefaults } from '../lib/config.js';
import type { Destinations, ResultOptions } from '../lib/result.js';
import { InvalidOptionsException } from '../command/exception/invalid-options-exception.js';

export type BaseOptions = {
	result: ResultOptions;
};

/** Non-empty string. */
export const text = () => Joi.string().min(1);

export const destinationList = (name = 'destinations') => Joi.array()
	.items(text())
	.min(1)
	.unique()
	.messages({ '*': `${name}: must be a non-repeating list of network locators` });

export const destinationCollection = (name = 'destinations') => Joi.alternatives<Destinations>(
	Joi.object().pattern(text(), text()).min(1),
	destinationList(name),
).messages({ '*': `${name}: must be non-repeating list of network locators or mapping of these to their result labels` });

export const hostnameList = (name = 'destinations') => Joi.array()
	.items(Joi.string().hostname())
	.min(1)
	.unique()
	.messages({ '*': `${name}: must be a non-repeating list of hostnames` });

export const naturalNumber = (name: string) => Joi.number().integer().min(1)
	.messages({ '*': `${name}: int must be greater than 0` });

export const positiveInt = (name: string, unit: string) => Joi.number().integer().min(0)
	.messages({ '*': `${name}: int ${unit} must not be less than 0` });

export const boundedReal = (name: string, message: string, min: number) => Joi.number().min(min)
	.messages({ '*': `${name}: ${message}` });

export const ipAddress = (name: string) => Joi.string().ip({ cidr: 'forbidden' })
	.messages({ '*': `${name}: must be an IP address` });

export const executable = (name: string) => text()
	.messages({ '*': `${name}: must be an executable on PATH or file system absolute path to executable` });

/** Seconds greater than zero, or a falsy value to disable. */
export const optionalTimeout = (name = 'timeout') => Joi.alternatives<number | false | null>(
	Joi.number().greater(0),
	Joi.valid(0, false, null),
).messages({ '*': `${name}: seconds greater than zero or falsey to disable` });

/**
 * Result-shaping parameters every measurement accepts. Their defaults come
 * from the already-validated global configuration.
 */
export const resultSchema = (label: string, defaults: ResultDefaults) => {
	const defaultLabel = defaults.label ? label : null;

	return Joi.object<ResultOptions>({
		flat: Joi.boolean().default(defaults.flat),
		label: Joi.alternatives(Joi.valid(false, null), text()).default(defaultLabel),
		annotate: Joi.boolean().default(defaults.annotate),
	}).default({ flat: defaults.flat, label: defaultLabel, annotate: defaults.annotate });
};

/**
 * Builds a measurement's parameter schema on top of the common result
 * parameters.
 */
export const extendSchema = <T extends BaseOptions>(label: string, defaults: ResultDefaults, keys: Joi.PartialSchemaMap<T>) => Joi.object<T>({
	result: resultSchema(label, defaults),
	...keys,
});

export const readParams = <T>(command: string, schema: Joi.ObjectSchema<T>, input: unknown): T => {
	const { error, value } = schema.validate(input ?? {}, { convert: false });

	if (error) {
		throw new InvalidOptionsException(command, error);
	}

	return value;
};
