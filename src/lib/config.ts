import config from 'config';
import Joi from 'joi';
import { InvalidSettingsException } from '../command/exception/invalid-options-exception.js';

export type ResultDefaults = {
	flat: boolean;
	label: boolean;
	annotate: boolean;
};

export type ConnectivitySettings = {
	deadline: number;
	lan: {
		attempts: number;
	};
	net: {
		disabled: boolean;
		attempts: number;
		destinations: string[];
	};
};

export type Settings = {
	commands: {
		timeout: number;
	};
	result: ResultDefaults;
	connectivity: ConnectivitySettings;
	task: {
		stateDir: string;
	};
};

const natural = Joi.number().integer().min(1);

const settingsSchema = Joi.object<Settings>({
	commands: Joi.object({
		timeout: natural.default(120),
	}).default(),
	result: Joi.object({
		flat: Joi.boolean().default(true),
		label: Joi.boolean().default(true),
		annotate: Joi.boolean().default(true),
	}).default(),
	connectivity: Joi.object({
		deadline: natural.default(5),
		lan: Joi.object({
			attempts: natural.default(3),
		}).default(),
		// `false` is accepted as shorthand for `{ disabled: true }`.
		net: Joi.alternatives(
			Joi.valid(false).custom(() => ({ disabled: true, attempts: 3, destinations: [] })),
			Joi.object({
				disabled: Joi.boolean().default(false),
				attempts: natural.default(3),
				destinations: Joi.array().items(Joi.string().min(1)).unique().default([ 'google.com', 'facebook.com', 'nytimes.com' ]),
			}),
		).default({ disabled: false, attempts: 3, destinations: [ 'google.com', 'facebook.com', 'nytimes.com' ] }),
	}).default(),
	task: Joi.object({
		stateDir: Joi.string().min(1).default('./state'),
	}).default(),
}).unknown(true);

/**
 * Validates a raw settings tree and fills in software defaults.
 */
export const parseSettings = (raw: unknown): Settings => {
	const { error, value } = settingsSchema.validate(raw ?? {});

	if (error) {
		throw new InvalidSettingsException(error);
	}

	return value;
};

/**
 * Reads the configuration files once and validates them eagerly, so a broken
 * configuration surfaces before any measurement starts.
 */
export const loadSettings = (): Settings => parseSettings(config.util.toObject());
