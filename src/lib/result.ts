/** A list of hosts, or hosts mapped to the labels their results go under. */
export type Destinations = string[] | Record<string, string>;

export type Target = {
	address: string;
	label: string;
};

export type ResultValue = string | number | boolean | null | ResultValue[] | { [key: string]: ResultValue };

export type ResultRecord = Record<string, ResultValue>;

export type ResultOptions = {
	flat: boolean;
	/** Key to nest the result under; falsy to leave it at the top level. */
	label: string | false | null;
	annotate: boolean;
};

export type AnnotatedResult = {
	Measurements: ResultRecord;
	Meta: {
		Time: number;
	};
};

export const toTargets = (destinations: Destinations): Target[] => {
	if (Array.isArray(destinations)) {
		return destinations.map(address => ({ address, label: address }));
	}

	return Object.entries(destinations).map(([ address, label ]) => ({ address, label }));
};

/**
 * Collapses `{ label: { stat: value } }` into `{ label_stat: value }`.
 */
export const flatten = (nested: Record<string, Record<string, ResultValue>>): ResultRecord => Object.fromEntries(
	Object.entries(nested).flatMap(([ label, stats ]) => Object.entries(stats).map(([ stat, value ]) => [ `${label}_${stat}`, value ] as const)),
);

export const prefixKeys = (prefix: string, record: ResultRecord): ResultRecord => Object.fromEntries(
	Object.entries(record).map(([ key, value ]) => [ `${prefix}${key}`, value ] as const),
);

/**
 * Nests the result under its label and wraps it with metadata, in that order.
 * Flattening, when wanted, is the caller's first step since the flat key
 * scheme differs between measurements.
 */
export function shapeResult (results: ResultRecord, options: Pick<ResultOptions, 'label' | 'annotate'>, now: () => number = Date.now): ResultRecord | AnnotatedResult {
	const labelled: ResultRecord = options.label ? { [options.label]: results } : results;

	if (!options.annotate) {
		return labelled;
	}

	return {
		Measurements: labelled,
		Meta: {
			Time: now() / 1000,
		},
	};
}

/**
 * Flattens a destination → statistics mapping (when `flat`), then labels and
 * annotates it.
 */
export const shape = (
	nested: Record<string, Record<string, ResultValue>>,
	options: ResultOptions,
	now: () => number = Date.now,
): ResultRecord | AnnotatedResult => shapeResult(options.flat ? flatten(nested) : nested, options, now);
