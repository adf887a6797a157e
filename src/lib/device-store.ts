import Joi from 'joi';
import { scopedLogger } from './logger.js';

const logger = scopedLogger('device-store');

export type DeviceState = Record<string, number>;

const stateSchema = Joi.object<DeviceState>().pattern(Joi.string(), Joi.number().integer());

export const DAY = 24 * 60 * 60;

const nowSeconds = (): number => Math.floor(Date.now() / 1000);

/**
 * Device hardware addresses mapped to the unix time, in whole seconds, they
 * were last seen at.
 */
export class DeviceStore {
	private readonly lastSeen: Map<string, number>;

	constructor (state: DeviceState = {}) {
		this.lastSeen = new Map(Object.entries(state));
	}

	/**
	 * Restores a store from persisted task state. State that does not have
	 * the expected shape is discarded.
	 */
	static fromState (state: unknown): DeviceStore {
		if (state === null || state === undefined) {
			return new DeviceStore();
		}

		const { error, value } = stateSchema.validate(state);

		if (error) {
			logger.warning('Discarding malformed device state.', { error: error.message });
			return new DeviceStore();
		}

		return new DeviceStore(value);
	}

	get size (): number {
		return this.lastSeen.size;
	}

	record (devices: Iterable<string>, timestamp: number = nowSeconds()): void {
		const seconds = Math.floor(timestamp);

		for (const device of devices) {
			this.lastSeen.set(device, seconds);
		}
	}

	/**
	 * Devices last seen within `span` seconds up to `before`.
	 */
	query (span: number, before: number = nowSeconds()): string[] {
		const since = before - span;
		return [ ...this.lastSeen ].filter(([ , seen ]) => before >= seen && seen > since).map(([ device ]) => device);
	}

	count (span: number, before?: number): number {
		return this.query(span, before).length;
	}

	toJSON (): DeviceState {
		return Object.fromEntries(this.lastSeen);
	}
}
