import { networkInterfaces, type NetworkInterfaceInfo } from 'node:os';
import type { CommandInterface } from '../types.js';
import type { Settings } from '../lib/config.js';
import type { ConnectivityGate } from '../lib/connectivity.js';
import { DAY, DeviceStore } from '../lib/device-store.js';
import { scopedLogger } from '../lib/logger.js';
import type { CompletedProcess, ProcessResult, ProcessRunner } from '../lib/process-runner.js';
import { prefixKeys, shapeResult } from '../lib/result.js';
import { preflight } from '../helper/preflight.js';
import type { TaskContext } from '../task/context.js';
import { extendSchema, readParams, text, type BaseOptions } from '../task/params.js';
import { TaskStatus } from '../task/status.js';
import parse from './handlers/arp/parse.js';

export type DevOptions = BaseOptions & {
	iface: string;
};

export const devOptionsSchema = (settings: Settings) => extendSchema<DevOptions>('connected_devices_arp', settings.result, {
	iface: text().default('eth0'),
});

export type InterfaceLookup = () => NodeJS.Dict<NetworkInterfaceInfo[]>;

const logger = scopedLogger('dev-command');

const succeeded = (result: ProcessResult): result is CompletedProcess => result.kind === 'completed' && result.exitCode === 0;

const failureDetail = (result: ProcessResult) => ({
	status: result.kind === 'completed' ? `Error (${result.exitCode})` : `Error (${result.kind})`,
	...(result.kind === 'timeout' ? { elapsed: result.elapsed } : {}),
	args: result.command,
	stdout: result.kind === 'missing' ? '' : result.stdout,
	stderr: result.kind === 'missing' ? '' : result.stderr,
});

/**
 * Counts the devices on the local network, from the ARP cache once an nmap
 * ping sweep has filled it.
 */
export class DevCommand implements CommandInterface {
	constructor (
		private readonly settings: Settings,
		private readonly runner: ProcessRunner,
		private readonly gate: ConnectivityGate,
		private readonly interfaces: InterfaceLookup = networkInterfaces,
		private readonly now: () => number = () => Math.floor(Date.now() / 1000),
	) {}

	async run (context: TaskContext): Promise<TaskStatus> {
		const options = readParams('dev', devOptionsSchema(this.settings), await context.readParams());
		const blocked = await preflight(this.runner, [ 'nmap', 'arp' ], () => this.gate.checkLan());

		if (blocked !== undefined) {
			return blocked;
		}

		const addresses = this.interfaces()[options.iface];

		if (!addresses) {
			logger.crit('Network interface not found.', { iface: options.iface });
			return TaskStatus.osError;
		}

		const ipv4 = addresses.find(address => address.family === 'IPv4');

		if (!ipv4?.cidr) {
			logger.crit('Could not locate internet address set.', { iface: options.iface });
			return TaskStatus.osError;
		}

		// nmap scans the whole subnet given any host address in CIDR notation.
		const timeout = this.settings.commands.timeout * 1000;
		const sweep = await this.runner.run('nmap', [ '-sn', ipv4.cidr ], { timeout });

		if (!succeeded(sweep)) {
			logger.crit('Ping sweep failed.', { dest: ipv4.cidr, ...failureDetail(sweep) });
			return TaskStatus.softwareError;
		}

		const arp = await this.runner.run('arp', [ '-e', '--numeric', '--device', options.iface ], { timeout });

		if (!succeeded(arp)) {
			logger.crit('ARP table query failed.', { iface: options.iface, ...failureDetail(arp) });
			return TaskStatus.softwareError;
		}

		const devices = new Set(parse(arp.stdout)
			.filter(entry => entry.address !== '_gateway' && entry.hwaddress !== options.iface)
			.map(entry => entry.hwaddress));

		logger.info('Devices found.', { count: devices.size });

		const store = DeviceStore.fromState(await context.readState());
		const now = this.now();

		logger.debug('Device state read.', { state: store.toJSON() });
		store.record(devices, now);
		await context.writeState(store.toJSON());

		const results = {
			'active': devices.size,
			'total': store.size,
			'1day': store.count(DAY, now),
			'1week': store.count(7 * DAY, now),
		};

		const shaped = options.result.flat ? prefixKeys('devices_', results) : { devices: results };

		await context.writeResult(shapeResult(shaped, options.result));
		return TaskStatus.success;
	}
}
