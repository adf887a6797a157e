import { expect } from 'chai';
import type { NetworkInterfaceInfo } from 'node:os';
import { DevCommand, type InterfaceLookup } from '../../../src/command/dev-command.js';
import { ConnectivityGate } from '../../../src/lib/connectivity.js';
import { DAY } from '../../../src/lib/device-store.js';
import { TaskStatus } from '../../../src/task/status.js';
import { MemoryTaskContext, exit, fakeRunner, getCmdMock, notInstalled, testSettings, type FakeProcessRunner, type Route } from '../../utils.js';

const NOW = 1709287200;

const eth0: NetworkInterfaceInfo = {
	address: '192.168.1.20',
	netmask: '255.255.255.0',
	family: 'IPv4',
	mac: 'aa:bb:cc:00:00:20',
	internal: false,
	cidr: '192.168.1.20/24',
};

const interfaces: InterfaceLookup = () => ({ eth0: [ eth0 ] });

const network: Route = (command) => {
	if (command === 'nmap') {
		return exit(0, 'Nmap done: 256 IP addresses (3 hosts up) scanned in 2.41 seconds');
	}

	return command === 'arp' ? exit(0, getCmdMock('arp-table')) : undefined;
};

const devCommand = (runner: FakeProcessRunner, lookup: InterfaceLookup = interfaces) => {
	const settings = testSettings();
	return new DevCommand(settings, runner, new ConnectivityGate(settings.connectivity, runner), lookup, () => NOW);
};

describe('device count command', () => {
	it('should count devices in the ARP table and remember them', async () => {
		const runner = fakeRunner(network);
		const context = new MemoryTaskContext({ result: { annotate: false } });

		const status = await devCommand(runner).run(context);

		expect(status).to.equal(TaskStatus.success);
		expect(runner.callsTo('nmap')).to.deep.equal([[ '-sn', '192.168.1.20/24' ]]);
		expect(runner.callsTo('arp')).to.deep.equal([[ '-e', '--numeric', '--device', 'eth0' ]]);

		expect(context.lastResult).to.deep.equal({
			connected_devices_arp: {
				devices_active: 2,
				devices_total: 2,
				devices_1day: 2,
				devices_1week: 2,
			},
		});

		expect(context.state).to.deep.equal({ 'aa:bb:cc:00:00:30': NOW, 'aa:bb:cc:00:00:31': NOW });
	});

	it('should count devices seen on earlier runs', async () => {
		const state = {
			'aa:bb:cc:00:00:30': NOW - 100,
			'aa:bb:cc:00:00:40': NOW - (2 * DAY),
			'aa:bb:cc:00:00:41': NOW - (8 * DAY),
		};

		const context = new MemoryTaskContext({ result: { flat: false, annotate: false } }, state);

		await devCommand(fakeRunner(network)).run(context);

		expect(context.lastResult).to.deep.equal({
			connected_devices_arp: {
				devices: { 'active': 2, 'total': 4, '1day': 2, '1week': 3 },
			},
		});

		expect(context.state).to.deep.equal({
			'aa:bb:cc:00:00:30': NOW,
			'aa:bb:cc:00:00:40': NOW - (2 * DAY),
			'aa:bb:cc:00:00:41': NOW - (8 * DAY),
			'aa:bb:cc:00:00:31': NOW,
		});
	});

	it('should start over from malformed state', async () => {
		const context = new MemoryTaskContext({ result: { label: false, annotate: false } }, 'garbage');

		await devCommand(fakeRunner(network)).run(context);

		expect(context.lastResult).to.have.property('devices_total', 2);
	});

	it('should fail with osError without a usable interface', async () => {
		const ipv6Only: InterfaceLookup = () => ({ eth0: [{ ...eth0, address: 'fe80::1', family: 'IPv6', scopeid: 2, cidr: 'fe80::1/64' }] });

		expect(await devCommand(fakeRunner(network)).run(new MemoryTaskContext({ iface: 'wlan0' }))).to.equal(TaskStatus.osError);
		expect(await devCommand(fakeRunner(network), ipv6Only).run(new MemoryTaskContext())).to.equal(TaskStatus.osError);
	});

	it('should stop with softwareError when a tool fails', async () => {
		const nmapFails = fakeRunner(command => command === 'nmap' ? exit(1, '', 'Failed to resolve') : undefined, network);
		const arpFails = fakeRunner(command => command === 'arp' ? exit(255) : undefined, network);

		expect(await devCommand(nmapFails).run(new MemoryTaskContext())).to.equal(TaskStatus.softwareError);
		expect(nmapFails.callsTo('arp')).to.deep.equal([]);
		expect(await devCommand(arpFails).run(new MemoryTaskContext())).to.equal(TaskStatus.softwareError);
	});

	it('should fail with fileMissing without nmap', async () => {
		const context = new MemoryTaskContext();

		expect(await devCommand(fakeRunner(notInstalled('nmap'), network)).run(context)).to.equal(TaskStatus.fileMissing);
		expect(context.state).to.be.null;
	});
});
