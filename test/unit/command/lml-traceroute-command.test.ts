import { expect } from 'chai';
import { createCommand } from '../../../src/commands.js';
import { LastMileTracerouteCommand } from '../../../src/command/lml-traceroute-command.js';
import { ConnectivityGate } from '../../../src/lib/connectivity.js';
import { TaskStatus } from '../../../src/task/status.js';
import { MemoryTaskContext, byDestination, exit, fakeRunner, getCmdMock, notInstalled, testSettings, timedOut, type FakeProcessRunner } from '../../utils.js';

const lastMilePing = byDestination('ping', { '96.120.10.1': () => exit(0, getCmdMock('ping-success')) });

const inOrder = <T>(items: T[]): T[] => items;

const lastMileTracerouteCommand = (runner: FakeProcessRunner) => {
	const settings = testSettings();
	return new LastMileTracerouteCommand(settings, runner, new ConnectivityGate(settings.connectivity, runner), inOrder);
};

describe('last mile traceroute command', () => {
	it('should ping the last mile found by traceroute', async () => {
		const runner = fakeRunner(byDestination('traceroute', { '8.8.8.8': () => exit(0, getCmdMock('traceroute-last-mile')) }), lastMilePing);
		const context = new MemoryTaskContext({ destinations: { '8.8.8.8': 'Google_DNS' }, result: { flat: false, annotate: false } });

		const status = await createCommand('lml-traceroute', testSettings(), runner).run(context);

		expect(status).to.equal(TaskStatus.success);
		expect(runner.callsTo('traceroute')).to.deep.equal([[ '8.8.8.8' ]]);
		expect(runner.callsTo('ping')).to.deep.include([ '-c', '10', '-i', '0.25', '-w', '5', '96.120.10.1' ]);

		expect(context.lastResult).to.deep.equal({
			last_mile_rtt: {
				Google_DNS: {
					last_mile_ping_rtt_min_ms: 10.912,
					last_mile_ping_rtt_avg_ms: 11.385,
					last_mile_ping_rtt_max_ms: 12.104,
					last_mile_ping_rtt_mdev_ms: 0.361,
					last_mile_ping_packet_loss_pct: 0,
					last_mile_tr_rtt_min_ms: 10.977,
					last_mile_tr_rtt_median_ms: 11.402,
					last_mile_tr_rtt_max_ms: 12.315,
				},
			},
		});
	});

	it('should prefix flat keys with the destination label', async () => {
		const runner = fakeRunner(byDestination('traceroute', { '8.8.8.8': () => exit(0, getCmdMock('traceroute-anomaly')) }), lastMilePing);
		const context = new MemoryTaskContext({ destinations: { '8.8.8.8': 'Google_DNS' }, count: 4, result: { annotate: false } });

		await createCommand('lml-traceroute', testSettings(), runner).run(context);

		expect(runner.callsTo('ping')).to.deep.include([ '-c', '4', '-i', '0.25', '-w', '5', '96.120.10.1' ]);
		expect(context.lastResult).to.have.nested.property('last_mile_rtt.Google_DNS_last_mile_tr_rtt_min_ms', 11.402);
		expect(context.lastResult).to.have.nested.property('last_mile_rtt.Google_DNS_last_mile_tr_rtt_max_ms', 12.315);
		expect(context.lastResult).to.have.nested.property('last_mile_rtt.Google_DNS_last_mile_ping_rtt_avg_ms', 11.385);
	});

	it('should fail with noHost when no path leaves private address space', async () => {
		const runner = fakeRunner(byDestination('traceroute', { '1.1.1.1': () => exit(0, getCmdMock('traceroute-private')) }));
		const status = await createCommand('lml-traceroute', testSettings(), runner).run(new MemoryTaskContext({ destinations: [ '1.1.1.1' ] }));

		expect(status).to.equal(TaskStatus.noHost);
	});

	it('should move on to the next destination when a path has no public hop', async () => {
		const runner = fakeRunner(byDestination('traceroute', {
			'1.1.1.1': () => exit(0, getCmdMock('traceroute-private')),
			'8.8.8.8': () => exit(0, getCmdMock('traceroute-last-mile')),
		}), lastMilePing);

		const context = new MemoryTaskContext({ destinations: { '1.1.1.1': 'Cloudflare_DNS', '8.8.8.8': 'Google_DNS' }, result: { annotate: false } });
		const status = await lastMileTracerouteCommand(runner).run(context);

		expect(status).to.equal(TaskStatus.success);
		expect(runner.callsTo('traceroute')).to.deep.equal([[ '1.1.1.1' ], [ '8.8.8.8' ]]);
		expect(context.lastResult).to.have.nested.property('last_mile_rtt.Google_DNS_last_mile_tr_rtt_median_ms', 11.402);
		expect(context.lastResult).to.not.have.nested.property('last_mile_rtt.Cloudflare_DNS_last_mile_tr_rtt_median_ms');
	});

	it('should move on to the next destination when traceroute times out', async () => {
		const runner = fakeRunner(byDestination('traceroute', {
			'1.1.1.1': timedOut(2500),
			'8.8.8.8': () => exit(0, getCmdMock('traceroute-last-mile')),
		}), lastMilePing);

		const context = new MemoryTaskContext({ destinations: { '1.1.1.1': 'Cloudflare_DNS', '8.8.8.8': 'Google_DNS' }, result: { annotate: false } });
		const status = await lastMileTracerouteCommand(runner).run(context);

		expect(status).to.equal(TaskStatus.success);
		expect(runner.callsTo('traceroute')).to.deep.equal([[ '1.1.1.1' ], [ '8.8.8.8' ]]);
	});

	it('should fail with noHost when traceroute fails', async () => {
		const runner = fakeRunner(byDestination('traceroute', { '1.1.1.1': exit(1, '', 'traceroute: unknown host') }));
		const status = await createCommand('lml-traceroute', testSettings(), runner).run(new MemoryTaskContext({ destinations: [ '1.1.1.1' ] }));

		expect(status).to.equal(TaskStatus.noHost);
		expect(runner.callsTo('ping').filter(args => args.includes('96.120.10.1'))).to.deep.equal([]);
	});

	it('should stop with noHost when the last mile does not answer', async () => {
		const runner = fakeRunner(
			byDestination('traceroute', { '8.8.8.8': () => exit(0, getCmdMock('traceroute-last-mile')) }),
			byDestination('ping', { '96.120.10.1': exit(2) }),
		);

		const status = await createCommand('lml-traceroute', testSettings(), runner).run(new MemoryTaskContext({ destinations: [ '8.8.8.8' ] }));

		expect(status).to.equal(TaskStatus.noHost);
	});

	it('should fail with fileMissing without traceroute', async () => {
		const status = await createCommand('lml-traceroute', testSettings(), fakeRunner(notInstalled('traceroute'))).run(new MemoryTaskContext());
		expect(status).to.equal(TaskStatus.fileMissing);
	});
});
