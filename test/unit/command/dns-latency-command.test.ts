import { expect } from 'chai';
import { createCommand } from '../../../src/commands.js';
import { argBuilder, stdev } from '../../../src/command/dns-latency-command.js';
import { runTask } from '../../../src/task/runner.js';
import { TaskStatus } from '../../../src/task/status.js';
import { MemoryTaskContext, exit, fakeRunner, getCmdMock, testSettings, type Route, type Scripted } from '../../utils.js';

// dig takes the queried name second: `dig @server name +yaml`.
const dig = (answers: Record<string, () => Scripted>): Route => (command, args) => command === 'dig' ? answers[args[1] ?? '']?.() : undefined;

const answers = dig({
	'alpha.test': () => exit(0, getCmdMock('dig-yaml')),
	'beta.test': () => exit(0, getCmdMock('dig-yaml-slow')),
	'gamma.test': () => exit(9, ';; connection timed out; no servers could be reached'),
	'delta.test': () => exit(0, ';; garbled'),
});

describe('dns latency command', () => {
	it('should query the server in yaml format', () => {
		const options = { result: { flat: true, label: null, annotate: false }, destinations: [ 'alpha.test' ], server: '1.1.1.1' };
		expect(argBuilder(options, 'alpha.test')).to.deep.equal([ '@1.1.1.1', 'alpha.test', '+yaml' ]);
	});

	it('should compute the sample standard deviation', () => {
		expect(stdev([])).to.equal(0);
		expect(stdev([ 5 ])).to.equal(0);
		expect(stdev([ 1, 3 ])).to.equal(Math.sqrt(2));
	});

	it('should report mean and maximum latency', async () => {
		const runner = fakeRunner(answers);
		const context = new MemoryTaskContext({ destinations: [ 'alpha.test', 'beta.test' ], result: { annotate: false } });

		const status = await createCommand('dns-latency', testSettings(), runner).run(context);

		expect(status).to.equal(TaskStatus.success);
		expect(runner.callsTo('dig')).to.deep.equal([
			[ '@8.8.8.8', 'alpha.test', '+yaml' ],
			[ '@8.8.8.8', 'beta.test', '+yaml' ],
		]);

		expect(context.lastResult).to.deep.equal({ dns_latency: { dns_query_avg_ms: 32, dns_query_max_ms: 41 } });
	});

	it('should nest results when not flat', async () => {
		const context = new MemoryTaskContext({ destinations: [ 'alpha.test', 'gamma.test' ], server: '1.1.1.1', result: { flat: false, annotate: false } });
		const runner = fakeRunner(answers);

		await createCommand('dns-latency', testSettings(), runner).run(context);

		expect(runner.callsTo('dig')[0]).to.deep.equal([ '@1.1.1.1', 'alpha.test', '+yaml' ]);
		expect(context.lastResult).to.deep.equal({ dns_latency: { dns_query: { avg_ms: 23, max_ms: 23 } } });
	});

	it('should fail with noHost when no query succeeded', async () => {
		const status = await createCommand('dns-latency', testSettings(), fakeRunner(answers)).run(new MemoryTaskContext({ destinations: [ 'gamma.test' ] }));
		expect(status).to.equal(TaskStatus.noHost);
	});

	it('should stop with softwareError on output it cannot read', async () => {
		const context = new MemoryTaskContext({ destinations: [ 'alpha.test', 'delta.test' ] });
		const status = await createCommand('dns-latency', testSettings(), fakeRunner(answers)).run(context);

		expect(status).to.equal(TaskStatus.softwareError);
		expect(context.results).to.deep.equal([]);
	});

	it('should accept hostnames only', async () => {
		const context = new MemoryTaskContext({ destinations: [ 'not a host' ] });
		expect(await runTask(createCommand('dns-latency', testSettings(), fakeRunner()), context)).to.equal(TaskStatus.confError);
	});
});
