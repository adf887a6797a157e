import { expect } from 'chai';
import { FakeProcessRunner, exit, missing } from '../../utils.js';
import { findMissingExecutable, isExecutableAvailable } from '../../../src/lib/dependencies.js';

const installed = (...names: string[]) => new FakeProcessRunner([
	(command, args) => command === 'which' ? exit(names.includes(args[0] ?? '') ? 0 : 1) : undefined,
]);

describe('executable checks', () => {
	it('should look executables up with which', async () => {
		const runner = installed('ping');

		expect(await isExecutableAvailable('ping', runner)).to.be.true;
		expect(runner.callsTo('which')).to.deep.equal([[ 'ping' ]]);
	});

	it('should treat a missing which as a missing executable', async () => {
		const runner = new FakeProcessRunner([ () => missing() ]);
		expect(await isExecutableAvailable('ping', runner)).to.be.false;
	});

	it('should return the first missing executable in input order', async () => {
		const runner = installed('ping');
		expect(await findMissingExecutable([ 'ping', 'scamper', 'dig' ], runner)).to.equal('scamper');
	});

	it('should return undefined when everything is installed', async () => {
		const runner = installed('scamper', 'dig');
		expect(await findMissingExecutable([ 'scamper', 'dig' ], runner)).to.be.undefined;
	});
});
