import { expect } from 'chai';
import { preflight } from '../../../src/helper/preflight.js';
import { TaskStatus } from '../../../src/task/status.js';
import { fakeRunner, notInstalled } from '../../utils.js';

describe('preflight', () => {
	it('should pass when everything is installed and the check passes', async () => {
		expect(await preflight(fakeRunner(), [ 'scamper', 'dig' ], async () => ({ passed: true }))).to.be.undefined;
	});

	it('should not run the check when an executable is missing', async () => {
		let checked = false;

		const status = await preflight(fakeRunner(notInstalled('dig')), [ 'scamper', 'dig' ], async () => {
			checked = true;
			return { passed: true };
		});

		expect(status).to.equal(TaskStatus.fileMissing);
		expect(checked).to.be.false;
	});

	it('should return the status of a failed check', async () => {
		expect(await preflight(fakeRunner(), [], async () => ({ passed: false, status: TaskStatus.noHost }))).to.equal(TaskStatus.noHost);
	});
});
