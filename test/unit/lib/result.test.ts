import { expect } from 'chai';
import { flatten, prefixKeys, shape, shapeResult, toTargets } from '../../../src/lib/result.js';

const now = () => 1709287200500;

describe('result shaping', () => {
	describe('toTargets', () => {
		it('should label list entries with themselves', () => {
			expect(toTargets([ 'alpha.test', '8.8.8.8' ])).to.deep.equal([
				{ address: 'alpha.test', label: 'alpha.test' },
				{ address: '8.8.8.8', label: '8.8.8.8' },
			]);
		});

		it('should take labels from a mapping', () => {
			expect(toTargets({ '8.8.8.8': 'Google_DNS' })).to.deep.equal([{ address: '8.8.8.8', label: 'Google_DNS' }]);
		});
	});

	it('should flatten nested statistics', () => {
		expect(flatten({ 'alpha.test': { rtt_avg_ms: 11.4, packet_loss_pct: 0 }, 'beta.test': { rtt_avg_ms: 21.5 } })).to.deep.equal({
			'alpha.test_rtt_avg_ms': 11.4,
			'alpha.test_packet_loss_pct': 0,
			'beta.test_rtt_avg_ms': 21.5,
		});
	});

	it('should prefix keys', () => {
		expect(prefixKeys('devices_', { active: 2, total: 3 })).to.deep.equal({ devices_active: 2, devices_total: 3 });
	});

	describe('shapeResult', () => {
		it('should nest under the label and annotate with the time in seconds', () => {
			expect(shapeResult({ a: 1 }, { label: 'ping_latency', annotate: true }, now)).to.deep.equal({
				Measurements: { ping_latency: { a: 1 } },
				Meta: { Time: 1709287200.5 },
			});
		});

		it('should leave the result unlabelled and bare', () => {
			expect(shapeResult({ a: 1 }, { label: null, annotate: false }, now)).to.deep.equal({ a: 1 });
			expect(shapeResult({ a: 1 }, { label: false, annotate: false }, now)).to.deep.equal({ a: 1 });
		});
	});

	describe('shape', () => {
		const nested = { alpha: { rtt_avg_ms: 11.4 } };

		it('should flatten before labelling', () => {
			expect(shape(nested, { flat: true, label: 'ping_latency', annotate: false }, now)).to.deep.equal({
				ping_latency: { alpha_rtt_avg_ms: 11.4 },
			});
		});

		it('should keep the nesting when not flat', () => {
			expect(shape(nested, { flat: false, label: null, annotate: false }, now)).to.deep.equal(nested);
		});
	});
});
