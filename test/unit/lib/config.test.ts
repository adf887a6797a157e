import { expect } from 'chai';
import { loadSettings, parseSettings } from '../../../src/lib/config.js';
import { InvalidSettingsException } from '../../../src/command/exception/invalid-options-exception.js';

describe('settings', () => {
	it('should fill in defaults', () => {
		expect(parseSettings({})).to.deep.equal({
			commands: { timeout: 120 },
			result: { flat: true, label: true, annotate: true },
			connectivity: {
				deadline: 5,
				lan: { attempts: 3 },
				net: { disabled: false, attempts: 3, destinations: [ 'google.com', 'facebook.com', 'nytimes.com' ] },
			},
			task: { stateDir: './state' },
		});
	});

	it('should accept false as a disabled Internet check', () => {
		expect(parseSettings({ connectivity: { net: false } }).connectivity.net).to.deep.equal({ disabled: true, attempts: 3, destinations: [] });
	});

	it('should reject invalid values', () => {
		expect(() => parseSettings({ commands: { timeout: 0 } })).to.throw(InvalidSettingsException, /^invalid settings: /);
		expect(() => parseSettings({ connectivity: { lan: { attempts: 'many' } } })).to.throw(InvalidSettingsException);
	});

	it('should load the configuration files', () => {
		const settings = loadSettings();

		expect(settings.commands.timeout).to.equal(120);
		expect(settings.connectivity.net.destinations).to.deep.equal([ 'google.com', 'facebook.com', 'nytimes.com' ]);
	});
});
