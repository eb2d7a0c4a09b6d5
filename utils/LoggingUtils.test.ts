import { afterEach, describe, expect, it, vi } from 'vitest';
import { LoggingUtils } from './LoggingUtils';

describe('LoggingUtils', () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it('logs only when verbose', () => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
		LoggingUtils.log('quiet', false);
		expect(log).not.toHaveBeenCalled();
		LoggingUtils.log('loud', true);
		expect(log).toHaveBeenCalledTimes(1);
		expect(log).toHaveBeenCalledWith(expect.stringContaining('loud'));
	});

	it('passes debug payloads through', () => {
		const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
		LoggingUtils.debug('state', { rows: 2 }, true);
		expect(debug).toHaveBeenCalledWith(expect.stringContaining('state'), { rows: 2 });
	});

	it('writes errors to stderr', () => {
		const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
		LoggingUtils.error('broken');
		expect(error).toHaveBeenCalledWith(expect.stringContaining('broken'));
	});
});
