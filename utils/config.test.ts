import path from 'path';
import { describe, expect, it } from 'vitest';
import { resolveConfig } from './config';

describe('resolveConfig', () => {
	it('prefers explicit overrides', () => {
		const config = resolveConfig({ root: '/work/a', verbose: false }, { TEMPLATE_DEV_ROOT: '/work/b', TEMPLATE_DEV_VERBOSE: '1' });
		expect(config).toEqual({
			root: path.resolve('/work/a'),
			samplesDir: path.join(path.resolve('/work/a'), 'tests'),
			templatesDir: path.join(path.resolve('/work/a'), 'ntc_templates', 'templates'),
			verbose: false,
		});
	});

	it('falls back to the environment', () => {
		const config = resolveConfig({}, { TEMPLATE_DEV_ROOT: '/work/b', TEMPLATE_DEV_VERBOSE: 'Yes' });
		expect(config.root).toBe(path.resolve('/work/b'));
		expect(config.verbose).toBe(true);
	});

	it('defaults to the current directory, quietly', () => {
		const config = resolveConfig({}, {});
		expect(config.root).toBe(process.cwd());
		expect(config.verbose).toBe(false);
	});
});
