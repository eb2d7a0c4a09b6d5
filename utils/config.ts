import path from 'path';

export const SAMPLES_DIR = 'tests';
export const TEMPLATES_DIR = path.join('ntc_templates', 'templates');

export interface DevelopmentConfig {
	root: string;
	samplesDir: string;
	templatesDir: string;
	verbose: boolean;
}

export interface ConfigOverrides {
	root?: string;
	verbose?: boolean;
}

function envFlag(value: string | undefined): boolean {
	return value !== undefined && ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}

/**
 * Resolve the working configuration: explicit overrides win over the
 * environment, which wins over the current directory.
 */
export function resolveConfig(
	overrides: ConfigOverrides = {},
	env: NodeJS.ProcessEnv = process.env,
): DevelopmentConfig {
	const root = path.resolve(overrides.root || env.TEMPLATE_DEV_ROOT || process.cwd());
	return {
		root,
		samplesDir: path.join(root, SAMPLES_DIR),
		templatesDir: path.join(root, TEMPLATES_DIR),
		verbose: overrides.verbose ?? envFlag(env.TEMPLATE_DEV_VERBOSE),
	};
}
