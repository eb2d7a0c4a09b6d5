import { createInterface } from 'readline/promises';
import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig } from '../utils/config';
import { UsageError } from '../utils/errors';
import { LoggingUtils } from '../utils/LoggingUtils';
import { formatIndexEntry } from '../workspace/IndexEntry';
import { substituteTemplateWhitespace } from '../workspace/BlankSubstitution';
import { TemplateManager } from '../workspace/TemplateManager';

export type CliOptions = {
	vendor?: string;
	command?: string;
	index?: number;
	generate?: boolean;
	blank?: boolean;
	test?: boolean;
	yml?: boolean;
	short?: string | boolean;
	root?: string;
	verbose?: boolean;
};

export interface CliIo {
	prompt(question: string): Promise<string>;
	print(line: string): void;
}

export const consoleIo: CliIo = {
	async prompt(question) {
		const rl = createInterface({ input: process.stdin, output: process.stdout });
		try {
			return await rl.question(question);
		} finally {
			rl.close();
		}
	},
	print(line) {
		console.log(line);
	},
};

function parseIndex(value: string): number {
	const index = Number(value);
	if (!Number.isInteger(index) || index < 1) {
		throw new InvalidArgumentError('Index must be a positive integer.');
	}
	return index;
}

export function createProgram(): Command {
	return new Command()
		.name('template-dev')
		.description('Scaffold, run and normalize TextFSM template test files')
		.option('-v, --vendor <vendor>', 'device vendor/OS, e.g. cisco_ios')
		.option('-c, --command <command>', 'device command, e.g. "show version"')
		.option('-i, --index <n>', 'sample number for commands with several samples, starting at 2', parseIndex)
		.option('-g, --generate', 'create the empty sample and template files')
		.option('-b, --blank', 'replace whitespace in template rules with \\s+')
		.option('-t, --test', 'run the template against the sample (default action)')
		.option('-y, --yml', 'write the parsed YAML result of every sample')
		.option('-s, --short [abbreviation]', 'print the index entry for the shortest command form')
		.option('--root <dir>', 'repository root (default: $TEMPLATE_DEV_ROOT or the current directory)')
		.option('--verbose', 'verbose logging');
}

/**
 * Dispatches to one action: generate, blank, yml, short, otherwise a test run.
 */
export async function runDevelopmentCommand(options: CliOptions, io: CliIo = consoleIo): Promise<void> {
	const { vendor, command } = options;
	if (!vendor || !command) {
		throw new UsageError('Both --vendor and --command are required');
	}
	const config = resolveConfig({ root: options.root, verbose: options.verbose });
	const manager = new TemplateManager(config);
	const index = options.index ?? 1;
	LoggingUtils.log(`Repository root: ${config.root}`, config.verbose);

	if (options.generate) {
		for (const file of await manager.generate(vendor, command, index)) {
			LoggingUtils.info(`created ${file}`);
		}
		return;
	}

	if (options.blank) {
		const { templateFile } = manager.files(vendor, command, index);
		await substituteTemplateWhitespace(templateFile);
		LoggingUtils.info(`updated ${templateFile}`);
		return;
	}

	if (options.yml) {
		const written = await manager.generateResults(vendor, command);
		for (const file of written) {
			LoggingUtils.info(`generate yml file: ${file}`);
		}
		LoggingUtils.info(`generate yml ${written.length} file done`);
		return;
	}

	if (options.short !== undefined) {
		const short = typeof options.short === 'string' ? options.short : await io.prompt('input shortest cmd: ');
		const { templateFile } = manager.files(vendor, command, index);
		io.print('');
		io.print(formatIndexEntry(templateFile, vendor, command, short));
		io.print('');
		return;
	}

	const records = await manager.run(vendor, command, index);
	io.print(JSON.stringify(records, null, 2));
}

export async function runCli(argv: string[], io: CliIo = consoleIo): Promise<void> {
	const program = createProgram();
	await program.parseAsync(argv);
	await runDevelopmentCommand(program.opts<CliOptions>(), io);
}
