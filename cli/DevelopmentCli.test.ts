import path from 'path';
import fs from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { dir } from 'tmp-promise';
import type { DirectoryResult } from 'tmp-promise';
import { UsageError } from '../utils/errors';
import { createProgram, runCli, runDevelopmentCommand } from './DevelopmentCli';
import type { CliIo } from './DevelopmentCli';

const TEMPLATE = 'Value VERSION (\\S+)\n\nStart\n  ^Version ${VERSION} -> Record\n';

function fakeIo(answer = '') {
	const printed: string[] = [];
	const prompts: string[] = [];
	const io: CliIo = {
		async prompt(question) {
			prompts.push(question);
			return answer;
		},
		print(line) {
			printed.push(line);
		},
	};
	return { io, printed, prompts };
}

function parse(...args: string[]) {
	const program = createProgram()
		.exitOverride()
		.configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
	program.parse(['node', 'template-dev', ...args]);
	return program.opts();
}

describe('createProgram', () => {
	it('reads the action flags', () => {
		expect(parse('-v', 'cisco_ios', '-c', 'show version', '-i', '2', '-y')).toEqual({
			vendor: 'cisco_ios',
			command: 'show version',
			index: 2,
			yml: true,
		});
	});

	it('accepts --short with or without an abbreviation', () => {
		expect(parse('-v', 'x', '-c', 'y', '-s').short).toBe(true);
		expect(parse('-v', 'x', '-c', 'y', '-s', 'sh ver').short).toBe('sh ver');
	});

	it('rejects indexes that are not positive integers', () => {
		expect(() => parse('-v', 'x', '-c', 'y', '-i', '0')).toThrow();
		expect(() => parse('-v', 'x', '-c', 'y', '-i', 'two')).toThrow();
	});
});

describe('runDevelopmentCommand', () => {
	let tmp: DirectoryResult;

	beforeEach(async () => {
		tmp = await dir({ unsafeCleanup: true });
		vi.spyOn(console, 'log').mockImplementation(() => undefined);
	});

	afterEach(async () => {
		vi.restoreAllMocks();
		await tmp.cleanup();
	});

	function samplePaths() {
		return {
			rawFile: path.join(tmp.path, 'tests', 'cisco_ios', 'show_version', 'cisco_ios_show_version.raw'),
			templateFile: path.join(tmp.path, 'ntc_templates', 'templates', 'cisco_ios_show_version.textfsm'),
		};
	}

	it('requires vendor and command', async () => {
		await expect(runDevelopmentCommand({ vendor: 'cisco_ios' }, fakeIo().io)).rejects.toThrow(UsageError);
	});

	it('generates the sample and template files', async () => {
		await runDevelopmentCommand({ vendor: 'cisco_ios', command: 'show version', generate: true, root: tmp.path }, fakeIo().io);
		const { rawFile, templateFile } = samplePaths();
		expect(await fs.pathExists(rawFile)).toBe(true);
		expect(await fs.pathExists(templateFile)).toBe(true);
	});

	it('prints the parsed records by default', async () => {
		const { rawFile, templateFile } = samplePaths();
		await fs.outputFile(rawFile, 'Version 15.2\n');
		await fs.outputFile(templateFile, TEMPLATE);
		const { io, printed } = fakeIo();

		await runDevelopmentCommand({ vendor: 'cisco_ios', command: 'show version', root: tmp.path }, io);

		expect(printed).toEqual([JSON.stringify([{ version: '15.2' }], null, 2)]);
	});

	it('writes result files with --yml', async () => {
		const { rawFile, templateFile } = samplePaths();
		await fs.outputFile(rawFile, 'Version 15.2\n');
		await fs.outputFile(templateFile, TEMPLATE);

		await runDevelopmentCommand({ vendor: 'cisco_ios', command: 'show version', yml: true, root: tmp.path }, fakeIo().io);

		expect(await fs.readFile(rawFile.replace(/\.raw$/, '.yml'), 'utf-8')).toBe(
			'---\nparsed_sample:\n  - version: "15.2"\n',
		);
	});

	it('asks for the abbreviation when --short has none', async () => {
		const { io, printed, prompts } = fakeIo('sh ver');

		await runDevelopmentCommand({ vendor: 'cisco_ios', command: 'show version', short: true, root: tmp.path }, io);

		expect(prompts).toEqual(['input shortest cmd: ']);
		expect(printed).toEqual(['', 'cisco_ios_show_version.textfsm, .*, cisco_ios, sh[[ow]] ver[[sion]]', '']);
	});

	it('rewrites template whitespace with --blank', async () => {
		const { templateFile } = samplePaths();
		await fs.outputFile(templateFile, 'Value V (\\S+)\n\nStart\n  ^Version  ${V}\n');

		await runCli(['node', 'template-dev', '-v', 'cisco_ios', '-c', 'show version', '-b', '--root', tmp.path], fakeIo().io);

		expect(await fs.readFile(templateFile, 'utf-8')).toBe('Value V (\\S+)\n\nStart\n  ^Version\\s+${V}\n');
	});
});
