import path from 'path';
import fs from 'fs-extra';
import { TemplateRunner, recordsFromResult } from '../parser/TemplateRunner';
import type { ParsedRecord } from '../parser/types/template';
import type { DevelopmentConfig } from '../utils/config';
import { UsageError } from '../utils/errors';
import { LoggingUtils } from '../utils/LoggingUtils';
import { PARSED_SAMPLE_KEY, writeCanonicalYaml } from '../yaml/CanonicalWriter';

export interface SampleFiles {
	rawFile: string;
	templateFile: string;
}

export function resultPathFor(rawFile: string): string {
	return rawFile.replace(/\.raw$/, '.yml');
}

/**
 * Knows where samples, templates and parsed results of a vendor/command live:
 * `tests/{vendor}/{command}/{vendor}_{command}[N].raw` and
 * `ntc_templates/templates/{vendor}_{command}.textfsm`, spaces in the
 * command written as underscores.
 */
export class TemplateManager {
	constructor(
		private readonly config: DevelopmentConfig,
		private readonly runner: TemplateRunner = new TemplateRunner(),
	) {}

	files(vendor: string, command: string, index = 1): SampleFiles {
		if (!Number.isInteger(index) || index < 1) {
			throw new UsageError(`Sample index must be a positive integer, got ${index}`);
		}
		const commandName = command.replace(/ /g, '_');
		const baseName = `${vendor}_${commandName}`;
		const rawBaseName = index > 1 ? `${baseName}${index}` : baseName;
		return {
			rawFile: path.join(this.config.samplesDir, vendor, commandName, `${rawBaseName}.raw`),
			templateFile: path.join(this.config.templatesDir, `${baseName}.textfsm`),
		};
	}

	/**
	 * Creates the empty sample and template files that do not exist yet.
	 */
	async generate(vendor: string, command: string, index = 1): Promise<string[]> {
		const { rawFile, templateFile } = this.files(vendor, command, index);
		const created: string[] = [];
		for (const file of [rawFile, templateFile]) {
			if (await fs.pathExists(file)) {
				LoggingUtils.log(`Keeping existing ${file}`, this.config.verbose);
				continue;
			}
			await fs.ensureDir(path.dirname(file));
			await fs.writeFile(file, '');
			created.push(file);
		}
		return created;
	}

	async run(vendor: string, command: string, index = 1): Promise<ParsedRecord[]> {
		const { rawFile, templateFile } = this.files(vendor, command, index);
		LoggingUtils.log(`Parsing ${rawFile} with ${templateFile}`, this.config.verbose);
		const result = await this.runner.parse(templateFile, rawFile, { debug: this.config.verbose });
		const { linesProcessed, matches } = result.meta;
		LoggingUtils.debug(
			`${result.templateName}: ${result.rows.length} record(s) from ${linesProcessed} line(s), ${matches} rule match(es)`,
			result.trace,
			this.config.verbose,
		);
		return recordsFromResult(result);
	}

	/**
	 * Replaces every `.yml` result of the command with a fresh one per `.raw`
	 * sample. Samples are expected to be numbered without gaps.
	 */
	async generateResults(vendor: string, command: string): Promise<string[]> {
		const sampleDir = path.dirname(this.files(vendor, command).rawFile);
		let rawCount = 0;
		for (const entry of await fs.readdir(sampleDir)) {
			if (entry.endsWith('.yml')) {
				await fs.remove(path.join(sampleDir, entry));
				LoggingUtils.log(`Removed ${entry}`, this.config.verbose);
			}
			if (entry.endsWith('.raw')) rawCount += 1;
		}

		const written: string[] = [];
		for (let index = 1; index <= rawCount; index += 1) {
			const ymlFile = resultPathFor(this.files(vendor, command, index).rawFile);
			const records = await this.run(vendor, command, index);
			await writeCanonicalYaml({ [PARSED_SAMPLE_KEY]: records }, ymlFile);
			written.push(ymlFile);
		}
		return written;
	}
}
