import path from 'path';
import fs from 'fs-extra';
import { TemplateSyntaxError } from '../utils/errors';
import { buildTemplateFromSource } from './TemplateBuilder';
import { TemplateValidator } from './TemplateValidator';
import { TextFsmEngine } from './TextFsmEngine';
import type { EngineOptions, EngineResult } from './TextFsmEngine';
import type { ParsedRecord, ParsedResult, Template } from './types/template';

/**
 * Pairs each row with the header, keyed by the lower-cased Value name.
 */
export function recordsFromResult({ header, rows }: Pick<ParsedResult, 'header' | 'rows'>): ParsedRecord[] {
	return rows.map((row) => Object.fromEntries(header.map((name, index) => [name.toLowerCase(), row[index]])));
}

export class TemplateRunner {
	constructor(private readonly engine: TextFsmEngine = new TextFsmEngine()) {}

	async loadTemplate(templatePath: string): Promise<Template> {
		const source = await fs.readFile(templatePath, 'utf-8');
		const template = buildTemplateFromSource(source, path.basename(templatePath));
		const validation = TemplateValidator.validate(template);
		if (!validation.valid) {
			throw new TemplateSyntaxError(`Template ${template.name} invalid: ${validation.errors.join('; ')}`);
		}
		return template;
	}

	/**
	 * Runs the template file over the sample file and returns the raw table,
	 * with a per-line trace when `options.debug` is set.
	 */
	async parse(templatePath: string, samplePath: string, options: EngineOptions = {}): Promise<EngineResult> {
		const template = await this.loadTemplate(templatePath);
		const text = await fs.readFile(samplePath, 'utf-8');
		return this.engine.parseOutput(text, template, options);
	}

	async run(templatePath: string, samplePath: string, options: EngineOptions = {}): Promise<ParsedRecord[]> {
		return recordsFromResult(await this.parse(templatePath, samplePath, options));
	}
}
