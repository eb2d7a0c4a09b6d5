import { TemplateRuntimeError } from '../utils/errors';
import { START_STATE } from './TemplateValidator';
import type { CompiledState, CompiledTemplate } from './types/parser';
import type { FieldValue, ParsedResult, Rule, Template, TraceEntry, ValueDefinition } from './types/template';

export interface EngineOptions {
	// record which rules matched each input line
	debug?: boolean;
}

export type EngineResult = ParsedResult & { trace?: TraceEntry[] };

type Cell = string | string[] | null;

function isEmpty(cell: Cell): boolean {
	return cell === null || cell === '' || (Array.isArray(cell) && cell.length === 0);
}

/**
 * Runtime state of one Value while a template runs. Options apply in the
 * order they are declared.
 */
class ValueState {
	value: Cell = null;
	private filldown: Cell = null;
	private items: string[] = [];

	constructor(readonly definition: ValueDefinition) {}

	private get options() {
		return this.definition.options;
	}

	assign(matched: string | undefined, rows: FieldValue[][], column: number): void {
		this.value = matched ?? null;
		for (const option of this.options) {
			if (option === 'Filldown') {
				this.filldown = this.value;
			} else if (option === 'List') {
				if (matched !== undefined) this.items.push(matched);
				this.value = [...this.items];
			} else if (option === 'Fillup' && typeof this.value === 'string' && this.value) {
				for (let i = rows.length - 1; i >= 0; i -= 1) {
					if (!isEmpty(rows[i][column])) break;
					rows[i][column] = this.value;
				}
			}
		}
	}

	clear(): void {
		this.value = null;
		for (const option of this.options) {
			if (option === 'Filldown') this.value = this.filldown;
			if (option === 'List' && !this.options.includes('Filldown')) this.items = [];
		}
	}

	clearAll(): void {
		this.value = null;
		this.filldown = null;
		this.items = [];
	}

	/**
	 * @returns false when a Required value is empty and the record must be dropped
	 */
	save(): boolean {
		for (const option of this.options) {
			if (option === 'List') this.value = [...this.items];
			if (option === 'Required' && isEmpty(this.value)) return false;
		}
		return true;
	}
}

export class TextFsmEngine {
	private compiledCache = new WeakMap<Template, CompiledTemplate>();

	parseOutput(output: string, template: Template, options: EngineOptions = {}): EngineResult {
		const compiled = this.getOrCompile(template);
		const lines = output.split(/\r?\n/);
		if (lines[lines.length - 1] === '') lines.pop();

		const values = compiled.values.map((definition) => new ValueState(definition));
		const columns = new Map(values.map((v, i) => [v.definition.name, i]));
		const rows: FieldValue[][] = [];
		const trace: TraceEntry[] = [];

		let currentStateName = compiled.startState;
		let linesProcessed = 0;
		let matches = 0;

		for (const line of lines) {
			linesProcessed += 1;
			const state = compiled.states.get(currentStateName);
			if (!state) {
				throw new TemplateRuntimeError(`Unknown state: ${currentStateName}`);
			}

			const matchedRules: number[] = [];
			for (let idx = 0; idx < state.rules.length; idx += 1) {
				const { rule, regex } = state.rules[idx];
				const m = regex.exec(line);
				if (!m) continue;
				matches += 1;
				matchedRules.push(idx);

				for (const [groupName, value] of Object.entries(m.groups ?? {})) {
					const column = columns.get(groupName);
					if (column !== undefined) values[column].assign(value, rows, column);
				}

				// Continue keeps testing the following rules against the same line
				if (!this.applyOperations(rule, line, values, rows)) continue;
				if (rule.newState) currentStateName = rule.newState;
				break;
			}

			if (options.debug) {
				trace.push({ line, state: currentStateName, matchedRules });
			}
			if (currentStateName === 'End' || currentStateName === 'EOF') break;
		}

		if (currentStateName !== 'End' && !compiled.states.has('EOF')) {
			this.appendRecord(values, rows);
		}

		return {
			templateName: template.name,
			header: values.map((v) => v.definition.name),
			rows,
			meta: { linesProcessed, matches },
			...(options.debug ? { trace } : {}),
		};
	}

	private applyOperations(rule: Rule, line: string, values: ValueState[], rows: FieldValue[][]): boolean {
		switch (rule.recordOp) {
			case 'Record':
				this.appendRecord(values, rows);
				break;
			case 'Clear':
				for (const v of values) v.clear();
				break;
			case 'Clearall':
				for (const v of values) v.clearAll();
				break;
			default:
				break;
		}

		if (rule.lineOp === 'Error') {
			if (rule.newState) {
				throw new TemplateRuntimeError(`Error: ${rule.newState}. Rule Line: ${rule.lineNumber}. Input Line: ${line}.`);
			}
			throw new TemplateRuntimeError(`State Error raised. Rule Line: ${rule.lineNumber}. Input Line: ${line}.`);
		}
		return rule.lineOp !== 'Continue';
	}

	private appendRecord(values: ValueState[], rows: FieldValue[][]): void {
		if (values.length === 0) return;

		const row: Cell[] = [];
		for (const v of values) {
			if (!v.save()) {
				for (const each of values) each.clear();
				return;
			}
			row.push(v.value);
		}
		// nothing captured since the last record
		if (row.every((cell) => cell === null || (Array.isArray(cell) && cell.length === 0))) return;

		rows.push(row.map((cell) => cell ?? ''));
		for (const v of values) v.clear();
	}

	private getOrCompile(template: Template): CompiledTemplate {
		const fromCache = this.compiledCache.get(template);
		if (fromCache) return fromCache;

		const states = new Map<string, CompiledState>();
		for (const s of template.states) {
			states.set(s.name, {
				name: s.name,
				rules: s.rules.map((rule) => ({ rule, regex: new RegExp(rule.regex) })),
			});
		}
		const compiled: CompiledTemplate = {
			values: template.values,
			states,
			startState: START_STATE,
		};
		this.compiledCache.set(template, compiled);
		return compiled;
	}
}
