import type { Rule, ValueDefinition } from './template';

export interface CompiledRule {
	rule: Rule;
	regex: RegExp;
}

export interface CompiledState {
	name: string;
	rules: CompiledRule[];
}

export interface CompiledTemplate {
	values: ValueDefinition[];
	states: Map<string, CompiledState>;
	startState: string;
}
