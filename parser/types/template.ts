export type ValueOption = 'Filldown' | 'Fillup' | 'Required' | 'List' | 'Key';

export const VALUE_OPTIONS: readonly ValueOption[] = ['Filldown', 'Fillup', 'Required', 'List', 'Key'];

export interface ValueDefinition {
	name: string;
	// regex as written, always wrapped in one outer "()" pair
	regex: string;
	options: ValueOption[];
}

export type LineOp = 'Next' | 'Continue' | 'Error';

export type RecordOp = 'NoRecord' | 'Record' | 'Clear' | 'Clearall';

export interface Rule {
	// rule text before "->", with ${VALUE} placeholders
	match: string;
	// match with placeholders expanded into named groups
	regex: string;
	lineOp: LineOp;
	recordOp: RecordOp;
	// next state, or the message of an Error action
	newState?: string;
	lineNumber: number;
}

export interface State {
	name: string;
	rules: Rule[];
}

export interface Template {
	name: string;
	values: ValueDefinition[];
	states: State[];
}

export type FieldValue = string | string[];

export interface ParsedRecord {
	[field: string]: FieldValue;
}

export interface ParsedResult {
	templateName: string;
	header: string[];
	rows: FieldValue[][];
	meta: {
		linesProcessed: number;
		matches: number;
	};
}

export interface TraceEntry {
	line: string;
	state: string;
	matchedRules: number[];
}
