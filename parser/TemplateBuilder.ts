import { TemplateSyntaxError } from '../utils/errors';
import { VALUE_OPTIONS } from './types/template';
import type { LineOp, RecordOp, Rule, State, Template, ValueDefinition, ValueOption } from './types/template';

const MAX_NAME_LENGTH = 48;
const COMMENT = /^\s*#/;
const STATE_NAME = /^\w+$/;
const VALUE_NAME = /^[A-Za-z_]\w*$/;
const RULE_START = /^(?: {1,2}|\t)\^/;

const LINE_OPS: readonly LineOp[] = ['Next', 'Continue', 'Error'];
const RECORD_OPS: readonly RecordOp[] = ['NoRecord', 'Record', 'Clear', 'Clearall'];

// the match is everything up to the last whitespace-preceded "->"
const MATCH_ACTION = /^(.*)\s->(.*)$/;
const LINE_OP_RE = '(?<lineOp>Continue|Next|Error)';
const RECORD_OP_RE = '(?<recordOp>Clear|Clearall|Record|NoRecord)';
const NEW_STATE_RE = '(?<newState>\\w+|".*")';
const ACTION_PATTERNS = [
	new RegExp(`^\\s+${LINE_OP_RE}(?:\\.${RECORD_OP_RE})?(?:\\s+${NEW_STATE_RE})?$`),
	new RegExp(`^\\s+${RECORD_OP_RE}(?:\\s+${NEW_STATE_RE})?$`),
	new RegExp(`^(?:\\s+${NEW_STATE_RE})?$`),
];

// $$, $NAME, ${NAME}, or a stray "$"
const PLACEHOLDER = /\$(?:(\$)|([_a-z][_a-z0-9]*)|\{([_a-z][_a-z0-9]*)\}|)/gi;

function isValueOption(option: string): option is ValueOption {
	return VALUE_OPTIONS.some((known) => known === option);
}

function isLineOp(op: string | undefined): op is LineOp {
	return LINE_OPS.some((known) => known === op);
}

function isRecordOp(op: string | undefined): op is RecordOp {
	return RECORD_OPS.some((known) => known === op);
}

/**
 * Rewrites the named-group syntax templates are written in to the one
 * JavaScript understands.
 */
export function toJsRegex(source: string): string {
	return source.replace(/\(\?P</g, '(?<').replace(/\(\?P=(\w+)\)/g, '\\k<$1>');
}

export function parseValue(line: string, lineNumber: number): ValueDefinition {
	const tokens = line.split(' ');
	if (tokens.length < 3) {
		throw new TemplateSyntaxError('Expect at least 3 tokens on line.', lineNumber);
	}

	let options: ValueOption[] = [];
	let name: string;
	let regex: string;
	if (!tokens[2].startsWith('(')) {
		options = tokens[1].split(',').map((option) => {
			if (!isValueOption(option)) {
				throw new TemplateSyntaxError(`Unknown option "${option}".`, lineNumber);
			}
			return option;
		});
		if (new Set(options).size !== options.length) {
			throw new TemplateSyntaxError('Duplicate option.', lineNumber);
		}
		name = tokens[2];
		regex = tokens.slice(3).join(' ');
	} else {
		name = tokens[1];
		regex = tokens.slice(2).join(' ');
	}

	if (!VALUE_NAME.test(name) || name.length > MAX_NAME_LENGTH) {
		throw new TemplateSyntaxError(`Invalid Value name "${name}".`, lineNumber);
	}
	if (!/^\(.*\)$/.test(regex)) {
		throw new TemplateSyntaxError(`Value "${name}" must be contained within a "()" pair.`, lineNumber);
	}
	return { name, regex, options };
}

function expandPlaceholders(match: string, valueRegexes: Map<string, string>, lineNumber: number): string {
	return match.replace(
		PLACEHOLDER,
		(whole: string, escaped?: string, named?: string, braced?: string) => {
			if (escaped) return '$';
			const name = named ?? braced;
			if (name === undefined) {
				throw new TemplateSyntaxError(`Invalid placeholder "${whole}" in rule.`, lineNumber);
			}
			const regex = valueRegexes.get(name);
			if (regex === undefined) {
				throw new TemplateSyntaxError(`Unknown Value "${name}" in rule.`, lineNumber);
			}
			return regex;
		},
	);
}

export function parseRule(line: string, lineNumber: number, valueRegexes: Map<string, string>): Rule {
	const text = line.trim();
	const split = MATCH_ACTION.exec(text);
	const match = split ? split[1] : text;
	const rule: Rule = {
		match,
		regex: toJsRegex(expandPlaceholders(match, valueRegexes, lineNumber)),
		lineOp: 'Next',
		recordOp: 'NoRecord',
		lineNumber,
	};
	if (!split) return rule;

	const action = split[2];
	const groups = ACTION_PATTERNS.map((pattern) => pattern.exec(action)).find((m) => m !== null)?.groups;
	if (!groups) {
		throw new TemplateSyntaxError(`Badly formatted rule "${text}".`, lineNumber);
	}
	if (isLineOp(groups.lineOp)) rule.lineOp = groups.lineOp;
	if (isRecordOp(groups.recordOp)) rule.recordOp = groups.recordOp;
	if (groups.newState) {
		rule.newState = groups.newState.replace(/^"(.*)"$/, '$1');
	}
	if (rule.lineOp === 'Continue' && rule.newState) {
		throw new TemplateSyntaxError('Action Continue with state change.', lineNumber);
	}
	return rule;
}

/**
 * Builds a template from `.textfsm` source: Value definitions, a blank
 * line, then states made of a name line followed by indented "^" rules.
 */
export function buildTemplateFromSource(source: string, name: string): Template {
	const lines = source.split(/\r?\n/);
	const values: ValueDefinition[] = [];
	let index = 0;

	for (; index < lines.length; index += 1) {
		const line = lines[index].trimEnd();
		if (!line) {
			index += 1;
			break;
		}
		if (COMMENT.test(line)) continue;
		if (line.startsWith('Value ')) {
			values.push(parseValue(line, index + 1));
			continue;
		}
		throw new TemplateSyntaxError(
			values.length === 0 ? 'No Value definitions found.' : 'Expected blank line after last Value entry.',
			index + 1,
		);
	}

	const valueRegexes = new Map<string, string>();
	for (const value of values) {
		if (valueRegexes.has(value.name)) {
			throw new TemplateSyntaxError(`Duplicate declarations for Value "${value.name}".`);
		}
		valueRegexes.set(value.name, value.regex.replace(/^\(/, `(?<${value.name}>`));
	}

	const states: State[] = [];
	while (index < lines.length) {
		const line = lines[index].trimEnd();
		const lineNumber = index + 1;
		index += 1;
		if (!line || COMMENT.test(line)) continue;

		const reserved = LINE_OPS.some((op) => op === line) || RECORD_OPS.some((op) => op === line);
		if (!STATE_NAME.test(line) || line.length > MAX_NAME_LENGTH || reserved) {
			throw new TemplateSyntaxError(`Invalid state name "${line}".`, lineNumber);
		}
		if (states.some((state) => state.name === line)) {
			throw new TemplateSyntaxError(`Duplicate state name "${line}".`, lineNumber);
		}

		const rules: Rule[] = [];
		for (; index < lines.length; index += 1) {
			const ruleLine = lines[index].trimEnd();
			if (!ruleLine) break;
			if (COMMENT.test(ruleLine)) continue;
			if (!RULE_START.test(ruleLine)) {
				throw new TemplateSyntaxError("Missing white space or carat ('^') before rule.", index + 1);
			}
			rules.push(parseRule(ruleLine, index + 1, valueRegexes));
		}
		states.push({ name: line, rules });
	}

	return { name, values, states };
}
