import fs from 'fs-extra';

const RULE_PREFIX = '  ^';
const ACTION_SUFFIX = /( -> .*)$/;

/**
 * Turns the literal whitespace of every rule line (`  ^...`) into `\s+`.
 * The ` -> action` part of a rule is left alone.
 */
export function substituteRuleWhitespace(text: string): string {
	const trailingNewline = text.endsWith('\n');
	const lines = text.split(/\r?\n/);
	if (trailingNewline) lines.pop();

	const rewritten = lines.map((line) => {
		if (!line.startsWith(RULE_PREFIX)) return line;

		let rule = line.slice(2);
		const action = ACTION_SUFFIX.exec(rule)?.[1] ?? '';
		if (action) rule = rule.slice(0, -action.length);

		const pattern = rule.trim().split(/\s+/).join('\\s+');
		return `  ${pattern}${action}`;
	});
	return rewritten.join('\n') + (trailingNewline ? '\n' : '');
}

export async function substituteTemplateWhitespace(templateFile: string): Promise<void> {
	const text = await fs.readFile(templateFile, 'utf-8');
	await fs.writeFile(templateFile, substituteRuleWhitespace(text), { encoding: 'utf-8' });
}
