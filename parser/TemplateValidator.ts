import type { Template } from './types/template';

export const START_STATE = 'Start';
export const RESERVED_STATES: readonly string[] = ['End', 'EOF'];

export class TemplateValidator {
	static validate(template: Template): { valid: true } | { valid: false; errors: string[] } {
		const errors: string[] = [];

		if (!template.name) errors.push('Missing template name');

		const stateNames = new Set(template.states.map((s) => s.name));
		if (!stateNames.has(START_STATE)) {
			errors.push(`Missing state '${START_STATE}'`);
		}

		for (const state of template.states) {
			if (RESERVED_STATES.includes(state.name) && state.rules.length > 0) {
				errors.push(`Non-empty ${state.name} state`);
			}
			for (const rule of state.rules) {
				try {
					// eslint-disable-next-line no-new
					new RegExp(rule.regex);
				} catch (e) {
					errors.push(`Invalid regex in state ${state.name}, line ${rule.lineNumber}: ${e instanceof Error ? e.message : String(e)}`);
				}
				if (rule.lineOp === 'Error' || !rule.newState) continue;
				if (!RESERVED_STATES.includes(rule.newState) && !stateNames.has(rule.newState)) {
					errors.push(`Transition from ${state.name} to unknown state ${rule.newState}, line ${rule.lineNumber}`);
				}
			}
		}

		if (errors.length > 0) return { valid: false, errors };
		return { valid: true };
	}
}
