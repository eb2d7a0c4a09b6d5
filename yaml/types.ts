import type { Node } from 'yaml';

/**
 * A comment in marker form: `#text` lines joined by newlines, newline-terminated.
 * Setting `value` writes through to wherever the comment is stored.
 */
export interface CommentToken {
	value: string;
}

export type CommentSlot =
	| { kind: 'single'; comment: CommentToken | null }
	| { kind: 'group'; comments: CommentToken[] };

/**
 * Comments attached to one map, sequence or document, keyed by entry
 * (map key, sequence index, or `document`).
 */
export interface CommentRegistry {
	items: Map<string | number, CommentSlot[]>;
	trailing: CommentSlot;
	children: Node[];
}

/**
 * Where `yaml` keeps comments: on nodes and on the document itself
 */
export interface CommentHost {
	commentBefore?: string | null;
	comment?: string | null;
}

export type CommentField = 'commentBefore' | 'comment';
