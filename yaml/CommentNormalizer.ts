import type { CommentToken } from './types';

// (rest of a line)\n(blank lines / indent)#  +  (text of the continuation line)
const MULTILINE_REMARK = /(.*\n\s*#)(.*)/g;
const TRAILING_BLANKS = /[ \t]+\n/g;

/**
 * Ensures a single space after every "#" of a remark that may span
 * several comment lines.
 *
 * The remark is the text following the first "#" of a comment, e.g.
 * `"comment 11\n#        comment 12\n#comment 13\n"` becomes
 * `"comment 11\n# comment 12\n# comment 13"`. A remark without a
 * continuation line is a single segment.
 */
export function normalizeRemark(remark: string): string {
	const segments = Array.from(remark.matchAll(MULTILINE_REMARK), (m) => ({
		prefix: m[1].replace(TRAILING_BLANKS, '\n'),
		text: m[2],
	}));
	if (segments.length === 0) {
		segments.push({ prefix: '', text: remark });
	}
	return segments.map(({ prefix, text }) => `${prefix} ${text.trim()}`).join('');
}

/**
 * Rewrites the token so each of its lines reads `# text`.
 * Whitespace in front of the first marker is kept. Absent comments are ignored.
 */
export function ensureSpaceAfterMarker(comment: CommentToken | null | undefined): void {
	if (comment == null) return;

	const { value } = comment;
	const at = value.indexOf('#');
	const lead = at === -1 ? value : value.slice(0, at);
	const remark = at === -1 ? '' : value.slice(at + 1);
	comment.value = `${lead}# ${normalizeRemark(remark).trimStart()}\n`;
}
