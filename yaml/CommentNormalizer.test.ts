import { describe, expect, it } from 'vitest';
import { ensureSpaceAfterMarker, normalizeRemark } from './CommentNormalizer';
import type { CommentToken } from './types';

describe('normalizeRemark', () => {
	it('puts a single space after every continuation marker', () => {
		const remark = 'comment 11\n#        comment 12\n#comment 13\n';
		expect(normalizeRemark(remark)).toBe('comment 11\n# comment 12\n# comment 13');
	});

	it('treats a remark without continuation lines as one trimmed segment', () => {
		expect(normalizeRemark('   single remark  \n')).toBe(' single remark');
	});

	it('keeps a marker that is not at the start of a line inside the segment', () => {
		expect(normalizeRemark('first #second')).toBe(' first #second');
	});

	it('keeps blank lines between comment lines', () => {
		expect(normalizeRemark('a\n\n#b')).toBe('a\n\n# b');
	});

	it('drops trailing blanks of the first line', () => {
		expect(normalizeRemark('a   \n#b')).toBe('a\n# b');
	});

	it('accepts empty and whitespace-only remarks', () => {
		expect(normalizeRemark('')).toBe(' ');
		expect(normalizeRemark('   ')).toBe(' ');
	});

	it('is unchanged by a second pass', () => {
		const once = normalizeRemark('a\n#   b\n#c');
		expect(once).toBe('a\n# b\n# c');
		expect(normalizeRemark(once)).toBe(once);
	});
});

describe('ensureSpaceAfterMarker', () => {
	it('normalizes every line of a grouped comment', () => {
		const comment: CommentToken = { value: '#comment 2\n#comment 3\n' };
		ensureSpaceAfterMarker(comment);
		expect(comment.value).toBe('# comment 2\n# comment 3\n');
	});

	it('keeps whitespace in front of the first marker', () => {
		const comment: CommentToken = { value: '   #  note\n' };
		ensureSpaceAfterMarker(comment);
		expect(comment.value).toBe('   # note\n');
	});

	it('keeps the number of lines and gives each exactly one space', () => {
		const segments = ['one', '  two', 'three   ', '\tfour'];
		const comment: CommentToken = { value: `${segments.map((s) => `#${s}`).join('\n')}\n` };
		ensureSpaceAfterMarker(comment);

		expect(comment.value).toBe('# one\n# two\n# three\n# four\n');
		const lines = comment.value.replace(/\n$/, '').split('\n');
		expect(lines).toHaveLength(segments.length);
		for (const line of lines) {
			expect(line).toMatch(/^# \S(.*\S)?$/);
		}
	});

	it('is idempotent', () => {
		const comment: CommentToken = { value: '#a\n#     b\n' };
		ensureSpaceAfterMarker(comment);
		const once = comment.value;
		ensureSpaceAfterMarker(comment);
		expect(comment.value).toBe(once);
	});

	it('ignores absent comments', () => {
		expect(() => ensureSpaceAfterMarker(null)).not.toThrow();
		expect(() => ensureSpaceAfterMarker(undefined)).not.toThrow();
	});

	it('does not throw on text without a marker', () => {
		const comment: CommentToken = { value: '   ' };
		ensureSpaceAfterMarker(comment);
		expect(comment.value).toBe('   # \n');
	});
});
