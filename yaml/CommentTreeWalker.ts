import { isCollection, isDocument, isMap, isNode, isScalar, isSeq } from 'yaml';
import type { Node } from 'yaml';
import { CommentsUnavailableError, MalformedCommentError } from '../utils/errors';
import { ensureSpaceAfterMarker } from './CommentNormalizer';
import type { CommentField, CommentHost, CommentRegistry, CommentSlot, CommentToken } from './types';

/**
 * `yaml` stores comments without their markers (`#a\n#b` is kept as `a\nb`).
 */
export function toMarkerForm(stored: string): string {
	const lines = stored.split('\n').map((line) => (line === '' ? '' : `#${line}`));
	return `${lines.join('\n')}\n`;
}

export function fromMarkerForm(marked: string): string {
	return marked
		.replace(/\n$/, '')
		.split('\n')
		.map((line) => {
			const at = line.indexOf('#');
			return at === -1 ? '' : line.slice(at + 1);
		})
		.join('\n');
}

class NodeCommentToken implements CommentToken {
	constructor(
		private readonly host: CommentHost,
		private readonly field: CommentField,
	) {}

	get value(): string {
		return toMarkerForm(this.host[this.field] ?? '');
	}

	set value(marked: string) {
		this.host[this.field] = fromMarkerForm(marked);
	}
}

const EMPTY_SLOT: CommentSlot = { kind: 'single', comment: null };

function single(host: CommentHost, field: CommentField): CommentSlot {
	return { kind: 'single', comment: host[field] ? new NodeCommentToken(host, field) : null };
}

function group(hosts: CommentHost[], field: CommentField): CommentSlot {
	return {
		kind: 'group',
		comments: hosts.filter((host) => host[field]).map((host) => new NodeCommentToken(host, field)),
	};
}

// Comments above a nested collection ride on the parent entry as a group,
// the collection's own trailing comment lives in its own registry.
function valueSlots(value: unknown): CommentSlot[] {
	if (isCollection(value)) return [group([value], 'commentBefore')];
	if (isNode(value)) return [single(value, 'commentBefore'), single(value, 'comment')];
	return [];
}

/**
 * Collects the comment slots of a map, sequence or document.
 * Scalars, aliases and plain values have no registry.
 */
export function commentRegistry(node: unknown): CommentRegistry | undefined {
	if (isDocument(node)) {
		const { contents } = node;
		const slots: CommentSlot[] = [single(node, 'commentBefore'), single(node, 'comment')];
		const children: Node[] = [];
		if (isCollection(contents)) {
			slots.push(single(contents, 'commentBefore'));
			children.push(contents);
		} else if (isNode(contents)) {
			slots.push(...valueSlots(contents));
		}
		const items = new Map<string | number, CommentSlot[]>([['document', slots]]);
		return { items, trailing: EMPTY_SLOT, children };
	}

	if (isMap(node)) {
		const items = new Map<string | number, CommentSlot[]>();
		const children: Node[] = [];
		node.items.forEach((pair, index) => {
			const { key, value } = pair;
			const slots: CommentSlot[] = isNode(key) ? [single(key, 'commentBefore'), single(key, 'comment')] : [];
			slots.push(...valueSlots(value));
			items.set(isScalar(key) ? String(key.value) : index, slots);
			if (isCollection(value)) children.push(value);
		});
		return { items, trailing: single(node, 'comment'), children };
	}

	if (isSeq(node)) {
		const items = new Map<string | number, CommentSlot[]>();
		const children: Node[] = [];
		node.items.forEach((item, index) => {
			if (isCollection(item)) {
				items.set(index, [single(item, 'commentBefore')]);
				children.push(item);
			} else {
				items.set(index, valueSlots(item));
			}
		});
		return { items, trailing: single(node, 'comment'), children };
	}

	return undefined;
}

/**
 * Applies the marker normalization to every comment found in the slots,
 * whether a slot holds one comment or a group of them.
 */
export function ensureSpaceComments(entries: Iterable<CommentSlot[]>): void {
	for (const slots of entries) {
		for (const slot of slots) {
			switch (slot.kind) {
				case 'single':
					ensureSpaceAfterMarker(slot.comment);
					break;
				case 'group':
					for (const comment of slot.comments) ensureSpaceAfterMarker(comment);
					break;
				default: {
					const unexpected: never = slot;
					throw new MalformedCommentError(`Unexpected comment slot: ${JSON.stringify(unexpected)}`);
				}
			}
		}
	}
}

/**
 * Ensures comments have a space after the "#" on the node and on every
 * nested map and sequence below it. Updates happen in place.
 *
 * @throws CommentsUnavailableError when handed a plain object or array,
 * which has nowhere to keep comments
 */
export function updateYamlComments(target: unknown): void {
	const registry = commentRegistry(target);
	if (registry === undefined) {
		if (isNode(target) || typeof target !== 'object' || target === null) return;
		throw new CommentsUnavailableError(
			`${Array.isArray(target) ? 'Array' : 'Object'} has no comment metadata`,
		);
	}

	ensureSpaceComments(registry.items.values());
	ensureSpaceComments([[registry.trailing]]);
	for (const child of registry.children) {
		updateYamlComments(child);
	}
}
