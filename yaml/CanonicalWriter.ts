import fs from 'fs-extra';
import { Document, isCollection, isDocument, isSeq, parseDocument, visit } from 'yaml';
import type { ToStringOptions } from 'yaml';
import { CommentsUnavailableError, MissingSampleError, YamlLoadError } from '../utils/errors';
import { updateYamlComments } from './CommentTreeWalker';
import { quoteRecordScalars } from './ScalarQuoting';

export const PARSED_SAMPLE_KEY = 'parsed_sample';

/**
 * Output layout shared by every file the tool writes: explicit `---`,
 * two-space mappings, sequences indented under their key, no folding.
 * Block style is applied to the nodes themselves before serializing.
 */
export const YAML_OUTPUT_OPTIONS: Readonly<ToStringOptions> = Object.freeze({
	directives: true,
	indent: 2,
	indentSeq: true,
	lineWidth: 0,
});

export interface ParsedSampleDocument {
	[PARSED_SAMPLE_KEY]: unknown[];
}

export type CanonicalSource = Document | ParsedSampleDocument;

function sampleRecords(source: CanonicalSource): Iterable<unknown> {
	if (isDocument(source)) {
		const samples = source.get(PARSED_SAMPLE_KEY);
		if (!isSeq(samples)) {
			throw new MissingSampleError(`Document has no "${PARSED_SAMPLE_KEY}" list`);
		}
		return samples.items;
	}
	const samples = source[PARSED_SAMPLE_KEY];
	if (!Array.isArray(samples)) {
		throw new MissingSampleError(`Object has no "${PARSED_SAMPLE_KEY}" list`);
	}
	return samples;
}

// Empty collections keep their `[]`/`{}` form.
function useBlockCollections(document: Document): void {
	visit(document, {
		Collection(_key, node) {
			if (node.items.length > 0) node.flow = false;
		},
	});
}

// `yaml` keeps end-of-file comments on the document and prints them after a
// blank line; on the root collection they follow the last entry directly.
function attachTrailingComment(document: Document): void {
	const { contents } = document;
	if (!document.comment || !isCollection(contents)) return;
	contents.comment = contents.comment ? `${contents.comment}\n${document.comment}` : document.comment;
	document.comment = null;
}

function serialize(document: Document): string {
	useBlockCollections(document);
	attachTrailingComment(document);
	return document.toString(YAML_OUTPUT_OPTIONS);
}

/**
 * Normalizes the comments of any loaded document and serializes it in the
 * canonical layout. The document is modified in place.
 */
export function formatYamlDocument(document: Document): string {
	updateYamlComments(document);
	return serialize(document);
}

/**
 * Quotes every record scalar, normalizes comments and serializes.
 * The source is modified in place.
 */
export function renderCanonicalYaml(source: CanonicalSource): string {
	quoteRecordScalars(sampleRecords(source));
	try {
		updateYamlComments(source);
	} catch (error) {
		// freshly built results have no comments to fix
		if (!(error instanceof CommentsUnavailableError)) throw error;
	}

	return serialize(isDocument(source) ? source : new Document(source, { aliasDuplicateObjects: false }));
}

/**
 * Writes `source` to `outputPath` in canonical form, replacing any existing file.
 */
export async function writeCanonicalYaml(source: CanonicalSource, outputPath: string): Promise<void> {
	await fs.writeFile(outputPath, renderCanonicalYaml(source), { encoding: 'utf-8' });
}

export function parseYamlDocument(text: string, origin = '<input>'): Document.Parsed {
	const document = parseDocument(text);
	if (document.errors.length > 0) {
		throw new YamlLoadError(`${origin}: ${document.errors.map((e) => e.message).join('; ')}`);
	}
	return document;
}

export async function loadYamlDocument(filePath: string): Promise<Document.Parsed> {
	const text = await fs.readFile(filePath, 'utf-8');
	return parseYamlDocument(text, filePath);
}
