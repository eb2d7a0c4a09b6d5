import { Scalar, isMap, isNode, isScalar, isSeq } from 'yaml';
import type { YAMLMap } from 'yaml';
import { RecordShapeError } from '../utils/errors';

export type PlainRecord = Record<string, unknown>;

export function isPlainRecord(value: unknown): value is PlainRecord {
	return typeof value === 'object' && value !== null && !Array.isArray(value) && !isNode(value);
}

function quoteScalar(scalar: Scalar, field: string): void {
	const { value } = scalar;
	if (typeof value !== 'string' && typeof value !== 'number') {
		throw new RecordShapeError(`Field "${field}" holds ${value === null ? 'null' : typeof value}, expected a string or number`);
	}
	// numbers keep the text they were written with, e.g. 12.10 or 0x1F
	scalar.value = typeof value === 'number' && scalar.source !== undefined ? scalar.source : String(value);
	scalar.type = Scalar.QUOTE_DOUBLE;
	delete scalar.tag;
}

function quotedScalar(value: unknown, field: string): Scalar {
	const scalar = isScalar(value) ? value : new Scalar(value);
	quoteScalar(scalar, field);
	return scalar;
}

function quoteMapRecord(record: YAMLMap): void {
	for (const pair of record.items) {
		const field = String(isScalar(pair.key) ? pair.key.value : pair.key);
		const { value } = pair;
		if (isScalar(value)) {
			quoteScalar(value, field);
		} else if (isSeq(value)) {
			for (const item of value.items) {
				if (!isScalar(item)) throw new RecordShapeError(`Field "${field}" holds a nested collection`);
				quoteScalar(item, field);
			}
		} else {
			throw new RecordShapeError(`Field "${field}" must be a scalar or a list of scalars`);
		}
	}
}

/**
 * Marks every leaf of every record for double-quoted output, so values that
 * look like numbers or booleans read back as strings.
 *
 * Loaded records are updated node by node; plain records get their values
 * replaced by quoted `Scalar` nodes. Anything else is rejected.
 */
export function quoteRecordScalars(records: Iterable<unknown>): void {
	for (const record of records) {
		if (isMap(record)) {
			quoteMapRecord(record);
		} else if (isPlainRecord(record)) {
			for (const [field, value] of Object.entries(record)) {
				record[field] = Array.isArray(value)
					? value.map((item: unknown) => quotedScalar(item, field))
					: quotedScalar(value, field);
			}
		} else {
			throw new RecordShapeError('Each parsed sample entry must be a mapping');
		}
	}
}
