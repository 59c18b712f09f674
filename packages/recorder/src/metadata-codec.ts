/**
 * Metadata Codec
 *
 * Turns caller-supplied metadata into a JSON object that always persists.
 * Three tiers, each a fallback for the one before:
 *
 * 1. structural encoding of the whole tree
 * 2. per top-level key, replacing values that still fail by their string form
 * 3. a fixed error object naming the action
 *
 * `encodeMetadata` never throws.
 */

import { CalendarDate, isIdentifiable, withoutNul, type JsonObject, type JsonValue } from '@actionlog/domain-core';
import { getLogger, type Logger } from '@actionlog/logging';

export type Metadata = Readonly<Record<string, unknown>>;

export const METADATA_FAILURE_MESSAGE = 'metadata serialization failed';

class MetadataEncodingError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'MetadataEncodingError';
	}
}

/**
 * Fixed-precision numerics (decimal.js, big.js and friends).
 */
interface FixedPrecisionNumber {
	toNumber(): number;
	toFixed(): string;
}

function isFixedPrecisionNumber(value: object): value is FixedPrecisionNumber {
	return (
		'toNumber' in value &&
		typeof value.toNumber === 'function' &&
		'toFixed' in value &&
		typeof value.toFixed === 'function'
	);
}

function hasToJSON(value: object): value is { toJSON(): unknown } {
	return 'toJSON' in value && typeof value.toJSON === 'function';
}

function isPlainObject(value: object): boolean {
	const prototype: unknown = Object.getPrototypeOf(value);
	return prototype === Object.prototype || prototype === null;
}

function encodeNumber(value: number): number {
	if (!Number.isFinite(value)) {
		throw new MetadataEncodingError(`Non-finite number: ${value}`);
	}
	return value;
}

function encodeValue(value: unknown, seen: Set<object>): JsonValue {
	switch (typeof value) {
		case 'string':
			return withoutNul(value);
		case 'boolean':
			return value;
		case 'number':
			return encodeNumber(value);
		case 'bigint':
			return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
		case 'undefined':
			return null;
		case 'function':
		case 'symbol':
			throw new MetadataEncodingError(`Unsupported value of type ${typeof value}`);
		default:
			break;
	}

	if (typeof value !== 'object' || value === null) {
		return null;
	}
	if (seen.has(value)) {
		throw new MetadataEncodingError('Circular reference');
	}

	seen.add(value);
	try {
		return encodeObject(value, seen);
	} finally {
		seen.delete(value);
	}
}

function encodeObject(value: object, seen: Set<object>): JsonValue {
	if (value instanceof Date) {
		if (Number.isNaN(value.getTime())) {
			throw new MetadataEncodingError('Invalid date');
		}
		return value.toISOString();
	}
	if (value instanceof CalendarDate) {
		return value.toISOString();
	}
	if (isFixedPrecisionNumber(value)) {
		return encodeNumber(value.toNumber());
	}
	if (isIdentifiable(value)) {
		const id = value.identity();
		return {
			type: withoutNul(value.typeTag()),
			id: typeof id === 'string' ? withoutNul(id) : id,
			display: withoutNul(String(value)),
		};
	}
	if (Array.isArray(value)) {
		return value.map((item: unknown) => encodeValue(item, seen));
	}
	if (value instanceof Set) {
		return [...value].map((item: unknown) => encodeValue(item, seen));
	}
	if (value instanceof Map) {
		const result: JsonObject = {};
		for (const [key, item] of value) {
			if (typeof key !== 'string') {
				throw new MetadataEncodingError(`Map key of type ${typeof key}`);
			}
			if (item !== undefined) {
				result[withoutNul(key)] = encodeValue(item, seen);
			}
		}
		return result;
	}
	if (isPlainObject(value)) {
		return encodeEntries(Object.entries(value), seen);
	}
	if (hasToJSON(value)) {
		return encodeValue(value.toJSON(), seen);
	}
	throw new MetadataEncodingError(`Unsupported object: ${value.constructor.name}`);
}

function encodeEntries(entries: [string, unknown][], seen: Set<object>): JsonObject {
	const result: JsonObject = {};
	for (const [key, item] of entries) {
		if (item !== undefined) {
			result[withoutNul(key)] = encodeValue(item, seen);
		}
	}
	return result;
}

function encodeLeniently(metadata: Metadata, logger: Logger): JsonObject {
	const result: JsonObject = {};
	for (const [key, item] of Object.entries(metadata)) {
		if (item === undefined) {
			continue;
		}
		try {
			result[withoutNul(key)] = encodeValue(item, new Set<object>([metadata]));
		} catch (error) {
			logger.debug({ err: error, key }, 'Metadata value replaced by its string form');
			result[withoutNul(key)] = withoutNul(String(item));
		}
	}
	return result;
}

/**
 * Encode metadata for storage.
 *
 * @param metadata - Arbitrary caller values; null or undefined encode to `{}`
 * @param action - Action text, kept in the error object of the last tier
 */
export function encodeMetadata(
	metadata: Metadata | null | undefined,
	action: string,
	logger: Logger = getLogger(),
): JsonObject {
	if (metadata === null || metadata === undefined) {
		return {};
	}

	try {
		return encodeEntries(Object.entries(metadata), new Set<object>([metadata]));
	} catch (error) {
		logger.debug({ err: error, action }, 'Structural metadata encoding failed, encoding per key');
	}

	try {
		return encodeLeniently(metadata, logger);
	} catch (error) {
		logger.debug({ err: error, action }, 'Metadata encoding failed');
		return { error: METADATA_FAILURE_MESSAGE, original_action: withoutNul(action) };
	}
}
