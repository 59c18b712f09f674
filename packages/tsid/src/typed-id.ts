/**
 * Prefixed IDs stored as-is: "{prefix}_{tsid}", 17 characters in total.
 */

import { generateRaw, isValid } from './tsid.js';

export const EntityType = {
	ACTION_LOG: 'alg',
} as const;

export type EntityTypeKey = keyof typeof EntityType;

export type EntityTypePrefix = (typeof EntityType)[EntityTypeKey];

export const TYPED_ID_LENGTH = 17;

/**
 * Generate a new prefixed ID, e.g. `generate('ACTION_LOG')` → "alg_0HZXEQ5Y8JY5Z".
 */
export function generate(type: EntityTypeKey): string {
	return `${EntityType[type]}_${generateRaw()}`;
}

export function isValidTypedId(id: string, type?: EntityTypeKey): boolean {
	const separator = id.indexOf('_');
	if (separator !== 3 || id.length !== TYPED_ID_LENGTH) {
		return false;
	}
	const prefix = id.slice(0, separator);
	if (type !== undefined && prefix !== EntityType[type]) {
		return false;
	}
	return isValid(id.slice(separator + 1));
}
