/**
 * Action Log Model
 *
 * One immutable record of "who did what to which entity". Entries are
 * created once, never updated, and only removed by retention jobs that live
 * outside this code base.
 *
 * The target is a weak reference: deleting the target entity leaves the entry
 * in place with a type/id pair that no longer resolves.
 */

import { isIP } from 'node:net';
import type { Actor, EntityId } from './capabilities.js';

/**
 * Closed set of action categories.
 */
export const ActionCategory = {
	CREATE: 'CREATE',
	UPDATE: 'UPDATE',
	DELETE: 'DELETE',
	VIEW: 'VIEW',
	LOGIN: 'LOGIN',
	LOGOUT: 'LOGOUT',
	UPLOAD: 'UPLOAD',
	DOWNLOAD: 'DOWNLOAD',
	SHARE: 'SHARE',
	SYSTEM: 'SYSTEM',
	OTHER: 'OTHER',
} as const;

export type ActionCategory = (typeof ActionCategory)[keyof typeof ActionCategory];

export const ACTION_CATEGORIES: readonly ActionCategory[] = Object.values(ActionCategory);

/**
 * Human-readable category labels, as shown in filter drop-downs.
 */
export const ACTION_CATEGORY_LABELS: Readonly<Record<ActionCategory, string>> = {
	CREATE: 'Create',
	UPDATE: 'Update',
	DELETE: 'Delete',
	VIEW: 'View',
	LOGIN: 'Login',
	LOGOUT: 'Logout',
	UPLOAD: 'Upload',
	DOWNLOAD: 'Download',
	SHARE: 'Share',
	SYSTEM: 'System',
	OTHER: 'Other',
};

export function isActionCategory(value: unknown): value is ActionCategory {
	return typeof value === 'string' && (ACTION_CATEGORIES as readonly string[]).includes(value);
}

/**
 * Actor tag written when no actor is involved.
 */
export const SYSTEM_ACTOR_TAG = '00000000-0000-0000-0000-000000000000';

export const ACTION_MAX_LENGTH = 255;
export const USER_AGENT_MAX_LENGTH = 500;
export const TARGET_TYPE_MAX_LENGTH = 100;

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * Polymorphic (type tag, identity) pair.
 */
export interface LogTarget {
	readonly type: string;
	readonly id: EntityId;
}

/**
 * Persisted action log entry.
 */
export interface LogEntry {
	/** Prefixed TSID ("alg_...") */
	readonly id: string;
	/** Acting principal, null for system events or once the actor is gone */
	readonly actorId: string | null;
	/** Actor UUID at write time, or SYSTEM_ACTOR_TAG */
	readonly actorTag: string;
	readonly action: string;
	readonly category: ActionCategory;
	/** Set together with targetId, or both null */
	readonly targetType: string | null;
	readonly targetId: string | null;
	readonly ipAddress: string | null;
	readonly userAgent: string | null;
	readonly metadata: JsonObject;
	readonly timestamp: Date;
}

/**
 * Store input. The store assigns `id`, and `timestamp` unless one is given.
 */
export interface NewLogEntry {
	readonly actorId: string | null;
	readonly actorTag: string;
	readonly action: string;
	readonly category: ActionCategory;
	readonly targetType: string | null;
	readonly targetId: string | null;
	readonly ipAddress: string | null;
	readonly userAgent: string | null;
	readonly metadata: JsonObject;
	readonly timestamp?: Date;
}

export interface NewLogEntryInput {
	readonly actor: Actor | null;
	readonly action: string;
	readonly category: ActionCategory;
	readonly target?: LogTarget | null;
	readonly metadata: JsonObject;
	readonly ipAddress?: string | null;
	readonly userAgent?: string | null;
	readonly timestamp?: Date;
}

/**
 * Replace U+0000, which postgres text and jsonb columns reject.
 */
export function withoutNul(value: string): string {
	return value.includes('\u0000') ? value.replaceAll('\u0000', '\uFFFD') : value;
}

function truncate(value: string, max: number): string {
	const text = withoutNul(value);
	return text.length > max ? text.slice(0, max) : text;
}

/**
 * The address when it is a literal IPv4 or IPv6 address, else null.
 */
export function normalizeIpAddress(value: string | null | undefined): string | null {
	const address = value?.trim();
	return address && isIP(address) !== 0 ? address : null;
}

/**
 * Build a store input from domain values, enforcing the entry invariants.
 *
 * @throws Error when the actor is unsaved or its tag is not a UUID, the
 *   category is unknown, or the target is half-populated
 */
export function buildNewLogEntry(input: NewLogEntryInput): NewLogEntry {
	if (!isActionCategory(input.category)) {
		throw new Error(`Unknown action category: ${String(input.category)}`);
	}

	let actorId: string | null = null;
	let actorTag = SYSTEM_ACTOR_TAG;
	if (input.actor) {
		const identity = input.actor.identity();
		if (identity === null || identity === '') {
			throw new Error('Actor has no identity; it must be persisted before it can be logged');
		}
		actorTag = input.actor.stableTag();
		if (!UUID_PATTERN.test(actorTag)) {
			throw new Error(`Actor tag is not a UUID: ${actorTag}`);
		}
		actorId = String(identity);
	}

	let targetType: string | null = null;
	let targetId: string | null = null;
	if (input.target) {
		const { type, id } = input.target;
		if (!type || id === null || id === undefined || id === '') {
			throw new Error('Log target needs both a type tag and an identity');
		}
		targetType = truncate(type, TARGET_TYPE_MAX_LENGTH);
		targetId = withoutNul(String(id));
	}

	return {
		actorId,
		actorTag,
		action: truncate(input.action, ACTION_MAX_LENGTH),
		category: input.category,
		targetType,
		targetId,
		ipAddress: normalizeIpAddress(input.ipAddress),
		userAgent: input.userAgent != null ? truncate(input.userAgent, USER_AGENT_MAX_LENGTH) : null,
		metadata: input.metadata,
		...(input.timestamp ? { timestamp: input.timestamp } : {}),
	};
}

/**
 * Display text shown for a target that no longer resolves.
 */
export const TARGET_UNAVAILABLE = 'Object no longer available';

/**
 * Looks up the current display name of a target, null when it is gone.
 */
export type TargetResolver = (targetType: string, targetId: string) => Promise<string | null>;

/**
 * Describe an entry's target for readers.
 *
 * @returns null for entries without a target, TARGET_UNAVAILABLE when the
 *   target was deleted or cannot be looked up
 */
export async function describeLogTarget(entry: LogEntry, resolve: TargetResolver): Promise<string | null> {
	if (entry.targetType === null || entry.targetId === null) {
		return null;
	}
	try {
		return (await resolve(entry.targetType, entry.targetId)) ?? TARGET_UNAVAILABLE;
	} catch {
		return TARGET_UNAVAILABLE;
	}
}
