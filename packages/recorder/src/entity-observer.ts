/**
 * Entity Observer
 *
 * Turns entity lifecycle events into action log entries, for every entity
 * type on the bus. Entities opt into richer entries through the capability
 * interfaces: `currentActor()` credits an actor, `trackedFields()` enables
 * update diffs.
 *
 * Always records through `recordAsync` with the event's transaction, so a
 * rolled back mutation leaves no entry.
 */

import {
	ActionCategory,
	ActorContext,
	CalendarDate,
	isIdentifiable,
	snapshotTrackedFields,
	type Actor,
	type EntityEventBus,
	type EntityFieldSnapshot,
	type EntityLifecycleEvent,
	type EntityUpdated,
	type Identifiable,
	type ObservableEntity,
} from '@actionlog/domain-core';
import { createComponentLogger, getLogger, type Logger } from '@actionlog/logging';
import type { ActionRecorder, RecordingContext } from './recorder.js';
import type { Metadata } from './metadata-codec.js';

/** Type tag of log entries themselves; never observed */
export const ACTION_LOG_TYPE = 'ActionLog';

export const DEFAULT_IGNORED_TYPES: readonly string[] = [ACTION_LOG_TYPE, 'Session', 'Migration'];

/** Fields copied into delete entries when the entity has them */
export const DELETE_SUMMARY_FIELDS: readonly string[] = ['name', 'title', 'full_name', 'display_name', 'subject'];

export interface EntityObserverOptions {
	/** Type tags never observed. `ActionLog` is always ignored. */
	readonly ignoredTypes?: readonly string[];
	readonly logger?: Logger;
}

function resolveActor(event: EntityLifecycleEvent): Actor | null {
	return event.entity.currentActor?.() ?? event.actor ?? ActorContext.getActor();
}

/**
 * Equality used to decide whether a tracked field changed.
 */
export function sameFieldValue(a: unknown, b: unknown): boolean {
	if (Object.is(a, b)) {
		return true;
	}
	if (a instanceof Date && b instanceof Date) {
		return a.getTime() === b.getTime();
	}
	if (a instanceof CalendarDate && b instanceof CalendarDate) {
		return a.equals(b);
	}
	if (isIdentifiable(a) && isIdentifiable(b)) {
		return a.typeTag() === b.typeTag() && a.identity() === b.identity();
	}
	if (typeof a === 'object' && a !== null && typeof b === 'object' && b !== null) {
		try {
			return JSON.stringify(a) === JSON.stringify(b);
		} catch {
			return false;
		}
	}
	return false;
}

export type FieldChanges = {
	readonly fields_changed: string[];
	readonly old_values: Record<string, unknown>;
	readonly new_values: Record<string, unknown>;
};

/**
 * Diff the before-write snapshot of an update against the entity's current
 * tracked values. Returns null when nothing changed.
 */
export function diffTrackedFields(event: EntityUpdated): FieldChanges | null {
	const current = snapshotTrackedFields(event.entity);
	const changes: FieldChanges = { fields_changed: [], old_values: {}, new_values: {} };

	for (const [field, value] of Object.entries(current)) {
		const before = event.previous[field];
		if (!sameFieldValue(before, value)) {
			changes.fields_changed.push(field);
			changes.old_values[field] = before;
			changes.new_values[field] = value;
		}
	}

	return changes.fields_changed.length > 0 ? changes : null;
}

/**
 * Name/title-like values of an entity about to disappear.
 */
export function summarizeDeleted(entity: ObservableEntity): EntityFieldSnapshot {
	const summary: Record<string, unknown> = {};
	if (!entity.fieldValue) {
		return summary;
	}
	for (const field of DELETE_SUMMARY_FIELDS) {
		const value = entity.fieldValue(field);
		if (value !== undefined && value !== null) {
			summary[field] = value;
		}
	}
	return summary;
}

interface DescribedEvent {
	readonly category: ActionCategory;
	readonly action: string;
	readonly metadata: Metadata;
}

function describeEvent(event: EntityLifecycleEvent, typeName: string): DescribedEvent | null {
	switch (event.kind) {
		case 'created':
			return {
				category: ActionCategory.CREATE,
				action: `Created ${typeName}`,
				metadata: { new_values: snapshotTrackedFields(event.entity) },
			};
		case 'updated': {
			const changes = diffTrackedFields(event);
			if (!changes) {
				return null;
			}
			return { category: ActionCategory.UPDATE, action: `Updated ${typeName}`, metadata: changes };
		}
		case 'deleted':
			return {
				category: ActionCategory.DELETE,
				action: `Deleted ${typeName}`,
				metadata: summarizeDeleted(event.entity),
			};
	}
}

/**
 * The entity as it was addressed by the event. Deleted entities keep the
 * identity they had before the delete.
 */
function eventTarget(event: EntityLifecycleEvent, typeName: string): Identifiable {
	if (event.kind !== 'deleted' || event.id === undefined || event.id === null) {
		return event.entity;
	}
	const id = event.id;
	return {
		identity: () => id,
		typeTag: () => typeName,
	};
}

/**
 * Subscribe the recorder to the bus.
 *
 * @returns Unsubscribe function
 */
export function observeEntities(
	bus: EntityEventBus,
	recorder: ActionRecorder,
	options: EntityObserverOptions = {},
): () => void {
	const logger = createComponentLogger(options.logger ?? getLogger(), 'EntityObserver');
	const ignored = new Set([ACTION_LOG_TYPE, ...(options.ignoredTypes ?? DEFAULT_IGNORED_TYPES)]);

	return bus.subscribe(async (event) => {
		const entity = event.entity;
		const typeName = entity.typeTag();
		if (ignored.has(typeName)) {
			return;
		}

		const actor = resolveActor(event);
		if (!actor) {
			logger.trace({ kind: event.kind, entityType: typeName }, 'No actor for entity event, not recorded');
			return;
		}

		const described = describeEvent(event, typeName);
		if (!described) {
			return;
		}

		const context: RecordingContext = { tx: event.tx };
		await recorder.recordAsync(
			actor,
			described.action,
			described.category,
			eventTarget(event, typeName),
			described.metadata,
			context,
		);
	});
}
