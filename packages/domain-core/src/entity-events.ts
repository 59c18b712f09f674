/**
 * Entity Lifecycle Events
 *
 * Typed in-process bus on which the persistence layer announces that an
 * entity was created, updated or deleted. Subscribers (the action log
 * observer) react generically through the capability interfaces; no
 * subscriber knows concrete entity types.
 *
 * Events carry the transaction the mutation ran in so that subscribers can
 * defer side effects until commit.
 */

import { getLogger, type Logger } from '@actionlog/logging';
import type { Actor, EntityId, ObservableEntity } from './capabilities.js';
import type { TransactionHandle } from './transaction-handle.js';

/**
 * Tracked field values captured at one point in time.
 */
export type EntityFieldSnapshot = Readonly<Record<string, unknown>>;

interface EntityEventBase {
	readonly entity: ObservableEntity;
	/** Actor supplied explicitly by the caller of the mutation */
	readonly actor?: Actor | null;
	/** Transaction the mutation ran in, if any */
	readonly tx?: TransactionHandle;
	readonly occurredAt: Date;
}

export interface EntityCreated extends EntityEventBase {
	readonly kind: 'created';
}

export interface EntityUpdated extends EntityEventBase {
	readonly kind: 'updated';
	/** Tracked field values before the write */
	readonly previous: EntityFieldSnapshot;
}

export interface EntityDeleted extends EntityEventBase {
	readonly kind: 'deleted';
	/** Identity before the delete; stores may clear it on the entity */
	readonly id?: EntityId | null;
}

export type EntityLifecycleEvent = EntityCreated | EntityUpdated | EntityDeleted;

export type EntityEventKind = EntityLifecycleEvent['kind'];

export type EntityEventOf<K extends EntityEventKind> = Extract<EntityLifecycleEvent, { kind: K }>;

export type EntityEventHandler<E extends EntityLifecycleEvent = EntityLifecycleEvent> = (
	event: E,
) => void | Promise<void>;

function isKind<K extends EntityEventKind>(event: EntityLifecycleEvent, kind: K): event is EntityEventOf<K> {
	return event.kind === kind;
}

/**
 * Capture the tracked field values of an entity.
 * Entities that do not track fields yield an empty snapshot.
 */
export function snapshotTrackedFields(entity: ObservableEntity): EntityFieldSnapshot {
	const snapshot: Record<string, unknown> = {};
	if (!entity.trackedFields || !entity.fieldValue) {
		return snapshot;
	}
	for (const field of entity.trackedFields()) {
		snapshot[field] = entity.fieldValue(field);
	}
	return snapshot;
}

export interface EntityEventBusOptions {
	readonly logger?: Logger;
}

/**
 * In-process publish/subscribe for entity lifecycle events.
 *
 * Handlers run in subscription order. A failing handler is logged and
 * skipped; it never fails the mutation that published the event.
 */
export class EntityEventBus {
	private readonly handlers = new Set<EntityEventHandler>();
	private readonly logger: Logger;

	constructor(options: EntityEventBusOptions = {}) {
		this.logger = options.logger ?? getLogger();
	}

	/**
	 * Subscribe to every lifecycle event.
	 *
	 * @returns Unsubscribe function
	 */
	subscribe(handler: EntityEventHandler): () => void {
		this.handlers.add(handler);
		return () => {
			this.handlers.delete(handler);
		};
	}

	/**
	 * Subscribe to one kind of lifecycle event.
	 *
	 * @returns Unsubscribe function
	 */
	on<K extends EntityEventKind>(kind: K, handler: EntityEventHandler<EntityEventOf<K>>): () => void {
		return this.subscribe((event) => (isKind(event, kind) ? handler(event) : undefined));
	}

	get subscriberCount(): number {
		return this.handlers.size;
	}

	async publish(event: EntityLifecycleEvent): Promise<void> {
		for (const handler of [...this.handlers]) {
			try {
				await handler(event);
			} catch (error) {
				this.logger.error(
					{ err: error, kind: event.kind, entityType: event.entity.typeTag() },
					'Entity event handler failed',
				);
			}
		}
	}
}
