/**
 * Observed Registry
 *
 * Central dispatcher for persisting and deleting entities that announces
 * every mutation on the entity event bus. Maps entity type tags to their
 * repository operations.
 *
 * Handlers must return stored state from `findById`, not the caller's
 * instance: the registry snapshots it before the write to build the
 * "previous" values of update events.
 */

import {
	isPersisted,
	snapshotTrackedFields,
	type Actor,
	type EntityEventBus,
	type EntityId,
	type ObservableEntity,
	type TransactionHandle,
} from '@actionlog/domain-core';
import type { TransactionContext, TransactionManager } from './transaction.js';

/**
 * Repository operations for one entity type.
 */
export interface ObservedHandler<T extends ObservableEntity, Db> {
	/** Type tag the handler serves, as returned by `typeTag()` */
	readonly typeName: string;
	findById(id: EntityId, tx?: TransactionContext<Db>): Promise<T | undefined>;
	/** Insert or update; assigns the identity of new entities in place */
	persist(entity: T, tx?: TransactionContext<Db>): Promise<void>;
	delete(entity: T, tx?: TransactionContext<Db>): Promise<boolean>;
}

export interface MutationOptions<Db> {
	readonly tx?: TransactionContext<Db>;
	/** Actor credited with the mutation, when the caller knows it */
	readonly actor?: Actor | null;
}

export interface ObservedRegistry<Db> {
	register<T extends ObservableEntity>(handler: ObservedHandler<T, Db>): void;
	has(typeName: string): boolean;

	/**
	 * Persist an entity and publish `created` or `updated`.
	 *
	 * @throws Error if no handler is registered for the entity type
	 */
	persist<T extends ObservableEntity>(entity: T, options?: MutationOptions<Db>): Promise<T>;

	/**
	 * Delete an entity and publish `deleted` when the handler removed it.
	 *
	 * @throws Error if no handler is registered for the entity type
	 */
	delete<T extends ObservableEntity>(entity: T, options?: MutationOptions<Db>): Promise<boolean>;
}

export interface ObservedRegistryConfig<Db> {
	readonly bus: EntityEventBus;
	/** Source of the ambient transaction when a call passes none */
	readonly transactions?: Pick<TransactionManager<Db>, 'current'>;
}

export function createObservedRegistry<Db>(config: ObservedRegistryConfig<Db>): ObservedRegistry<Db> {
	const handlers = new Map<string, ObservedHandler<ObservableEntity, Db>>();

	function handlerFor(entity: ObservableEntity): ObservedHandler<ObservableEntity, Db> {
		const typeName = entity.typeTag();
		const handler = handlers.get(typeName);
		if (!handler) {
			throw new Error(
				`No handler registered for entity type: ${typeName}. ` +
					`Registered types: ${Array.from(handlers.keys()).join(', ')}`,
			);
		}
		return handler;
	}

	function eventTransaction(options: MutationOptions<Db>): TransactionHandle | undefined {
		return options.tx ?? config.transactions?.current() ?? undefined;
	}

	return {
		register<T extends ObservableEntity>(handler: ObservedHandler<T, Db>): void {
			handlers.set(handler.typeName, handler);
		},

		has(typeName: string): boolean {
			return handlers.has(typeName);
		},

		async persist<T extends ObservableEntity>(entity: T, options: MutationOptions<Db> = {}): Promise<T> {
			const handler = handlerFor(entity);
			const id = entity.identity();
			const existing = isPersisted(entity) && id !== null ? await handler.findById(id, options.tx) : undefined;
			const previous = existing ? snapshotTrackedFields(existing) : null;

			await handler.persist(entity, options.tx);

			const base = {
				entity,
				actor: options.actor,
				tx: eventTransaction(options),
				occurredAt: new Date(),
			};
			await config.bus.publish(previous ? { ...base, kind: 'updated', previous } : { ...base, kind: 'created' });

			return entity;
		},

		async delete<T extends ObservableEntity>(entity: T, options: MutationOptions<Db> = {}): Promise<boolean> {
			const handler = handlerFor(entity);
			const id = entity.identity();
			const deleted = await handler.delete(entity, options.tx);

			if (deleted) {
				await config.bus.publish({
					kind: 'deleted',
					entity,
					id,
					actor: options.actor,
					tx: eventTransaction(options),
					occurredAt: new Date(),
				});
			}

			return deleted;
		},
	};
}
