/**
 * @actionlog/domain-core
 *
 * Shared domain vocabulary of the action log engine:
 * - LogEntry model, categories and entry invariants
 * - Capability interfaces implemented by entities and actors
 * - Actor context (AsyncLocalStorage)
 * - Transaction capability used for post-commit recording
 * - Entity lifecycle event bus
 * - Calendar date value type
 */

export {
	isPersisted,
	isIdentifiable,
	type EntityId,
	type Identifiable,
	type Actor,
	type HasActorContext,
	type TracksFields,
	type ObservableEntity,
} from './capabilities.js';

export {
	ActionCategory,
	ACTION_CATEGORIES,
	ACTION_CATEGORY_LABELS,
	ACTION_MAX_LENGTH,
	USER_AGENT_MAX_LENGTH,
	TARGET_TYPE_MAX_LENGTH,
	SYSTEM_ACTOR_TAG,
	TARGET_UNAVAILABLE,
	isActionCategory,
	buildNewLogEntry,
	describeLogTarget,
	normalizeIpAddress,
	withoutNul,
	type LogEntry,
	type NewLogEntry,
	type NewLogEntryInput,
	type LogTarget,
	type TargetResolver,
	type JsonPrimitive,
	type JsonValue,
	type JsonObject,
} from './action-log.js';

export { ActorContext, type ActorContextData } from './actor-context.js';

export { type TransactionHandle, type CommitCallback } from './transaction-handle.js';

export {
	EntityEventBus,
	snapshotTrackedFields,
	type EntityEventBusOptions,
	type EntityLifecycleEvent,
	type EntityCreated,
	type EntityUpdated,
	type EntityDeleted,
	type EntityEventKind,
	type EntityEventOf,
	type EntityEventHandler,
	type EntityFieldSnapshot,
} from './entity-events.js';

export { CalendarDate } from './calendar-date.js';
