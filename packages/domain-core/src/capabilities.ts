/**
 * Capability Interfaces
 *
 * The action log never knows concrete entity classes. Anything that wants to be
 * recorded as a target, observed on save/delete, or credited as an actor
 * implements the small interfaces below.
 */

/**
 * Identity of a persisted entity. Numeric keys and string keys (TSIDs, UUIDs)
 * are both accepted; the log stores them in string form.
 */
export type EntityId = string | number;

/**
 * An entity with a stable identity and a type tag.
 *
 * `identity()` returns null until the entity has been persisted.
 */
export interface Identifiable {
	identity(): EntityId | null;
	typeTag(): string;
}

/**
 * The principal credited with an action.
 */
export interface Actor {
	/** Persistent key of the actor, null while unsaved */
	identity(): EntityId | null;
	/** UUID copied onto every entry; outlives the actor record */
	stableTag(): string;
}

/**
 * Entity carrying a transient "acting principal" attached by the caller
 * before it is saved or deleted.
 */
export interface HasActorContext {
	currentActor(): Actor | null;
}

/**
 * Entity exposing the fields that are diffed on update.
 */
export interface TracksFields {
	trackedFields(): readonly string[];
	fieldValue(field: string): unknown;
}

/**
 * What the entity observer accepts: identity is required, the rest optional.
 */
export type ObservableEntity = Identifiable & Partial<HasActorContext> & Partial<TracksFields>;

/**
 * True once the value has been assigned a persistent identity.
 */
export function isPersisted(value: { identity(): EntityId | null }): boolean {
	const id = value.identity();
	return id !== null && id !== '';
}

/**
 * Runtime check used where values arrive untyped (metadata trees).
 */
export function isIdentifiable(value: unknown): value is Identifiable {
	if (typeof value !== 'object' || value === null) {
		return false;
	}
	return (
		'identity' in value &&
		typeof value.identity === 'function' &&
		'typeTag' in value &&
		typeof value.typeTag === 'function'
	);
}
