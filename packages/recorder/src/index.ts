/**
 * @actionlog/recorder
 *
 * Writes the action log:
 * - Metadata codec (total JSON encoding with fallbacks)
 * - Action recorder (sync, post-commit and background strategies)
 * - Bounded background queue
 * - Entity observer turning lifecycle events into entries
 */

export { encodeMetadata, METADATA_FAILURE_MESSAGE, type Metadata } from './metadata-codec.js';

export {
	BackgroundQueue,
	type BackgroundTask,
	type BackgroundQueueConfig,
	type BackgroundQueueState,
	type BackgroundQueueStats,
} from './background-queue.js';

export {
	createActionRecorder,
	DEFAULT_CONCURRENCY,
	DEFAULT_BACKLOG,
	type ActionRecorder,
	type ActionRecorderConfig,
	type RecordingContext,
	type EntryWriter,
	type TransactionSource,
} from './recorder.js';

export {
	observeEntities,
	diffTrackedFields,
	summarizeDeleted,
	sameFieldValue,
	ACTION_LOG_TYPE,
	DEFAULT_IGNORED_TYPES,
	DELETE_SUMMARY_FIELDS,
	type EntityObserverOptions,
	type FieldChanges,
} from './entity-observer.js';

export {
	createActionLogEngine,
	bootstrapActionLog,
	type ActionLogEngine,
	type ActionLogEngineDependencies,
	type ActionLogBootstrapOptions,
	type ActionLogRuntime,
} from './engine.js';
