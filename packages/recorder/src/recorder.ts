/**
 * Action Recorder
 *
 * The single entry point for writing action log entries. Producers (entity
 * observer, HTTP interceptor, application code) call it; nothing else
 * writes the store.
 *
 * Recording never fails the caller: every entry point catches at its own
 * boundary and logs at debug level.
 */

import {
	buildNewLogEntry,
	isPersisted,
	type ActionCategory,
	type Actor,
	type Identifiable,
	type JsonObject,
	type LogEntry,
	type LogTarget,
	type NewLogEntry,
	type TransactionHandle,
} from '@actionlog/domain-core';
import { createComponentLogger, getLogger, type Logger } from '@actionlog/logging';
import { BackgroundQueue } from './background-queue.js';
import { encodeMetadata, type Metadata } from './metadata-codec.js';

/**
 * Request-scoped values threaded through a recording call.
 */
export interface RecordingContext {
	/** Transaction of the mutation being recorded */
	readonly tx?: TransactionHandle | undefined;
	readonly ipAddress?: string | null | undefined;
	readonly userAgent?: string | null | undefined;
}

/**
 * Write side of the action log store.
 */
export interface EntryWriter {
	/** Writes into `tx` when the store can use it, else the ambient transaction */
	create(entry: NewLogEntry, tx?: TransactionHandle): Promise<LogEntry>;
}

/**
 * Source of the ambient transaction.
 */
export interface TransactionSource {
	current(): TransactionHandle | null;
}

export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_BACKLOG = 1000;

export interface ActionRecorderConfig {
	readonly store: EntryWriter;
	readonly transactions?: TransactionSource;
	/** Shared queue; one is created from `concurrency` and `backlog` otherwise */
	readonly queue?: BackgroundQueue;
	readonly concurrency?: number;
	readonly backlog?: number;
	readonly logger?: Logger;
	/** Start in synchronous mode */
	readonly testMode?: boolean;
}

export interface ActionRecorder {
	/**
	 * Write an entry now.
	 *
	 * @returns The entry, or null when nothing was written (unsaved actor,
	 *   invalid input, store failure)
	 */
	record(
		actor: Actor | null,
		action: string,
		category: ActionCategory,
		target?: Identifiable | null,
		metadata?: Metadata | null,
		context?: RecordingContext,
	): Promise<LogEntry | null>;

	/**
	 * Record without blocking the caller on the write. The entry is built
	 * from the arguments as they are at call time; only the write is deferred.
	 *
	 * Synchronous mode writes inline. Inside an open transaction the write
	 * waits for the outermost commit and is dropped on rollback. Otherwise it
	 * goes to the background queue. Never rejects.
	 */
	recordAsync(
		actor: Actor | null,
		action: string,
		category: ActionCategory,
		target?: Identifiable | null,
		metadata?: Metadata | null,
		context?: RecordingContext,
	): Promise<void>;

	/**
	 * Record an action with no actor; `system: true` is added to the metadata.
	 */
	recordSystem(
		action: string,
		category: ActionCategory,
		target?: Identifiable | null,
		metadata?: Metadata | null,
		context?: RecordingContext,
	): Promise<LogEntry | null>;

	setTestMode(enabled: boolean): void;
	isTestMode(): boolean;

	/**
	 * Resolves once queued background writes have settled.
	 */
	flush(): Promise<void>;

	/**
	 * Stop accepting background work and wait for queued writes.
	 */
	close(): Promise<void>;
}

function toLogTarget(target: Identifiable | null | undefined): LogTarget | null {
	if (!target) {
		return null;
	}
	const id = target.identity();
	if (id === null) {
		throw new Error(`Target ${target.typeTag()} has no identity`);
	}
	return { type: target.typeTag(), id };
}

export function createActionRecorder(config: ActionRecorderConfig): ActionRecorder {
	const logger = createComponentLogger(config.logger ?? getLogger(), 'ActionRecorder');
	const queue =
		config.queue ??
		new BackgroundQueue(
			{
				concurrency: config.concurrency ?? DEFAULT_CONCURRENCY,
				backlog: config.backlog ?? DEFAULT_BACKLOG,
			},
			logger,
		);
	let testMode = config.testMode ?? false;

	function openTransaction(context: RecordingContext): TransactionHandle | null {
		if (context.tx?.isOpen()) {
			return context.tx;
		}
		const ambient = config.transactions?.current() ?? null;
		return ambient?.isOpen() ? ambient : null;
	}

	/**
	 * Validate and encode everything the entry needs.
	 *
	 * @returns null for an unsaved actor
	 * @throws Error for invalid input
	 */
	function prepare(
		actor: Actor | null,
		action: string,
		category: ActionCategory,
		target: Identifiable | null,
		metadata: Metadata | null,
		context: RecordingContext,
		extra: JsonObject = {},
	): NewLogEntry | null {
		if (actor && !isPersisted(actor)) {
			return null;
		}
		return buildNewLogEntry({
			actor,
			action,
			category,
			target: toLogTarget(target),
			metadata: { ...encodeMetadata(metadata, action, logger), ...extra },
			ipAddress: context.ipAddress,
			userAgent: context.userAgent,
		});
	}

	async function write(entry: NewLogEntry, tx?: TransactionHandle): Promise<LogEntry | null> {
		try {
			return await config.store.create(entry, tx);
		} catch (error) {
			logger.debug({ err: error, action: entry.action, category: entry.category }, 'Failed to record action');
			return null;
		}
	}

	async function recordPrepared(
		actor: Actor | null,
		action: string,
		category: ActionCategory,
		target: Identifiable | null,
		metadata: Metadata | null,
		context: RecordingContext,
		extra?: JsonObject,
	): Promise<LogEntry | null> {
		try {
			const entry = prepare(actor, action, category, target, metadata, context, extra);
			return entry ? await write(entry, context.tx) : null;
		} catch (error) {
			logger.debug({ err: error, action, category }, 'Failed to record action');
			return null;
		}
	}

	const recorder: ActionRecorder = {
		record(actor, action, category, target = null, metadata = null, context = {}) {
			return recordPrepared(actor, action, category, target, metadata, context);
		},

		async recordAsync(actor, action, category, target = null, metadata = null, context = {}) {
			try {
				const entry = prepare(actor, action, category, target, metadata, context);
				if (!entry) {
					return;
				}

				if (testMode) {
					await write(entry, context.tx);
					return;
				}

				const deferred = () => write(entry);
				const tx = openTransaction(context);
				if (tx) {
					tx.onCommit(() => {
						queue.submit(deferred);
					});
					return;
				}

				queue.submit(deferred);
			} catch (error) {
				logger.debug({ err: error, action, category }, 'Failed to schedule action log entry');
			}
		},

		async recordSystem(action, category, target = null, metadata = null, context = {}) {
			return recordPrepared(null, action, category, target, metadata, context, { system: true });
		},

		setTestMode(enabled) {
			testMode = enabled;
		},

		isTestMode() {
			return testMode;
		},

		flush() {
			return queue.flush();
		},

		close() {
			return queue.drain();
		},
	};

	return recorder;
}
