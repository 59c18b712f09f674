/**
 * Wires the recorder and the entity observer from environment configuration.
 */

import type { ActionLogConfig } from '@actionlog/config';
import type { EntityEventBus } from '@actionlog/domain-core';
import { createLogger, type DestinationStream, type Logger } from '@actionlog/logging';
import {
	createDatabase,
	createDrizzleActionLogStore,
	createTransactionManager,
	type ActionLogStore,
	type DrizzleDb,
	type TransactionManager,
} from '@actionlog/persistence';
import { createActionRecorder, type ActionRecorder, type EntryWriter, type TransactionSource } from './recorder.js';
import { DEFAULT_IGNORED_TYPES, observeEntities } from './entity-observer.js';

export interface ActionLogEngineDependencies {
	readonly store: EntryWriter;
	readonly transactions?: TransactionSource;
	/** Observed when given */
	readonly bus?: EntityEventBus;
	readonly logger?: Logger;
}

export interface ActionLogEngine {
	readonly recorder: ActionRecorder;
	/**
	 * Stop observing entities and wait for queued writes.
	 */
	stop(): Promise<void>;
}

export function createActionLogEngine(
	config: Pick<ActionLogConfig, 'syncMode' | 'concurrency' | 'backlog' | 'ignoredTypes'>,
	deps: ActionLogEngineDependencies,
): ActionLogEngine {
	const recorder = createActionRecorder({
		store: deps.store,
		transactions: deps.transactions,
		concurrency: config.concurrency,
		backlog: config.backlog,
		testMode: config.syncMode,
		logger: deps.logger,
	});

	const unsubscribe = deps.bus
		? observeEntities(deps.bus, recorder, {
				ignoredTypes: [...DEFAULT_IGNORED_TYPES, ...config.ignoredTypes],
				logger: deps.logger,
			})
		: () => undefined;

	return {
		recorder,
		async stop() {
			unsubscribe();
			await recorder.close();
		},
	};
}

export interface ActionLogBootstrapOptions {
	readonly serviceName?: string;
	/** Observed when given */
	readonly bus?: EntityEventBus;
	/** Log output when not pretty printing (default: stdout) */
	readonly destination?: DestinationStream;
}

export interface ActionLogRuntime extends ActionLogEngine {
	readonly logger: Logger;
	readonly transactions: TransactionManager<DrizzleDb>;
	readonly store: ActionLogStore<DrizzleDb>;
}

/**
 * Build the logger, the postgres connection, the store and the engine from
 * loaded configuration. `stop` also closes the connection pool.
 *
 * @example
 * ```typescript
 * const runtime = bootstrapActionLog(loadActionLogConfig(), { bus });
 * process.on('SIGTERM', () => void runtime.stop());
 * ```
 *
 * @throws Error when no database URL is configured
 */
export function bootstrapActionLog(config: ActionLogConfig, options: ActionLogBootstrapOptions = {}): ActionLogRuntime {
	const logger = createLogger({
		level: config.logLevel,
		pretty: config.logPretty,
		serviceName: options.serviceName ?? 'actionlog',
		destination: options.destination,
	});

	if (!config.databaseUrl) {
		throw new Error('DATABASE_URL is required to start the action log');
	}

	const database = createDatabase({ url: config.databaseUrl, logger });
	const transactions = createTransactionManager(database.db, { logger });
	const store = createDrizzleActionLogStore(transactions);
	const engine = createActionLogEngine(config, { store, transactions, bus: options.bus, logger });

	logger.info(
		{ syncMode: config.syncMode, concurrency: config.concurrency, backlog: config.backlog },
		'Action log started',
	);

	return {
		logger,
		transactions,
		store,
		recorder: engine.recorder,
		async stop() {
			await engine.stop();
			await database.close();
			logger.info('Action log stopped');
		},
	};
}
