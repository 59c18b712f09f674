/**
 * @actionlog/persistence
 *
 * Database access for the action log engine:
 * - DrizzleORM schema and postgres.js connection
 * - Transaction manager with post-commit callbacks
 * - Action log store (postgres and in-memory)
 * - Observed registry publishing entity lifecycle events
 */

export { createDatabase, type DatabaseConfig, type Database } from './connection.js';

export {
	createTransactionManager,
	createScopedTransactionManager,
	resolveDb,
	type DrizzleDb,
	type TransactionContext,
	type TransactionManager,
	type TransactionManagerOptions,
	type BeginTransaction,
} from './transaction.js';

export * from './schema/index.js';

export {
	escapeLikePattern,
	type ActionLogStore,
	type ActionLogFilters,
	type PaginationOptions,
	type PaginatedLogEntries,
} from './action-log-store.js';

export { createDrizzleActionLogStore } from './drizzle-action-log-store.js';

export {
	InMemoryJournal,
	createInMemoryTransactionManager,
	createInMemoryActionLogStore,
	type StagedChange,
} from './in-memory.js';

export {
	createObservedRegistry,
	type ObservedHandler,
	type ObservedRegistry,
	type ObservedRegistryConfig,
	type MutationOptions,
} from './observed-registry.js';
