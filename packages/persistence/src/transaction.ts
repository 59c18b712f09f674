/**
 * Transaction Management
 *
 * Transaction scopes with post-commit callbacks. Each manager keeps the
 * currently open scope in AsyncLocalStorage so code that was not handed a
 * transaction (entity observers, stores called from deep inside a use case)
 * still joins it.
 *
 * Nesting: an inner `inTransaction` runs as a savepoint. Callbacks registered
 * in an inner scope move to the parent when it completes and are dropped
 * when it fails. Only the outermost commit runs them.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import type { PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import type { CommitCallback, TransactionHandle } from '@actionlog/domain-core';
import { getLogger, type Logger } from '@actionlog/logging';

/**
 * Drizzle database or transaction over postgres.js.
 */
export type DrizzleDb = PgDatabase<PostgresJsQueryResultHKT>;

/**
 * Transaction context passed to repository operations.
 * Contains the database handle scoped to the current transaction.
 */
export interface TransactionContext<Db = DrizzleDb> extends TransactionHandle {
	readonly db: Db;
}

/**
 * Transaction manager for executing atomic operations.
 */
export interface TransactionManager<Db = DrizzleDb> {
	/**
	 * Execute a function within a transaction.
	 * If the function throws, the transaction is rolled back and its commit
	 * callbacks are discarded. If it returns, the transaction is committed and,
	 * for the outermost scope, the callbacks run before this promise resolves.
	 *
	 * @throws Re-throws any error from the function after rolling back
	 */
	inTransaction<T>(fn: (tx: TransactionContext<Db>) => Promise<T>): Promise<T>;

	/**
	 * The open transaction of the calling async context, if any.
	 */
	current(): TransactionContext<Db> | null;

	/**
	 * The open scope behind a handle this manager created, null for closed
	 * scopes and foreign handles.
	 */
	scopeOf(handle: TransactionHandle): TransactionContext<Db> | null;

	/**
	 * Database handle for non-transactional queries.
	 */
	readonly db: Db;
}

/**
 * Opens a transaction (or savepoint) on `parent` and runs `work` inside it.
 * Resolves after commit, rejects after rollback.
 */
export type BeginTransaction<Db> = <T>(parent: Db, work: (db: Db) => Promise<T>) => Promise<T>;

export interface TransactionManagerOptions {
	readonly logger?: Logger;
}

type ScopeState = 'open' | 'committed' | 'rolled_back';

class TransactionScope<Db> implements TransactionContext<Db> {
	private readonly callbacks: CommitCallback[] = [];
	private state: ScopeState = 'open';

	constructor(
		readonly db: Db,
		private readonly parent: TransactionScope<Db> | null,
	) {}

	isOpen(): boolean {
		return this.state === 'open';
	}

	onCommit(callback: CommitCallback): void {
		if (this.state !== 'open') {
			throw new Error(`Cannot register a commit callback on a ${this.state.replace('_', ' ')} transaction`);
		}
		this.callbacks.push(callback);
	}

	/**
	 * Mark committed. Returns the callbacks the caller must run now; nested
	 * scopes hand theirs to the parent and return none.
	 */
	complete(): CommitCallback[] {
		this.state = 'committed';
		const pending = this.callbacks.splice(0);
		if (this.parent) {
			this.parent.callbacks.push(...pending);
			return [];
		}
		return pending;
	}

	abandon(): void {
		this.state = 'rolled_back';
		this.callbacks.length = 0;
	}
}

async function runCommitCallbacks(callbacks: CommitCallback[], logger: Logger): Promise<void> {
	for (const callback of callbacks) {
		try {
			await callback();
		} catch (error) {
			logger.error({ err: error }, 'Post-commit callback failed');
		}
	}
}

/**
 * Build a transaction manager over any database handle that can open nested
 * transactions.
 */
export function createScopedTransactionManager<Db>(
	db: Db,
	begin: BeginTransaction<Db>,
	options: TransactionManagerOptions = {},
): TransactionManager<Db> {
	const logger = options.logger ?? getLogger();
	const storage = new AsyncLocalStorage<TransactionScope<Db>>();
	const scopes = new WeakMap<TransactionHandle, TransactionScope<Db>>();

	function openScope(): TransactionScope<Db> | null {
		const scope = storage.getStore();
		return scope && scope.isOpen() ? scope : null;
	}

	return {
		db,

		current() {
			return openScope();
		},

		scopeOf(handle) {
			const scope = scopes.get(handle);
			return scope && scope.isOpen() ? scope : null;
		},

		async inTransaction<T>(fn: (tx: TransactionContext<Db>) => Promise<T>): Promise<T> {
			const parent = openScope();
			const opened: { scope: TransactionScope<Db> | null } = { scope: null };
			let result: T;
			try {
				result = await begin(parent?.db ?? db, (txDb) => {
					const scope = new TransactionScope(txDb, parent);
					scopes.set(scope, scope);
					opened.scope = scope;
					return storage.run(scope, () => fn(scope));
				});
			} catch (error) {
				opened.scope?.abandon();
				throw error;
			}
			if (opened.scope === null) {
				throw new Error('Transaction body did not run');
			}
			await runCommitCallbacks(opened.scope.complete(), logger);
			return result;
		},
	};
}

/**
 * Create a transaction manager from a DrizzleORM database instance.
 * Nested calls become savepoints.
 */
export function createTransactionManager(
	db: DrizzleDb,
	options: TransactionManagerOptions = {},
): TransactionManager<DrizzleDb> {
	return createScopedTransactionManager<DrizzleDb>(db, (parent, work) => parent.transaction((tx) => work(tx)), options);
}

/**
 * Resolve the database handle: the explicit transaction when it is an open
 * scope of `transactions`, then the ambient one, then the default handle.
 */
export function resolveDb<Db>(
	transactions: Pick<TransactionManager<Db>, 'db' | 'current' | 'scopeOf'>,
	tx?: TransactionHandle,
): Db {
	const explicit = tx ? transactions.scopeOf(tx) : null;
	return explicit?.db ?? transactions.current()?.db ?? transactions.db;
}
