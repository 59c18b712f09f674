/**
 * Action Log Store
 *
 * Append-only storage for log entries. There is deliberately no update or
 * delete operation: entries are written once by the recorder and read by the
 * query API.
 */

import type { ActionCategory, LogEntry, NewLogEntry, TransactionHandle } from '@actionlog/domain-core';
import type { DrizzleDb, TransactionContext } from './transaction.js';

/**
 * Pagination options.
 */
export interface PaginationOptions {
	readonly limit: number;
	readonly offset: number;
}

/**
 * Filter options for entry queries. All filters combine with AND.
 */
export interface ActionLogFilters {
	readonly category?: ActionCategory | undefined;
	readonly targetType?: string | undefined;
	readonly targetId?: string | undefined;
	readonly actorId?: string | undefined;
	readonly actorTag?: string | undefined;
	/** Inclusive lower bound on timestamp */
	readonly from?: Date | undefined;
	/** Inclusive upper bound on timestamp */
	readonly to?: Date | undefined;
	/** Case-insensitive substring of the action text */
	readonly search?: string | undefined;
}

/**
 * Paginated entry result, newest first.
 */
export interface PaginatedLogEntries {
	readonly entries: LogEntry[];
	readonly total: number;
	readonly limit: number;
	readonly offset: number;
}

export interface ActionLogStore<Db = DrizzleDb> {
	/**
	 * Create an entry. The store assigns the id and, unless given, the
	 * timestamp. The write goes into `tx` when it is an open transaction of
	 * the store's manager, else joins the ambient transaction, if any.
	 */
	create(entry: NewLogEntry, tx?: TransactionHandle): Promise<LogEntry>;
	findById(id: string, tx?: TransactionContext<Db>): Promise<LogEntry | undefined>;
	findPaged(
		filters: ActionLogFilters,
		pagination: PaginationOptions,
		tx?: TransactionContext<Db>,
	): Promise<PaginatedLogEntries>;
	/** Target type tags that occur in the log, sorted */
	findDistinctTargetTypes(tx?: TransactionContext<Db>): Promise<string[]>;
	count(filters?: ActionLogFilters, tx?: TransactionContext<Db>): Promise<number>;
}

/**
 * Escape LIKE wildcards so search text matches literally.
 */
export function escapeLikePattern(text: string): string {
	return text.replace(/[\\%_]/g, (match) => `\\${match}`);
}
