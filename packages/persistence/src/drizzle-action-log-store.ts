/**
 * Action log store over postgres (DrizzleORM).
 */

import { and, desc, eq, gte, ilike, lte, sql, type SQL } from 'drizzle-orm';
import {
	ActionCategory,
	isActionCategory,
	type LogEntry,
	type NewLogEntry,
	type TransactionHandle,
} from '@actionlog/domain-core';
import { generate } from '@actionlog/tsid';
import { actionLogs, type ActionLogRecord, type NewActionLogRecord } from './schema/index.js';
import { resolveDb, type DrizzleDb, type TransactionContext, type TransactionManager } from './transaction.js';
import {
	escapeLikePattern,
	type ActionLogFilters,
	type ActionLogStore,
	type PaginatedLogEntries,
	type PaginationOptions,
} from './action-log-store.js';

/**
 * AND of the given filters; undefined when there are none.
 */
export function buildConditions(filters: ActionLogFilters): SQL | undefined {
	const conditions: SQL[] = [];

	if (filters.category) {
		conditions.push(eq(actionLogs.category, filters.category));
	}
	if (filters.targetType) {
		conditions.push(eq(actionLogs.targetType, filters.targetType));
	}
	if (filters.targetId) {
		conditions.push(eq(actionLogs.targetId, filters.targetId));
	}
	if (filters.actorId) {
		conditions.push(eq(actionLogs.actorId, filters.actorId));
	}
	if (filters.actorTag) {
		conditions.push(eq(actionLogs.actorTag, filters.actorTag));
	}
	if (filters.from) {
		conditions.push(gte(actionLogs.timestamp, filters.from));
	}
	if (filters.to) {
		conditions.push(lte(actionLogs.timestamp, filters.to));
	}
	if (filters.search) {
		conditions.push(ilike(actionLogs.action, `%${escapeLikePattern(filters.search)}%`));
	}

	return conditions.length > 0 ? and(...conditions) : undefined;
}

/**
 * Row to entry. Categories outside the closed set read as OTHER.
 */
export function recordToEntry(record: ActionLogRecord): LogEntry {
	return Object.freeze({
		id: record.id,
		actorId: record.actorId,
		actorTag: record.actorTag,
		action: record.action,
		category: isActionCategory(record.category) ? record.category : ActionCategory.OTHER,
		targetType: record.targetType,
		targetId: record.targetId,
		ipAddress: record.ipAddress,
		userAgent: record.userAgent,
		metadata: record.metadata,
		timestamp: record.timestamp,
	});
}

/**
 * One page of entries, newest first. Entries sharing a timestamp are ordered
 * by id, which is time-sorted too.
 */
export function selectPageQuery(db: DrizzleDb, filters: ActionLogFilters, pagination: PaginationOptions) {
	return db
		.select()
		.from(actionLogs)
		.where(buildConditions(filters))
		.orderBy(desc(actionLogs.timestamp), desc(actionLogs.id))
		.limit(pagination.limit)
		.offset(pagination.offset);
}

export function selectCountQuery(db: DrizzleDb, filters: ActionLogFilters) {
	return db
		.select({ count: sql<number>`count(*)` })
		.from(actionLogs)
		.where(buildConditions(filters));
}

/**
 * Create the postgres-backed store.
 *
 * @param transactions - Supplies the default handle and the ambient transaction
 */
export function createDrizzleActionLogStore(transactions: TransactionManager<DrizzleDb>): ActionLogStore<DrizzleDb> {
	const db = (tx?: TransactionHandle): DrizzleDb => resolveDb(transactions, tx);

	return {
		async create(entry: NewLogEntry, tx?: TransactionHandle): Promise<LogEntry> {
			const values: NewActionLogRecord = {
				id: generate('ACTION_LOG'),
				actorId: entry.actorId,
				actorTag: entry.actorTag,
				action: entry.action,
				category: entry.category,
				targetType: entry.targetType,
				targetId: entry.targetId,
				ipAddress: entry.ipAddress,
				userAgent: entry.userAgent,
				metadata: entry.metadata,
				timestamp: entry.timestamp ?? new Date(),
			};

			const [record] = await db(tx).insert(actionLogs).values(values).returning();
			if (!record) {
				throw new Error('Insert into action_logs returned no row');
			}
			return recordToEntry(record);
		},

		async findById(id: string, tx?: TransactionContext<DrizzleDb>): Promise<LogEntry | undefined> {
			const [record] = await db(tx).select().from(actionLogs).where(eq(actionLogs.id, id)).limit(1);

			if (!record) return undefined;

			return recordToEntry(record);
		},

		async findPaged(
			filters: ActionLogFilters,
			pagination: PaginationOptions,
			tx?: TransactionContext<DrizzleDb>,
		): Promise<PaginatedLogEntries> {
			const [records, countResult] = await Promise.all([
				selectPageQuery(db(tx), filters, pagination),
				selectCountQuery(db(tx), filters),
			]);

			return {
				entries: records.map(recordToEntry),
				total: Number(countResult[0]?.count ?? 0),
				limit: pagination.limit,
				offset: pagination.offset,
			};
		},

		async findDistinctTargetTypes(tx?: TransactionContext<DrizzleDb>): Promise<string[]> {
			const rows = await db(tx)
				.selectDistinct({ targetType: actionLogs.targetType })
				.from(actionLogs)
				.orderBy(actionLogs.targetType);

			return rows.flatMap((row) => (row.targetType === null ? [] : [row.targetType]));
		},

		async count(filters: ActionLogFilters = {}, tx?: TransactionContext<DrizzleDb>): Promise<number> {
			const [result] = await selectCountQuery(db(tx), filters);

			return Number(result?.count ?? 0);
		},
	};
}
