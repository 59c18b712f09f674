/**
 * In-memory persistence
 *
 * Process-local stand-ins for postgres: a transaction manager whose writes
 * are buffered per scope and discarded on rollback, and an action log store
 * built on it. Used by tests and local tooling.
 *
 * Reads only see committed writes.
 */

import type { LogEntry, NewLogEntry, TransactionHandle } from '@actionlog/domain-core';
import { generate } from '@actionlog/tsid';
import {
	createScopedTransactionManager,
	resolveDb,
	type TransactionManager,
	type TransactionManagerOptions,
} from './transaction.js';
import type {
	ActionLogFilters,
	ActionLogStore,
	PaginatedLogEntries,
	PaginationOptions,
} from './action-log-store.js';

export type StagedChange = () => void;

/**
 * Write journal. The root journal applies changes immediately; a forked
 * journal buffers them until it is committed into its parent.
 */
export class InMemoryJournal {
	private readonly staged: StagedChange[] = [];

	constructor(private readonly parent: InMemoryJournal | null = null) {}

	apply(change: StagedChange): void {
		if (this.parent === null) {
			change();
		} else {
			this.staged.push(change);
		}
	}

	fork(): InMemoryJournal {
		return new InMemoryJournal(this);
	}

	commit(): void {
		const changes = this.staged.splice(0);
		for (const change of changes) {
			if (this.parent) {
				this.parent.apply(change);
			}
		}
	}

	/** Number of changes waiting for commit */
	get pending(): number {
		return this.staged.length;
	}
}

/**
 * Transaction manager over an in-memory journal.
 */
export function createInMemoryTransactionManager(
	options: TransactionManagerOptions = {},
): TransactionManager<InMemoryJournal> {
	return createScopedTransactionManager(
		new InMemoryJournal(),
		async (parent, work) => {
			const journal = parent.fork();
			const result = await work(journal);
			journal.commit();
			return result;
		},
		options,
	);
}

function matches(entry: LogEntry, filters: ActionLogFilters): boolean {
	if (filters.category && entry.category !== filters.category) return false;
	if (filters.targetType && entry.targetType !== filters.targetType) return false;
	if (filters.targetId && entry.targetId !== filters.targetId) return false;
	if (filters.actorId && entry.actorId !== filters.actorId) return false;
	if (filters.actorTag && entry.actorTag !== filters.actorTag) return false;
	if (filters.from && entry.timestamp < filters.from) return false;
	if (filters.to && entry.timestamp > filters.to) return false;
	if (filters.search && !entry.action.toLowerCase().includes(filters.search.toLowerCase())) return false;
	return true;
}

function newestFirst(a: LogEntry, b: LogEntry): number {
	const byTime = b.timestamp.getTime() - a.timestamp.getTime();
	if (byTime !== 0) return byTime;
	return a.id < b.id ? 1 : a.id > b.id ? -1 : 0;
}

/**
 * Action log store held in memory.
 */
export function createInMemoryActionLogStore(
	transactions: TransactionManager<InMemoryJournal>,
): ActionLogStore<InMemoryJournal> {
	const entries = new Map<string, LogEntry>();

	function select(filters: ActionLogFilters): LogEntry[] {
		return [...entries.values()].filter((entry) => matches(entry, filters)).sort(newestFirst);
	}

	return {
		async create(entry: NewLogEntry, tx?: TransactionHandle): Promise<LogEntry> {
			const created: LogEntry = Object.freeze({
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
			});
			resolveDb(transactions, tx).apply(() => {
				entries.set(created.id, created);
			});
			return created;
		},

		async findById(id: string): Promise<LogEntry | undefined> {
			return entries.get(id);
		},

		async findPaged(filters: ActionLogFilters, pagination: PaginationOptions): Promise<PaginatedLogEntries> {
			const selected = select(filters);
			return {
				entries: selected.slice(pagination.offset, pagination.offset + pagination.limit),
				total: selected.length,
				limit: pagination.limit,
				offset: pagination.offset,
			};
		},

		async findDistinctTargetTypes(): Promise<string[]> {
			const types = new Set<string>();
			for (const entry of entries.values()) {
				if (entry.targetType !== null) {
					types.add(entry.targetType);
				}
			}
			return [...types].sort();
		},

		async count(filters: ActionLogFilters = {}): Promise<number> {
			return select(filters).length;
		},
	};
}
