import { EntityEventBus, type Actor, type EntityId, type ObservableEntity } from '@actionlog/domain-core';
import { createSilentLogger } from '@actionlog/logging';
import {
	createInMemoryActionLogStore,
	createInMemoryTransactionManager,
	createObservedRegistry,
	resolveDb,
	type ActionLogStore,
	type InMemoryJournal,
	type ObservedHandler,
	type ObservedRegistry,
	type TransactionManager,
} from '@actionlog/persistence';
import { createActionRecorder, type ActionRecorder } from '../recorder.js';

export const ADMIN_TAG = '3b8d1e52-6c1f-4b7a-9e2d-0f4a5c6b7d8e';
export const TUTOR_TAG = '9a7c5e3b-1d2f-4a6b-8c0e-2f4d6b8a0c1e';

export class TestActor implements Actor {
	constructor(
		readonly id: number | null,
		readonly tag: string,
	) {}

	identity(): EntityId | null {
		return this.id;
	}

	stableTag(): string {
		return this.tag;
	}
}

export const admin = new TestActor(1, ADMIN_TAG);
export const tutor = new TestActor(2, TUTOR_TAG);

export class Student implements ObservableEntity {
	id: number | null = null;
	actingUser: Actor | null = null;

	constructor(
		public name: string,
		public grade: string,
	) {}

	identity(): EntityId | null {
		return this.id;
	}

	typeTag(): string {
		return 'Student';
	}

	currentActor(): Actor | null {
		return this.actingUser;
	}

	trackedFields(): readonly string[] {
		return ['name', 'grade'];
	}

	fieldValue(field: string): unknown {
		switch (field) {
			case 'name':
				return this.name;
			case 'grade':
				return this.grade;
			default:
				return undefined;
		}
	}

	toString(): string {
		return this.name;
	}
}

export function studentWithId(id: number, name = 'Jane Doe', grade = 'B'): Student {
	const student = new Student(name, grade);
	student.id = id;
	return student;
}

export function createStudentHandler(
	transactions: TransactionManager<InMemoryJournal>,
): ObservedHandler<Student, InMemoryJournal> {
	const rows = new Map<EntityId, { name: string; grade: string }>();
	let nextId = 1;

	return {
		typeName: 'Student',
		async findById(id) {
			const row = rows.get(id);
			if (!row) return undefined;
			return studentWithId(Number(id), row.name, row.grade);
		},
		async persist(student, tx) {
			if (student.id === null) {
				student.id = nextId++;
			}
			const id = student.id;
			const row = { name: student.name, grade: student.grade };
			resolveDb(transactions, tx).apply(() => rows.set(id, row));
		},
		async delete(student, tx) {
			const id = student.id;
			if (id === null || !rows.has(id)) return false;
			resolveDb(transactions, tx).apply(() => rows.delete(id));
			student.id = null;
			return true;
		},
	};
}

export interface Harness {
	readonly transactions: TransactionManager<InMemoryJournal>;
	readonly store: ActionLogStore<InMemoryJournal>;
	readonly recorder: ActionRecorder;
	readonly bus: EntityEventBus;
	readonly registry: ObservedRegistry<InMemoryJournal>;
}

export function createHarness(options: { testMode?: boolean } = {}): Harness {
	const logger = createSilentLogger();
	const transactions = createInMemoryTransactionManager({ logger });
	const store = createInMemoryActionLogStore(transactions);
	const recorder = createActionRecorder({ store, transactions, logger, testMode: options.testMode ?? false });
	const bus = new EntityEventBus({ logger });
	const registry = createObservedRegistry({ bus, transactions });
	registry.register(createStudentHandler(transactions));
	return { transactions, store, recorder, bus, registry };
}

/**
 * Fixed-precision decimal in the shape of decimal.js values.
 */
export class FixedDecimal {
	constructor(private readonly digits: string) {}

	toNumber(): number {
		return Number(this.digits);
	}

	toFixed(): string {
		return this.digits;
	}

	toString(): string {
		return this.digits;
	}
}

export async function allEntries(store: ActionLogStore<InMemoryJournal>) {
	const page = await store.findPaged({}, { limit: 100, offset: 0 });
	return page.entries;
}
