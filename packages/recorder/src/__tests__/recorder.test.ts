import { describe, it, expect, vi } from 'vitest';
import {
	ActionCategory,
	CalendarDate,
	SYSTEM_ACTOR_TAG,
	type CommitCallback,
	type TransactionHandle,
} from '@actionlog/domain-core';
import { createSilentLogger } from '@actionlog/logging';
import { METADATA_FAILURE_MESSAGE } from '../metadata-codec.js';
import { createActionRecorder } from '../recorder.js';
import { ADMIN_TAG, FixedDecimal, TestActor, admin, allEntries, createHarness, studentWithId } from './fixtures.js';

describe('ActionRecorder.record', () => {
	it('should persist an entry for an actor and a target', async () => {
		const { recorder } = createHarness();

		const entry = await recorder.record(admin, 'Created Student', ActionCategory.CREATE, studentWithId(42));

		expect(entry).toMatchObject({
			actorId: '1',
			actorTag: ADMIN_TAG,
			action: 'Created Student',
			category: 'CREATE',
			targetType: 'Student',
			targetId: '42',
			metadata: {},
		});
	});

	it('should credit system actions to the sentinel tag', async () => {
		const { recorder } = createHarness();

		const entry = await recorder.record(null, 'System cleanup', ActionCategory.SYSTEM);

		expect(entry?.actorId).toBeNull();
		expect(entry?.actorTag).toBe(SYSTEM_ACTOR_TAG);
		expect(entry?.targetType).toBeNull();
		expect(entry?.targetId).toBeNull();
	});

	it('should do nothing for an unsaved actor', async () => {
		const { recorder, store } = createHarness();
		const unsaved = new TestActor(null, ADMIN_TAG);

		const entry = await recorder.record(unsaved, 'Created Student', ActionCategory.CREATE, studentWithId(42));

		expect(entry).toBeNull();
		expect(await store.count()).toBe(0);
	});

	it('should store encoded metadata', async () => {
		const { recorder } = createHarness();

		const entry = await recorder.record(admin, 'Recorded fee payment', ActionCategory.CREATE, null, {
			amount: new FixedDecimal('9.99'),
			when: CalendarDate.of(2024, 1, 1),
		});

		expect(entry?.metadata).toEqual({ amount: 9.99, when: '2024-01-01' });
	});

	it('should store request context columns', async () => {
		const { recorder } = createHarness();

		const entry = await recorder.record(admin, 'GET /documents/5', ActionCategory.VIEW, null, null, {
			ipAddress: '203.0.113.7',
			userAgent: 'Mozilla/5.0',
		});

		expect(entry?.ipAddress).toBe('203.0.113.7');
		expect(entry?.userAgent).toBe('Mozilla/5.0');
	});

	it('should return null for an unknown category', async () => {
		const { recorder, store } = createHarness();

		const entry = await recorder.record(admin, 'Archived', 'ARCHIVE' as never);

		expect(entry).toBeNull();
		expect(await store.count()).toBe(0);
	});

	it('should return null for a target without identity', async () => {
		const { recorder } = createHarness();
		const student = studentWithId(1);
		student.id = null;

		expect(await recorder.record(admin, 'Created Student', ActionCategory.CREATE, student)).toBeNull();
	});

	it('should return null when the store fails', async () => {
		const recorder = createActionRecorder({
			store: {
				create: async () => {
					throw new Error('connection refused');
				},
			},
			logger: createSilentLogger(),
		});

		expect(await recorder.record(admin, 'Created Student', ActionCategory.CREATE)).toBeNull();
	});
});

describe('ActionRecorder.recordSystem', () => {
	it('should mark the metadata as a system action', async () => {
		const { recorder } = createHarness();

		const entry = await recorder.recordSystem('Nightly grade import', ActionCategory.SYSTEM, null, { rows: 120 });

		expect(entry?.actorTag).toBe(SYSTEM_ACTOR_TAG);
		expect(entry?.metadata).toEqual({ rows: 120, system: true });
	});

	it('should resolve with the fallback metadata when reading the metadata throws', async () => {
		const { recorder } = createHarness();
		const metadata = new Proxy<Record<string, unknown>>(
			{},
			{
				ownKeys: () => {
					throw new Error('revoked');
				},
			},
		);

		const entry = await recorder.recordSystem('Nightly grade import', ActionCategory.SYSTEM, null, metadata);

		expect(entry?.metadata).toEqual({
			error: METADATA_FAILURE_MESSAGE,
			original_action: 'Nightly grade import',
			system: true,
		});
	});

	it('should keep the system flag over a caller key of the same name', async () => {
		const { recorder } = createHarness();

		const entry = await recorder.recordSystem('Nightly grade import', ActionCategory.SYSTEM, null, { system: false });

		expect(entry?.metadata).toEqual({ system: true });
	});

	it('should resolve to null instead of throwing for an invalid target', async () => {
		const { recorder, store } = createHarness();
		const student = studentWithId(1);
		student.id = null;

		await expect(recorder.recordSystem('Nightly grade import', ActionCategory.SYSTEM, student)).resolves.toBeNull();
		expect(await store.count()).toBe(0);
	});
});

describe('ActionRecorder explicit transactions', () => {
	it('should write into the passed transaction rather than the ambient one', async () => {
		const { recorder, store, transactions } = createHarness();

		await transactions.inTransaction(async (outer) => {
			await expect(
				transactions.inTransaction(async () => {
					await recorder.record(admin, 'Created Student', ActionCategory.CREATE, null, null, { tx: outer });
					throw new Error('enrolment rejected');
				}),
			).rejects.toThrow('enrolment rejected');
		});

		expect(await store.count()).toBe(1);
	});

	it('should write into the passed transaction in test mode', async () => {
		const { recorder, store, transactions } = createHarness({ testMode: true });

		await transactions.inTransaction(async (outer) => {
			await expect(
				transactions.inTransaction(async () => {
					await recorder.recordAsync(admin, 'Created Student', ActionCategory.CREATE, null, null, { tx: outer });
					throw new Error('enrolment rejected');
				}),
			).rejects.toThrow('enrolment rejected');
		});

		expect(await store.count()).toBe(1);
	});
});

describe('ActionRecorder.recordAsync', () => {
	it('should write inline in test mode', async () => {
		const { recorder, store } = createHarness({ testMode: true });

		await recorder.recordAsync(admin, 'Created Student', ActionCategory.CREATE, studentWithId(42));

		expect(await store.count()).toBe(1);
	});

	it('should hand work to the background queue outside transactions', async () => {
		const { recorder, store } = createHarness();

		await recorder.recordAsync(admin, 'Viewed timetable', ActionCategory.VIEW);
		await recorder.flush();

		expect(await store.count()).toBe(1);
	});

	it('should write only after the surrounding transaction commits', async () => {
		const { recorder, store, transactions } = createHarness();

		await transactions.inTransaction(async () => {
			await recorder.recordAsync(admin, 'Updated Student', ActionCategory.UPDATE, studentWithId(42));
			await recorder.flush();
			expect(await store.count()).toBe(0);
		});
		await recorder.flush();

		const entries = await allEntries(store);
		expect(entries.map((entry) => entry.action)).toEqual(['Updated Student']);
	});

	it('should leave no entry when the transaction rolls back', async () => {
		const { recorder, store, transactions } = createHarness();

		await expect(
			transactions.inTransaction(async () => {
				await recorder.recordAsync(admin, 'Created Student', ActionCategory.CREATE, studentWithId(42));
				throw new Error('enrolment rejected');
			}),
		).rejects.toThrow('enrolment rejected');
		await recorder.flush();

		expect(await store.count()).toBe(0);
	});

	it('should leave no entry on rollback in test mode either', async () => {
		const { recorder, store, transactions } = createHarness({ testMode: true });

		await expect(
			transactions.inTransaction(async () => {
				await recorder.recordAsync(admin, 'Created Student', ActionCategory.CREATE, studentWithId(42));
				throw new Error('enrolment rejected');
			}),
		).rejects.toThrow('enrolment rejected');

		expect(await store.count()).toBe(0);
	});

	it('should defer through an explicitly passed transaction', async () => {
		const { recorder, store } = createHarness();
		const callbacks: CommitCallback[] = [];
		const tx: TransactionHandle = {
			isOpen: () => true,
			onCommit: (callback) => {
				callbacks.push(callback);
			},
		};

		await recorder.recordAsync(admin, 'Shared document', ActionCategory.SHARE, null, null, { tx });
		await recorder.flush();
		expect(await store.count()).toBe(0);

		for (const callback of callbacks) {
			await callback();
		}
		await recorder.flush();

		expect(await store.count()).toBe(1);
	});

	it('should treat a closed explicit transaction as no transaction', async () => {
		const { recorder, store } = createHarness();
		const onCommit = vi.fn();

		await recorder.recordAsync(admin, 'Shared document', ActionCategory.SHARE, null, null, {
			tx: { isOpen: () => false, onCommit },
		});
		await recorder.flush();

		expect(onCommit).not.toHaveBeenCalled();
		expect(await store.count()).toBe(1);
	});

	it('should store the metadata as it was at call time', async () => {
		const { recorder, store } = createHarness();
		const metadata = { status: 'draft' };

		await recorder.recordAsync(admin, 'Updated document', ActionCategory.UPDATE, null, metadata);
		metadata.status = 'published';
		await recorder.flush();

		const [entry] = await allEntries(store);
		expect(entry?.metadata).toEqual({ status: 'draft' });
	});

	it('should store the target identity as it was at call time', async () => {
		const { recorder, store, transactions } = createHarness();
		const student = studentWithId(42);

		await transactions.inTransaction(async () => {
			await recorder.recordAsync(admin, 'Deleted Student', ActionCategory.DELETE, student);
			student.id = null;
		});
		await recorder.flush();

		const [entry] = await allEntries(store);
		expect(entry?.targetId).toBe('42');
	});

	it('should drop writes submitted after close', async () => {
		const { recorder, store } = createHarness();

		await recorder.recordAsync(admin, 'Viewed timetable', ActionCategory.VIEW);
		await recorder.close();
		await recorder.recordAsync(admin, 'Viewed timetable', ActionCategory.VIEW);
		await recorder.flush();

		expect(await store.count()).toBe(1);
	});

	it('should never reject', async () => {
		const recorder = createActionRecorder({
			store: {
				create: async () => {
					throw new Error('connection refused');
				},
			},
			logger: createSilentLogger(),
			testMode: true,
		});

		await expect(recorder.recordAsync(admin, 'Created Student', ActionCategory.CREATE)).resolves.toBeUndefined();
	});
});

describe('ActionRecorder test mode', () => {
	it('should toggle per instance', () => {
		const first = createHarness().recorder;
		const second = createHarness().recorder;

		first.setTestMode(true);

		expect(first.isTestMode()).toBe(true);
		expect(second.isTestMode()).toBe(false);
	});
});
