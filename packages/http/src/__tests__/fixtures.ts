import Fastify, { type FastifyInstance } from 'fastify';
import cookie from '@fastify/cookie';
import type { Actor, EntityId } from '@actionlog/domain-core';
import { createSilentLogger } from '@actionlog/logging';
import {
	createInMemoryActionLogStore,
	createInMemoryTransactionManager,
	type ActionLogStore,
	type InMemoryJournal,
} from '@actionlog/persistence';
import { createActionRecorder, type ActionRecorder } from '@actionlog/recorder';
import { actorContextPlugin } from '../plugins/actor-context.js';

export const ALICE_TAG = '5f0c2a9e-7b3d-4e1f-a6c8-1d2e3f4a5b6c';
export const BOB_TAG = 'c1d2e3f4-a5b6-4c7d-8e9f-0a1b2c3d4e5f';

export class TestUser implements Actor {
	constructor(
		readonly id: number,
		readonly tag: string,
	) {}

	identity(): EntityId | null {
		return this.id;
	}

	stableTag(): string {
		return this.tag;
	}
}

export const alice = new TestUser(7, ALICE_TAG);
export const bob = new TestUser(8, BOB_TAG);

const users = new Map<string, TestUser>([
	['7', alice],
	['8', bob],
]);

/** Token → user id */
const tokens = new Map<string, string>([
	['alice-session', '7'],
	['alice-token', '7'],
	['bob-token', '8'],
]);

export interface TestApp {
	readonly app: FastifyInstance;
	readonly store: ActionLogStore<InMemoryJournal>;
	readonly recorder: ActionRecorder;
	readonly validateToken: (token: string) => Promise<string | null>;
}

/**
 * Fastify instance with cookies and the actor context plugin registered,
 * backed by an in-memory store.
 */
export async function createTestApp(options: { skipPaths?: string[] } = {}): Promise<TestApp> {
	const logger = createSilentLogger();
	const transactions = createInMemoryTransactionManager({ logger });
	const store = createInMemoryActionLogStore(transactions);
	const recorder = createActionRecorder({ store, transactions, logger, testMode: false });
	const validateToken = async (token: string) => tokens.get(token) ?? null;

	const app = Fastify();
	await app.register(cookie);
	await app.register(actorContextPlugin, {
		validateToken,
		loadActor: async (id) => users.get(id) ?? null,
		skipPaths: options.skipPaths ?? ['/health'],
	});

	return { app, store, recorder, validateToken };
}
