/**
 * Actor Context
 *
 * Request-scoped "current actor" for code that cannot be handed one
 * explicitly (entity observers reacting to a save deep inside a use case).
 * Uses AsyncLocalStorage so concurrent requests never see each other's actor.
 *
 * Populated by:
 * - HTTP handlers wrapping their use case in `ActorContext.run()`
 * - Tests via `run()` / `runAsync()`
 *
 * Explicitly passed actors always take precedence over this context.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import type { Actor } from './capabilities.js';

/**
 * Context data stored in AsyncLocalStorage.
 */
export interface ActorContextData {
	readonly actor: Actor | null;
}

const storage = new AsyncLocalStorage<ActorContextData>();

export const ActorContext = {
	/**
	 * Current context data, or null outside any scope.
	 */
	current(): ActorContextData | null {
		return storage.getStore() ?? null;
	},

	/**
	 * The ambient actor, or null when none was established.
	 */
	getActor(): Actor | null {
		return storage.getStore()?.actor ?? null;
	},

	/**
	 * Run a function with the given actor as ambient actor.
	 */
	run<T>(actor: Actor | null, fn: () => T): T {
		return storage.run({ actor }, fn);
	},

	/**
	 * Run an async function with the given actor as ambient actor.
	 */
	async runAsync<T>(actor: Actor | null, fn: () => Promise<T>): Promise<T> {
		return storage.run({ actor }, fn);
	},
};
