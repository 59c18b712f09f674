/**
 * Actor Context Plugin
 *
 * Resolves the acting principal of each request from a session cookie or a
 * Bearer token and decorates the request with `actionContext`.
 *
 * Requires @fastify/cookie to be registered first.
 */

import type { FastifyPluginAsync, FastifyRequest, preHandlerHookHandler } from 'fastify';
import type {} from '@fastify/cookie';
import fp from 'fastify-plugin';
import { ActorContext } from '@actionlog/domain-core';
import type { ActorContextPluginOptions } from '../types.js';
import { clientIp, requestPath, userAgent } from '../request-info.js';
import { unauthorized } from '../response.js';

/**
 * Actor context plugin for Fastify.
 *
 * Attempts to authenticate the request using:
 * 1. Session cookie (browser clients)
 * 2. Bearer token in Authorization header (API clients)
 *
 * @example
 * ```typescript
 * const fastify = Fastify();
 * await fastify.register(cookie);
 * await fastify.register(actorContextPlugin, {
 *     validateToken: async (token) => sessions.userIdFor(token),
 *     loadActor: async (id) => users.findById(id),
 * });
 * ```
 */
const actorContextPluginAsync: FastifyPluginAsync<ActorContextPluginOptions> = async (fastify, opts) => {
	const { sessionCookieName = 'session', skipPaths = [], validateToken, loadActor } = opts;

	fastify.decorateRequest('actionContext', null, []);

	fastify.addHook('onRequest', async (request) => {
		const client = { ipAddress: clientIp(request), userAgent: userAgent(request) };
		const path = requestPath(request.url);

		if (skipPaths.some((skipPath) => path.startsWith(skipPath))) {
			request.actionContext = { actor: null, ...client };
			return;
		}

		let actorId: string | null = null;

		const sessionToken = request.cookies[sessionCookieName];
		if (sessionToken) {
			actorId = await validateToken(sessionToken);
		}

		if (!actorId) {
			const authHeader = request.headers.authorization;
			if (authHeader?.startsWith('Bearer ')) {
				actorId = await validateToken(authHeader.substring('Bearer '.length));
			}
		}

		const actor = actorId ? await loadActor(actorId) : null;
		request.actionContext = { actor, ...client };
	});
};

export const actorContextPlugin = fp(actorContextPluginAsync, {
	name: '@actionlog/actor-context',
	fastify: '5.x',
	dependencies: ['@fastify/cookie'],
});

/**
 * Run a use case with the request's actor as the ambient actor, so entity
 * observers credit it.
 */
export function runAsActor<T>(request: FastifyRequest, fn: () => Promise<T>): Promise<T> {
	return ActorContext.runAsync(request.actionContext.actor, fn);
}

/**
 * preHandler hook answering 401 for anonymous requests.
 */
export function requireActorHook(): preHandlerHookHandler {
	return async (request, reply) => {
		if (!request.actionContext.actor) {
			return unauthorized(reply);
		}
	};
}
