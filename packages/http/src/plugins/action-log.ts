/**
 * Action Log Plugin
 *
 * Records one action log entry per authenticated, successful request. Runs
 * in the onResponse hook, after the reply has been sent, so it can never
 * change what the client receives.
 */

import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { ActionCategory, type Identifiable } from '@actionlog/domain-core';
import type { ActionLogPluginOptions, ExtractedResource, PathExtractor } from '../types.js';
import { requestPath } from '../request-info.js';

export const DEFAULT_SKIP_PREFIXES: readonly string[] = ['/admin/', '/static/'];

export const DEFAULT_METHODS: readonly string[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'];

export const DEFAULT_PATH_EXTRACTORS: readonly PathExtractor[] = [
	{ pattern: /\/documents\/([^/]+)/, metadataKey: 'document_id', targetType: 'Document' },
	{ pattern: /\/timetables\/([^/]+)/, metadataKey: 'timetable_id', targetType: 'Timetable' },
];

export const DEFAULT_REDACTED_FIELDS: readonly string[] = ['password', 'token', 'secret'];

const REDACTED = '[REDACTED]';

const BODY_METHODS = new Set(['POST', 'PUT', 'PATCH']);

const METHOD_CATEGORIES: Readonly<Record<string, ActionCategory>> = {
	GET: ActionCategory.VIEW,
	POST: ActionCategory.CREATE,
	PUT: ActionCategory.UPDATE,
	PATCH: ActionCategory.UPDATE,
	DELETE: ActionCategory.DELETE,
};

export function categoryForMethod(method: string): ActionCategory {
	return METHOD_CATEGORIES[method.toUpperCase()] ?? ActionCategory.OTHER;
}

/**
 * First extractor match for a path. Numeric identifiers become numbers.
 */
export function extractResource(path: string, extractors: readonly PathExtractor[]): ExtractedResource | null {
	for (const extractor of extractors) {
		const raw = extractor.pattern.exec(path)?.[1];
		if (raw) {
			return {
				metadataKey: extractor.metadataKey,
				targetType: extractor.targetType,
				id: /^\d+$/.test(raw) ? Number(raw) : decodeURIComponent(raw),
			};
		}
	}
	return null;
}

function resourceTarget(resource: ExtractedResource): Identifiable {
	return {
		identity: () => resource.id,
		typeTag: () => resource.targetType,
	};
}

function redact(value: unknown, redactFields: ReadonlySet<string>): unknown {
	if (Array.isArray(value)) {
		return value.map((item: unknown) => redact(item, redactFields));
	}
	if (typeof value !== 'object' || value === null) {
		return value;
	}
	const data: Record<string, unknown> = {};
	for (const [key, item] of Object.entries(value)) {
		data[key] = redactFields.has(key.toLowerCase()) ? REDACTED : redact(item, redactFields);
	}
	return data;
}

/**
 * Request body as stored in metadata, with sensitive fields replaced at
 * any depth.
 */
export function bodyData(method: string, body: unknown, redactFields: ReadonlySet<string>): unknown {
	if (!BODY_METHODS.has(method) || body === undefined) {
		return null;
	}
	return redact(body, redactFields);
}

/**
 * Action log plugin for Fastify.
 *
 * @example
 * ```typescript
 * await fastify.register(actorContextPlugin, { validateToken, loadActor });
 * await fastify.register(actionLogPlugin, { recorder });
 * ```
 */
const actionLogPluginAsync: FastifyPluginAsync<ActionLogPluginOptions> = async (fastify, opts) => {
	const {
		recorder,
		skipPrefixes = DEFAULT_SKIP_PREFIXES,
		extractors = DEFAULT_PATH_EXTRACTORS,
	} = opts;
	const methods = new Set((opts.methods ?? DEFAULT_METHODS).map((method) => method.toUpperCase()));
	const redactFields = new Set((opts.redactFields ?? DEFAULT_REDACTED_FIELDS).map((field) => field.toLowerCase()));

	fastify.addHook('onResponse', async (request, reply) => {
		try {
			if (recorder.isTestMode() || reply.statusCode >= 400) {
				return;
			}

			const { actor, ipAddress, userAgent } = request.actionContext;
			if (!actor) {
				return;
			}

			const method = request.method.toUpperCase();
			const path = requestPath(request.url);
			if (!methods.has(method) || skipPrefixes.some((prefix) => path.startsWith(prefix))) {
				return;
			}

			const resource = extractResource(path, extractors);
			const metadata: Record<string, unknown> = {
				method,
				path,
				status_code: reply.statusCode,
				query_params: request.query ?? {},
				data: bodyData(method, request.body, redactFields),
			};
			if (resource) {
				metadata[resource.metadataKey] = resource.id;
			}

			await recorder.recordAsync(
				actor,
				`${method} ${path}`,
				categoryForMethod(method),
				resource ? resourceTarget(resource) : null,
				metadata,
				{ ipAddress, userAgent },
			);
		} catch (error) {
			request.log.debug({ err: error }, 'Action log interceptor failed');
		}
	});
};

export const actionLogPlugin = fp(actionLogPluginAsync, {
	name: '@actionlog/action-log',
	fastify: '5.x',
	dependencies: ['@actionlog/actor-context'],
});
