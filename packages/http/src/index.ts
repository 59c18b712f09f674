/**
 * @actionlog/http
 *
 * Fastify integration of the action log:
 * - Actor context plugin (session cookie / Bearer token)
 * - Request interceptor recording one entry per request
 * - Read-only action log API
 */

export * from './types.js';

export { jsonSuccess, jsonError, notFound, unauthorized, forbidden, badRequest } from './response.js';

export { ErrorResponseSchema, type ErrorResponseType } from './schemas.js';

export { requestPath, clientIp, userAgent } from './request-info.js';

export { actorContextPlugin, runAsActor, requireActorHook } from './plugins/actor-context.js';

export {
	actionLogPlugin,
	categoryForMethod,
	extractResource,
	bodyData,
	DEFAULT_SKIP_PREFIXES,
	DEFAULT_METHODS,
	DEFAULT_PATH_EXTRACTORS,
	DEFAULT_REDACTED_FIELDS,
} from './plugins/action-log.js';

export {
	registerActionLogRoutes,
	targetTypeLabel,
	DEFAULT_LIMIT,
	MAX_LIMIT,
	type ActionLogReader,
	type ActionLogRoutesDeps,
} from './routes/action-logs.js';
