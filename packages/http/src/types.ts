/**
 * HTTP Layer Types
 *
 * Fastify request decorators and plugin options.
 */

import type { Actor, EntityId } from '@actionlog/domain-core';
import type { ActionRecorder } from '@actionlog/recorder';

/**
 * Who is calling and from where, resolved once per request.
 */
export interface ActionRequestContext {
	/** The authenticated actor (null if not authenticated) */
	readonly actor: Actor | null;
	/** First X-Forwarded-For hop, else the socket address */
	readonly ipAddress: string | null;
	readonly userAgent: string | null;
}

/**
 * Configuration for the actor context plugin.
 */
export interface ActorContextPluginOptions {
	/** Cookie name for session token (default: session) */
	readonly sessionCookieName?: string;
	/** Paths resolved as anonymous without looking at credentials */
	readonly skipPaths?: readonly string[];
	/** Validate a session or bearer token and return the actor id */
	readonly validateToken: (token: string) => Promise<string | null>;
	/** Load the actor for a validated id */
	readonly loadActor: (actorId: string) => Promise<Actor | null>;
}

/**
 * Recognizes one kind of resource path and names the entity it addresses.
 */
export interface PathExtractor {
	/** Must capture the identifier in its first group */
	readonly pattern: RegExp;
	/** Metadata key the identifier is stored under */
	readonly metadataKey: string;
	/** Type tag of the addressed entity, used as the entry target */
	readonly targetType: string;
}

export interface ExtractedResource {
	readonly metadataKey: string;
	readonly targetType: string;
	readonly id: EntityId;
}

/**
 * Configuration for the request interceptor.
 */
export interface ActionLogPluginOptions {
	readonly recorder: ActionRecorder;
	/** Path prefixes never recorded (default: /admin/, /static/) */
	readonly skipPrefixes?: readonly string[];
	/** Methods recorded (default: GET, POST, PUT, PATCH, DELETE) */
	readonly methods?: readonly string[];
	/** Path extractors (default: documents, timetables) */
	readonly extractors?: readonly PathExtractor[];
	/** Body fields replaced before the body is stored (default: password, token, secret) */
	readonly redactFields?: readonly string[];
}

/**
 * Standard error response format.
 */
export interface ErrorResponse {
	/** Human-readable error message */
	readonly message: string;
	/** Machine-readable error code */
	readonly code: string;
	/** Additional error details */
	readonly details?: Record<string, unknown>;
}

declare module 'fastify' {
	interface FastifyRequest {
		/** Actor and client details of the request */
		actionContext: ActionRequestContext;
	}
}
