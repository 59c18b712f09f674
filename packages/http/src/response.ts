/**
 * Response Utilities
 */

import type { FastifyReply } from 'fastify';
import type { ErrorResponse } from './types.js';

export function jsonSuccess<T>(reply: FastifyReply, data: T, status: number = 200): FastifyReply {
	return reply.status(status).send(data);
}

/**
 * Send an error response in the standard format.
 */
export function jsonError(
	reply: FastifyReply,
	status: number,
	code: string,
	message: string,
	details?: Record<string, unknown>,
): FastifyReply {
	const response: ErrorResponse = {
		code,
		message,
		...(details ? { details } : {}),
	};
	return reply.status(status).send(response);
}

export function notFound(reply: FastifyReply, message: string = 'Not found'): FastifyReply {
	return jsonError(reply, 404, 'NOT_FOUND', message);
}

export function unauthorized(reply: FastifyReply, message: string = 'Authentication required'): FastifyReply {
	return jsonError(reply, 401, 'UNAUTHORIZED', message);
}

export function forbidden(reply: FastifyReply, message: string = 'Access denied'): FastifyReply {
	return jsonError(reply, 403, 'FORBIDDEN', message);
}

export function badRequest(reply: FastifyReply, message: string, details?: Record<string, unknown>): FastifyReply {
	return jsonError(reply, 400, 'BAD_REQUEST', message, details);
}
