/**
 * Request details shared by the plugins.
 */

import { normalizeIpAddress } from '@actionlog/domain-core';
import type { FastifyRequest } from 'fastify';

/**
 * Path without the query string.
 */
export function requestPath(url: string): string {
	const queryStart = url.indexOf('?');
	return queryStart === -1 ? url : url.slice(0, queryStart);
}

/**
 * Client address: the first X-Forwarded-For hop when present, else the
 * socket peer. Null when the chosen value is not an IP address.
 */
export function clientIp(request: FastifyRequest): string | null {
	const forwarded = request.headers['x-forwarded-for'];
	const header = Array.isArray(forwarded) ? forwarded[0] : forwarded;
	const first = header?.split(',')[0]?.trim();
	if (first) {
		return normalizeIpAddress(first);
	}
	return normalizeIpAddress(request.socket.remoteAddress);
}

export function userAgent(request: FastifyRequest): string | null {
	return request.headers['user-agent'] ?? null;
}
