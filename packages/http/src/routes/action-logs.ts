/**
 * Action Logs API
 *
 * Read-only REST endpoints over the action log.
 */

import type { FastifyInstance, preHandlerAsyncHookHandler } from 'fastify';
import { Type, type Static, type TSchema } from '@sinclair/typebox';
import {
	ACTION_CATEGORIES,
	ACTION_CATEGORY_LABELS,
	describeLogTarget,
	isActionCategory,
	type Actor,
	type LogEntry,
	type TargetResolver,
} from '@actionlog/domain-core';
import type { ActionLogFilters, PaginatedLogEntries, PaginationOptions } from '@actionlog/persistence';
import { badRequest, forbidden, jsonSuccess, notFound, unauthorized } from '../response.js';
import { ErrorResponseSchema } from '../schemas.js';

// ─── Param / Query Schemas ──────────────────────────────────────────────────

const IdParam = Type.Object({ id: Type.String() });

export const DEFAULT_LIMIT = 50;
export const MAX_LIMIT = 100;

const ListActionLogsQuery = Type.Object({
	category: Type.Optional(Type.String()),
	targetType: Type.Optional(Type.String()),
	targetId: Type.Optional(Type.String()),
	actorId: Type.Optional(Type.String()),
	actorTag: Type.Optional(Type.String()),
	from: Type.Optional(Type.String()),
	to: Type.Optional(Type.String()),
	search: Type.Optional(Type.String()),
	limit: Type.Optional(Type.Integer({ minimum: 1, maximum: MAX_LIMIT })),
	offset: Type.Optional(Type.Integer({ minimum: 0 })),
});

// ─── Response Schemas ───────────────────────────────────────────────────────

const Nullable = <T extends TSchema>(schema: T) => Type.Union([schema, Type.Null()]);

const ActionLogResponseSchema = Type.Object({
	id: Type.String(),
	actorId: Nullable(Type.String()),
	actorTag: Type.String(),
	action: Type.String(),
	category: Type.String(),
	categoryLabel: Type.String(),
	targetType: Nullable(Type.String()),
	targetId: Nullable(Type.String()),
	targetDisplay: Nullable(Type.String()),
	ipAddress: Nullable(Type.String()),
	userAgent: Nullable(Type.String()),
	metadata: Type.Record(Type.String(), Type.Unknown()),
	timestamp: Type.String({ description: 'ISO-8601 instant' }),
});

const ActionLogListResponseSchema = Type.Object({
	entries: Type.Array(ActionLogResponseSchema),
	total: Type.Integer(),
	limit: Type.Integer(),
	offset: Type.Integer(),
});

const OptionSchema = Type.Object({
	value: Type.String(),
	label: Type.String(),
});

const OptionListResponseSchema = Type.Array(OptionSchema);

type ActionLogResponse = Static<typeof ActionLogResponseSchema>;
type ListActionLogsQueryType = Static<typeof ListActionLogsQuery>;

/**
 * Read side of the store used by the routes.
 */
export interface ActionLogReader {
	findById(id: string): Promise<LogEntry | undefined>;
	findPaged(filters: ActionLogFilters, pagination: PaginationOptions): Promise<PaginatedLogEntries>;
	findDistinctTargetTypes(): Promise<string[]>;
}

/**
 * Dependencies for the action logs API.
 */
export interface ActionLogRoutesDeps {
	readonly store: ActionLogReader;
	/** Whether an authenticated actor may read the log */
	readonly authorize: (actor: Actor) => boolean | Promise<boolean>;
	/** Current display name of a target; without it targetDisplay is null */
	readonly resolveTarget?: TargetResolver;
}

/**
 * "TimetableLesson" → "Timetable Lesson".
 */
export function targetTypeLabel(typeName: string): string {
	return typeName.replace(/([a-z0-9])([A-Z])/g, '$1 $2');
}

function parseInstant(value: string | undefined): Date | undefined | null {
	if (value === undefined) {
		return undefined;
	}
	const date = new Date(value);
	return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Register action log API routes.
 */
export async function registerActionLogRoutes(fastify: FastifyInstance, deps: ActionLogRoutesDeps): Promise<void> {
	const { store, authorize, resolveTarget } = deps;

	async function toResponse(entry: LogEntry): Promise<ActionLogResponse> {
		return {
			id: entry.id,
			actorId: entry.actorId,
			actorTag: entry.actorTag,
			action: entry.action,
			category: entry.category,
			categoryLabel: ACTION_CATEGORY_LABELS[entry.category],
			targetType: entry.targetType,
			targetId: entry.targetId,
			targetDisplay: resolveTarget ? await describeLogTarget(entry, resolveTarget) : null,
			ipAddress: entry.ipAddress,
			userAgent: entry.userAgent,
			metadata: entry.metadata,
			timestamp: entry.timestamp.toISOString(),
		};
	}

	const guard: preHandlerAsyncHookHandler = async (request, reply) => {
		const actor = request.actionContext.actor;
		if (!actor) {
			return unauthorized(reply);
		}
		if (!(await authorize(actor))) {
			return forbidden(reply);
		}
	};

	// GET /action-logs - List entries with filters, newest first
	fastify.get<{ Querystring: ListActionLogsQueryType }>(
		'/action-logs',
		{
			preHandler: guard,
			schema: {
				querystring: ListActionLogsQuery,
				response: {
					200: ActionLogListResponseSchema,
					400: ErrorResponseSchema,
				},
			},
		},
		async (request, reply) => {
			const query = request.query;

			if (query.category !== undefined && !isActionCategory(query.category)) {
				return badRequest(reply, `Unknown category: ${query.category}`);
			}
			const category = isActionCategory(query.category) ? query.category : undefined;

			const from = parseInstant(query.from);
			const to = parseInstant(query.to);
			if (from === null || to === null) {
				return badRequest(reply, 'from and to must be ISO-8601 date-times');
			}

			const limit = query.limit ?? DEFAULT_LIMIT;
			const offset = query.offset ?? 0;

			const result = await store.findPaged(
				{
					category,
					targetType: query.targetType,
					targetId: query.targetId,
					actorId: query.actorId,
					actorTag: query.actorTag,
					from,
					to,
					search: query.search,
				},
				{ limit, offset },
			);

			return jsonSuccess(reply, {
				entries: await Promise.all(result.entries.map(toResponse)),
				total: result.total,
				limit: result.limit,
				offset: result.offset,
			});
		},
	);

	// GET /action-logs/target-types - Target types present in the log
	fastify.get(
		'/action-logs/target-types',
		{
			preHandler: guard,
			schema: {
				response: { 200: OptionListResponseSchema },
			},
		},
		async (_request, reply) => {
			const types = await store.findDistinctTargetTypes();
			return jsonSuccess(
				reply,
				types.map((value) => ({ value, label: targetTypeLabel(value) })),
			);
		},
	);

	// GET /action-logs/categories - Category choices
	fastify.get(
		'/action-logs/categories',
		{
			preHandler: guard,
			schema: {
				response: { 200: OptionListResponseSchema },
			},
		},
		async (_request, reply) => {
			return jsonSuccess(
				reply,
				ACTION_CATEGORIES.map((value) => ({ value, label: ACTION_CATEGORY_LABELS[value] })),
			);
		},
	);

	// GET /action-logs/:id - Get a single entry
	fastify.get<{ Params: Static<typeof IdParam> }>(
		'/action-logs/:id',
		{
			preHandler: guard,
			schema: {
				params: IdParam,
				response: {
					200: ActionLogResponseSchema,
					404: ErrorResponseSchema,
				},
			},
		},
		async (request, reply) => {
			const entry = await store.findById(request.params.id);
			if (!entry) {
				return notFound(reply, `Action log entry not found: ${request.params.id}`);
			}
			return jsonSuccess(reply, await toResponse(entry));
		},
	);
}
