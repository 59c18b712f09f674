/**
 * Action Logs Schema
 *
 * One row per recorded action. The actor and target columns are weak
 * references: no foreign keys, so deleting a user or a document never
 * touches the trail.
 */

import { sql } from 'drizzle-orm';
import { pgTable, varchar, jsonb, uuid, index, check } from 'drizzle-orm/pg-core';
import type { JsonObject } from '@actionlog/domain-core';
import { tsidColumn, foreignIdColumn, timestampColumn } from './common.js';

export const actionLogs = pgTable(
	'action_logs',
	{
		id: tsidColumn('id').primaryKey(),

		// Who
		actorId: foreignIdColumn('actor_id'),
		actorTag: uuid('actor_tag').notNull(),

		// What
		action: varchar('action', { length: 255 }).notNull(),
		category: varchar('category', { length: 20 }).notNull().default('OTHER'),

		// Request context
		ipAddress: varchar('ip_address', { length: 45 }),
		userAgent: varchar('user_agent', { length: 500 }),

		// Which entity
		targetType: varchar('target_type', { length: 100 }),
		targetId: foreignIdColumn('target_id'),

		metadata: jsonb('metadata').$type<JsonObject>().notNull().default({}),

		timestamp: timestampColumn('timestamp').notNull().defaultNow(),
	},
	(table) => [
		index('idx_action_logs_timestamp').on(table.timestamp.desc()),
		index('idx_action_logs_actor').on(table.actorId),
		index('idx_action_logs_actor_tag').on(table.actorTag),
		index('idx_action_logs_category').on(table.category),
		index('idx_action_logs_target').on(table.targetType, table.targetId),
		check('action_logs_target_pair', sql`(${table.targetType} IS NULL) = (${table.targetId} IS NULL)`),
	],
);

export type ActionLogRecord = typeof actionLogs.$inferSelect;

export type NewActionLogRecord = typeof actionLogs.$inferInsert;
