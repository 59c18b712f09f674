import { describe, it, expect } from 'vitest';
import { getTableConfig } from 'drizzle-orm/pg-core';
import { actionLogs } from '../schema/index.js';
import { escapeLikePattern } from '../action-log-store.js';

describe('action_logs schema', () => {
	const config = getTableConfig(actionLogs);

	it('should define the table and its columns', () => {
		expect(config.name).toBe('action_logs');
		expect(config.columns.map((column) => column.name)).toEqual([
			'id',
			'actor_id',
			'actor_tag',
			'action',
			'category',
			'ip_address',
			'user_agent',
			'target_type',
			'target_id',
			'metadata',
			'timestamp',
		]);
	});

	it('should require action, category, actor tag and timestamp', () => {
		const required = config.columns.filter((column) => column.notNull).map((column) => column.name);

		expect(required).toEqual(['id', 'actor_tag', 'action', 'category', 'metadata', 'timestamp']);
	});

	it('should constrain the target pair', () => {
		expect(config.checks.map((check) => check.name)).toEqual(['action_logs_target_pair']);
	});
});

describe('escapeLikePattern', () => {
	it('should escape wildcards and backslashes', () => {
		expect(escapeLikePattern('100%_done\\')).toBe('100\\%\\_done\\\\');
	});
});
