export { tsidColumn, foreignIdColumn, timestampColumn } from './common.js';
export { actionLogs, type ActionLogRecord, type NewActionLogRecord } from './action-logs.js';
