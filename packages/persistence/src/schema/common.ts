/**
 * Shared column definitions.
 */

import { varchar, timestamp } from 'drizzle-orm/pg-core';

/**
 * Typed ID column - 17-character prefixed TSID ("alg_0HZXEQ5Y8JY5Z").
 */
export const tsidColumn = (name: string) => varchar(name, { length: 17 });

/**
 * Foreign identity column. Entity keys come from other systems (numeric
 * serials, UUIDs, TSIDs) and are stored in their string form.
 */
export const foreignIdColumn = (name: string) => varchar(name, { length: 64 });

/**
 * Standard timestamp column with timezone.
 */
export const timestampColumn = (name: string) => timestamp(name, { withTimezone: true, mode: 'date' });
