import { sqliteTable, text, integer, check } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';
import type { Priority } from '../types/priority.js';

/** Keyed by address like objectives, but deliberately without a foreign key */
export const priorities = sqliteTable('priorities', {
  address: text('address').primaryKey(),
  urgency: integer('urgency').$type<Priority>().notNull(),
}, (table) => [
  check('urgency_range', sql`${table.urgency} BETWEEN 1 AND 3`),
]);
