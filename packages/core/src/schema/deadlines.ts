import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

/** Keyed by address like objectives, but deliberately without a foreign key */
export const deadlines = sqliteTable('deadlines', {
  address: text('address').primaryKey(),
  /** Absolute block height, computed once when scheduled */
  targetPoint: integer('target_point').notNull(),
  alertActivated: integer('alert_activated', { mode: 'boolean' }).notNull().default(false),
});
