import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

export const objectives = sqliteTable('objectives', {
  address: text('address').primaryKey(),
  description: text('description').notNull(),
  completed: integer('completed', { mode: 'boolean' }).notNull().default(false),
});
