import { sqliteTable, text, real } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';

// ---------------------------------------------------------------------------
// Counter states -- last sample per counter id (rates and moving averages)
// ---------------------------------------------------------------------------
export const counterStates = sqliteTable('counter_states', {
  counterId: text('counter_id').primaryKey(),   // host/check/item/metric
  lastValue: real('last_value').notNull(),
  lastTimestamp: real('last_timestamp').notNull(), // seconds since epoch
  updatedAt: text('updated_at').notNull().default(sql`(datetime('now'))`),
});
