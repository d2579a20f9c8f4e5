import { pgTable, text, bigint, bigserial, jsonb, timestamp, index } from 'drizzle-orm/pg-core';
import type { TransactionRecord } from '../types.js';

export const registrations = pgTable('registrations', {
  userId: bigint('user_id', { mode: 'number' }).primaryKey(),
  chatId: bigint('chat_id', { mode: 'number' }).notNull(),
  username: text('username'),
  cardNumber: text('card_number').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index('idx_registrations_card_number').on(table.cardNumber),
]);

// One row per card: the last known state. Replaced, never appended.
export const balanceSnapshots = pgTable('balance_snapshots', {
  cardNumber: text('card_number').primaryKey(),
  balanceOre: bigint('balance_ore', { mode: 'number' }).notNull(),
  lastTransaction: jsonb('last_transaction').$type<TransactionRecord>(),
  observedAt: timestamp('observed_at', { withTimezone: true }).notNull(),
});

export const balanceHistory = pgTable('balance_history', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  cardNumber: text('card_number').notNull(),
  balanceOre: bigint('balance_ore', { mode: 'number' }).notNull(),
  observedAt: timestamp('observed_at', { withTimezone: true }).notNull(),
}, (table) => [
  index('idx_balance_history_card_observed').on(table.cardNumber, table.observedAt),
]);
