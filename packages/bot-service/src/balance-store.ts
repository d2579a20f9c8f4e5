import { and, desc, eq, ne } from 'drizzle-orm';
import {
  StoreError,
  balanceHistory,
  balanceSnapshots,
  registrations,
} from '@saldovakt/shared';
import type {
  BalanceHistoryEntry,
  Db,
  BalanceSnapshot,
  CardRegistration,
} from '@saldovakt/shared';

export interface RegistrationInput {
  userId: number;
  chatId: number;
  username: string | null;
  cardNumber: string;
}

export interface ReplaceSnapshotOptions {
  /** Also append the snapshot's balance to the card's history. */
  appendHistory?: boolean;
}

export interface BalanceStore {
  getRegistration(userId: number): Promise<CardRegistration | null>;
  /**
   * Saves the registration. When no other user watches the card its snapshot is
   * cleared, so the next check is a baseline.
   */
  upsertRegistration(input: RegistrationInput): Promise<CardRegistration>;
  listRegistrations(): Promise<CardRegistration[]>;
  listRegistrationsForCard(cardNumber: string): Promise<CardRegistration[]>;
  getLastSnapshot(cardNumber: string): Promise<BalanceSnapshot | null>;
  /** Sole writer of a card's last known balance. */
  replaceSnapshot(snapshot: BalanceSnapshot, options?: ReplaceSnapshotOptions): Promise<void>;
  getBalanceHistory(cardNumber: string, limit: number): Promise<BalanceHistoryEntry[]>;
}

type RegistrationRow = typeof registrations.$inferSelect;
type SnapshotRow = typeof balanceSnapshots.$inferSelect;

function toRegistration(row: RegistrationRow): CardRegistration {
  return {
    userId: row.userId,
    chatId: row.chatId,
    username: row.username,
    cardNumber: row.cardNumber,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toSnapshot(row: SnapshotRow): BalanceSnapshot {
  return {
    cardNumber: row.cardNumber,
    balanceOre: row.balanceOre,
    lastTransaction: row.lastTransaction,
    observedAt: row.observedAt,
  };
}

async function guard<T>(operation: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (err) {
    if (err instanceof StoreError) throw err;
    throw new StoreError(`${operation} failed`, { cause: err });
  }
}

export function createBalanceStore(db: Db): BalanceStore {
  return {
    getRegistration: (userId) =>
      guard('getRegistration', async () => {
        const row = await db.query.registrations.findFirst({
          where: eq(registrations.userId, userId),
        });
        return row ? toRegistration(row) : null;
      }),

    upsertRegistration: (input) =>
      guard('upsertRegistration', () =>
        db.transaction(async (tx) => {
          const now = new Date();
          const [row] = await tx
            .insert(registrations)
            .values({ ...input, createdAt: now, updatedAt: now })
            .onConflictDoUpdate({
              target: registrations.userId,
              set: {
                chatId: input.chatId,
                username: input.username,
                cardNumber: input.cardNumber,
                updatedAt: now,
              },
            })
            .returning();

          if (!row) throw new StoreError(`No registration returned for user ${input.userId}`);

          const [otherWatcher] = await tx
            .select({ userId: registrations.userId })
            .from(registrations)
            .where(and(eq(registrations.cardNumber, input.cardNumber), ne(registrations.userId, input.userId)))
            .limit(1);

          if (!otherWatcher) {
            await tx
              .delete(balanceSnapshots)
              .where(eq(balanceSnapshots.cardNumber, input.cardNumber));
          }

          return toRegistration(row);
        }),
      ),

    listRegistrations: () =>
      guard('listRegistrations', async () => {
        const rows = await db.select().from(registrations);
        return rows.map(toRegistration);
      }),

    listRegistrationsForCard: (cardNumber) =>
      guard('listRegistrationsForCard', async () => {
        const rows = await db
          .select()
          .from(registrations)
          .where(eq(registrations.cardNumber, cardNumber));
        return rows.map(toRegistration);
      }),

    getLastSnapshot: (cardNumber) =>
      guard('getLastSnapshot', async () => {
        const row = await db.query.balanceSnapshots.findFirst({
          where: eq(balanceSnapshots.cardNumber, cardNumber),
        });
        return row ? toSnapshot(row) : null;
      }),

    replaceSnapshot: (snapshot, options = {}) =>
      guard('replaceSnapshot', () =>
        db.transaction(async (tx) => {
          const values = {
            balanceOre: snapshot.balanceOre,
            lastTransaction: snapshot.lastTransaction,
            observedAt: snapshot.observedAt,
          };

          await tx
            .insert(balanceSnapshots)
            .values({ cardNumber: snapshot.cardNumber, ...values })
            .onConflictDoUpdate({ target: balanceSnapshots.cardNumber, set: values });

          if (options.appendHistory) {
            await tx.insert(balanceHistory).values({
              cardNumber: snapshot.cardNumber,
              balanceOre: snapshot.balanceOre,
              observedAt: snapshot.observedAt,
            });
          }
        }),
      ),

    getBalanceHistory: (cardNumber, limit) =>
      guard('getBalanceHistory', async () => {
        const rows = await db
          .select({
            cardNumber: balanceHistory.cardNumber,
            balanceOre: balanceHistory.balanceOre,
            observedAt: balanceHistory.observedAt,
          })
          .from(balanceHistory)
          .where(eq(balanceHistory.cardNumber, cardNumber))
          .orderBy(desc(balanceHistory.observedAt))
          .limit(limit);
        return rows;
      }),
  };
}
