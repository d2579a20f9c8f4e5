import { vi } from 'vitest';
import type {
  BalanceHistoryEntry,
  BalanceSnapshot,
  CardRegistration,
  NotificationEvent,
} from '@saldovakt/shared';
import type { BalanceStore, RegistrationInput, ReplaceSnapshotOptions } from '../balance-store.js';
import type { BalanceFetcher } from '../balance-fetcher.js';
import type { Notifier } from '../notifier.js';
import type { CardDialogMode, InteractionState } from '../interaction-state.js';

export const CARD = '123456789012';

export function snapshot(balanceOre: number, overrides: Partial<BalanceSnapshot> = {}): BalanceSnapshot {
  return {
    cardNumber: CARD,
    balanceOre,
    lastTransaction: null,
    observedAt: new Date('2026-01-01T12:00:00Z'),
    ...overrides,
  };
}

export function createInMemoryStore(
  registrations: CardRegistration[] = [],
  now: () => Date = () => new Date('2026-01-01T00:00:00Z'),
) {
  const regs = new Map<number, CardRegistration>(registrations.map((r) => [r.userId, r]));
  const snapshots = new Map<string, BalanceSnapshot>();
  const history: BalanceHistoryEntry[] = [];

  const store = {
    getRegistration: vi.fn(async (userId: number) => regs.get(userId) ?? null),
    upsertRegistration: vi.fn(async (input: RegistrationInput) => {
      const updatedAt = now();
      const registration: CardRegistration = {
        ...input,
        createdAt: regs.get(input.userId)?.createdAt ?? updatedAt,
        updatedAt,
      };
      regs.set(input.userId, registration);
      const watchedByOthers = [...regs.values()].some(
        (r) => r.cardNumber === input.cardNumber && r.userId !== input.userId,
      );
      if (!watchedByOthers) snapshots.delete(input.cardNumber);
      return registration;
    }),
    listRegistrations: vi.fn(async () => [...regs.values()]),
    listRegistrationsForCard: vi.fn(async (cardNumber: string) =>
      [...regs.values()].filter((r) => r.cardNumber === cardNumber),
    ),
    getLastSnapshot: vi.fn(async (cardNumber: string) => snapshots.get(cardNumber) ?? null),
    replaceSnapshot: vi.fn(async (next: BalanceSnapshot, options: ReplaceSnapshotOptions = {}) => {
      snapshots.set(next.cardNumber, next);
      if (options.appendHistory) {
        history.push({ cardNumber: next.cardNumber, balanceOre: next.balanceOre, observedAt: next.observedAt });
      }
    }),
    getBalanceHistory: vi.fn(async (cardNumber: string, limit: number) =>
      history.filter((h) => h.cardNumber === cardNumber).reverse().slice(0, limit),
    ),
  } satisfies BalanceStore;

  return Object.assign(store, { snapshots, history });
}

export function registration(overrides: Partial<CardRegistration> = {}): CardRegistration {
  return {
    userId: 456,
    chatId: 123,
    username: 'kari',
    cardNumber: CARD,
    createdAt: new Date('2026-01-01T00:00:00Z'),
    updatedAt: new Date('2026-01-01T00:00:00Z'),
    ...overrides,
  };
}

/** Fetcher that replays queued balances (øre) or errors, one per call. */
export function createScriptedFetcher(script: Array<number | Error>) {
  let tick = 0;
  const fetcher = {
    fetchBalance: vi.fn(async (cardNumber: string) => {
      const next = script.shift();
      if (next === undefined) throw new Error('fetcher script exhausted');
      if (next instanceof Error) throw next;
      tick += 1;
      return snapshot(next, {
        cardNumber,
        observedAt: new Date(Date.UTC(2026, 0, 1, 12, tick * 5)),
      });
    }),
  } satisfies BalanceFetcher;
  return fetcher;
}

export function createRecordingNotifier() {
  const events: NotificationEvent[] = [];
  const notifier = {
    notify: vi.fn(async (event: NotificationEvent) => {
      events.push(event);
    }),
  } satisfies Notifier;
  return Object.assign(notifier, { events });
}

export function createInMemoryState(): InteractionState & { dialogs: Map<string, CardDialogMode> } {
  const dialogs = new Map<string, CardDialogMode>();
  const k = (chatId: number, userId: number) => `${chatId}:${userId}`;
  return {
    dialogs,
    async startCardDialog(chatId, userId, mode) {
      dialogs.set(k(chatId, userId), mode);
    },
    async getCardDialog(chatId, userId) {
      return dialogs.get(k(chatId, userId)) ?? null;
    },
    async clearCardDialog(chatId, userId) {
      return dialogs.delete(k(chatId, userId));
    },
  };
}
