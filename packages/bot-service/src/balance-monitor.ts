import { FetchError, maskCardNumber, parseCardNumber } from '@saldovakt/shared';
import type { BalanceSnapshot, CardRegistration } from '@saldovakt/shared';
import { evaluateSnapshot } from './balance-processor.js';
import type { BalanceEvaluation } from './balance-processor.js';
import type { BalanceFetcher } from './balance-fetcher.js';
import type { BalanceStore, RegistrationInput } from './balance-store.js';
import type { Notifier } from './notifier.js';
import { createKeyedLock } from './card-lock.js';
import type { KeyedLock } from './card-lock.js';
import { withTimeout } from './timeout.js';

export const DEFAULT_FETCH_TIMEOUT_MS = 60_000;

export type CheckOutcome =
  | { status: 'not_registered' }
  | { status: 'fetch_failed'; cardNumber: string; error: FetchError; lastKnown: BalanceSnapshot | null }
  | {
      status: 'checked';
      cardNumber: string;
      evaluation: BalanceEvaluation;
      notified: number;
      notifyFailures: number;
    };

export interface CheckSummary {
  cards: number;
  changed: number;
  failed: number;
}

export interface BalanceMonitorDeps {
  store: BalanceStore;
  fetcher: BalanceFetcher;
  notifier: Notifier;
  fetchTimeoutMs?: number;
  lock?: KeyedLock;
}

export interface BalanceMonitor {
  /** Runs one fetch-evaluate-store cycle; callers arriving while one is in flight share it. */
  checkCard(cardNumber: string): Promise<CheckOutcome>;
  checkAll(): Promise<CheckSummary>;
  /** Throws InvalidCardNumberError before anything is stored. */
  registerCard(input: RegistrationInput): Promise<CardRegistration>;
}

export function createBalanceMonitor(deps: BalanceMonitorDeps): BalanceMonitor {
  const { store, fetcher, notifier } = deps;
  const fetchTimeoutMs = deps.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
  const lock = deps.lock ?? createKeyedLock();
  const inFlight = new Map<string, Promise<CheckOutcome>>();

  async function fetchSnapshot(cardNumber: string): Promise<BalanceSnapshot> {
    try {
      return await withTimeout(
        fetcher.fetchBalance(cardNumber),
        fetchTimeoutMs,
        () => new FetchError('timeout', `Balance fetch timed out after ${fetchTimeoutMs}ms`),
      );
    } catch (err) {
      if (err instanceof FetchError) throw err;
      throw new FetchError('unreachable', err instanceof Error ? err.message : String(err), { cause: err });
    }
  }

  async function runCycle(cardNumber: string): Promise<CheckOutcome> {
    const masked = maskCardNumber(cardNumber);
    const registered = await store.listRegistrationsForCard(cardNumber);
    if (registered.length === 0) return { status: 'not_registered' };

    const previous = await store.getLastSnapshot(cardNumber);

    let current: BalanceSnapshot;
    try {
      current = await fetchSnapshot(cardNumber);
    } catch (err) {
      if (!(err instanceof FetchError)) throw err;
      console.warn(`Card ${masked}: fetch failed (${err.kind}): ${err.message}`);
      return { status: 'fetch_failed', cardNumber, error: err, lastKnown: previous };
    }

    const evaluation = evaluateSnapshot(previous, current);
    await store.replaceSnapshot(evaluation.snapshot, {
      appendHistory: evaluation.kind !== 'unchanged',
    });

    if (evaluation.kind !== 'changed') {
      console.log(`Card ${masked}: ${evaluation.kind} (${current.balanceOre} øre)`);
      return { status: 'checked', cardNumber, evaluation, notified: 0, notifyFailures: 0 };
    }

    const { change } = evaluation;
    // A user who registered after the stored snapshot has not seen the old balance yet.
    const recipients = registered.filter(
      (registration) =>
        previous !== null && registration.updatedAt.getTime() <= previous.observedAt.getTime(),
    );
    console.log(`Card ${masked}: changed (${change.oldBalanceOre} -> ${change.newBalanceOre} øre)`);

    // The snapshot is committed; delivery problems are reported, never rolled back.
    let notified = 0;
    let notifyFailures = 0;
    for (const recipient of recipients) {
      try {
        await notifier.notify({ ...change, userId: recipient.userId, chatId: recipient.chatId });
        notified += 1;
      } catch (err) {
        notifyFailures += 1;
        console.error(`Card ${masked}: notifying user ${recipient.userId} failed:`, err);
      }
    }

    return { status: 'checked', cardNumber, evaluation, notified, notifyFailures };
  }

  function checkCard(cardNumber: string): Promise<CheckOutcome> {
    const existing = inFlight.get(cardNumber);
    if (existing) return existing;

    const cycle = lock
      .run(cardNumber, () => runCycle(cardNumber))
      .finally(() => inFlight.delete(cardNumber));
    inFlight.set(cardNumber, cycle);
    return cycle;
  }

  return {
    checkCard,

    async checkAll() {
      const cardNumbers = [...new Set((await store.listRegistrations()).map((r) => r.cardNumber))];
      const summary: CheckSummary = { cards: cardNumbers.length, changed: 0, failed: 0 };

      for (const cardNumber of cardNumbers) {
        try {
          const outcome = await checkCard(cardNumber);
          if (outcome.status === 'fetch_failed') summary.failed += 1;
          if (outcome.status === 'checked' && outcome.evaluation.kind === 'changed') summary.changed += 1;
        } catch (err) {
          summary.failed += 1;
          console.error(`Card ${maskCardNumber(cardNumber)}: check failed:`, err);
        }
      }

      return summary;
    },

    async registerCard(input) {
      const cardNumber = parseCardNumber(input.cardNumber);
      return lock.run(cardNumber, () => store.upsertRegistration({ ...input, cardNumber }));
    },
  };
}
