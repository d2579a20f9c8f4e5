import { z } from 'zod';
import type { JobsOptions, QueueEvents } from 'bullmq';
import { FetchError, QUEUES, parseKroner } from '@saldovakt/shared';
import type {
  BalanceFetchJob,
  BalanceFetchResult,
  BalanceSnapshot,
  TransactionRecord,
} from '@saldovakt/shared';

export interface BalanceFetcher {
  /** Rejects with FetchError when the page cannot be reached or read. */
  fetchBalance(cardNumber: string): Promise<BalanceSnapshot>;
}

interface FetchJobHandle {
  id?: string;
  waitUntilFinished(queueEvents: QueueEvents, ttl?: number): Promise<unknown>;
  remove(): Promise<void>;
}

interface FetchQueue {
  add(name: string, data: BalanceFetchJob, opts?: JobsOptions): Promise<FetchJobHandle>;
}

const fetchResultSchema: z.ZodType<BalanceFetchResult> = z.object({
  balance: z.string(),
  lastTransaction: z
    .object({
      date: z.string().nullable(),
      description: z.string().nullable(),
      amount: z.string().nullable(),
    })
    .nullable(),
});

export function toSnapshot(cardNumber: string, raw: unknown, observedAt: Date): BalanceSnapshot {
  const parsed = fetchResultSchema.safeParse(raw);
  if (!parsed.success) {
    throw new FetchError(
      'unparseable',
      `Malformed fetch result: ${parsed.error.issues.map((issue) => issue.message).join(', ')}`,
    );
  }

  const balanceOre = parseKroner(parsed.data.balance);
  if (balanceOre === null) {
    throw new FetchError('unparseable', `Could not read balance from "${parsed.data.balance}"`);
  }

  const tx = parsed.data.lastTransaction;
  const lastTransaction: TransactionRecord | null = tx
    ? { date: tx.date, description: tx.description, amountOre: parseKroner(tx.amount) }
    : null;

  return { cardNumber, balanceOre, lastTransaction, observedAt };
}

async function removeJob(job: FetchJobHandle): Promise<void> {
  try {
    await job.remove();
  } catch (err) {
    console.warn(`Could not remove balance-fetch job ${job.id}:`, err);
  }
}

/**
 * Requests a balance from the scraper worker through the `balance-fetch` queue
 * and waits for its result.
 */
export function createQueueBalanceFetcher(
  queue: FetchQueue,
  queueEvents: QueueEvents,
  timeoutMs: number,
  now: () => Date = () => new Date(),
): BalanceFetcher {
  return {
    async fetchBalance(cardNumber) {
      let raw: unknown;
      let job: FetchJobHandle | undefined;
      try {
        job = await queue.add(QUEUES.BALANCE_FETCH, { cardNumber }, {
          attempts: 1,
          removeOnComplete: { age: 3600 },
          removeOnFail: { age: 24 * 3600 },
        });
        raw = await job.waitUntilFinished(queueEvents, timeoutMs);
      } catch (err) {
        // Nobody reads the result of an abandoned request; keep it from piling up.
        if (job) await removeJob(job);
        const message = err instanceof Error ? err.message : String(err);
        const kind = /timed out/i.test(message) ? 'timeout' : 'unreachable';
        throw new FetchError(kind, `Balance fetch failed: ${message}`, { cause: err });
      }

      return toSnapshot(cardNumber, raw, now());
    },
  };
}
