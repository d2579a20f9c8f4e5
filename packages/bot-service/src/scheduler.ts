import { Queue, Worker } from 'bullmq';
import type { ConnectionOptions } from 'bullmq';
import { QUEUES } from '@saldovakt/shared';
import type { BalanceMonitor } from './balance-monitor.js';

export const DEFAULT_CHECK_INTERVAL_MS = 5 * 60_000;

export async function registerScheduler(
  connection: ConnectionOptions,
  monitor: Pick<BalanceMonitor, 'checkAll'>,
  intervalMs: number = DEFAULT_CHECK_INTERVAL_MS,
) {
  // Repeatable job: one tick walks every registered card
  const balanceCheckQueue = new Queue(QUEUES.BALANCE_CHECK, { connection });
  await balanceCheckQueue.upsertJobScheduler('balance-check-scheduler', {
    every: intervalMs,
  }, {
    name: 'balance-check',
  });

  const worker = new Worker(
    QUEUES.BALANCE_CHECK,
    async () => {
      const summary = await monitor.checkAll();
      console.log(
        `Balance check: ${summary.cards} card(s), ${summary.changed} changed, ${summary.failed} failed`,
      );
      return summary;
    },
    { connection, concurrency: 1 },
  );

  worker.on('failed', (job, err) => {
    console.error(`Scheduler job ${job?.id} failed:`, err.message);
  });

  return { worker, balanceCheckQueue };
}
