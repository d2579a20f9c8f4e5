import { createServer } from 'node:http';
import { fileURLToPath } from 'node:url';
import { Queue, QueueEvents, Worker } from 'bullmq';
import { Redis } from 'ioredis';
import { migrate } from 'drizzle-orm/postgres-js/migrator';
import { createDb, parseRedisUrl, QUEUES } from '@saldovakt/shared';
import type { BalanceFetchJob, NotifyUserJob } from '@saldovakt/shared';
import { createBot } from './bot.js';
import { loadConfig } from './config.js';
import { createBalanceStore } from './balance-store.js';
import { createQueueBalanceFetcher } from './balance-fetcher.js';
import { createQueueNotifier } from './notifier.js';
import { createBalanceMonitor } from './balance-monitor.js';
import { createInteractionState } from './interaction-state.js';
import { registerScheduler } from './scheduler.js';
import { createShutdownHandler } from './shutdown.js';

async function main() {
  const config = loadConfig();
  const db = createDb(config.databaseUrl);

  console.log('Running database migrations...');
  await migrate(db, {
    migrationsFolder: fileURLToPath(new URL('../../shared/drizzle', import.meta.url)),
  });
  console.log('Migrations complete');

  const connection = parseRedisUrl(config.redisUrl);
  const redis = new Redis(connection);
  const fetchTimeoutMs = config.fetchTimeoutSeconds * 1000;

  const fetchQueue = new Queue<BalanceFetchJob, unknown>(QUEUES.BALANCE_FETCH, { connection });
  const fetchEvents = new QueueEvents(QUEUES.BALANCE_FETCH, { connection });
  const notifyQueue = new Queue<NotifyUserJob>(QUEUES.NOTIFY_USER, { connection });

  const store = createBalanceStore(db);
  const monitor = createBalanceMonitor({
    store,
    fetcher: createQueueBalanceFetcher(fetchQueue, fetchEvents, fetchTimeoutMs),
    notifier: createQueueNotifier(notifyQueue),
    fetchTimeoutMs,
  });

  const bot = createBot(config.telegramBotToken, {
    store,
    monitor,
    state: createInteractionState(redis),
    checkIntervalMinutes: Math.max(1, Math.round(config.checkIntervalSeconds / 60)),
  });

  const { worker: schedulerWorker, balanceCheckQueue } = await registerScheduler(
    connection,
    monitor,
    config.checkIntervalSeconds * 1000,
  );

  // Notify-user worker: sends Telegram messages
  const notifyWorker = new Worker<NotifyUserJob>(
    QUEUES.NOTIFY_USER,
    async (job) => {
      const { telegramChatId, message } = job.data;
      await bot.api.sendMessage(telegramChatId, message);
    },
    { connection, concurrency: 5 },
  );

  notifyWorker.on('failed', (job, err) => {
    console.error(`Notify job ${job?.id} failed:`, err.message);
  });

  const server = createServer((req, res) => {
    if (req.url === '/health') {
      res.writeHead(200);
      res.end('ok');
    } else {
      res.writeHead(404);
      res.end();
    }
  }).listen(config.healthPort);

  const shutdown = createShutdownHandler(bot, [
    schedulerWorker,
    notifyWorker,
    balanceCheckQueue,
    fetchEvents,
    fetchQueue,
    notifyQueue,
    { close: () => redis.quit() },
    { close: () => db.$client.end() },
    { close: () => new Promise<void>((resolve) => server.close(() => resolve())) },
  ]);
  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);

  console.log('Bot service starting');
  await bot.start();
}

main().catch((err) => {
  console.error('Bot service failed:', err);
  process.exit(1);
});
