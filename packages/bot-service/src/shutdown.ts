import type { Bot } from 'grammy';

export interface Closable {
  close(): Promise<unknown>;
}

export function createShutdownHandler(
  bot: Pick<Bot, 'stop'>,
  closables: Closable[],
): () => Promise<void> {
  return async () => {
    try {
      await bot.stop();
    } catch (err) {
      console.error('Error stopping bot:', err);
    }
    // Order matters: workers before the queues and connections they use.
    for (const [index, closable] of closables.entries()) {
      try {
        await closable.close();
      } catch (err) {
        console.error(`Error closing resource at index ${index}:`, err);
      }
    }
  };
}
