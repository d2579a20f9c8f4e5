import { NotifyError, QUEUES } from '@saldovakt/shared';
import type { NotificationEvent, NotifyUserJob } from '@saldovakt/shared';
import { formatBalanceChange } from './notifications.js';

export interface Notifier {
  /** Rejects with NotifyError when the message cannot be handed off. */
  notify(event: NotificationEvent): Promise<void>;
}

interface NotifyQueue {
  add(name: string, data: NotifyUserJob): Promise<unknown>;
}

export function createQueueNotifier(queue: NotifyQueue): Notifier {
  return {
    async notify(event) {
      try {
        await queue.add(QUEUES.NOTIFY_USER, {
          telegramChatId: event.chatId,
          message: formatBalanceChange(event),
        } satisfies NotifyUserJob);
      } catch (err) {
        throw new NotifyError(`Could not enqueue notification for user ${event.userId}`, { cause: err });
      }
    },
  };
}
