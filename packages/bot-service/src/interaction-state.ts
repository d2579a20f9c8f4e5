import type { Redis } from 'ioredis';

const STATE_TTL_SECONDS = 30 * 60;

function key(chatId: number, userId: number) {
  return `card-dialog:${chatId}:${userId}`;
}

export type CardDialogMode = 'register' | 'update';

function isCardDialogMode(value: string | null): value is CardDialogMode {
  return value === 'register' || value === 'update';
}

export type InteractionState = {
  startCardDialog(chatId: number, userId: number, mode: CardDialogMode): Promise<void>;
  getCardDialog(chatId: number, userId: number): Promise<CardDialogMode | null>;
  /** Resolves true when a dialog was open. */
  clearCardDialog(chatId: number, userId: number): Promise<boolean>;
};

export function createInteractionState(redis: Redis): InteractionState {
  return {
    async startCardDialog(chatId, userId, mode) {
      await redis.set(key(chatId, userId), mode, 'EX', STATE_TTL_SECONDS);
    },

    async getCardDialog(chatId, userId) {
      const mode = await redis.get(key(chatId, userId));
      return isCardDialogMode(mode) ? mode : null;
    },

    async clearCardDialog(chatId, userId) {
      const removed = await redis.del(key(chatId, userId));
      return removed > 0;
    },
  };
}
