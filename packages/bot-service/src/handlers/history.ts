import { Context } from 'grammy';
import type { BalanceStore } from '../balance-store.js';
import { formatBalanceHistory } from '../notifications.js';

const HISTORY_LIMIT = 5;

export function createHistoryHandler(store: BalanceStore) {
  return async (ctx: Context) => {
    const userId = ctx.from?.id;
    if (!userId) return;

    const registration = await store.getRegistration(userId);
    if (!registration) {
      await ctx.reply("You haven't registered a card number yet. Use /start to begin.");
      return;
    }

    const entries = await store.getBalanceHistory(registration.cardNumber, HISTORY_LIMIT);
    await ctx.reply(formatBalanceHistory(entries));
  };
}
