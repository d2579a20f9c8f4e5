import { Context } from 'grammy';
import type { BalanceStore } from '../balance-store.js';
import type { BalanceMonitor } from '../balance-monitor.js';
import { formatBalanceReport, formatLastKnownBalance } from '../notifications.js';

const NOT_REGISTERED = "You haven't registered a card number yet. Use /start to begin.";

export function createBalanceHandler(store: BalanceStore, monitor: BalanceMonitor) {
  return async (ctx: Context) => {
    const userId = ctx.from?.id;
    if (!userId) return;

    try {
      const registration = await store.getRegistration(userId);
      if (!registration) {
        await ctx.reply(NOT_REGISTERED);
        return;
      }

      await ctx.reply('Checking balance...');
      const outcome = await monitor.checkCard(registration.cardNumber);

      if (outcome.status === 'not_registered') {
        await ctx.reply(NOT_REGISTERED);
        return;
      }

      if (outcome.status === 'fetch_failed') {
        const lastKnown = outcome.lastKnown ? `\n\n${formatLastKnownBalance(outcome.lastKnown)}` : '';
        await ctx.reply(`Could not get the balance. Please try again later.${lastKnown}`);
        return;
      }

      await ctx.reply(formatBalanceReport(outcome.evaluation.snapshot));
    } catch (err) {
      console.error(`Balance check for user ${userId} failed:`, err);
      await ctx.reply('Something went wrong while checking the balance. Please try again later.');
    }
  };
}
