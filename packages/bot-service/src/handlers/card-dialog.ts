import { Context } from 'grammy';
import { InvalidCardNumberError } from '@saldovakt/shared';
import type { BalanceStore } from '../balance-store.js';
import type { BalanceMonitor } from '../balance-monitor.js';
import type { InteractionState } from '../interaction-state.js';

const CARD_PROMPT = 'Please send me your card number (12 digits).';

function displayName(ctx: Context): string | null {
  return ctx.from?.username ?? ctx.from?.first_name ?? null;
}

export function createStartHandler(store: BalanceStore, state: InteractionState) {
  return async (ctx: Context) => {
    const chatId = ctx.chat?.id;
    const userId = ctx.from?.id;
    if (!chatId || !userId) return;

    const name = displayName(ctx) ?? 'there';
    const registration = await store.getRegistration(userId);
    if (registration) {
      await ctx.reply(
        `Hi ${name}! You have already registered your card number.\n\n` +
          'Use /balance to check the balance now.\n' +
          'Use /updatecard to change your card number.',
      );
      return;
    }

    await state.startCardDialog(chatId, userId, 'register');
    await ctx.reply(`Hi ${name}! Welcome to the prepaid card balance watch.\n\n${CARD_PROMPT}`);
  };
}

export function createUpdateCardHandler(state: InteractionState) {
  return async (ctx: Context) => {
    const chatId = ctx.chat?.id;
    const userId = ctx.from?.id;
    if (!chatId || !userId) return;

    await state.startCardDialog(chatId, userId, 'update');
    await ctx.reply(`Please send me your new card number (12 digits).\nUse /cancel to keep the current one.`);
  };
}

export function createCancelHandler(state: InteractionState) {
  return async (ctx: Context) => {
    const chatId = ctx.chat?.id;
    const userId = ctx.from?.id;
    if (!chatId || !userId) return;

    const cancelled = await state.clearCardDialog(chatId, userId);
    await ctx.reply(cancelled ? 'Cancelled.' : 'Nothing to cancel.');
  };
}

export function createCardInputHandler(
  monitor: BalanceMonitor,
  state: InteractionState,
  checkIntervalMinutes: number,
) {
  return async (ctx: Context) => {
    const chatId = ctx.chat?.id;
    const userId = ctx.from?.id;
    const text = ctx.message?.text?.trim();
    if (!chatId || !userId || !text) return false;

    const mode = await state.getCardDialog(chatId, userId);
    if (!mode || text.startsWith('/')) return false;

    try {
      await monitor.registerCard({ userId, chatId, username: displayName(ctx), cardNumber: text });
    } catch (err) {
      if (!(err instanceof InvalidCardNumberError)) throw err;
      await ctx.reply(`Invalid card number. ${CARD_PROMPT}`);
      return true;
    }

    await state.clearCardDialog(chatId, userId);
    await ctx.reply(
      `${mode === 'update' ? 'Your card number has been updated.' : 'Thanks! Your card number is registered.'}\n\n` +
        `I will check the balance every ${checkIntervalMinutes} minutes and notify you when it changes.\n\n` +
        'Use /balance to check it now.',
    );
    return true;
  };
}
