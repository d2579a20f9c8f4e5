import { Bot } from 'grammy';
import type { BalanceStore } from './balance-store.js';
import type { BalanceMonitor } from './balance-monitor.js';
import type { InteractionState } from './interaction-state.js';
import { createBalanceHandler } from './handlers/balance.js';
import {
  createCancelHandler,
  createCardInputHandler,
  createStartHandler,
  createUpdateCardHandler,
} from './handlers/card-dialog.js';
import { createHelpHandler } from './handlers/help.js';
import { createHistoryHandler } from './handlers/history.js';

export interface BotDeps {
  store: BalanceStore;
  monitor: BalanceMonitor;
  state: InteractionState;
  checkIntervalMinutes: number;
}

export function createBot(token: string, deps: BotDeps) {
  const { store, monitor, state, checkIntervalMinutes } = deps;
  const bot = new Bot(token);
  const cardInputHandler = createCardInputHandler(monitor, state, checkIntervalMinutes);

  bot.command('start', createStartHandler(store, state));
  bot.command('balance', createBalanceHandler(store, monitor));
  bot.command('updatecard', createUpdateCardHandler(state));
  bot.command('cancel', createCancelHandler(state));
  bot.command('history', createHistoryHandler(store));
  bot.command('help', createHelpHandler());

  bot.on('message:text', async (ctx) => {
    const handledCardInput = await cardInputHandler(ctx);
    if (handledCardInput) return;

    await ctx.reply('Use /start to register your card or /balance to check it. Type /help for commands.');
  });

  bot.catch((err) => {
    console.error(`Update ${err.ctx.update.update_id} failed:`, err.error);
  });

  return bot;
}
