import { Context } from 'grammy';

export function createHelpHandler() {
  return async (ctx: Context) => {
    await ctx.reply(
      [
        'Available commands:',
        '/start - register your card number',
        '/balance - check the balance now',
        '/history - show recent balances',
        '/updatecard - change your card number',
        '/cancel - cancel card registration',
        '/help - show this help message',
      ].join('\n'),
    );
  };
}
