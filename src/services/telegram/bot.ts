import { Bot, InputFile, type Context } from 'grammy';
import type { ExpenseLedger } from '../ledger';
import { handleExport } from '../export';
import { helpText, messages } from '../feedback/messages';
import { DEFAULT_MESSAGES } from '../../config/constants';
import { describeError } from '../../utils/errors';
import { getMainMenuKeyboard, isMenuAction, MenuAction } from './buttons';
import {
  type BotSettings,
  replyToAdd,
  replyToCategories,
  replyToDelete,
  replyToHistory,
  replyToQuickEntry,
  replyToSummary,
} from './handlers';

export interface BotOptions extends BotSettings {
  token: string;
}

/**
 * Telegram front end over a shared ledger instance
 */
export function createBot(ledger: ExpenseLedger, options: BotOptions): Bot {
  const bot = new Bot(options.token);
  const settings: BotSettings = {
    categories: options.categories,
    currencySymbol: options.currencySymbol,
    historyLimit: options.historyLimit,
  };

  async function sendExport(ctx: Context): Promise<void> {
    const result = handleExport(ledger, { format: 'csv' });
    if (result.success && result.data) {
      await ctx.replyWithDocument(new InputFile(Buffer.from(result.data), result.fileName));
    } else {
      console.error('[Export]', result.message);
      await ctx.reply(messages.error.exportFailed);
    }
  }

  bot.command('start', async (ctx) => {
    await ctx.reply(DEFAULT_MESSAGES.WELCOME, { reply_markup: getMainMenuKeyboard() });
  });

  bot.command('help', async (ctx) => {
    await ctx.reply(helpText(), { reply_markup: getMainMenuKeyboard() });
  });

  bot.command('add', async (ctx) => {
    await ctx.reply(replyToAdd(ledger, ctx.match, settings));
  });

  bot.command('history', async (ctx) => {
    await ctx.reply(replyToHistory(ledger, settings));
  });

  bot.command('delete', async (ctx) => {
    await ctx.reply(replyToDelete(ledger, ctx.match));
  });

  bot.command('summary', async (ctx) => {
    await ctx.reply(replyToSummary(ledger, ctx.match, settings));
  });

  bot.command('categories', async (ctx) => {
    await ctx.reply(replyToCategories(settings));
  });

  bot.command('export', async (ctx) => {
    await sendExport(ctx);
  });

  bot.on('callback_query:data', async (ctx) => {
    const action = ctx.callbackQuery.data;
    await ctx.answerCallbackQuery();

    if (!isMenuAction(action)) {
      console.log('[Bot] Unknown callback:', action);
      return;
    }

    switch (action) {
      case MenuAction.HISTORY:
        await ctx.reply(replyToHistory(ledger, settings));
        break;
      case MenuAction.SUMMARY_ALL:
        await ctx.reply(replyToSummary(ledger, '', settings));
        break;
      case MenuAction.SUMMARY_TODAY:
        await ctx.reply(replyToSummary(ledger, 'today', settings));
        break;
      case MenuAction.EXPORT:
        await sendExport(ctx);
        break;
      case MenuAction.CATEGORIES:
        await ctx.reply(replyToCategories(settings));
        break;
      case MenuAction.HELP:
        await ctx.reply(helpText());
        break;
    }
  });

  bot.on('message:text', async (ctx) => {
    const text = ctx.message.text;
    if (text.startsWith('/')) {
      await ctx.reply(helpText());
      return;
    }

    const reply = replyToQuickEntry(ledger, text, settings);
    await ctx.reply(reply ?? messages.info.helpQuickEntry, { reply_markup: getMainMenuKeyboard() });
  });

  bot.catch(async (err) => {
    console.error('[Bot] Error:', describeError(err.error));
    try {
      await err.ctx.reply(DEFAULT_MESSAGES.ERROR);
    } catch (replyError) {
      console.error('[Bot] Could not send error reply:', describeError(replyError));
    }
  });

  console.log('[Bot] Commands registered');
  return bot;
}
