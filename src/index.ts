import { env } from './config/env';
import { StorageGateway } from './services/database';
import { ExpenseLedger } from './services/ledger';
import { createBot } from './services/telegram';
import { startHealthServer } from './services/health/server';
import { describeError } from './utils/errors';

async function main(): Promise<void> {
  console.log('Starting expense ledger...');

  const gateway = new StorageGateway(env.DB_PATH, { busyTimeoutMs: env.DB_BUSY_TIMEOUT_MS });
  const ledger = new ExpenseLedger(gateway);
  if (!ledger.isReady) {
    throw new Error(`Database schema could not be created at ${gateway.dbPath}`);
  }
  console.log(`Database ready at ${gateway.dbPath}`);

  const bot = createBot(ledger, {
    token: env.TELEGRAM_BOT_TOKEN,
    categories: env.EXPENSE_CATEGORIES,
    currencySymbol: env.CURRENCY_SYMBOL,
    historyLimit: env.HISTORY_LIMIT,
  });

  const healthServer = startHealthServer(gateway, env.HEALTH_PORT);

  const shutdown = (signal: string) => {
    console.log(`\n${signal} received, shutting down...`);
    healthServer.close();
    bot.stop().catch((error: unknown) => {
      console.error('[Bot] Stop failed:', describeError(error));
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await bot.start({
    onStart: (info) => console.log(`[Bot] Running as @${info.username}`),
  });
}

main().catch((error: unknown) => {
  console.error('Fatal error:', describeError(error));
  process.exit(1);
});
