import 'dotenv/config';
import express, { Express, Request, Response } from 'express';
import { runScheduler } from './api/admin/scheduler';
import { addRecurringRule, getRecurringRules } from './api/recurring/recurring';
import { getRecurringRule, setRecurringRuleActive, updateRecurringRule } from './api/recurring/rule';
import { addTransaction, getTransactions } from './api/transactions/transactions';
import { deleteTransaction, getTransaction, restoreTransaction } from './api/transactions/transaction';
import { addTag, getTags } from './api/tags/tags';
import { LedgerConfig, loadConfig } from './utils/config/config';
import { createLogger, setLogLevel } from './utils/log';
import { verifyToken } from './utils/net/auth';
import { respond } from './utils/net/respond';
import { startRecurrenceTimer } from './utils/recurrence/trigger';
import { MemoryLedgerStore } from './utils/store/memory';
import { MysqlLedgerStore } from './utils/store/mysql';
import { openMysqlConnection } from './utils/store/mysqlConnection';
import { LedgerStore } from './utils/store/types';

const logger = createLogger('server');

export type AppConfig = Pick<LedgerConfig, 'jwtSecret' | 'timezone' | 'retentionDays'>;

/**
 * Builds the HTTP app over `store`; every `/api` route except health needs a token
 */
export function createApp(store: LedgerStore, config: AppConfig): Express {
  const app: Express = express();
  const auth = verifyToken(config.jwtSecret);

  // Middleware
  app.use(express.json());

  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  // Admin routes
  app.post(
    '/api/admin/run-scheduler',
    auth,
    respond((req) => runScheduler(req, store, config)),
  );

  // Recurring rule routes
  app
    .route('/api/recurring')
    .get(auth, respond((req) => getRecurringRules(req, store)))
    .put(auth, respond((req) => addRecurringRule(req, store)));

  app
    .route('/api/recurring/:ruleId')
    .get(auth, respond((req) => getRecurringRule(req, store)))
    .post(auth, respond((req) => updateRecurringRule(req, store)));

  app.patch('/api/recurring/:ruleId/active', auth, respond((req) => setRecurringRuleActive(req, store)));

  // Transaction routes
  app
    .route('/api/transactions')
    .get(auth, respond((req) => getTransactions(req, store)))
    .put(auth, respond((req) => addTransaction(req, store)));

  app
    .route('/api/transactions/:transactionId')
    .get(auth, respond((req) => getTransaction(req, store)))
    .delete(auth, respond((req) => deleteTransaction(req, store)));

  app.post('/api/transactions/:transactionId/restore', auth, respond((req) => restoreTransaction(req, store)));

  // Tag routes
  app
    .route('/api/tags')
    .get(auth, respond((req) => getTags(req, store)))
    .put(auth, respond((req) => addTag(req, store)));

  return app;
}

/**
 * Opens the configured store, creating the MySQL tables on first use
 */
export async function openStore(config: LedgerConfig): Promise<LedgerStore> {
  if (config.storeDriver === 'memory') {
    logger.warn('using the in-memory store, data is lost on exit');
    return new MemoryLedgerStore();
  }
  const { host, user, password, database, lockTimeoutSeconds } = config.mysql;
  const store = new MysqlLedgerStore({
    openConnection: () => openMysqlConnection({ host, user, password, database }),
    lockTimeoutSeconds,
  });
  await store.ensureSchema();
  return store;
}

export async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const store = await openStore(config);
  const timer = startRecurrenceTimer(store, config);
  const server = createApp(store, config).listen(config.port, () => {
    logger.log('server is running', { port: config.port });
  });

  const shutdown = (signal: string) => {
    logger.log('shutting down', { signal });
    timer?.stop();
    server.close(() => {
      store.close().catch((e: unknown) => logger.err('closing store failed', { error: e }));
    });
  };
  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);
}

if (require.main === module) {
  main().catch((e: unknown) => {
    logger.err('startup failed', { error: e });
    process.exitCode = 1;
  });
}
