import 'dotenv/config';
import { Sequelize } from 'sequelize';
import { ImportEngine, createLogger } from '@product-importer/core';
import { CsvProductParser } from '@product-importer/csv';
import { SequelizeJobStore, SequelizeProductStore, SequelizeWebhookStore } from '@product-importer/state-sequelize';
import { WebhookDispatcher, bindImportWebhooks } from '@product-importer/webhooks';
import { buildApp } from './app.js';
import { loadConfig } from './config.js';
import { APP_VERSION } from './version.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });

  const sequelize = new Sequelize(config.databaseUrl, {
    dialect: 'postgres',
    logging: (sql) => {
      logger.trace({ sql }, 'SQL');
    },
  });
  const jobStore = new SequelizeJobStore(sequelize);
  const productStore = new SequelizeProductStore(sequelize);
  const webhookStore = new SequelizeWebhookStore(sequelize);
  await jobStore.initialize();
  await productStore.initialize();
  await webhookStore.initialize();

  const engine = new ImportEngine({
    parser: new CsvProductParser(),
    productStore,
    jobStore,
    batchSize: config.chunkSize,
    maxConcurrentJobs: config.maxConcurrentImports,
    errorSampleSize: config.errorSampleSize,
    logger: logger.child({ component: 'import' }),
  });
  const dispatcher = new WebhookDispatcher({
    store: webhookStore,
    timeoutMs: config.webhookTimeoutMs,
    maxRetries: config.webhookMaxRetries,
    retryDelayMs: config.webhookRetryDelayMs,
    logger: logger.child({ component: 'webhooks' }),
  });
  bindImportWebhooks(engine, dispatcher);

  const app = await buildApp({
    engine,
    dispatcher,
    logger,
    version: APP_VERSION,
    uploadDir: config.uploadDir,
    maxUploadSize: config.maxUploadSize,
    streamMaxDurationMs: config.streamMaxDurationMs,
    streamKeepAliveMs: config.streamKeepAliveMs,
  });

  const stop = async (signal: NodeJS.Signals): Promise<void> => {
    logger.info({ signal }, 'Shutting down');
    await app.close();
    await sequelize.close();
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      void stop(signal).then(
        () => {
          process.exitCode = 0;
        },
        (error: unknown) => {
          logger.error({ err: error }, 'Shutdown failed');
          process.exitCode = 1;
        },
      );
    });
  }

  await app.listen({ port: config.port, host: config.host });
}

main().catch((error: unknown) => {
  createLogger().fatal({ err: error }, 'Server failed to start');
  process.exitCode = 1;
});
