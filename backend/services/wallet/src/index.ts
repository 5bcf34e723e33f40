import mongoose from 'mongoose';
import { createApp } from './app';
import { config } from './config';
import { createContainer } from './container';
import { Scheduler } from './jobs/scheduler';
import { MongoDocumentStore } from './store/mongo-document-store';
import { errorMessage } from './utils/errors';
import { logger } from './utils/logger';

const startServer = async (): Promise<void> => {
  // Connect to MongoDB
  await mongoose.connect(config.database.uri);
  logger.info('Connected to MongoDB');

  const store = new MongoDocumentStore(mongoose.connection);
  await store.ensureIndexes();

  const container = createContainer({ store });
  container.readiness.logStartupReport();

  if (await container.rates.seedIfMissing()) {
    logger.warn('Exchange rates seeded from defaults; refreshing from the rate provider');
    await container.rates.refreshRates().catch((error: unknown) => {
      logger.warn('Initial exchange rate refresh failed', { error: errorMessage(error) });
    });
  }

  // Create Express app
  const app = createApp(container);

  // Start server
  const server = app.listen(config.app.port, () => {
    logger.info(`Wallet service running on port ${config.app.port}`);
  });

  // Start background jobs
  const scheduler = new Scheduler(container);
  scheduler.start();

  // Graceful shutdown
  process.on('SIGTERM', () => {
    logger.info('SIGTERM received, shutting down gracefully');
    scheduler.stop();

    server.close(() => {
      logger.info('HTTP server closed');
      mongoose.connection
        .close()
        .then(() => {
          logger.info('MongoDB connection closed');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error('Error closing MongoDB connection', { error: errorMessage(error) });
          process.exit(1);
        });
    });
  });
};

// Start the server
startServer().catch((error: unknown) => {
  logger.error('Failed to start server', { error: errorMessage(error) });
  process.exit(1);
});
