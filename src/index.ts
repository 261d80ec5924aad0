import { createApp } from './app';
import { env } from './config/environment';
import { logger } from './config/logger';
import { Catalog } from './repositories/catalog.repository';
import { FileRecordStore } from './repositories/record-store';
import { seedInitialData } from './repositories/seed';
import { createServices } from './services';

/**
 * Application Entry Point
 *
 * Loads the catalog from the data directory, then starts the Express server
 * and handles graceful shutdown
 */
function startServer(): void {
  try {
    const catalog = new Catalog(new FileRecordStore(env.DATA_DIR));
    const report = catalog.load();

    // Counters rebuilt from the event ledgers replace the stale ones on disk
    if (report.orphanedAttendees.length > 0) {
      catalog.save('events');
      logger.info('Saved repaired event attendee lists', { dataDir: env.DATA_DIR });
    }
    if (report.reconcile.adjustedItems.length > 0) {
      catalog.save('inventory');
      logger.info('Saved reconciled inventory counters', { dataDir: env.DATA_DIR });
    }

    if (env.SEED_INITIAL_DATA && seedInitialData(catalog)) {
      logger.info('Sample data seeded into empty collections');
    }

    const app = createApp(createServices(catalog));

    const server = app.listen(env.PORT, () => {
      logger.info(`
╔════════════════════════════════════════════════════════════╗
║  Event Inventory API Server                                ║
╟────────────────────────────────────────────────────────────╢
║  Environment: ${env.NODE_ENV.padEnd(45)}║
║  Port:        ${String(env.PORT).padEnd(45)}║
║  Data:        ${env.DATA_DIR.padEnd(45)}║
║  Docs:        ${`http://localhost:${env.PORT}/docs`.padEnd(45)}║
║  Health:      ${`http://localhost:${env.PORT}/health`.padEnd(45)}║
╚════════════════════════════════════════════════════════════╝
      `.trim());

      logger.info('Server is ready to accept connections');
    });

    // Graceful shutdown handler; every catalog change is already on disk
    const gracefulShutdown = (signal: string) => {
      logger.info(`${signal} received, starting graceful shutdown...`);

      server.close(() => {
        logger.info('HTTP server closed');
        process.exit(0);
      });

      // Force shutdown after 10 seconds
      setTimeout(() => {
        logger.error('Could not close connections in time, forcefully shutting down');
        process.exit(1);
      }, 10000).unref();
    };

    process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => gracefulShutdown('SIGINT'));

    process.on('uncaughtException', (error: Error) => {
      logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
      gracefulShutdown('uncaughtException');
    });

    process.on('unhandledRejection', (reason: unknown) => {
      logger.error('Unhandled Rejection', { reason });
      gracefulShutdown('unhandledRejection');
    });
  } catch (error) {
    logger.error('Failed to start server', { error });
    process.exit(1);
  }
}

startServer();
