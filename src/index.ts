#!/usr/bin/env node
import { createLogger, setLogLevel } from './utils/logger.js';
import { getConfig } from './config/index.js';
import { errorMessage } from './core/errors.js';
import { buildMonitor } from './app.js';
import { buildServer, startServer } from './api/server.js';
import { EXIT_CODES } from './pipeline/MonitoringPipeline.js';

const logger = createLogger('Main');

async function main(): Promise<void> {
  const once = process.argv.includes('--once');
  logger.info(`Starting Protocol Monitor${once ? ' (single run)' : ''}...`);

  try {
    // Load configuration
    const config = getConfig();
    setLogLevel(config.app.logLevel);
    logger.info(`Environment: ${config.app.environment}`);

    const monitor = buildMonitor(config);

    if (once) {
      const summary = await monitor.pipeline.run();
      monitor.database.close();
      process.exit(EXIT_CODES[summary.status]);
    }

    // Start the reporting API
    const server = await buildServer({
      appName: config.app.name,
      protocols: monitor.protocols,
      snapshots: monitor.snapshots,
      alerts: monitor.alerts,
      database: monitor.database,
      alertSettings: config.alerts,
      getLastRun: () => monitor.pipeline.getLastRun(),
      getDeliveryCounts: () => monitor.deliveryStats.getCounts(),
      getCollectorStatus: () => monitor.collector.getStatus(),
    });
    if (config.api.enabled) {
      logger.info('Starting API server...');
      await startServer(server, config.api.host, config.api.port);
    }

    // Start the scheduled pipeline
    logger.info('Starting monitoring pipeline...');
    await monitor.pipeline.start();

    logger.info('Protocol Monitor started successfully!');
    logger.info('Press Ctrl+C to stop');

    // Handle graceful shutdown
    const shutdown = async () => {
      logger.info('Shutting down...');

      // Stop the scheduler
      monitor.pipeline.stop();

      // Stop the API
      await server.close();

      // Close database
      monitor.database.close();

      logger.info('Shutdown complete');
      process.exit(0);
    };

    const onSignal = () => {
      shutdown().catch((error: unknown) => {
        logger.error(`Shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      });
    };

    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  } catch (error) {
    logger.error(`Fatal error: ${errorMessage(error)}`);
    process.exit(EXIT_CODES.failed);
  }
}

// Run the application
main().catch((error: unknown) => {
  logger.error(`Fatal error: ${errorMessage(error)}`);
  process.exit(EXIT_CODES.failed);
});
