/**
 * Rooftop Solar Assistant API server
 */

import 'dotenv/config';
import { config, createLogger, validateEnv, errorMessage } from '@rooftop/shared';
import { createApp } from './app';

const logger = createLogger('SERVER');
const PORT = config.ports.api;

async function start(): Promise<void> {
  const envValidation = validateEnv();
  if (!envValidation.valid) {
    logger.error('Environment validation failed:');
    envValidation.errors.forEach(err => logger.error(`  - ${err}`));
    process.exit(1);
  }

  logger.info(`Starting in ${config.env.nodeEnv} mode`);

  const app = createApp();

  const server = app.listen(PORT, () => {
    logger.info(`Rooftop API running on port ${PORT}`);
    logger.info(`ROI defaults: energy=$${config.roi.energyCostPerKwh}/kWh, incentive=${config.roi.incentiveRate}, lifespan=${config.roi.lifespanYears}y`);
    if (config.analysis.seed !== undefined) {
      logger.info(`Analysis seed fixed at ${config.analysis.seed}`);
    }
  });

  // Graceful shutdown handler
  function shutdown(signal: string): void {
    logger.info(`${signal} received, shutting down gracefully...`);

    server.close(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });

    // Force exit after timeout
    setTimeout(() => {
      logger.warn('Forcing shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  }

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

start().catch(err => {
  logger.error(`Failed to start: ${errorMessage(err)}`);
  process.exit(1);
});
