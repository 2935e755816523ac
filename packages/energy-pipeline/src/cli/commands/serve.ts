/**
 * Serve Command
 *
 * Start the HTTP API server over a freshly loaded pipeline context.
 * SIGHUP reloads the dataset; SIGTERM and SIGINT stop the server.
 */

import type { PipelineConfig } from '../../core/config.js';
import { errorMessage } from '../../core/errors.js';
import { logger } from '../../core/utils/logger.js';
import { EnergyPipelineContext } from '../../context/pipeline-context.js';
import { EnergyDashboardAPI } from '../../serving/api.js';

export interface ServeOptions {
  readonly corsOrigins?: string;
}

export async function serveCommand(config: PipelineConfig, options: ServeOptions = {}): Promise<EnergyDashboardAPI> {
  logger.info('Starting energy dashboard API server...', {
    host: config.server.host,
    port: config.server.port,
    dataPath: config.dataPath,
  });

  const context = await EnergyPipelineContext.fromConfig(config);
  const api = new EnergyDashboardAPI(context, {
    host: config.server.host,
    port: config.server.port,
    corsOrigins: (options.corsOrigins ?? '*').split(',').map((origin) => origin.trim()),
  });
  await api.start();

  // Graceful shutdown
  const shutdown = (): void => {
    logger.info('Received shutdown signal, stopping server...');
    api.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Server did not stop cleanly', { error: errorMessage(error) });
        process.exit(1);
      }
    );
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
  process.on('SIGHUP', () => {
    context.reload().catch((error: unknown) => {
      logger.warn('Reload on SIGHUP failed, keeping current snapshot', { error: errorMessage(error) });
    });
  });

  return api;
}
