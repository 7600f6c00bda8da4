import 'dotenv/config';
import http from 'http';
import { appConfig } from './config/appConfig';
import { createApp } from './app';
import { createServices } from './services/container';
import logger from './utils/logger';

const SHUTDOWN_TIMEOUT_MS = 30_000;

async function bootstrapApplication(): Promise<void> {
  const services = createServices(appConfig);
  const recovered = await services.generationService.recoverInterruptedRuns();
  if (recovered > 0) {
    logger.warn({ recovered }, '[server] recovered interrupted generation runs');
  }

  const app = createApp(services, appConfig);
  const server = http.createServer(app);
  const { port } = appConfig.server;
  server.listen(port, () => {
    logger.info(
      { port, simulation: services.providerRegistry.simulation, primary: services.providerRegistry.primary.name },
      '[server] listening'
    );
  });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, '[server] shutting down');

    const forceExit = setTimeout(() => {
      logger.error('[server] shutdown timed out');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    services.generationService
      .shutdown()
      .then(() => {
        server.close((error) => {
          if (error) {
            logger.error({ err: error }, '[server] error while closing server');
            process.exit(1);
            return;
          }
          process.exit(0);
        });
      })
      .catch((error) => {
        logger.error({ err: error }, '[server] error while stopping generation runs');
        process.exit(1);
      });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

async function start(): Promise<void> {
  try {
    await bootstrapApplication();
  } catch (error) {
    logger.error({ err: error }, '[server] failed to start');
    process.exit(1);
  }
}

void start();
