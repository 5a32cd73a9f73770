import process from 'node:process';

import pino from 'pino';

import { createApp } from './app';
import { ConfigError, loadConfig, type AnalyzerConfig } from './config';
import { createLogger } from './logger';

const readConfig = (): AnalyzerConfig | null => {
  try {
    return loadConfig();
  } catch (error) {
    if (!(error instanceof ConfigError)) {
      throw error;
    }
    pino(createLogger('error')).fatal({ issues: error.issues }, 'Invalid station analyzer configuration');
    return null;
  }
};

const start = async () => {
  const config = readConfig();
  if (!config) {
    process.exitCode = 1;
    return;
  }

  const { app, ctx } = await createApp(config);

  // Abandoned wizards leave their upload behind until the next request touches the store.
  const sweeper = setInterval(() => {
    ctx.sessions
      .sweepExpired()
      .then((swept) => {
        if (swept > 0) {
          app.log.info({ swept }, 'Expired wizard uploads removed');
        }
      })
      .catch((error: unknown) => {
        app.log.warn({ err: error }, 'Failed to sweep expired wizard uploads');
      });
  }, Math.min(config.sessionTtlSeconds, 60) * 1000);
  sweeper.unref();

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(
      { address: `http://${config.host}:${config.port}`, uploadDir: config.uploadDir, rowOrder: config.rowOrder },
      'Station analyzer ready for uploads'
    );
  } catch (error) {
    clearInterval(sweeper);
    app.log.error({ err: error }, 'Station analyzer could not bind its port');
    await app.close();
    process.exit(1);
  }

  const stop = async (signal: NodeJS.Signals) => {
    clearInterval(sweeper);
    app.log.info({ signal, pendingUploads: ctx.sessions.size }, 'Stopping; pending uploads will be discarded');
    try {
      await app.close();
      process.exit(0);
    } catch (error) {
      app.log.error({ err: error }, 'Station analyzer did not close cleanly');
      process.exit(1);
    }
  };

  process.once('SIGTERM', () => void stop('SIGTERM'));
  process.once('SIGINT', () => void stop('SIGINT'));
};

start().catch((error: unknown) => {
  pino(createLogger('fatal')).fatal({ err: error }, 'Station analyzer failed to start');
  process.exit(1);
});
