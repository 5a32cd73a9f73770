import cookie from '@fastify/cookie';
import multipart from '@fastify/multipart';
import fastify, { type FastifyInstance } from 'fastify';

import type { AnalyzerConfig } from './config';
import { mapErrorToResponse } from './errors';
import { createLogger } from './logger';
import { createMetrics } from './metrics';
import { registerApiRoutes } from './routes/api';
import { registerHealthRoutes } from './routes/health';
import { registerWizardRoutes } from './routes/wizard';
import { WizardSessionStore } from './session/store';
import type { AppContext } from './types';
import { createViewRenderer } from './views';

interface CreateAppResult {
  app: FastifyInstance;
  ctx: AppContext;
}

export const createApp = async (config: AnalyzerConfig): Promise<CreateAppResult> => {
  const logger = createLogger(config.logLevel);
  const app = fastify({ logger });

  await app.register(cookie, { secret: config.cookieSecret });
  await app.register(multipart, {
    limits: {
      fileSize: config.maxUploadBytes,
      fieldSize: 64 * 1024,
      fields: 16
    }
  });

  const metrics = createMetrics();
  metrics.readinessGauge.set({ component: 'uploads' }, 0);

  const sessions = new WizardSessionStore({
    rootDir: config.uploadDir,
    ttlMs: config.sessionTtlSeconds * 1000,
    onChange: (event) => {
      metrics.activeSessions.set(sessions.size);
      if (event.action === 'discarded') {
        metrics.sessionsDiscarded.inc({ reason: event.reason });
        app.log.debug({ token: event.session.token, reason: event.reason }, 'Wizard session discarded');
      }
    }
  });

  const readiness = { uploads: false };
  await sessions.init();
  readiness.uploads = true;
  metrics.readinessGauge.set({ component: 'uploads' }, 1);

  const ctx: AppContext = {
    config,
    sessions,
    metrics,
    views: createViewRenderer(),
    readiness
  };

  registerHealthRoutes(app, ctx);
  registerWizardRoutes(app, ctx);
  registerApiRoutes(app, ctx);

  app.setErrorHandler((error, request, reply) => {
    const mapped = mapErrorToResponse(error);
    if (mapped.statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error');
    }
    reply.status(mapped.statusCode).send({ message: mapped.message, details: mapped.details });
  });

  app.addHook('onClose', async () => {
    readiness.uploads = false;
    await sessions.close();
  });

  return { app, ctx };
};
