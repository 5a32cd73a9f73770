import type { FastifyInstance } from 'fastify';

import type { AppContext } from '../types';

export const registerHealthRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/healthz', async () => ({ status: 'ok' }));

  app.get('/readyz', async (request, reply) => {
    const components: Record<string, boolean> = {
      uploads: ctx.readiness.uploads
    };
    ctx.metrics.readinessGauge.set({ component: 'uploads' }, ctx.readiness.uploads ? 1 : 0);

    if (!Object.values(components).every(Boolean)) {
      return reply.status(503).send({ status: 'not_ready', components });
    }
    return { status: 'ready', components };
  });

  app.get('/metrics', async (request, reply) => {
    reply.header('Content-Type', ctx.metrics.register.contentType);
    return ctx.metrics.register.metrics();
  });
};
