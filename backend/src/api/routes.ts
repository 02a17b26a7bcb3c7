import type { FastifyInstance } from 'fastify';
import type { AppDeps } from '../app.js';
import { registerSiteDecisionModule } from '../modules/site-decision/index.js';

const startedAt = Date.now();

export async function registerRoutes(app: FastifyInstance, deps: AppDeps = {}): Promise<void> {
  app.get('/api/health', async () => ({
    ok: true,
    service: 'site-decision',
    uptimeSec: Math.floor((Date.now() - startedAt) / 1000),
    timestamp: new Date().toISOString(),
  }));

  await registerSiteDecisionModule(app, deps.siteDecision);
}
