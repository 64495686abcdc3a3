import type { FastifyPluginAsync } from 'fastify';

export const healthRoutes: FastifyPluginAsync<{ readonly version: string }> = async (app, { version }) => {
  app.get('/health', async () => ({ status: 'healthy', version }));
};
