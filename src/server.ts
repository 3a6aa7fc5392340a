import { buildApp } from './app.js';
import { HOST, NBP_API_BASE, PORT, REQUEST_TIMEOUT_MS } from './config/constants.js';

const fastify = await buildApp();

try {
  await fastify.listen({ port: PORT, host: HOST });
  fastify.log.info(`🚀 Server running on http://${HOST}:${PORT}`);
  fastify.log.info(`🏦 Upstream: ${NBP_API_BASE} (timeout ${REQUEST_TIMEOUT_MS / 1000}s)`);
} catch (err) {
  fastify.log.error(err);
  process.exit(1);
}
