import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import NBPService, { NBPServiceOptions } from './services/nbp.service.js';
import { setupRoutes } from './routes/index.js';
import { LOG_LEVEL } from './config/constants.js';

export interface AppOptions extends NBPServiceOptions {
  logLevel?: string;
  now?: () => Date;
}

export async function buildApp(options: AppOptions = {}): Promise<FastifyInstance> {
  const { logLevel = LOG_LEVEL, now, ...serviceOptions } = options;

  const fastify = Fastify({
    logger: { level: logLevel }
  });

  // CORS configuration
  await fastify.register(cors, {
    origin: true,
    methods: ['GET', 'OPTIONS']
  });

  const nbpService = new NBPService(fastify.log, serviceOptions);

  setupRoutes(fastify, nbpService, now);

  return fastify;
}
