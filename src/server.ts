import Fastify, { type FastifyInstance } from 'fastify';
import websocket from '@fastify/websocket';
import { wsHandler, type WsHandlerOptions } from './adapters/ws-handler';
import { config } from './config';
import { errorMessage, logger } from './observability/logger';

export type BuildServerOptions = WsHandlerOptions & {
  httpLogger?: boolean;
};

export async function buildServer(opts: BuildServerOptions = {}): Promise<FastifyInstance> {
  const { httpLogger = true, ...wsOpts } = opts;
  const server = Fastify({ logger: httpLogger });
  await server.register(websocket);

  server.get('/health', async () => ({ status: 'ok' }));

  server.get('/ws/chat', { websocket: true }, (socket, _req) => {
    wsHandler(socket, wsOpts);
  });

  return server;
}

async function start() {
  logger.info('=== chat bridge start ===', { model: config.chatModel, api: config.chatApiBaseUrl });
  const server = await buildServer();
  await server.listen({ port: config.port, host: config.host });
  logger.info('server listening', { port: config.port, host: config.host });
}

if (require.main === module) {
  start().catch((err: unknown) => {
    logger.error('failed to start server', { error: errorMessage(err) });
    process.exit(1);
  });
}
