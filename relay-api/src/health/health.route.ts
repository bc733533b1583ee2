import { pingRedis, type RedisHealthClient } from '@event-relay/shared';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

interface RegisterHealthRouteOptions {
  redis: RedisHealthClient;
}

interface HealthResponse {
  status: 'healthy' | 'unhealthy';
  redis: 'connected' | 'disconnected';
  timestamp: string;
}

export async function registerHealthRoute(
  app: FastifyInstance,
  options: RegisterHealthRouteOptions,
): Promise<void> {
  app.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const redisStatus = await pingRedis(options.redis);

    const responseBody: HealthResponse = {
      status: redisStatus === 'connected' ? 'healthy' : 'unhealthy',
      redis: redisStatus,
      timestamp: new Date().toISOString(),
    };

    return reply.status(redisStatus === 'connected' ? 200 : 503).send(responseBody);
  });
}
