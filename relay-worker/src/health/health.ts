import { pingRedis, type RedisHealthClient } from '@event-relay/shared';

interface HealthDeps {
  redis: RedisHealthClient;
}

export interface WorkerHealthStatus {
  status: 'healthy' | 'unhealthy';
  redis: 'connected' | 'disconnected';
  timestamp: string;
}

export async function checkWorkerHealth(
  deps: HealthDeps,
  now: () => Date = () => new Date(),
): Promise<WorkerHealthStatus> {
  const redis = await pingRedis(deps.redis);

  return {
    status: redis === 'connected' ? 'healthy' : 'unhealthy',
    redis,
    timestamp: now().toISOString(),
  };
}
