/**
 * Upstash Redis Client Configuration
 */

import { Redis } from '@upstash/redis';

export interface RedisSettings {
  url: string;
  token: string;
}

export function createRedisClient(settings: RedisSettings): Redis {
  if (settings.url === '') {
    throw new Error('UPSTASH_REDIS_URL is required');
  }
  if (settings.token === '') {
    throw new Error('UPSTASH_REDIS_TOKEN is required');
  }
  return new Redis({
    url: settings.url,
    token: settings.token,
  });
}
