import { registerAs } from '@nestjs/config';

export interface RedisConfig {
  url: string;
  keyPrefix: string;
}

export default registerAs(
  'redis',
  (): RedisConfig => ({
    url: process.env.REDIS_URL ?? 'redis://localhost:6379/0',
    keyPrefix: process.env.REDIS_KEY_PREFIX ?? 'todos',
  }),
);
