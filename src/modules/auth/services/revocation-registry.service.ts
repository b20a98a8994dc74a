import { Inject, Injectable, Logger } from '@nestjs/common';
import { Redis } from 'ioredis';
import { REDIS_CLIENT } from '../../../common/redis/redis.constants';

/**
 * Denylist of revoked token identifiers. Each entry expires on its own in
 * Redis, so nothing here ever sweeps old entries.
 */
@Injectable()
export class RevocationRegistryService {
  private readonly logger = new Logger(RevocationRegistryService.name);

  constructor(@Inject(REDIS_CLIENT) private readonly redis: Redis) {}

  /** Inserts or refreshes the entry. `ttlSeconds` must outlive the token itself. */
  async revoke(jti: string, ttlSeconds: number): Promise<void> {
    await this.redis.set(this.key(jti), '1', 'EX', Math.max(1, Math.ceil(ttlSeconds)));
    this.logger.debug(`Revoked token ${jti} for ${ttlSeconds}s`);
  }

  async isRevoked(jti: string): Promise<boolean> {
    return (await this.redis.exists(this.key(jti))) > 0;
  }

  private key(jti: string): string {
    return `revoked:${jti}`;
  }
}
