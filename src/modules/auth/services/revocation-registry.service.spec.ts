import { Test } from '@nestjs/testing';
import { RevocationRegistryService } from './revocation-registry.service';
import { REDIS_CLIENT } from '../../../common/redis/redis.constants';
import { FakeRedis } from '../../../../test/support/fake-redis';

describe('RevocationRegistryService', () => {
  let registry: RevocationRegistryService;
  let redis: FakeRedis;
  let now: number;

  beforeEach(async () => {
    now = 1_700_000_000_000;
    jest.spyOn(Date, 'now').mockImplementation(() => now);
    redis = new FakeRedis();

    const moduleRef = await Test.createTestingModule({
      providers: [
        RevocationRegistryService,
        { provide: REDIS_CLIENT, useValue: redis },
      ],
    }).compile();

    registry = moduleRef.get(RevocationRegistryService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('reports unknown identifiers as not revoked', async () => {
    await expect(registry.isRevoked('jti-1')).resolves.toBe(false);
  });

  it('stores the entry under a namespaced key with the given ttl', async () => {
    await registry.revoke('jti-1', 3600);

    await expect(registry.isRevoked('jti-1')).resolves.toBe(true);
    expect(redis.ttl('revoked:jti-1')).toBe(3600);
  });

  it('forgets the entry once its ttl has elapsed', async () => {
    await registry.revoke('jti-1', 60);

    now += 59_000;
    await expect(registry.isRevoked('jti-1')).resolves.toBe(true);

    now += 1_000;
    await expect(registry.isRevoked('jti-1')).resolves.toBe(false);
  });

  it('refreshes the ttl when revoked again', async () => {
    await registry.revoke('jti-1', 60);
    now += 30_000;
    await registry.revoke('jti-1', 60);

    expect(redis.ttl('revoked:jti-1')).toBe(60);
  });
});
