import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('ioredis', async () => {
  const { FakeRedis } = await import('../helpers/fakeRedis.js');
  return { Redis: FakeRedis, default: FakeRedis };
});

import { createRedisClient } from '../../src/redis/client.js';
import { MemoryReplayGuard, RedisReplayGuard } from '../../src/auth/replayGuard.js';
import { fakeRedisControl } from '../helpers/fakeRedis.js';
import { makeClock } from '../helpers/fixtures.js';

describe('MemoryReplayGuard', () => {
  it('accepts a fingerprint once until it expires', async () => {
    const clock = makeClock();
    const guard = new MemoryReplayGuard(clock.read);

    expect(await guard.claim('req-a', 10)).toBe(true);
    expect(await guard.claim('req-a', 10)).toBe(false);

    clock.advance(9);
    expect(await guard.claim('req-a', 10)).toBe(false);

    clock.advance(1);
    expect(await guard.claim('req-a', 10)).toBe(true);
  });

  it('forgets expired fingerprints', async () => {
    const clock = makeClock();
    const guard = new MemoryReplayGuard(clock.read);

    await guard.claim('req-a', 5);
    await guard.claim('req-b', 20);
    expect(guard.size).toBe(2);

    clock.advance(5);
    await guard.claim('req-c', 20);
    expect(guard.size).toBe(2);
    expect(await guard.claim('req-b', 20)).toBe(false);
  });
});

describe('RedisReplayGuard', () => {
  beforeEach(() => {
    fakeRedisControl.reset();
  });

  it('claims each fingerprint once', async () => {
    const guard = new RedisReplayGuard(createRedisClient('redis://localhost:6379'), 'test');

    expect(await guard.claim('req-a', 60)).toBe(true);
    expect(await guard.claim('req-a', 60)).toBe(false);
    expect(await guard.claim('req-b', 60)).toBe(true);
  });

  it('stores claims under the prefixed key shared by every connection', async () => {
    const redis = createRedisClient('redis://localhost:6379');
    const first = new RedisReplayGuard(redis, 'test');
    const second = new RedisReplayGuard(createRedisClient('redis://localhost:6379'), 'test');

    expect(await first.claim('req-a', 60)).toBe(true);
    expect(await second.claim('req-a', 60)).toBe(false);
    expect(await redis.get('test:auth:used:req-a')).toBe('1');
  });
});
