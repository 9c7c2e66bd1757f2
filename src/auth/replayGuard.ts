import type { RedisClient } from '../redis/client.js';
import { registryKeys, type RegistryKeys } from '../redis/constants.js';
import { systemClock, type Clock } from '../registry/types.js';

/**
 * Remembers signed requests for as long as they could still pass the
 * timestamp check, so each one is accepted once. Requests are identified by
 * a fingerprint of the signer and the signed message rather than by the
 * signature bytes, which have more than one valid encoding.
 */
export interface ReplayGuard {
  /** Returns false when the fingerprint was already claimed and has not expired. */
  claim(fingerprint: string, ttlSeconds: number): Promise<boolean>;
}

export class MemoryReplayGuard implements ReplayGuard {
  private seen = new Map<string, number>();
  private clock: Clock;

  constructor(clock: Clock = systemClock) {
    this.clock = clock;
  }

  async claim(fingerprint: string, ttlSeconds: number): Promise<boolean> {
    const now = this.clock();
    for (const [key, expiresAt] of this.seen) {
      if (expiresAt <= now) this.seen.delete(key);
    }

    if (this.seen.has(fingerprint)) return false;
    this.seen.set(fingerprint, now + ttlSeconds);
    return true;
  }

  get size(): number {
    return this.seen.size;
  }
}

export class RedisReplayGuard implements ReplayGuard {
  private redis: RedisClient;
  private keys: RegistryKeys;

  constructor(redis: RedisClient, keyPrefix = 'registry') {
    this.redis = redis;
    this.keys = registryKeys(keyPrefix);
  }

  async claim(fingerprint: string, ttlSeconds: number): Promise<boolean> {
    const result = await this.redis.set(this.keys.usedRequest(fingerprint), '1', 'EX', ttlSeconds, 'NX');
    return result === 'OK';
  }
}
