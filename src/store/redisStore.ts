import type { RedisClient } from '../redis/client.js';
import { registryKeys, type RegistryKeys } from '../redis/constants.js';
import type {
  Credential,
  EventRecord,
  Identity,
  Principal,
  RegistryEvent,
} from '../registry/types.js';
import type { RegistryStore, StateChanges } from './types.js';
import { createLogger } from '../logger.js';

const log = createLogger('RedisStore');

/**
 * Registry state kept in Redis.
 *
 * Layout (prefix defaults to "registry"):
 *   {prefix}:identity:<principal>     JSON Identity
 *   {prefix}:credentials:<principal>  list of JSON Credential, index = position
 *   {prefix}:issuers                  hash principal -> "1" | "0"
 *   {prefix}:owner                    owner principal
 *   {prefix}:stats:identities         identity counter
 *   {prefix}:tx:seq                   last committed transaction sequence
 *   {prefix}:events                   list of JSON EventRecord
 *
 * begin() WATCHes the sequence key before the transaction reads anything and
 * commit() is a single MULTI/EXEC on the same connection, so a commit fails
 * when another writer sharing the keys committed in between.
 */
export class RedisRegistryStore implements RegistryStore {
  private redis: RedisClient;
  private keys: RegistryKeys;

  constructor(redis: RedisClient, keyPrefix = 'registry') {
    this.redis = redis;
    this.keys = registryKeys(keyPrefix);
  }

  async getIdentity(principal: Principal): Promise<Identity | null> {
    const data = await this.redis.get(this.keys.identity(principal));
    if (!data) return null;
    return JSON.parse(data) as Identity;
  }

  async getCredentials(principal: Principal): Promise<Credential[]> {
    const items = await this.redis.lrange(this.keys.credentials(principal), 0, -1);
    return items.map((item) => JSON.parse(item) as Credential);
  }

  async getCredential(principal: Principal, index: number): Promise<Credential | null> {
    if (!Number.isSafeInteger(index) || index < 0) return null;
    const item = await this.redis.lindex(this.keys.credentials(principal), index);
    if (!item) return null;
    return JSON.parse(item) as Credential;
  }

  async getCredentialCount(principal: Principal): Promise<number> {
    return this.redis.llen(this.keys.credentials(principal));
  }

  async isTrustedIssuer(principal: Principal): Promise<boolean> {
    const flag = await this.redis.hget(this.keys.issuers, principal);
    return flag === '1';
  }

  async getOwner(): Promise<Principal | null> {
    return this.redis.get(this.keys.owner);
  }

  async getTotalIdentities(): Promise<number> {
    const count = await this.redis.get(this.keys.identityCount);
    return count ? parseInt(count, 10) : 0;
  }

  async getEvents(offset: number, limit: number): Promise<EventRecord[]> {
    if (limit <= 0) return [];
    const items = await this.redis.lrange(this.keys.events, offset, offset + limit - 1);
    return items.map((item) => JSON.parse(item) as EventRecord);
  }

  async getEventCount(): Promise<number> {
    return this.redis.llen(this.keys.events);
  }

  async seedOwner(owner: Principal): Promise<Principal> {
    await this.redis.watch(this.keys.owner);
    const existing = await this.redis.get(this.keys.owner);
    if (existing) {
      await this.redis.unwatch();
      return existing;
    }

    const result = await this.redis
      .multi()
      .set(this.keys.owner, owner)
      .hset(this.keys.issuers, owner, '1')
      .exec();

    if (result === null) {
      // Another process seeded first.
      const seeded = await this.redis.get(this.keys.owner);
      if (!seeded) {
        throw new Error('Failed to seed registry owner: owner key changed but is empty');
      }
      return seeded;
    }
    assertExecSucceeded(result, 'seed registry owner');

    log.info({ owner }, 'Registry owner seeded');
    return owner;
  }

  async begin(): Promise<number> {
    await this.redis.watch(this.keys.sequence);
    return this.readSequence();
  }

  async abort(): Promise<void> {
    await this.redis.unwatch();
  }

  async commit(changes: StateChanges, events: RegistryEvent[], baseSequence: number): Promise<number> {
    const current = await this.readSequence();
    if (current !== baseSequence) {
      await this.redis.unwatch();
      throw new Error(
        `Failed to commit registry transaction: sequence changed by another writer (expected ${baseSequence}, found ${current})`,
      );
    }
    const sequence = baseSequence + 1;

    const multi = this.redis.multi();
    for (const [principal, identity] of changes.identities) {
      multi.set(this.keys.identity(principal), JSON.stringify(identity));
    }
    for (const update of changes.credentialUpdates) {
      multi.lset(this.keys.credentials(update.subject), update.index, JSON.stringify(update.credential));
    }
    for (const [principal, appended] of changes.credentialAppends) {
      if (appended.length === 0) continue;
      multi.rpush(
        this.keys.credentials(principal),
        ...appended.map((credential) => JSON.stringify(credential)),
      );
    }
    for (const [principal, trusted] of changes.issuers) {
      multi.hset(this.keys.issuers, principal, trusted ? '1' : '0');
    }
    if (changes.identityCountDelta !== 0) {
      multi.incrby(this.keys.identityCount, changes.identityCountDelta);
    }
    if (events.length > 0) {
      const records: EventRecord[] = events.map((event) => ({ sequence, event }));
      multi.rpush(this.keys.events, ...records.map((record) => JSON.stringify(record)));
    }
    multi.set(this.keys.sequence, String(sequence));

    const result = await multi.exec();
    if (result === null) {
      throw new Error(
        'Failed to commit registry transaction: sequence changed by another writer',
      );
    }
    assertExecSucceeded(result, 'commit registry transaction');

    return sequence;
  }

  private async readSequence(): Promise<number> {
    const current = await this.redis.get(this.keys.sequence);
    return current ? parseInt(current, 10) : 0;
  }
}

function assertExecSucceeded(
  result: Array<[error: Error | null, value: unknown]>,
  action: string,
): void {
  const failure = result.find(([error]) => error !== null);
  if (failure && failure[0]) {
    throw new Error(`Failed to ${action}: ${failure[0].message}`);
  }
}
