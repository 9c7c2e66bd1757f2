import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryRegistryStore } from '../../src/store/memoryStore.js';
import { emptyChanges } from '../../src/store/types.js';
import type { Credential, Identity } from '../../src/registry/types.js';
import { ALICE, BOB, OWNER, T0 } from '../helpers/fixtures.js';

const alice: Identity = {
  name: 'Alice',
  email: 'alice@example.com',
  profileHash: '',
  reputationScore: 100,
  isVerified: false,
  createdAt: T0,
  lastUpdated: T0,
};

const kyc: Credential = {
  credentialType: 'KYC',
  issuer: 'Unknown Issuer',
  credentialHash: 'bafy-kyc',
  issuedAt: T0,
  expiresAt: 0,
  isValid: true,
};

describe('MemoryRegistryStore', () => {
  let store: MemoryRegistryStore;

  beforeEach(() => {
    store = new MemoryRegistryStore();
  });

  it('seeds the owner once', async () => {
    expect(await store.seedOwner(OWNER)).toBe(OWNER);
    expect(await store.seedOwner(BOB)).toBe(OWNER);
    expect(await store.getOwner()).toBe(OWNER);
    expect(await store.isTrustedIssuer(OWNER)).toBe(true);
    expect(await store.isTrustedIssuer(BOB)).toBe(false);
  });

  it('applies a commit and numbers its events', async () => {
    const changes = emptyChanges();
    changes.identities.set(ALICE, alice);
    changes.credentialAppends.set(ALICE, [kyc]);
    changes.identityCountDelta = 1;
    const event = { type: 'IdentityCreated' as const, user: ALICE, name: 'Alice', timestamp: T0 };

    expect(await store.commit(changes, [event], await store.begin())).toBe(1);
    expect(await store.commit(emptyChanges(), [], await store.begin())).toBe(2);

    expect(await store.getIdentity(ALICE)).toEqual(alice);
    expect(await store.getCredentials(ALICE)).toEqual([kyc]);
    expect(await store.getCredentialCount(ALICE)).toBe(1);
    expect(await store.getTotalIdentities()).toBe(1);
    expect(await store.getEvents(0, 10)).toEqual([{ sequence: 1, event }]);
    expect(await store.getEventCount()).toBe(1);
  });

  it('rejects a commit that updates a missing credential and applies nothing', async () => {
    const changes = emptyChanges();
    changes.identities.set(ALICE, alice);
    changes.credentialUpdates.push({ subject: ALICE, index: 0, credential: kyc });

    await expect(store.commit(changes, [], await store.begin())).rejects.toThrow('does not exist');
    expect(await store.getIdentity(ALICE)).toBeNull();
    expect(await store.commit(emptyChanges(), [], await store.begin())).toBe(1);
  });

  it('rejects a commit built on a stale sequence and applies nothing', async () => {
    const base = await store.begin();
    await store.commit(emptyChanges(), [], base);

    const changes = emptyChanges();
    changes.identities.set(ALICE, alice);
    changes.identityCountDelta = 1;

    await expect(store.commit(changes, [], base)).rejects.toThrow(
      'Failed to commit registry transaction: sequence changed by another writer (expected 0, found 1)',
    );
    expect(await store.getIdentity(ALICE)).toBeNull();
    expect(await store.getTotalIdentities()).toBe(0);
  });

  it('returns copies that cannot alter stored state', async () => {
    const changes = emptyChanges();
    changes.identities.set(ALICE, alice);
    changes.credentialAppends.set(ALICE, [kyc]);
    await store.commit(changes, [], await store.begin());

    const identity = await store.getIdentity(ALICE);
    const credentials = await store.getCredentials(ALICE);
    if (identity) identity.reputationScore = 999;
    credentials[0].isValid = false;

    expect((await store.getIdentity(ALICE))?.reputationScore).toBe(100);
    expect((await store.getCredential(ALICE, 0))?.isValid).toBe(true);
  });

  it('returns null for a missing credential index', async () => {
    expect(await store.getCredential(ALICE, 0)).toBeNull();
    expect(await store.getCredentials(ALICE)).toEqual([]);
  });
});
