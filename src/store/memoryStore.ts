import type {
  Credential,
  EventRecord,
  Identity,
  Principal,
  RegistryEvent,
} from '../registry/types.js';
import type { RegistryStore, StateChanges } from './types.js';

/**
 * Process-local registry state. Commits run synchronously between awaits,
 * so readers never observe a partial commit.
 */
export class MemoryRegistryStore implements RegistryStore {
  private identities = new Map<Principal, Identity>();
  private credentials = new Map<Principal, Credential[]>();
  private issuers = new Map<Principal, boolean>();
  private owner: Principal | null = null;
  private totalIdentities = 0;
  private sequence = 0;
  private events: EventRecord[] = [];

  async getIdentity(principal: Principal): Promise<Identity | null> {
    const identity = this.identities.get(principal);
    return identity ? { ...identity } : null;
  }

  async getCredentials(principal: Principal): Promise<Credential[]> {
    return (this.credentials.get(principal) ?? []).map((credential) => ({ ...credential }));
  }

  async getCredential(principal: Principal, index: number): Promise<Credential | null> {
    const credential = this.credentials.get(principal)?.[index];
    return credential ? { ...credential } : null;
  }

  async getCredentialCount(principal: Principal): Promise<number> {
    return this.credentials.get(principal)?.length ?? 0;
  }

  async isTrustedIssuer(principal: Principal): Promise<boolean> {
    return this.issuers.get(principal) === true;
  }

  async getOwner(): Promise<Principal | null> {
    return this.owner;
  }

  async getTotalIdentities(): Promise<number> {
    return this.totalIdentities;
  }

  async getEvents(offset: number, limit: number): Promise<EventRecord[]> {
    return this.events.slice(offset, offset + limit).map((record) => ({
      sequence: record.sequence,
      event: { ...record.event },
    }));
  }

  async getEventCount(): Promise<number> {
    return this.events.length;
  }

  async seedOwner(owner: Principal): Promise<Principal> {
    if (this.owner === null) {
      this.owner = owner;
      this.issuers.set(owner, true);
    }
    return this.owner;
  }

  async begin(): Promise<number> {
    return this.sequence;
  }

  async commit(changes: StateChanges, events: RegistryEvent[], baseSequence: number): Promise<number> {
    if (baseSequence !== this.sequence) {
      throw new Error(
        `Failed to commit registry transaction: sequence changed by another writer (expected ${baseSequence}, found ${this.sequence})`,
      );
    }
    const sequence = this.sequence + 1;

    for (const update of changes.credentialUpdates) {
      const list = this.credentials.get(update.subject);
      if (!list || update.index >= list.length) {
        throw new Error(`Credential ${update.index} of ${update.subject} does not exist`);
      }
    }

    for (const [principal, identity] of changes.identities) {
      this.identities.set(principal, { ...identity });
    }
    for (const update of changes.credentialUpdates) {
      const list = this.credentials.get(update.subject) ?? [];
      list[update.index] = { ...update.credential };
    }
    for (const [principal, appended] of changes.credentialAppends) {
      const list = this.credentials.get(principal) ?? [];
      list.push(...appended.map((credential) => ({ ...credential })));
      this.credentials.set(principal, list);
    }
    for (const [principal, trusted] of changes.issuers) {
      this.issuers.set(principal, trusted);
    }
    this.totalIdentities += changes.identityCountDelta;
    this.events.push(...events.map((event) => ({ sequence, event: { ...event } })));
    this.sequence = sequence;

    return sequence;
  }

  /** Nothing is held between begin() and commit(). */
  async abort(): Promise<void> {}
}
