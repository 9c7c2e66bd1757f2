import type { RegistryStore, StateChanges } from '../store/types.js';
import { emptyChanges } from '../store/types.js';
import type { Credential, Identity, Principal, RegistryEvent } from './types.js';

interface CredentialView {
  list: Credential[];
  committedLength: number;
  dirty: Set<number>;
}

/**
 * Copy-on-write view of registry state for a single operation.
 *
 * Reads fall through to the store the first time a key is touched; writes
 * stay here until drain() hands them to RegistryStore.commit(). Dropping the
 * working set without draining discards the operation.
 */
export class WorkingSet {
  private identities = new Map<Principal, Identity | null>();
  private dirtyIdentities = new Set<Principal>();
  private credentials = new Map<Principal, CredentialView>();
  private issuers = new Map<Principal, boolean>();
  private dirtyIssuers = new Set<Principal>();
  private identityCountDelta = 0;
  private events: RegistryEvent[] = [];

  constructor(private store: RegistryStore) {}

  async getIdentity(principal: Principal): Promise<Identity | null> {
    if (!this.identities.has(principal)) {
      this.identities.set(principal, await this.store.getIdentity(principal));
    }
    const identity = this.identities.get(principal);
    return identity ? { ...identity } : null;
  }

  putIdentity(principal: Principal, identity: Identity): void {
    this.identities.set(principal, { ...identity });
    this.dirtyIdentities.add(principal);
  }

  incrementIdentityCount(): void {
    this.identityCountDelta += 1;
  }

  async getCredentialCount(principal: Principal): Promise<number> {
    const view = await this.loadCredentials(principal);
    return view.list.length;
  }

  async getCredential(principal: Principal, index: number): Promise<Credential | null> {
    const view = await this.loadCredentials(principal);
    const credential = view.list[index];
    return credential ? { ...credential } : null;
  }

  /** Returns the index of the appended credential. */
  async appendCredential(principal: Principal, credential: Credential): Promise<number> {
    const view = await this.loadCredentials(principal);
    view.list.push({ ...credential });
    return view.list.length - 1;
  }

  async putCredential(principal: Principal, index: number, credential: Credential): Promise<void> {
    const view = await this.loadCredentials(principal);
    if (index < 0 || index >= view.list.length) {
      throw new Error(`Credential ${index} of ${principal} is not loaded`);
    }
    view.list[index] = { ...credential };
    if (index < view.committedLength) {
      view.dirty.add(index);
    }
  }

  async isTrustedIssuer(principal: Principal): Promise<boolean> {
    const cached = this.issuers.get(principal);
    if (cached !== undefined) return cached;
    const trusted = await this.store.isTrustedIssuer(principal);
    this.issuers.set(principal, trusted);
    return trusted;
  }

  setTrustedIssuer(principal: Principal, trusted: boolean): void {
    this.issuers.set(principal, trusted);
    this.dirtyIssuers.add(principal);
  }

  emit(event: RegistryEvent): void {
    this.events.push(event);
  }

  /** Collect pending writes and events. */
  drain(): { changes: StateChanges; events: RegistryEvent[] } {
    const changes = emptyChanges();

    for (const principal of this.dirtyIdentities) {
      const identity = this.identities.get(principal);
      if (identity) changes.identities.set(principal, identity);
    }
    for (const [principal, view] of this.credentials) {
      for (const index of view.dirty) {
        changes.credentialUpdates.push({ subject: principal, index, credential: view.list[index] });
      }
      if (view.list.length > view.committedLength) {
        changes.credentialAppends.set(principal, view.list.slice(view.committedLength));
      }
    }
    for (const principal of this.dirtyIssuers) {
      changes.issuers.set(principal, this.issuers.get(principal) === true);
    }
    changes.identityCountDelta = this.identityCountDelta;

    return { changes, events: [...this.events] };
  }

  private async loadCredentials(principal: Principal): Promise<CredentialView> {
    let view = this.credentials.get(principal);
    if (!view) {
      const list = await this.store.getCredentials(principal);
      view = { list, committedLength: list.length, dirty: new Set() };
      this.credentials.set(principal, view);
    }
    return view;
  }
}
