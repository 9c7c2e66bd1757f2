import type {
  Credential,
  EventRecord,
  Identity,
  Principal,
  RegistryEvent,
} from '../registry/types.js';

export interface CredentialUpdate {
  subject: Principal;
  index: number;
  credential: Credential;
}

/**
 * Writes collected by one registry operation. A backend applies all of them,
 * together with the events, or none.
 */
export interface StateChanges {
  identities: Map<Principal, Identity>;
  credentialAppends: Map<Principal, Credential[]>;
  credentialUpdates: CredentialUpdate[];
  issuers: Map<Principal, boolean>;
  identityCountDelta: number;
}

export interface RegistryStore {
  getIdentity(principal: Principal): Promise<Identity | null>;
  getCredentials(principal: Principal): Promise<Credential[]>;
  getCredential(principal: Principal, index: number): Promise<Credential | null>;
  getCredentialCount(principal: Principal): Promise<number>;
  isTrustedIssuer(principal: Principal): Promise<boolean>;
  getOwner(): Promise<Principal | null>;
  getTotalIdentities(): Promise<number>;
  getEvents(offset: number, limit: number): Promise<EventRecord[]>;
  getEventCount(): Promise<number>;

  /**
   * Record the owner and mark it as a trusted issuer, unless an owner is
   * already recorded. Returns the owner in effect afterwards.
   */
  seedOwner(owner: Principal): Promise<Principal>;

  /**
   * Start a transaction before its first read. Returns the sequence the
   * transaction is based on.
   */
  begin(): Promise<number>;

  /**
   * Atomically apply the changes, append the events and advance the
   * transaction sequence. Fails without applying anything when another
   * writer committed since begin() returned baseSequence. Returns the new
   * sequence number.
   */
  commit(changes: StateChanges, events: RegistryEvent[], baseSequence: number): Promise<number>;

  /** End a transaction started with begin() that will not be committed. */
  abort(): Promise<void>;
}

export function emptyChanges(): StateChanges {
  return {
    identities: new Map(),
    credentialAppends: new Map(),
    credentialUpdates: [],
    issuers: new Map(),
    identityCountDelta: 0,
  };
}
