/**
 * Registry data model: identities, credentials, audit events and the
 * transactions that mutate them.
 */

/** Checksummed EVM account address. */
export type Principal = string;

export const MAX_REPUTATION_SCORE = 1000;
export const INITIAL_REPUTATION_SCORE = 100;
export const UNKNOWN_ISSUER = 'Unknown Issuer';

export interface Identity {
  name: string;
  email: string;
  profileHash: string;
  reputationScore: number;
  isVerified: boolean;
  createdAt: number;
  lastUpdated: number;
}

export interface Credential {
  credentialType: string;
  /** Issuer display name captured at issuance time */
  issuer: string;
  credentialHash: string;
  issuedAt: number;
  /** 0 = never expires */
  expiresAt: number;
  isValid: boolean;
}

// ─── Events ──────────────────────────────────────────────────────────────

export interface IdentityCreatedEvent {
  type: 'IdentityCreated';
  user: Principal;
  name: string;
  timestamp: number;
}

export interface IdentityUpdatedEvent {
  type: 'IdentityUpdated';
  user: Principal;
  timestamp: number;
}

export interface CredentialAddedEvent {
  type: 'CredentialAdded';
  user: Principal;
  credentialType: string;
  issuer: string;
  timestamp: number;
}

export interface CredentialRevokedEvent {
  type: 'CredentialRevoked';
  user: Principal;
  credentialIndex: number;
  timestamp: number;
}

export interface TrustedIssuerAddedEvent {
  type: 'TrustedIssuerAdded';
  issuer: Principal;
  timestamp: number;
}

export interface TrustedIssuerRemovedEvent {
  type: 'TrustedIssuerRemoved';
  issuer: Principal;
  timestamp: number;
}

export interface ReputationUpdatedEvent {
  type: 'ReputationUpdated';
  user: Principal;
  newScore: number;
  timestamp: number;
}

export type RegistryEvent =
  | IdentityCreatedEvent
  | IdentityUpdatedEvent
  | CredentialAddedEvent
  | CredentialRevokedEvent
  | TrustedIssuerAddedEvent
  | TrustedIssuerRemovedEvent
  | ReputationUpdatedEvent;

export type RegistryEventType = RegistryEvent['type'];

/** An event as stored in the audit log. */
export interface EventRecord {
  sequence: number;
  event: RegistryEvent;
}

// ─── Transactions ────────────────────────────────────────────────────────

interface TransactionBase {
  sender: Principal;
  /** Unix seconds; the registry clock is used when omitted */
  timestamp?: number;
}

export interface ProfileFields {
  name: string;
  email: string;
  profileHash: string;
}

export interface CreateIdentityTx extends TransactionBase, ProfileFields {
  type: 'createIdentity';
}

export interface UpdateProfileTx extends TransactionBase, ProfileFields {
  type: 'updateProfile';
  /** Identity being edited; must equal the sender when given */
  subject?: Principal;
}

export interface VerifyIdentityTx extends TransactionBase {
  type: 'verifyIdentity';
  subject: Principal;
  verified: boolean;
}

export interface AddCredentialTx extends TransactionBase {
  type: 'addCredential';
  subject: Principal;
  credentialType: string;
  credentialHash: string;
  expiresAt: number;
}

export interface RevokeCredentialTx extends TransactionBase {
  type: 'revokeCredential';
  subject: Principal;
  index: number;
}

export interface AddTrustedIssuerTx extends TransactionBase {
  type: 'addTrustedIssuer';
  issuer: Principal;
}

export interface RemoveTrustedIssuerTx extends TransactionBase {
  type: 'removeTrustedIssuer';
  issuer: Principal;
}

export type RegistryTransaction =
  | CreateIdentityTx
  | UpdateProfileTx
  | VerifyIdentityTx
  | AddCredentialTx
  | RevokeCredentialTx
  | AddTrustedIssuerTx
  | RemoveTrustedIssuerTx;

export type RegistryTransactionType = RegistryTransaction['type'];

export interface TransactionReceipt {
  sequence: number;
  type: RegistryTransactionType;
  sender: Principal;
  timestamp: number;
  events: RegistryEvent[];
  /** Index assigned by addCredential */
  credentialIndex?: number;
}

/** A stored credential with its index and validity at read time. */
export interface CredentialStatus extends Credential {
  index: number;
  valid: boolean;
}

export interface RegistryStats {
  totalIdentities: number;
}

/** Unix-seconds time source. */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);
