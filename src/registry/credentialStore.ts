import { indexOutOfRange, invalidInput } from './errors.js';
import { requireIdentity } from './identityStore.js';
import { adjustReputation, REPUTATION_DELTAS } from './reputation.js';
import { UNKNOWN_ISSUER, type Credential, type Principal } from './types.js';
import type { WorkingSet } from './workingSet.js';

export interface NewCredential {
  credentialType: string;
  credentialHash: string;
  expiresAt: number;
}

/**
 * Credential validity at a point in time. Expiry is derived, never stored.
 */
export function isCredentialActive(credential: Credential, now: number): boolean {
  return credential.isValid && (credential.expiresAt === 0 || credential.expiresAt > now);
}

export function isValidIndex(index: number, length: number): boolean {
  return Number.isSafeInteger(index) && index >= 0 && index < length;
}

export async function addCredential(
  ws: WorkingSet,
  subject: Principal,
  input: NewCredential,
  issuerPrincipal: Principal,
  now: number,
): Promise<number> {
  await requireIdentity(ws, subject);

  if (!input.credentialType) throw invalidInput('Credential type cannot be empty');
  if (!input.credentialHash) throw invalidInput('Credential hash cannot be empty');
  if (!Number.isInteger(input.expiresAt) || input.expiresAt < 0) {
    throw invalidInput(`Invalid expiration: ${input.expiresAt}`);
  }
  if (input.expiresAt !== 0 && input.expiresAt <= now) {
    throw invalidInput('Expiration must be in the future');
  }

  const issuerIdentity = await ws.getIdentity(issuerPrincipal);
  const issuer = issuerIdentity ? issuerIdentity.name : UNKNOWN_ISSUER;

  const index = await ws.appendCredential(subject, {
    credentialType: input.credentialType,
    issuer,
    credentialHash: input.credentialHash,
    issuedAt: now,
    expiresAt: input.expiresAt,
    isValid: true,
  });
  ws.emit({
    type: 'CredentialAdded',
    user: subject,
    credentialType: input.credentialType,
    issuer,
    timestamp: now,
  });

  await adjustReputation(ws, subject, REPUTATION_DELTAS.credentialAdded, now);
  return index;
}

/**
 * Revoking an already revoked credential is accepted and applies the
 * penalty again.
 */
export async function revokeCredential(
  ws: WorkingSet,
  subject: Principal,
  index: number,
  now: number,
): Promise<void> {
  const count = await ws.getCredentialCount(subject);
  const credential = isValidIndex(index, count) ? await ws.getCredential(subject, index) : null;
  if (!credential) {
    throw indexOutOfRange(`Credential index ${index} out of range for ${subject} (count ${count})`);
  }

  await ws.putCredential(subject, index, { ...credential, isValid: false });
  ws.emit({ type: 'CredentialRevoked', user: subject, credentialIndex: index, timestamp: now });

  await adjustReputation(ws, subject, REPUTATION_DELTAS.credentialRevoked, now);
}
