import { alreadyExists, invalidInput, notFound } from './errors.js';
import { adjustReputation, REPUTATION_DELTAS } from './reputation.js';
import {
  INITIAL_REPUTATION_SCORE,
  type Identity,
  type Principal,
  type ProfileFields,
} from './types.js';
import type { WorkingSet } from './workingSet.js';

function validateProfile(fields: ProfileFields): void {
  if (!fields.name) throw invalidInput('Name cannot be empty');
  if (!fields.email) throw invalidInput('Email cannot be empty');
}

export async function requireIdentity(ws: WorkingSet, principal: Principal): Promise<Identity> {
  const identity = await ws.getIdentity(principal);
  if (!identity) {
    throw notFound(`Identity does not exist for ${principal}`);
  }
  return identity;
}

export async function createIdentity(
  ws: WorkingSet,
  principal: Principal,
  fields: ProfileFields,
  now: number,
): Promise<void> {
  if (await ws.getIdentity(principal)) {
    throw alreadyExists(`Identity already exists for ${principal}`);
  }
  validateProfile(fields);

  ws.putIdentity(principal, {
    name: fields.name,
    email: fields.email,
    profileHash: fields.profileHash,
    reputationScore: INITIAL_REPUTATION_SCORE,
    isVerified: false,
    createdAt: now,
    lastUpdated: now,
  });
  ws.incrementIdentityCount();
  ws.emit({ type: 'IdentityCreated', user: principal, name: fields.name, timestamp: now });
}

export async function updateProfile(
  ws: WorkingSet,
  principal: Principal,
  fields: ProfileFields,
  now: number,
): Promise<void> {
  const identity = await requireIdentity(ws, principal);
  validateProfile(fields);

  ws.putIdentity(principal, {
    ...identity,
    name: fields.name,
    email: fields.email,
    profileHash: fields.profileHash,
    lastUpdated: Math.max(identity.lastUpdated, now),
  });
  ws.emit({ type: 'IdentityUpdated', user: principal, timestamp: now });
}

export async function setVerification(
  ws: WorkingSet,
  principal: Principal,
  verified: boolean,
  now: number,
): Promise<void> {
  const identity = await requireIdentity(ws, principal);

  ws.putIdentity(principal, {
    ...identity,
    isVerified: verified,
    lastUpdated: Math.max(identity.lastUpdated, now),
  });
  ws.emit({ type: 'IdentityUpdated', user: principal, timestamp: now });

  await adjustReputation(
    ws,
    principal,
    verified ? REPUTATION_DELTAS.identityVerified : REPUTATION_DELTAS.identityUnverified,
    now,
  );
}
