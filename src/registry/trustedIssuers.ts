import { forbidden } from './errors.js';
import { samePrincipal } from './principal.js';
import type { Principal } from './types.js';
import type { WorkingSet } from './workingSet.js';

export function addTrustedIssuer(ws: WorkingSet, issuer: Principal, now: number): void {
  ws.setTrustedIssuer(issuer, true);
  ws.emit({ type: 'TrustedIssuerAdded', issuer, timestamp: now });
}

export function removeTrustedIssuer(
  ws: WorkingSet,
  issuer: Principal,
  owner: Principal,
  now: number,
): void {
  if (samePrincipal(issuer, owner)) {
    throw forbidden('Cannot remove the registry owner from trusted issuers');
  }
  ws.setTrustedIssuer(issuer, false);
  ws.emit({ type: 'TrustedIssuerRemoved', issuer, timestamp: now });
}
