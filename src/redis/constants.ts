/**
 * Central Redis key layout for registry state.
 * Change names here — the Redis store references only these.
 */

export interface RegistryKeys {
  identity(principal: string): string;
  credentials(principal: string): string;
  issuers: string;
  owner: string;
  identityCount: string;
  sequence: string;
  events: string;
  usedRequest(fingerprint: string): string;
}

export function registryKeys(prefix: string): RegistryKeys {
  return {
    identity: (principal) => `${prefix}:identity:${principal}`,
    credentials: (principal) => `${prefix}:credentials:${principal}`,
    issuers: `${prefix}:issuers`,
    owner: `${prefix}:owner`,
    identityCount: `${prefix}:stats:identities`,
    sequence: `${prefix}:tx:seq`,
    events: `${prefix}:events`,
    usedRequest: (fingerprint) => `${prefix}:auth:used:${fingerprint}`,
  };
}
