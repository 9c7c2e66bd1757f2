/**
 * Registry module entry point
 * Identity, credential and reputation state machine
 */

export { Registry, DEFAULT_EVENT_PAGE_SIZE, MAX_EVENT_PAGE_SIZE } from './registry.js';
export type { RegistryOptions, ReplayResult, RejectedTransaction, EventPage } from './registry.js';
export { RegistryError, isRegistryError } from './errors.js';
export type { RegistryErrorKind } from './errors.js';
export { applyDelta, REPUTATION_DELTAS } from './reputation.js';
export { isCredentialActive } from './credentialStore.js';
export type { NewCredential } from './credentialStore.js';
export { toPrincipal } from './principal.js';
export * from './types.js';
