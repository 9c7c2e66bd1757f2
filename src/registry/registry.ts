import { trace, SpanStatusCode } from '@opentelemetry/api';
import type { RegistryStore } from '../store/types.js';
import { createLogger } from '../logger.js';
import { addCredential, isCredentialActive, isValidIndex, revokeCredential, type NewCredential } from './credentialStore.js';
import { forbidden, indexOutOfRange, invalidInput, isRegistryError, notFound, type RegistryError } from './errors.js';
import { createIdentity, setVerification, updateProfile } from './identityStore.js';
import { samePrincipal, toPrincipal } from './principal.js';
import { addTrustedIssuer, removeTrustedIssuer } from './trustedIssuers.js';
import {
  systemClock,
  type Clock,
  type Credential,
  type CredentialStatus,
  type EventRecord,
  type Identity,
  type Principal,
  type ProfileFields,
  type RegistryStats,
  type RegistryTransaction,
  type TransactionReceipt,
} from './types.js';
import { WorkingSet } from './workingSet.js';
import { WriteQueue } from './writeQueue.js';

const log = createLogger('Registry');
const tracer = trace.getTracer('identity-registry');

export const DEFAULT_EVENT_PAGE_SIZE = 50;
export const MAX_EVENT_PAGE_SIZE = 500;

export interface RegistryOptions {
  store: RegistryStore;
  /** Owner principal used when the store has not been seeded yet */
  owner: string;
  clock?: Clock;
}

export interface RejectedTransaction {
  position: number;
  transaction: RegistryTransaction;
  error: RegistryError;
}

export interface ReplayResult {
  applied: TransactionReceipt[];
  rejected: RejectedTransaction[];
}

export interface EventPage {
  events: EventRecord[];
  offset: number;
  limit: number;
  total: number;
}

/**
 * The only write path into registry state.
 *
 * Every mutation is a RegistryTransaction: it is authorised, validated and
 * applied to a WorkingSet, then committed with its events in one store call.
 * Writes are serialised through a WriteQueue; reads go straight to the store.
 */
export class Registry {
  private store: RegistryStore;
  private clock: Clock;
  private configuredOwner: string;
  private owner: Principal | null = null;
  private queue = new WriteQueue();

  constructor(options: RegistryOptions) {
    this.store = options.store;
    this.clock = options.clock ?? systemClock;
    this.configuredOwner = options.owner;
  }

  /**
   * Seed the owner on first use. Safe to call on every start; an owner
   * already recorded in the store wins over the configured one.
   */
  async init(): Promise<Principal> {
    const configured = toPrincipal(this.configuredOwner, 'owner');
    const owner = await this.store.seedOwner(configured);
    if (!samePrincipal(owner, configured)) {
      log.warn({ configured, owner }, 'Store already has a different owner; configured owner ignored');
    }
    this.owner = owner;
    return owner;
  }

  // ─── Writes ────────────────────────────────────────────────────────────

  createIdentity(caller: string, fields: ProfileFields, timestamp?: number): Promise<TransactionReceipt> {
    return this.execute({ type: 'createIdentity', sender: caller, timestamp, ...fields });
  }

  /** Subject defaults to the caller. */
  updateProfile(caller: string, fields: ProfileFields, subject?: string, timestamp?: number): Promise<TransactionReceipt> {
    return this.execute({ type: 'updateProfile', sender: caller, subject, timestamp, ...fields });
  }

  verifyIdentity(caller: string, subject: string, verified: boolean, timestamp?: number): Promise<TransactionReceipt> {
    return this.execute({ type: 'verifyIdentity', sender: caller, subject, verified, timestamp });
  }

  addCredential(caller: string, subject: string, credential: NewCredential, timestamp?: number): Promise<TransactionReceipt> {
    return this.execute({ type: 'addCredential', sender: caller, subject, timestamp, ...credential });
  }

  revokeCredential(caller: string, subject: string, index: number, timestamp?: number): Promise<TransactionReceipt> {
    return this.execute({ type: 'revokeCredential', sender: caller, subject, index, timestamp });
  }

  addTrustedIssuer(caller: string, issuer: string, timestamp?: number): Promise<TransactionReceipt> {
    return this.execute({ type: 'addTrustedIssuer', sender: caller, issuer, timestamp });
  }

  removeTrustedIssuer(caller: string, issuer: string, timestamp?: number): Promise<TransactionReceipt> {
    return this.execute({ type: 'removeTrustedIssuer', sender: caller, issuer, timestamp });
  }

  /** Apply one transaction after every previously submitted one. */
  execute(tx: RegistryTransaction): Promise<TransactionReceipt> {
    return this.queue.run(() => this.apply(tx));
  }

  /**
   * Apply transactions in order. Transactions rejected by registry rules are
   * reported and skipped; any other failure stops the replay.
   */
  async replay(transactions: RegistryTransaction[]): Promise<ReplayResult> {
    const result: ReplayResult = { applied: [], rejected: [] };

    for (const [position, transaction] of transactions.entries()) {
      try {
        result.applied.push(await this.execute(transaction));
      } catch (error) {
        if (!isRegistryError(error)) throw error;
        result.rejected.push({ position, transaction, error });
      }
    }

    log.info(
      { applied: result.applied.length, rejected: result.rejected.length },
      'Replay finished',
    );
    return result;
  }

  /** Resolves once all submitted writes have settled. */
  drain(): Promise<void> {
    return this.queue.onIdle();
  }

  get pendingWrites(): number {
    return this.queue.size;
  }

  // ─── Reads ─────────────────────────────────────────────────────────────

  async getIdentity(principal: string): Promise<Identity> {
    const subject = toPrincipal(principal);
    const identity = await this.store.getIdentity(subject);
    if (!identity) {
      throw notFound(`Identity does not exist for ${subject}`);
    }
    return identity;
  }

  async getCredentials(principal: string): Promise<Credential[]> {
    return this.store.getCredentials(toPrincipal(principal));
  }

  /** Every credential of a principal, with validity evaluated now. */
  async listCredentials(principal: string): Promise<CredentialStatus[]> {
    const credentials = await this.store.getCredentials(toPrincipal(principal));
    const now = this.clock();
    return credentials.map((credential, index) => ({
      ...credential,
      index,
      valid: isCredentialActive(credential, now),
    }));
  }

  async getCredentialsCount(principal: string): Promise<number> {
    return this.store.getCredentialCount(toPrincipal(principal));
  }

  async getCredential(principal: string, index: number): Promise<Credential> {
    const subject = toPrincipal(principal);
    const credential = Number.isSafeInteger(index) ? await this.store.getCredential(subject, index) : null;
    if (!credential) {
      throw indexOutOfRange(`Credential index ${index} out of range for ${subject}`);
    }
    return credential;
  }

  /** False for an out-of-range index rather than an error. */
  async isCredentialValid(principal: string, index: number): Promise<boolean> {
    const subject = toPrincipal(principal);
    const count = await this.store.getCredentialCount(subject);
    if (!isValidIndex(index, count)) return false;

    const credential = await this.store.getCredential(subject, index);
    return credential !== null && isCredentialActive(credential, this.clock());
  }

  async isTrustedIssuer(principal: string): Promise<boolean> {
    return this.store.isTrustedIssuer(toPrincipal(principal));
  }

  async getOwner(): Promise<Principal | null> {
    return this.owner ?? this.store.getOwner();
  }

  async getContractStats(): Promise<RegistryStats> {
    return { totalIdentities: await this.store.getTotalIdentities() };
  }

  async getEvents(options: { offset?: number; limit?: number } = {}): Promise<EventPage> {
    const offset = Math.max(0, Math.floor(options.offset ?? 0));
    const limit = Math.min(
      MAX_EVENT_PAGE_SIZE,
      Math.max(0, Math.floor(options.limit ?? DEFAULT_EVENT_PAGE_SIZE)),
    );
    const [events, total] = await Promise.all([
      this.store.getEvents(offset, limit),
      this.store.getEventCount(),
    ]);
    return { events, offset, limit, total };
  }

  // ─── Transaction processing ────────────────────────────────────────────

  private async apply(tx: RegistryTransaction): Promise<TransactionReceipt> {
    const span = tracer.startSpan(`registry.${tx.type}`);
    let started = false;

    try {
      const now = this.transactionTime(tx);
      const sender = toPrincipal(tx.sender, 'sender');
      span.setAttribute('registry.sender', sender);

      const baseSequence = await this.store.begin();
      started = true;
      const ws = new WorkingSet(this.store);
      const credentialIndex = await this.dispatch(ws, tx, sender, now);

      const { changes, events } = ws.drain();
      started = false;
      const sequence = await this.store.commit(changes, events, baseSequence);
      span.setAttribute('registry.sequence', sequence);
      span.setStatus({ code: SpanStatusCode.OK });

      log.info(
        { sequence, type: tx.type, sender, events: events.map((event) => event.type) },
        'Transaction committed',
      );
      const receipt: TransactionReceipt = { sequence, type: tx.type, sender, timestamp: now, events };
      if (credentialIndex !== undefined) receipt.credentialIndex = credentialIndex;
      return receipt;
    } catch (error) {
      if (started) await this.store.abort();
      if (isRegistryError(error)) {
        span.setAttribute('registry.error_kind', error.kind);
        log.debug({ type: tx.type, sender: tx.sender, kind: error.kind, reason: error.message }, 'Transaction rejected');
      } else {
        log.error({ err: error, type: tx.type, sender: tx.sender }, 'Transaction failed');
      }
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      span.end();
    }
  }

  private async dispatch(
    ws: WorkingSet,
    tx: RegistryTransaction,
    sender: Principal,
    now: number,
  ): Promise<number | undefined> {
    switch (tx.type) {
      case 'createIdentity':
        await createIdentity(ws, sender, profileOf(tx), now);
        return;

      case 'updateProfile':
        if (tx.subject !== undefined && !samePrincipal(toPrincipal(tx.subject, 'subject'), sender)) {
          throw forbidden(`${sender} cannot update the profile of ${tx.subject}`);
        }
        await updateProfile(ws, sender, profileOf(tx), now);
        return;

      case 'verifyIdentity':
        await this.requireTrustedIssuer(ws, sender);
        await setVerification(ws, toPrincipal(tx.subject, 'subject'), tx.verified, now);
        return;

      case 'addCredential':
        await this.requireTrustedIssuer(ws, sender);
        return addCredential(
          ws,
          toPrincipal(tx.subject, 'subject'),
          { credentialType: tx.credentialType, credentialHash: tx.credentialHash, expiresAt: tx.expiresAt },
          sender,
          now,
        );

      case 'revokeCredential':
        await this.requireTrustedIssuer(ws, sender);
        await revokeCredential(ws, toPrincipal(tx.subject, 'subject'), tx.index, now);
        return;

      case 'addTrustedIssuer':
        this.requireOwner(sender);
        addTrustedIssuer(ws, toPrincipal(tx.issuer, 'issuer'), now);
        return;

      case 'removeTrustedIssuer': {
        const owner = this.requireOwner(sender);
        removeTrustedIssuer(ws, toPrincipal(tx.issuer, 'issuer'), owner, now);
        return;
      }
    }
  }

  /** Explicit timestamps must be unix seconds. */
  private transactionTime(tx: RegistryTransaction): number {
    if (tx.timestamp === undefined) return this.clock();
    if (!Number.isSafeInteger(tx.timestamp) || tx.timestamp < 0) {
      throw invalidInput(`Invalid transaction timestamp: ${tx.timestamp}`);
    }
    return tx.timestamp;
  }

  private async requireTrustedIssuer(ws: WorkingSet, sender: Principal): Promise<void> {
    if (!(await ws.isTrustedIssuer(sender))) {
      throw forbidden(`${sender} is not a trusted issuer`);
    }
  }

  private requireOwner(sender: Principal): Principal {
    if (!this.owner) {
      throw new Error('Registry not initialised: call init() before submitting transactions');
    }
    if (!samePrincipal(sender, this.owner)) {
      throw forbidden(`${sender} is not the registry owner`);
    }
    return this.owner;
  }
}

function profileOf(fields: ProfileFields): ProfileFields {
  return { name: fields.name, email: fields.email, profileHash: fields.profileHash ?? '' };
}
