import { createHash } from 'node:crypto';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ethers } from 'ethers';
import { createLogger } from '../logger.js';
import { systemClock, type Clock, type Principal } from '../registry/types.js';
import { MemoryReplayGuard, type ReplayGuard } from './replayGuard.js';

const log = createLogger('Auth');

export const AUTH_HEADERS = {
  address: 'x-registry-address',
  timestamp: 'x-registry-timestamp',
  signature: 'x-registry-signature',
  caller: 'x-registry-caller',
} as const;

export type AuthMode = 'signature' | 'header';

export interface CallerAuthConfig {
  mode: AuthMode;
  maxSkewSeconds: number;
  clock?: Clock;
  /** Signed requests already accepted; defaults to process memory */
  replayGuard?: ReplayGuard;
}

export class AuthError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuthError';
  }
}

/**
 * Message a caller signs (EIP-191 personal_sign) to authenticate one request:
 *   identity-registry:<METHOD>:<path>:<timestamp>:<sha256 of JSON body>
 */
export function buildAuthMessage(method: string, path: string, timestamp: number, body: unknown): string {
  const bodyHash = createHash('sha256')
    .update(JSON.stringify(body ?? {}))
    .digest('hex');
  return `identity-registry:${method.toUpperCase()}:${path}:${timestamp}:${bodyHash}`;
}

function readHeader(req: Request, name: string): string {
  const value = req.headers[name];
  if (Array.isArray(value)) return value[0] ?? '';
  return value ?? '';
}

function requestPath(req: Request): string {
  return req.originalUrl.split('?')[0];
}

/**
 * Resolve the principal behind a request. Rejects with AuthError when the
 * request does not prove (signature mode) or name (header mode) a valid
 * address, or repeats a signed request already accepted.
 */
export async function resolveCaller(
  req: Request,
  config: CallerAuthConfig,
  replayGuard: ReplayGuard,
): Promise<Principal> {
  if (config.mode === 'header') {
    const caller = readHeader(req, AUTH_HEADERS.caller);
    if (!ethers.isAddress(caller)) {
      throw new AuthError(`Missing or invalid ${AUTH_HEADERS.caller} header`);
    }
    return ethers.getAddress(caller);
  }

  const address = readHeader(req, AUTH_HEADERS.address);
  const timestampHeader = readHeader(req, AUTH_HEADERS.timestamp);
  const signature = readHeader(req, AUTH_HEADERS.signature);

  if (!address || !timestampHeader || !signature) {
    throw new AuthError(
      `Missing authentication headers: ${AUTH_HEADERS.address}, ${AUTH_HEADERS.timestamp} and ${AUTH_HEADERS.signature} are required`,
    );
  }
  if (!ethers.isAddress(address)) {
    throw new AuthError(`Invalid ${AUTH_HEADERS.address} header`);
  }

  const timestamp = Number(timestampHeader);
  if (!Number.isInteger(timestamp)) {
    throw new AuthError(`Invalid ${AUTH_HEADERS.timestamp} header`);
  }
  const now = (config.clock ?? systemClock)();
  if (Math.abs(now - timestamp) > config.maxSkewSeconds) {
    throw new AuthError('Request timestamp outside the accepted window');
  }

  const message = buildAuthMessage(req.method, requestPath(req), timestamp, req.body);
  let recovered: string;
  try {
    recovered = ethers.verifyMessage(message, signature);
  } catch (error) {
    throw new AuthError(`Malformed signature: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (recovered.toLowerCase() !== address.toLowerCase()) {
    throw new AuthError('Signature does not match address');
  }

  // Remember the request until its timestamp leaves the window.
  const fingerprint = createHash('sha256')
    .update(`${recovered.toLowerCase()}:${message}`)
    .digest('hex');
  const ttlSeconds = timestamp + config.maxSkewSeconds - now + 1;
  if (!(await replayGuard.claim(fingerprint, ttlSeconds))) {
    throw new AuthError('Request already used');
  }
  return ethers.getAddress(address);
}

/**
 * Express middleware that authenticates the caller and stores the principal
 * in res.locals.caller. Rejects with 401 when authentication fails.
 */
export function createCallerAuth(config: CallerAuthConfig): RequestHandler {
  const replayGuard = config.replayGuard ?? new MemoryReplayGuard(config.clock);

  return (req: Request, res: Response, next: NextFunction) => {
    resolveCaller(req, config, replayGuard).then(
      (caller) => {
        res.locals.caller = caller;
        next();
      },
      (error: unknown) => {
        if (error instanceof AuthError) {
          log.debug({ path: requestPath(req), reason: error.message }, 'Caller authentication failed');
          res.status(401).json({ error: 'unauthorized', message: error.message });
          return;
        }
        next(error);
      },
    );
  };
}

export function getCaller(res: Response): Principal {
  const caller: unknown = res.locals.caller;
  if (typeof caller !== 'string') {
    throw new Error('Caller not authenticated: createCallerAuth must run before this handler');
  }
  return caller;
}
