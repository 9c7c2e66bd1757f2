import express, { type NextFunction, type Request, type RequestHandler, type Response, type Router } from 'express';
import { z } from 'zod';
import type { Registry } from '../registry/registry.js';
import { getCaller } from '../auth/callerAuth.js';
import { toErrorResponse } from './errors.js';
import { createLogger } from '../logger.js';

const log = createLogger('REST');

export interface RestRoutesDeps {
  registry: Registry;
  /** Authenticates the caller of write routes (see createCallerAuth) */
  callerAuth: RequestHandler;
}

const profileBody = z.object({
  name: z.string(),
  email: z.string(),
  profileHash: z.string().default(''),
});

const verificationBody = z.object({
  verified: z.boolean(),
});

const credentialBody = z.object({
  credentialType: z.string(),
  credentialHash: z.string(),
  expiresAt: z.number().int().nonnegative().default(0),
});

const issuerBody = z.object({
  issuer: z.string(),
});

const eventsQuery = z.object({
  offset: z.coerce.number().int().nonnegative().optional(),
  limit: z.coerce.number().int().positive().optional(),
});

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/**
 * Run an async handler and translate whatever it throws into the JSON error
 * contract. Unexpected failures are logged; registry failures are not.
 */
function handle(fn: AsyncHandler): RequestHandler {
  return (req: Request, res: Response, _next: NextFunction) => {
    fn(req, res).catch((error: unknown) => {
      const { status, body } = toErrorResponse(error);
      if (status >= 500) {
        log.error({ err: error, method: req.method, path: req.originalUrl }, 'Request failed');
      }
      res.status(status).json(body);
    });
  };
}

function parseIndex(raw: string): number {
  // Non-numeric or oversized indices fall through as NaN and are reported as out of range.
  const index = /^\d+$/.test(raw) ? Number(raw) : Number.NaN;
  return Number.isSafeInteger(index) ? index : Number.NaN;
}

export function createRestRoutes(deps: RestRoutesDeps): Router {
  const { registry, callerAuth } = deps;
  const router = express.Router();

  // ─── Identities ──────────────────────────────────────────────────────

  /**
   * POST /api/v1/identities
   * Create the caller's identity
   */
  router.post('/identities', callerAuth, handle(async (req, res) => {
    const body = profileBody.parse(req.body);
    const receipt = await registry.createIdentity(getCaller(res), body);
    res.status(201).json({ receipt });
  }));

  /**
   * PUT /api/v1/identities/:principal
   * Update a profile; only the identity's own principal may call this.
   * "me" addresses the caller's identity.
   */
  router.put('/identities/:principal', callerAuth, handle(async (req, res) => {
    const body = profileBody.parse(req.body);
    const caller = getCaller(res);
    const subject = req.params.principal === 'me' ? caller : req.params.principal;
    const receipt = await registry.updateProfile(caller, body, subject);
    res.json({ receipt });
  }));

  /**
   * GET /api/v1/identities/:principal
   */
  router.get('/identities/:principal', handle(async (req, res) => {
    const identity = await registry.getIdentity(req.params.principal);
    res.json({ identity });
  }));

  /**
   * POST /api/v1/identities/:principal/verification
   * Trusted issuers set or clear the verified flag
   */
  router.post('/identities/:principal/verification', callerAuth, handle(async (req, res) => {
    const { verified } = verificationBody.parse(req.body);
    const receipt = await registry.verifyIdentity(getCaller(res), req.params.principal, verified);
    res.json({ receipt });
  }));

  // ─── Credentials ─────────────────────────────────────────────────────

  /**
   * POST /api/v1/identities/:principal/credentials
   * Trusted issuers attach a credential; the response carries its index
   */
  router.post('/identities/:principal/credentials', callerAuth, handle(async (req, res) => {
    const body = credentialBody.parse(req.body);
    const receipt = await registry.addCredential(getCaller(res), req.params.principal, body);
    res.status(201).json({ receipt, index: receipt.credentialIndex });
  }));

  /**
   * GET /api/v1/identities/:principal/credentials
   */
  router.get('/identities/:principal/credentials', handle(async (req, res) => {
    const credentials = await registry.listCredentials(req.params.principal);
    res.json({ count: credentials.length, credentials });
  }));

  /**
   * GET /api/v1/identities/:principal/credentials/:index
   */
  router.get('/identities/:principal/credentials/:index', handle(async (req, res) => {
    const index = parseIndex(req.params.index);
    const credential = await registry.getCredential(req.params.principal, index);
    const valid = await registry.isCredentialValid(req.params.principal, index);
    res.json({ index, credential, valid });
  }));

  /**
   * GET /api/v1/identities/:principal/credentials/:index/validity
   * Always 200; an unknown index is simply not valid
   */
  router.get('/identities/:principal/credentials/:index/validity', handle(async (req, res) => {
    const valid = await registry.isCredentialValid(req.params.principal, parseIndex(req.params.index));
    res.json({ valid });
  }));

  /**
   * POST /api/v1/identities/:principal/credentials/:index/revoke
   */
  router.post('/identities/:principal/credentials/:index/revoke', callerAuth, handle(async (req, res) => {
    const receipt = await registry.revokeCredential(
      getCaller(res),
      req.params.principal,
      parseIndex(req.params.index),
    );
    res.json({ receipt });
  }));

  // ─── Trusted issuers ─────────────────────────────────────────────────

  router.get('/issuers/:principal', handle(async (req, res) => {
    const trusted = await registry.isTrustedIssuer(req.params.principal);
    res.json({ trusted });
  }));

  router.post('/issuers', callerAuth, handle(async (req, res) => {
    const { issuer } = issuerBody.parse(req.body);
    const receipt = await registry.addTrustedIssuer(getCaller(res), issuer);
    res.status(201).json({ receipt });
  }));

  router.delete('/issuers/:principal', callerAuth, handle(async (req, res) => {
    const receipt = await registry.removeTrustedIssuer(getCaller(res), req.params.principal);
    res.json({ receipt });
  }));

  // ─── Registry ────────────────────────────────────────────────────────

  router.get('/stats', handle(async (_req, res) => {
    const [stats, owner] = await Promise.all([registry.getContractStats(), registry.getOwner()]);
    res.json({ ...stats, owner });
  }));

  router.get('/events', handle(async (req, res) => {
    const query = eventsQuery.parse(req.query);
    res.json(await registry.getEvents(query));
  }));

  return router;
}
