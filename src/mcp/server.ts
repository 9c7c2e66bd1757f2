import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { Registry } from '../registry/registry.js';
import { toErrorResponse } from '../api/errors.js';

export interface McpServerDeps {
  registry: Registry;
}

type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

async function runTool(fn: () => Promise<unknown>): Promise<ToolResult> {
  try {
    const result = await fn();
    return { content: [{ type: 'text' as const, text: JSON.stringify(result, null, 2) }] };
  } catch (error) {
    const { body } = toErrorResponse(error);
    return { content: [{ type: 'text' as const, text: JSON.stringify(body) }], isError: true };
  }
}

const principalArg = z.string().describe('Account address (0x-prefixed, 20 bytes)');
const indexArg = z.number().int().nonnegative().describe('Credential index within the subject\'s credential list');

/**
 * Create the MCP server with the registry's read-only tools.
 * Separated from the transports so tests can call tools directly.
 */
export function createMcpServer(deps: McpServerDeps): McpServer {
  const { registry } = deps;
  const server = new McpServer(
    {
      name: 'identity-registry',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.tool(
    'get_identity',
    'Look up the identity record of a principal: display name, email, profile hash, reputation score (0-1000), verification flag and timestamps.',
    { principal: principalArg },
    async ({ principal }) => runTool(() => registry.getIdentity(principal)),
  );

  server.tool(
    'get_credentials',
    'List every credential attached to a principal, in issuance order, with its index and current validity.',
    { principal: principalArg },
    async ({ principal }) => runTool(async () => {
      const credentials = await registry.listCredentials(principal);
      return { count: credentials.length, credentials };
    }),
  );

  server.tool(
    'get_credential',
    'Fetch one credential by index. Fails with index_out_of_range past the end of the list.',
    { principal: principalArg, index: indexArg },
    async ({ principal, index }) => runTool(() => registry.getCredential(principal, index)),
  );

  server.tool(
    'is_credential_valid',
    'Check whether a credential is currently valid: not revoked and not expired. Unknown indices are reported as not valid.',
    { principal: principalArg, index: indexArg },
    async ({ principal, index }) => runTool(async () => ({
      valid: await registry.isCredentialValid(principal, index),
    })),
  );

  server.tool(
    'is_trusted_issuer',
    'Check whether a principal may verify identities and issue or revoke credentials.',
    { principal: principalArg },
    async ({ principal }) => runTool(async () => ({
      trusted: await registry.isTrustedIssuer(principal),
    })),
  );

  server.tool(
    'get_registry_stats',
    'Registry-wide statistics: total identities created and the owner principal.',
    async () => runTool(async () => ({
      ...(await registry.getContractStats()),
      owner: await registry.getOwner(),
    })),
  );

  server.tool(
    'get_events',
    'Page through the audit log of registry events, oldest first.',
    {
      offset: z.number().int().nonnegative().optional().describe('Number of events to skip'),
      limit: z.number().int().positive().optional().describe('Page size (max 500)'),
    },
    async ({ offset, limit }) => runTool(() => registry.getEvents({ offset, limit })),
  );

  return server;
}
