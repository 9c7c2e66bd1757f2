import './tracing.js';
import express from 'express';
import type { Server } from 'node:http';
import swaggerUi from 'swagger-ui-express';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { Config } from './config/index.js';
import { loadConfig } from './config/index.js';
import { createMcpServer } from './mcp/server.js';
import { buildSwaggerSpec } from './swagger.js';
import { createRestRoutes } from './api/restRoutes.js';
import { createCallerAuth } from './auth/callerAuth.js';
import { MemoryReplayGuard, RedisReplayGuard } from './auth/replayGuard.js';
import { Registry } from './registry/index.js';
import type { Clock } from './registry/types.js';
import { createStore } from './store/index.js';
import type { RegistryStore } from './store/types.js';
import type { RedisClient } from './redis/client.js';
import { createLogger } from './logger.js';

const log = createLogger('Server');

export interface AppOverrides {
  /** Use this store instead of the one selected by config.storeMode */
  store?: RegistryStore;
  clock?: Clock;
}

function createApp(config: Config, overrides: AppOverrides = {}) {
  const handle = overrides.store
    ? { store: overrides.store, redis: null }
    : createStore(config);
  const redis: RedisClient | null = handle.redis;
  const registry = new Registry({ store: handle.store, owner: config.registryOwner, clock: overrides.clock });

  const app = express();

  // Build swagger spec with dynamic base URL
  const swaggerSpec = buildSwaggerSpec(config.publicBaseUrl);

  app.use(express.json());

  // Swagger UI
  app.use('/docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec));
  app.get('/openapi.json', (_req, res) => res.json(swaggerSpec));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      service: 'identity-registry',
      storeMode: overrides.store ? 'custom' : config.storeMode,
      authMode: config.authMode,
      pendingWrites: registry.pendingWrites,
      tracing: { enabled: !!config.otelExporterEndpoint },
    });
  });

  const callerAuth = createCallerAuth({
    mode: config.authMode,
    maxSkewSeconds: config.authMaxSkewSeconds,
    clock: overrides.clock,
    replayGuard: redis
      ? new RedisReplayGuard(redis, config.redisKeyPrefix)
      : new MemoryReplayGuard(overrides.clock),
  });
  app.use('/api/v1', createRestRoutes({ registry, callerAuth }));

  // MCP StreamableHTTP endpoint (stateless mode, read-only tools)
  app.post('/mcp', async (req, res) => {
    try {
      const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
      const server = createMcpServer({ registry });
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      log.error({ err: error }, 'MCP request failed');
      if (!res.headersSent) {
        res.status(500).json({ error: 'internal_error', message: 'Internal server error' });
      }
    }
  });

  app.get('/mcp', (_req, res) => {
    res.status(405).json({ error: 'SSE not supported in stateless mode. Use POST /mcp instead.' });
  });

  app.delete('/mcp', (_req, res) => {
    res.status(405).json({ error: 'Session management not supported in stateless mode.' });
  });

  // Malformed JSON bodies arrive here from express.json()
  app.use((error: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'invalid_input', message: 'Malformed JSON body' });
      return;
    }
    next(error);
  });

  return { app, registry, redis };
}

async function startServer() {
  const config = loadConfig();

  try {
    const { app, registry, redis } = createApp(config);
    const owner = await registry.init();

    const server: Server = app.listen(config.port, () => {
      log.info(
        { port: config.port, storeMode: config.storeMode, authMode: config.authMode, owner },
        'identity-registry server listening',
      );
      log.info(`MCP endpoint: http://localhost:${config.port}/mcp`);
      log.info(`API docs: http://localhost:${config.port}/docs`);
    });

    const shutdown = (signal: string) => {
      log.info({ signal }, 'Shutting down');
      server.close(() => {
        registry
          .drain()
          .then(() => (redis ? redis.quit() : undefined))
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            log.error({ err: error }, 'Error during shutdown');
            process.exit(1);
          });
      });
    };
    process.once('SIGTERM', () => shutdown('SIGTERM'));
    process.once('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    log.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

// Export for testing
export { createApp, startServer };
export type { Config };

// Only start server when run directly (not imported by tests)
const isMainModule = process.argv[1]?.endsWith('index.js') || process.argv[1]?.endsWith('index.ts');
if (isMainModule) {
  void startServer();
}
