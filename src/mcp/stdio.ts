import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createMcpServer } from './server.js';
import { loadConfig } from '../config/index.js';
import { createStore } from '../store/index.js';
import { Registry } from '../registry/index.js';
import { createLogger } from '../logger.js';

// Run with LOG_STDERR=true so log lines stay off the protocol stream.
const log = createLogger('MCP');

const config = loadConfig();
const { store } = createStore(config);
const registry = new Registry({ store, owner: config.registryOwner });
await registry.init();

const server = createMcpServer({ registry });
const transport = new StdioServerTransport();
await server.connect(transport);
log.info({ storeMode: config.storeMode }, 'identity-registry MCP server started on stdio');
