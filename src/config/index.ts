import { ethers } from 'ethers';

function getRequiredEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`${key} environment variable is required`);
  }
  return value;
}

function validateChoice<T extends string>(key: string, value: string, valid: readonly T[]): T {
  const match = valid.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(`${key} must be one of: ${valid.join(', ')} (got: ${value})`);
  }
  return match;
}

function parsePositiveInt(key: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${key} must be a positive integer (got: ${value})`);
  }
  return parsed;
}

function validateAddress(key: string, value: string): string {
  if (!ethers.isAddress(value)) {
    throw new Error(`${key} must be an account address (got: ${value})`);
  }
  return ethers.getAddress(value);
}

export function loadConfig() {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const port = parsePositiveInt('PORT', process.env.PORT || '4010');
  const storeMode = validateChoice('STORE_MODE', process.env.STORE_MODE || 'memory', ['memory', 'redis'] as const);
  const authMode = validateChoice('AUTH_MODE', process.env.AUTH_MODE || 'signature', ['signature', 'header'] as const);

  if (authMode === 'header' && nodeEnv === 'production') {
    throw new Error('AUTH_MODE=header is not allowed when NODE_ENV=production');
  }

  return {
    port,
    nodeEnv,
    registryOwner: validateAddress('REGISTRY_OWNER', getRequiredEnv('REGISTRY_OWNER')),
    storeMode,
    // Redis (required when storeMode === 'redis')
    redisUrl: storeMode === 'redis' ? getRequiredEnv('REDIS_URL') : process.env.REDIS_URL || '',
    redisKeyPrefix: process.env.REDIS_KEY_PREFIX || 'registry',

    // Caller authentication
    authMode,
    authMaxSkewSeconds: parsePositiveInt('AUTH_MAX_SKEW_SECONDS', process.env.AUTH_MAX_SKEW_SECONDS || '300'),

    publicBaseUrl: process.env.PUBLIC_BASE_URL || `http://localhost:${port}`,
    otelExporterEndpoint: process.env.OTEL_EXPORTER_OTLP_ENDPOINT || '',
  };
}

export type Config = ReturnType<typeof loadConfig>;
