import {
  CpAuthConfigError,
  GroupName,
  GroupParameters,
  isGroupName,
  validateGroupParameters,
  GROUPS,
} from '@cp-auth/core';
import { DEFAULT_CHALLENGE_TTL_MS, DEFAULT_SESSION_TTL_MS } from '@cp-auth/sdk';

export interface ServerConfig {
  port: number;
  host: string;
  groupName: GroupName;
  params: GroupParameters;
  challengeTtlMs: number;
  sessionTtlMs: number;
  /** Requests per minute per client on the protocol endpoints */
  apiRateLimit: number;
  corsOrigin: string;
  nodeEnv: string;
}

export const DEFAULT_PORT = 5051;
export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_GROUP: GroupName = 'rfc5114-1024-160';
export const DEFAULT_API_RATE_LIMIT = 60;

function readInteger(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  min: number,
  max = Number.MAX_SAFE_INTEGER,
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw new CpAuthConfigError(`${name} must be an integer, got "${raw}"`);
  }
  const value = Number(raw.trim());
  if (value < min || value > max) {
    throw new CpAuthConfigError(`${name} must be between ${min} and ${max}, got ${value}`);
  }
  return value;
}

/**
 * Read server settings from the environment. Call dotenv.config() first to pick up
 * a local .env file.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const groupName = env.ZKP_GROUP?.trim() || DEFAULT_GROUP;
  if (!isGroupName(groupName)) {
    throw new CpAuthConfigError(
      `ZKP_GROUP must be one of: ${Object.keys(GROUPS).join(', ')}, got "${groupName}"`,
    );
  }
  const nodeEnv = env.NODE_ENV?.trim() || 'development';
  if (groupName === 'toy' && nodeEnv === 'production') {
    throw new CpAuthConfigError('ZKP_GROUP=toy is not allowed when NODE_ENV=production');
  }
  const params = GROUPS[groupName];
  validateGroupParameters(params);

  return {
    port: readInteger(env, 'PORT', DEFAULT_PORT, 0, 65535),
    host: env.HOST?.trim() || DEFAULT_HOST,
    groupName,
    params,
    challengeTtlMs: readInteger(env, 'CHALLENGE_TTL_MS', DEFAULT_CHALLENGE_TTL_MS, 1),
    sessionTtlMs: readInteger(env, 'SESSION_TTL_MS', DEFAULT_SESSION_TTL_MS, 1),
    apiRateLimit: readInteger(env, 'API_RATE_LIMIT', DEFAULT_API_RATE_LIMIT, 1),
    corsOrigin: env.CORS_ORIGIN?.trim() || '*',
    nodeEnv,
  };
}
