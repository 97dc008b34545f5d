import dotenv from 'dotenv';
import { ConfigError } from '../lib/errors';
import { STORAGE_TYPES, type StorageType } from '../types/storage-insights';

dotenv.config();

export type Config = {
  api: {
    url: string;
    timeoutMs: number;
    insecureTls: boolean;
  };
  defaults: {
    credsPath: string;
    storageType: StorageType;
  };
};

type Env = Record<string, string | undefined>;

const getEnv = (env: Env, key: string, fallback: string): string => {
  const value = env[key];
  return value === undefined ? fallback : value.trim();
};

const toNumber = (value: string, key: string): number => {
  const parsed = Number(value);
  if (value === '' || Number.isNaN(parsed) || parsed <= 0) {
    throw new ConfigError(`Env var ${key} must be a positive number`);
  }
  return parsed;
};

const toBoolean = (value: string, key: string): boolean => {
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'y'].includes(normalized)) return true;
  if (['false', '0', 'no', 'n'].includes(normalized)) return false;
  throw new ConfigError(`Env var ${key} must be boolean-like (true/false)`);
};

export const isStorageType = (value: string): value is StorageType =>
  (STORAGE_TYPES as readonly string[]).includes(value);

const toStorageType = (value: string, key: string): StorageType => {
  const normalized = value.toLowerCase();
  if (!isStorageType(normalized)) {
    throw new ConfigError(`Env var ${key} must be one of block, filer, object or empty`);
  }
  return normalized;
};

/**
 * Builds the runtime config from environment variables (after `.env` is applied).
 * Called by the CLI so that a malformed value surfaces as a ConfigError.
 */
export const loadConfig = (env: Env = process.env): Config => ({
  api: {
    url: getEnv(env, 'SI_API_URL', 'https://dev.insights.ibm.com'),
    timeoutMs: toNumber(getEnv(env, 'SI_HTTP_TIMEOUT_MS', '30000'), 'SI_HTTP_TIMEOUT_MS'),
    insecureTls: toBoolean(getEnv(env, 'SI_INSECURE_TLS', 'false'), 'SI_INSECURE_TLS'),
  },
  defaults: {
    credsPath: getEnv(env, 'SI_CREDS_PATH', 'creds') || 'creds',
    storageType: toStorageType(getEnv(env, 'SI_STORAGE_TYPE', 'block'), 'SI_STORAGE_TYPE'),
  },
});
