import axios, { type AxiosAdapter, type AxiosInstance, type AxiosRequestConfig } from 'axios';
import https from 'https';
import { AuthError, FetchError, InsightsError } from '../lib/errors';
import type {
  Credentials,
  StorageSystemRecord,
  StorageSystemsPayload,
  StorageType,
  TimestampValue,
  Token,
} from '../types/storage-insights';

const TOKEN_PATH = (tenantId: string) => `/restapi/v1/tenants/${encodeURIComponent(tenantId)}/token`;
const STORAGE_SYSTEMS_PATH = (tenantId: string) =>
  `/restapi/v1/tenants/${encodeURIComponent(tenantId)}/storage-systems`;

export type StorageInsightsApiOptions = {
  baseUrl: string;
  timeoutMs?: number;
  allowInsecureTls?: boolean;
  /** Replaces the axios transport, e.g. with an in-process fake. */
  adapter?: AxiosAdapter;
};

type ErrorFactory = (message: string, details?: unknown) => InsightsError;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const stringifyBody = (data: unknown): string => {
  if (data === undefined || data === null) return '';
  if (typeof data === 'string') return data;
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
};

const toEpochMillis = (value: unknown): number | null => {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) return Number(value.trim());
  return null;
};

/**
 * Extract `{ result: { token, expiration } }` from a token response body.
 * Returns null when either field is missing or has the wrong shape.
 */
export function parseTokenResponse(body: unknown): Token | null {
  if (!isRecord(body) || !isRecord(body.result)) return null;
  const { token, expiration } = body.result;
  const expirationEpochMillis = toEpochMillis(expiration);
  if (
    typeof token !== 'string' ||
    token.length === 0 ||
    expirationEpochMillis === null ||
    !Number.isInteger(expirationEpochMillis)
  ) {
    return null;
  }
  return { value: token, expirationEpochMillis };
}

const toTimestampValue = (value: unknown): TimestampValue => {
  if (value === undefined || value === null) return null;
  return toEpochMillis(value) ?? (typeof value === 'string' ? value : stringifyBody(value));
};

const toOptionalString = (value: unknown): string | undefined =>
  typeof value === 'string' ? value : undefined;

export function toStorageSystemRecord(item: Record<string, unknown>): StorageSystemRecord {
  return {
    name: String(item.name ?? ''),
    lastSuccessfulProbe: toTimestampValue(item.last_successful_probe),
    lastSuccessfulMonitor: toTimestampValue(item.last_successful_monitor),
    condition: String(item.condition ?? ''),
  };
}

/**
 * Validate a storage-systems response body. A missing `data` field reads as an empty list;
 * a `data` field that is not an array is rejected.
 */
export function parseStorageSystemsResponse(body: unknown): StorageSystemsPayload | null {
  if (!isRecord(body)) return null;
  const data: unknown = body.data ?? [];
  if (!Array.isArray(data)) return null;
  return {
    raw: body,
    tenantId: toOptionalString(body.tenantId),
    storageType: toOptionalString(body.storageType),
    systems: data.filter(isRecord).map(toStorageSystemRecord),
  };
}

/**
 * Thin wrapper around the tenant-scoped Storage Insights REST API.
 * One request per call, no retries.
 */
export class StorageInsightsApi {
  private readonly client: AxiosInstance;
  readonly baseUrl: string;

  constructor(options: StorageInsightsApiOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');

    const httpsAgent = options.allowInsecureTls
      ? new https.Agent({ rejectUnauthorized: false })
      : undefined;

    this.client = axios.create({
      baseURL: this.baseUrl,
      timeout: options.timeoutMs ?? 30_000,
      httpsAgent,
      adapter: options.adapter,
      headers: {
        Accept: 'application/json',
      },
    });
  }

  private async request(config: AxiosRequestConfig, fail: ErrorFactory): Promise<unknown> {
    const url = `${this.baseUrl}${config.url ?? ''}`;
    try {
      const res = await this.client.request<unknown>(config);
      return res.data;
    } catch (err) {
      if (axios.isAxiosError(err)) {
        if (err.response) {
          const body = stringifyBody(err.response.data);
          throw fail(`HTTP ${err.response.status} for ${url}: ${body}`, {
            status: err.response.status,
            body: err.response.data,
          });
        }
        throw fail(`Failed to reach ${url}: ${err.message}`, { code: err.code });
      }
      throw fail(`Request to ${url} failed: ${String(err)}`);
    }
  }

  // ---- Auth ----

  async requestToken(credentials: Credentials): Promise<Token> {
    const body = await this.request(
      {
        method: 'POST',
        url: TOKEN_PATH(credentials.tenantId),
        data: '{}',
        headers: {
          'x-api-key': credentials.apiKey,
          'Content-Type': 'application/json',
        },
      },
      (message, details) => new AuthError(message, details)
    );

    const token = parseTokenResponse(body);
    if (!token) {
      throw new AuthError(`Unexpected token response structure: ${stringifyBody(body)}`, { body });
    }
    return token;
  }

  // ---- Storage systems ----

  async fetchStorageSystems(
    token: Token,
    tenantId: string,
    storageType: StorageType
  ): Promise<StorageSystemsPayload> {
    const body = await this.request(
      {
        method: 'GET',
        url: STORAGE_SYSTEMS_PATH(tenantId),
        params: storageType ? { 'storage-type': storageType } : undefined,
        headers: {
          'x-api-token': token.value,
        },
      },
      (message, details) => new FetchError(message, details)
    );

    const payload = parseStorageSystemsResponse(body);
    if (!payload) {
      throw new FetchError(`Unexpected storage systems response structure: ${stringifyBody(body)}`, {
        body,
      });
    }
    return payload;
  }
}
