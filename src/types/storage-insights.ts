export interface Credentials {
  readonly apiKey: string;
  readonly tenantId: string;
}

export interface Token {
  value: string;
  expirationEpochMillis: number;
}

export const STORAGE_TYPES = ['block', 'filer', 'object', ''] as const;

/** Empty string lists every storage type. */
export type StorageType = typeof STORAGE_TYPES[number];

export type TimestampValue = number | string | null;

export interface StorageSystemRecord {
  name: string;
  /** Epoch millis; a non-numeric value from the API is kept as text. */
  lastSuccessfulProbe: TimestampValue;
  lastSuccessfulMonitor: TimestampValue;
  condition: string;
}

export interface StorageSystemsPayload {
  /** Response body exactly as received. */
  raw: Record<string, unknown>;
  tenantId?: string;
  storageType?: string;
  systems: StorageSystemRecord[];
}

export interface StatusTable {
  headers: readonly string[];
  rows: string[][];
  text: string;
}
