import fs from 'fs';
import { ConfigError } from '../lib/errors';
import type { Credentials } from '../types/storage-insights';

/**
 * Parse a `key: value` credentials file body.
 * Recognized keys are `apikey` and `tenantid` (case-insensitive); the last occurrence wins.
 */
export function parseCredentials(text: string, source = 'creds'): Credentials {
  let apiKey: string | undefined;
  let tenantId: string | undefined;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;

    const sep = line.indexOf(':');
    if (sep === -1) continue;

    const key = line.slice(0, sep).trim().toLowerCase();
    const value = line.slice(sep + 1).trim();
    if (key === 'apikey') {
      apiKey = value;
    } else if (key === 'tenantid') {
      tenantId = value;
    }
  }

  if (!apiKey || !tenantId) {
    throw new ConfigError(`Both 'apikey' and 'tenantid' must be present in ${source}`, {
      path: source,
      hasApiKey: Boolean(apiKey),
      hasTenantId: Boolean(tenantId),
    });
  }

  return Object.freeze({ apiKey, tenantId });
}

export async function loadCredentials(path: string): Promise<Credentials> {
  let text: string;
  try {
    text = await fs.promises.readFile(path, 'utf8');
  } catch (err) {
    const code = err instanceof Error && 'code' in err ? String(err.code) : undefined;
    const message =
      code === 'ENOENT'
        ? `Credential file not found: ${path}`
        : `Unable to read credential file ${path}: ${String(err)}`;
    throw new ConfigError(message, { path, code });
  }
  return parseCredentials(text, path);
}
