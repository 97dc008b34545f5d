import fs from 'fs';
import { IOError } from '../lib/errors';

export type OutputKind = 'token' | 'json' | 'table';

const LABELS: Record<OutputKind, string> = {
  token: 'token',
  json: 'JSON payload',
  table: 'table',
};

export const outputLabel = (kind: OutputKind): string => LABELS[kind];

/**
 * Write `content` plus a trailing newline to `path`.
 * Goes through a sibling temp file and a rename, so `path` is either fully written or untouched.
 */
export async function writeOutput(kind: OutputKind, path: string, content: string): Promise<void> {
  const tmpPath = `${path}.${process.pid}.tmp`;
  try {
    await fs.promises.writeFile(tmpPath, `${content}\n`, 'utf8');
    await fs.promises.rename(tmpPath, path);
  } catch (err) {
    const cleanupError = await fs.promises
      .rm(tmpPath, { force: true })
      .then(() => undefined, (rmErr: unknown) => rmErr);
    throw new IOError(`Failed to write ${LABELS[kind]} to ${path}: ${String(err)}`, {
      kind,
      path,
      cause: err,
      ...(cleanupError ? { cleanupError } : {}),
    });
  }
}

export const writeTokenFile = (path: string, token: string) => writeOutput('token', path, token);

export const writeJsonFile = (path: string, payload: unknown) =>
  writeOutput('json', path, JSON.stringify(payload, null, 2));

export const writeTableFile = (path: string, table: string) => writeOutput('table', path, table);
