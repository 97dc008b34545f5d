import { IOError } from '../lib/errors';
import type { Logger } from '../lib/logger';
import { formatTimestamp, renderTable } from '../lib/table';
import { loadCredentials } from '../services/credentials';
import type { StorageInsightsApi } from '../services/insights-api';
import {
  type OutputKind,
  outputLabel,
  writeJsonFile,
  writeTableFile,
  writeTokenFile,
} from '../services/outputs';
import type {
  StatusTable,
  StorageSystemsPayload,
  StorageType,
  Token,
} from '../types/storage-insights';

export type ReportOptions = {
  credsPath: string;
  storageType: StorageType;
  tokenOut?: string;
  jsonOut?: string;
  tableOut?: string;
  /** Print the table to stdout. */
  printTable?: boolean;
  limit?: number;
};

export type OutputFailure = {
  kind: OutputKind;
  path: string;
  error: IOError;
};

export type ReportResult = {
  tenantId: string;
  token: Token;
  payload: StorageSystemsPayload;
  table?: StatusTable;
  failedOutputs: OutputFailure[];
};

export type PrintFn = (text: string) => void;

const defaultPrint: PrintFn = (text) => {
  process.stdout.write(`${text}\n`);
};

export class ReportController {
  constructor(
    private readonly api: StorageInsightsApi,
    private readonly logger: Logger,
    private readonly print: PrintFn = defaultPrint
  ) {}

  /**
   * Single linear run:
   * - load credentials and request a token (one tenant for the whole run)
   * - fetch storage systems for the requested type
   * - render/print/persist the optional outputs
   * Credential, token and fetch failures propagate; output failures are collected.
   */
  async run(options: ReportOptions): Promise<ReportResult> {
    const credentials = await loadCredentials(options.credsPath);
    const { tenantId } = credentials;
    this.logger.info(`Using tenant: ${tenantId}`);

    const token = await this.api.requestToken(credentials);
    const failedOutputs: OutputFailure[] = [];

    if (options.tokenOut) {
      await this.persist('token', options.tokenOut, failedOutputs, (path) =>
        writeTokenFile(path, token.value)
      );
    }

    this.logger.info(`Token expiration (UTC): ${formatTimestamp(token.expirationEpochMillis)}`);

    const payload = await this.api.fetchStorageSystems(token, tenantId, options.storageType);
    const summaryType = payload.storageType || options.storageType || 'all';
    this.logger.info(
      `Retrieved ${payload.systems.length} storage systems (storageType=${summaryType})`
    );

    if (options.jsonOut) {
      await this.persist('json', options.jsonOut, failedOutputs, (path) =>
        writeJsonFile(path, payload.raw)
      );
    }

    let table: StatusTable | undefined;
    if (options.printTable || options.tableOut) {
      const rendered = renderTable(payload.systems, { limit: options.limit });
      table = rendered;
      if (options.printTable) {
        this.print(rendered.text);
      }
      if (options.tableOut) {
        await this.persist('table', options.tableOut, failedOutputs, (path) =>
          writeTableFile(path, rendered.text)
        );
      }
    }

    return { tenantId, token, payload, table, failedOutputs };
  }

  private async persist(
    kind: OutputKind,
    path: string,
    failures: OutputFailure[],
    write: (path: string) => Promise<void>
  ): Promise<void> {
    try {
      await write(path);
      this.logger.info(`Wrote ${outputLabel(kind)} to ${path}`);
    } catch (err) {
      if (!(err instanceof IOError)) throw err;
      this.logger.warn(err.message, { kind, path });
      failures.push({ kind, path, error: err });
    }
  }
}
