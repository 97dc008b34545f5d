import { parseArgs } from 'util';
import type { AxiosAdapter } from 'axios';
import { isStorageType, loadConfig } from './config';
import { ReportController, type PrintFn, type ReportOptions } from './controllers/report.controller';
import { EXIT_FAILURE, EXIT_OK, InsightsError, UsageError, exitCodeFor } from './lib/errors';
import { createLogger, type LogSink } from './lib/logger';
import { StorageInsightsApi } from './services/insights-api';

export const USAGE = `Usage: storage-insights [options]

List IBM Storage Insights storage systems for a tenant.

Options:
  --creds PATH           credentials file with apikey/tenantid lines (default: creds)
  --storage-type VALUE   block, filer or object; empty for all (default: block)
  --json-out PATH        write the raw storage systems JSON payload
  --token-out PATH       write the API token
  --table                print the storage systems summary table
  --table-out PATH       write the summary table
  --limit N              limit the number of table rows
  --api-url URL          override the API base URL
  --quiet                suppress non-essential output
  -h, --help             show this help`;

export type CliArgs = Omit<ReportOptions, 'credsPath' | 'storageType'> & {
  credsPath?: string;
  storageType?: string;
  apiUrl?: string;
  quiet: boolean;
  help: boolean;
};

export type CliDeps = {
  env?: Record<string, string | undefined>;
  print?: PrintFn;
  sink?: LogSink;
  adapter?: AxiosAdapter;
};

const parseLimit = (raw: string | undefined): number | undefined => {
  if (raw === undefined) return undefined;
  if (!/^\d+$/.test(raw.trim())) {
    throw new UsageError(`--limit must be a non-negative integer, got '${raw}'`);
  }
  return Number(raw.trim());
};

const readValues = (argv: string[]) => {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        creds: { type: 'string' },
        'storage-type': { type: 'string' },
        'json-out': { type: 'string' },
        'token-out': { type: 'string' },
        'table-out': { type: 'string' },
        table: { type: 'boolean', default: false },
        limit: { type: 'string' },
        'api-url': { type: 'string' },
        quiet: { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
    }).values;
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
};

export function parseCliArgs(argv: string[]): CliArgs {
  const values = readValues(argv);

  return {
    credsPath: values.creds,
    storageType: values['storage-type'],
    jsonOut: values['json-out'],
    tokenOut: values['token-out'],
    tableOut: values['table-out'],
    printTable: values.table ?? false,
    limit: parseLimit(values.limit),
    apiUrl: values['api-url'],
    quiet: values.quiet ?? false,
    help: values.help ?? false,
  };
}

/**
 * Runs one invocation and resolves to the process exit code.
 * Never rejects: every failure is logged and mapped through `exitCodeFor`.
 */
export async function main(argv: string[], deps: CliDeps = {}): Promise<number> {
  const print: PrintFn = deps.print ?? ((text) => process.stdout.write(`${text}\n`));
  let logger = createLogger({ sink: deps.sink, plain: true });

  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      print(USAGE);
      return EXIT_OK;
    }
    if (args.quiet) {
      logger = createLogger({ sink: deps.sink, plain: true, level: 'warn' });
    }

    const config = loadConfig(deps.env ?? process.env);
    const storageType = (args.storageType ?? config.defaults.storageType).trim().toLowerCase();
    if (!isStorageType(storageType)) {
      throw new UsageError(
        `--storage-type must be one of block, filer, object or empty, got '${args.storageType}'`
      );
    }

    const api = new StorageInsightsApi({
      baseUrl: args.apiUrl ?? config.api.url,
      timeoutMs: config.api.timeoutMs,
      allowInsecureTls: config.api.insecureTls,
      adapter: deps.adapter,
    });
    const controller = new ReportController(api, logger, print);

    const result = await controller.run({
      credsPath: args.credsPath || config.defaults.credsPath,
      storageType,
      tokenOut: args.tokenOut,
      jsonOut: args.jsonOut,
      tableOut: args.tableOut,
      printTable: args.printTable,
      limit: args.limit,
    });

    if (result.failedOutputs.length > 0) {
      logger.error(`${result.failedOutputs.length} output file(s) could not be written`, {
        paths: result.failedOutputs.map((f) => f.path),
      });
      return EXIT_FAILURE;
    }
    return EXIT_OK;
  } catch (err) {
    if (err instanceof InsightsError) {
      logger.error(err.message, { code: err.code });
      if (err instanceof UsageError) print(USAGE);
    } else {
      logger.error('Unexpected failure', { err });
    }
    return exitCodeFor(err);
  }
}
