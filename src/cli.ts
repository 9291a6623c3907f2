/**
 * Command line entry logic
 *
 * `runCli` resolves to the process exit code: 0 on success (or when the
 * model returned nothing), 1 on any failure.
 */

import { parseArgs } from 'util';
import { clientOptionsFromConfig, withClient, type FetchLike } from './adapters/index.js';
import {
  loadEmailConfig,
  loadEnvFile,
  loadPerplexityConfig,
  resolveAppPaths,
  validatePerplexityConfig,
  type AppPaths,
} from './services/config.js';
import { SmtpEmailSender, type EmailSender } from './services/emailer.js';
import { ApiError, ConfigurationError, FileLoadError, errorMessage } from './services/errors.js';
import { configureLogger, createLogger, loadLoggerConfig } from './services/logger.js';
import { runVeille } from './services/veille.js';
import { DEFAULT_VEILLE_TYPE, VEILLE_TYPES, isVeilleType, type VeilleType } from './types/index.js';

export const DEFAULT_DAYS = 60;

export const USAGE = `Usage: veille [options]

Ask the chat API for a monitoring report and email it.

Options:
  -t, --type <type>    ${VEILLE_TYPES.join(' | ')} (default: ${DEFAULT_VEILLE_TYPE})
  -d, --days <n>       days to look back from today for the start date (default: ${DEFAULT_DAYS})
      --dry-run        render the report without sending it
  -o, --output <file>  with --dry-run, write the HTML to <file> instead of stdout
  -h, --help           show this help

Examples:
  veille --type veille_juridique
  veille -t veille_pedagogique_technologique -d 90
  veille --dry-run -o report.html`;

export interface CliOptions {
  type: VeilleType;
  days: number;
  dryRun: boolean;
  output?: string;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  let values: {
    type?: string;
    days?: string;
    'dry-run'?: boolean;
    output?: string;
    help?: boolean;
  };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        type: { type: 'string', short: 't' },
        days: { type: 'string', short: 'd' },
        'dry-run': { type: 'boolean' },
        output: { type: 'string', short: 'o' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (error) {
    throw new UsageError(errorMessage(error));
  }

  const type = values.type ?? DEFAULT_VEILLE_TYPE;
  if (!isVeilleType(type)) {
    throw new UsageError(`Invalid type "${type}". Choose from: ${VEILLE_TYPES.join(', ')}`);
  }

  let days = DEFAULT_DAYS;
  if (values.days !== undefined) {
    if (!/^\d+$/.test(values.days.trim())) {
      throw new UsageError(`Invalid days "${values.days}". Expected a non-negative integer`);
    }
    days = parseInt(values.days.trim(), 10);
  }

  if (values.output !== undefined && !values['dry-run']) {
    throw new UsageError('--output is only valid with --dry-run');
  }

  return {
    type,
    days,
    dryRun: values['dry-run'] ?? false,
    output: values.output,
    help: values.help ?? false,
  };
}

/**
 * Diagnostic line for a fatal error
 */
export function describeFailure(error: unknown): string {
  if (error instanceof ConfigurationError) {
    return `❌ Configuration Error: ${error.message}`;
  }
  if (error instanceof FileLoadError) {
    return `❌ File Error: ${error.message}`;
  }
  if (error instanceof ApiError) {
    const status = error.statusCode !== undefined ? ` (HTTP ${error.statusCode})` : '';
    return `❌ API Error: ${error.message}${status}`;
  }
  return `❌ Unexpected Error: ${errorMessage(error)}`;
}

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  paths?: AppPaths;
  fetch?: FetchLike;
  createSender?: () => EmailSender;
  now?: () => Date;
  print?: (line: string) => void;
  printError?: (line: string) => void;
  /** Destination of a dry-run report when no output file is given */
  writeStdout?: (text: string) => void;
  sleep?: (ms: number) => Promise<void>;
}

export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line));
  const printError = deps.printError ?? ((line: string) => console.error(line));

  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    printError(`❌ ${errorMessage(error)}`);
    printError(USAGE);
    return 1;
  }

  if (options.help) {
    print(USAGE);
    return 0;
  }

  const paths = deps.paths ?? resolveAppPaths();
  const env = deps.env ?? process.env;
  if (!deps.env) {
    loadEnvFile(paths.envFile);
  }
  configureLogger(loadLoggerConfig(env));
  const logger = createLogger(undefined, { command: 'veille' });

  print(`🔍 Veille: ${options.type}, looking back ${options.days} days`);

  try {
    const config = validatePerplexityConfig(loadPerplexityConfig(env));
    const createSender = deps.createSender ?? (() => new SmtpEmailSender(loadEmailConfig(env), { logger }));

    const result = await withClient(
      clientOptionsFromConfig(config, { logger, fetch: deps.fetch, env, timeoutMs: config.reportTimeoutMs }),
      (client) =>
        runVeille(
          { type: options.type, days: options.days, dryRun: options.dryRun, output: options.output },
          {
            client,
            createSender,
            paths,
            logger,
            now: deps.now,
            writeStdout: deps.writeStdout,
            retry: { maxRetries: config.maxRetries, ...(deps.sleep ? { sleep: deps.sleep } : {}) },
          }
        )
    );

    switch (result.status) {
      case 'sent':
        print('✅ Email report sent successfully!');
        return 0;
      case 'dry_run':
        if (options.output) {
          print(`✅ Report written to ${options.output}`);
        }
        return 0;
      case 'no_content':
        print('⚠️  No content to send via email');
        return 0;
      case 'email_failed':
        printError('❌ Failed to send email report');
        return 1;
    }
  } catch (error) {
    logger.error('Veille run failed', { error: errorMessage(error) });
    printError(describeFailure(error));
    return 1;
  }
}
