#!/usr/bin/env node
/**
 * Synchronize a directory group with a set of managed devices.
 *
 * Usage:
 *   intune-group-sync --group "Macs with Zoom" --app "zoom.us" --mode create-or-update
 *   intune-group-sync --group-id <id> --devices-file ./devices.txt --identifier-type serial --additive
 */

import { createLogger, setLogLevel } from '../utils/logger.js';
import { loadDotenv } from '../utils/dotenv-loader.js';
import { validateSyncConfig } from '../utils/env-validation.js';
import { logErrorWithContext, setupGlobalErrorHandlers } from '../utils/error-handler.js';
import { Sleep } from '../utils/throttle.js';
import { GraphTransport } from '../graph/transport.js';
import { IdentifierNamespace } from '../graph/identity-resolver.js';
import { ReconcileMode, TargetCollection, outcomeExitCode } from '../reconcile/set-reconciler.js';
import { Selection, desiredFromIdentifiers } from '../sources/device-selector.js';
import { readDeviceListFile } from '../sources/device-list-file.js';
import { SyncStack, createSyncStack, createTransport, settingsFromConfig } from '../sync-stack.js';
import { formatOutcomeJson, formatOutcomeText } from './outcome-report.js';
import { print, printError } from './output.js';

const logger = createLogger('cli-sync-group');

export const EXIT_OK = 0;
export const EXIT_PARTIAL = 1;
export const EXIT_FATAL = 2;

export interface CLIOptions {
  group?: string;
  groupId?: string;
  description?: string;
  devicesFile?: string;
  identifierType?: string;
  app?: string;
  os?: string;
  mode?: string;
  additive: boolean;
  batchedLookups: boolean;
  maxThrottleRetries?: string;
  pageDelay?: string;
  output?: string;
  help: boolean;
}

type IdentifierType = IdentifierNamespace | 'deviceName';

export type DesiredSource =
  | { kind: 'file'; path: string; identifierType: IdentifierType }
  | { kind: 'app'; appName: string }
  | { kind: 'os'; operatingSystem: string };

export interface SyncRequest {
  target: TargetCollection;
  source: DesiredSource;
  mode: ReconcileMode;
  prune: boolean;
  batchedLookups: boolean;
  maxThrottleRetries?: number;
  pageDelayMs?: number;
  output: 'text' | 'json';
}

const MODES = new Map<string, ReconcileMode>([
  ['create-only', 'CreateOnly'],
  ['create-or-update', 'CreateOrUpdate'],
  ['dry-run', 'DryRun'],
]);

const IDENTIFIER_TYPES = new Map<string, IdentifierType>([
  ['name', 'deviceName'],
  ['serial', 'hardwareSerial'],
  ['managementId', 'managementId'],
  ['directoryObjectId', 'directoryObjectId'],
]);

const OUTPUTS = new Map<string, 'text' | 'json'>([
  ['text', 'text'],
  ['json', 'json'],
]);

export function showUsage(): string {
  return `
Intune Group Sync
=================

Make a directory group's device membership match a selection of managed devices.

Usage:
  intune-group-sync (--group <name> | --group-id <id>) <source> [options]

Sources (exactly one):
  --devices-file <path>        Device list, one identifier per line or first CSV column
  --app <display name>         Devices where this app is detected
  --os <operating system>      Devices running this operating system

Options:
  --identifier-type <type>     Identifiers in --devices-file: name, serial,
                               managementId, directoryObjectId (default: name)
  --description <text>         Description for a newly created group
  --mode <mode>                create-only, create-or-update, dry-run
                               (default: create-or-update)
  --additive                   Only add members; never remove
  --batched-lookups            Group directory lookups into fewer queries
  --max-throttle-retries <n>   Give up on a throttled call after n retries
                               (default: retry until it succeeds)
  --page-delay <ms>            Delay between page requests (default: 100)
  --output <format>            text or json (default: text)
  --help                       Show this help message

Environment Variables:
  GRAPH_TENANT_ID, GRAPH_CLIENT_ID, GRAPH_CLIENT_SECRET   Client credentials
  GRAPH_ACCESS_TOKEN                                      Or a pre-acquired token
  GRAPH_BASE_URL        Graph root (default: https://graph.microsoft.com/v1.0)

Exit codes:
  0  membership matches the selection
  1  partial progress (unresolved devices, failed batches, incomplete reads)
  2  usage, configuration or fatal error
`;
}

export function parseArgs(args: readonly string[]): CLIOptions {
  const options: CLIOptions = { additive: false, batchedLookups: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--help':
      case '-h':
        options.help = true;
        break;
      case '--group':
      case '-g':
        options.group = args[++i];
        break;
      case '--group-id':
        options.groupId = args[++i];
        break;
      case '--description':
        options.description = args[++i];
        break;
      case '--devices-file':
      case '-f':
        options.devicesFile = args[++i];
        break;
      case '--identifier-type':
        options.identifierType = args[++i];
        break;
      case '--app':
        options.app = args[++i];
        break;
      case '--os':
        options.os = args[++i];
        break;
      case '--mode':
      case '-m':
        options.mode = args[++i];
        break;
      case '--additive':
        options.additive = true;
        break;
      case '--batched-lookups':
        options.batchedLookups = true;
        break;
      case '--max-throttle-retries':
        options.maxThrottleRetries = args[++i];
        break;
      case '--page-delay':
        options.pageDelay = args[++i];
        break;
      case '--output':
      case '-o':
        options.output = args[++i];
        break;
    }
  }

  return options;
}

function parseNonNegativeInt(value: string | undefined, flag: string, errors: string[]): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    errors.push(`${flag} must be a non-negative integer`);
    return undefined;
  }
  return parsed;
}

export function buildSyncRequest(options: CLIOptions): { request?: SyncRequest; errors: string[] } {
  const errors: string[] = [];

  if (!options.group && !options.groupId) {
    errors.push('Provide --group <name> or --group-id <id>');
  }

  const sourceFlags = [options.devicesFile, options.app, options.os].filter((value) => value !== undefined);
  if (sourceFlags.length !== 1) {
    errors.push('Provide exactly one of --devices-file, --app or --os');
  }

  const sources: DesiredSource[] = [];
  if (options.devicesFile !== undefined) {
    const identifierType = IDENTIFIER_TYPES.get(options.identifierType ?? 'name');
    if (!identifierType) {
      errors.push(`Unknown --identifier-type: ${options.identifierType}`);
    } else {
      sources.push({ kind: 'file', path: options.devicesFile, identifierType });
    }
  }
  if (options.app !== undefined) sources.push({ kind: 'app', appName: options.app });
  if (options.os !== undefined) sources.push({ kind: 'os', operatingSystem: options.os });

  const mode = MODES.get(options.mode ?? 'create-or-update');
  if (!mode) errors.push(`Unknown --mode: ${options.mode}`);

  const output = OUTPUTS.get(options.output ?? 'text');
  if (!output) errors.push(`Unknown --output: ${options.output}`);

  const maxThrottleRetries = parseNonNegativeInt(options.maxThrottleRetries, '--max-throttle-retries', errors);
  const pageDelayMs = parseNonNegativeInt(options.pageDelay, '--page-delay', errors);

  if (errors.length > 0 || !mode || !output || sources.length !== 1) {
    return { errors };
  }

  return {
    errors,
    request: {
      target: {
        id: options.groupId,
        displayName: options.group ?? options.groupId ?? '',
        description: options.description,
      },
      source: sources[0],
      mode,
      prune: !options.additive,
      batchedLookups: options.batchedLookups,
      maxThrottleRetries,
      pageDelayMs,
      output,
    },
  };
}

async function selectDevices(stack: SyncStack, source: DesiredSource): Promise<Selection> {
  switch (source.kind) {
    case 'app':
      return stack.selector.withDetectedApp(source.appName);
    case 'os':
      return stack.selector.byOperatingSystem(source.operatingSystem);
    case 'file': {
      const identifiers = await readDeviceListFile(source.path);
      logger.info('Read device list', { path: source.path, count: identifiers.length });
      if (source.identifierType === 'deviceName') {
        return stack.selector.byDeviceNames(identifiers);
      }
      return { devices: desiredFromIdentifiers(source.identifierType, identifiers), unmatched: [], complete: true };
    }
  }
}

export interface SyncGroupDeps {
  /** Replaces the axios transport built from the environment */
  transport?: GraphTransport;
  sleep?: Sleep;
}

/**
 * Run one sync and return the process exit code
 */
export async function runSyncGroup(
  args: readonly string[],
  env: NodeJS.ProcessEnv,
  deps: SyncGroupDeps = {}
): Promise<number> {
  const options = parseArgs(args);
  if (options.help) {
    print(showUsage());
    return EXIT_OK;
  }

  const { request, errors } = buildSyncRequest(options);
  if (!request) {
    for (const error of errors) printError(`Error: ${error}`);
    printError('Run with --help for usage.');
    return EXIT_FATAL;
  }

  const configResult = validateSyncConfig(env);
  if (!configResult.valid || !configResult.config) {
    printError(configResult.error?.format() ?? 'Invalid configuration');
    return EXIT_FATAL;
  }
  const config = configResult.config;
  if (config.LOG_LEVEL) setLogLevel(config.LOG_LEVEL);

  try {
    const settings = settingsFromConfig(config);
    const stack = createSyncStack(
      deps.transport ?? createTransport(config),
      {
        ...settings,
        maxThrottleRetries: request.maxThrottleRetries ?? settings.maxThrottleRetries,
        pageDelayMs: request.pageDelayMs ?? settings.pageDelayMs,
      },
      deps.sleep
    );

    const selection = await selectDevices(stack, request.source);
    logger.info('Selected devices', {
      source: request.source.kind,
      devices: selection.devices.length,
      unmatched: selection.unmatched.length,
    });

    // A short selection would read as "remove everything not listed".
    const prune = request.prune && selection.complete;
    if (request.prune && !selection.complete) {
      logger.warn('Device selection read incompletely; removals suppressed for this run', {
        source: request.source.kind,
        devices: selection.devices.length,
      });
    }

    const outcome = await stack.reconciler.reconcile(request.target, selection.devices, {
      mode: request.mode,
      prune,
      batchedLookups: request.batchedLookups,
    });

    const summary = { unmatched: selection.unmatched, complete: selection.complete };
    print(request.output === 'json' ? formatOutcomeJson(outcome, summary) : formatOutcomeText(outcome, summary));

    const selectionProblems = selection.unmatched.length > 0 || !selection.complete;
    return outcomeExitCode(outcome) === EXIT_OK && !selectionProblems ? EXIT_OK : EXIT_PARTIAL;
  } catch (error) {
    const context = logErrorWithContext(error, 'Group sync', 'cli-sync-group', { group: request.target.displayName });
    printError(`Error: ${context.message}`);
    for (const suggestion of context.suggestions ?? []) {
      printError(`  - ${suggestion}`);
    }
    return EXIT_FATAL;
  }
}

if (require.main === module) {
  setupGlobalErrorHandlers();
  loadDotenv();
  runSyncGroup(process.argv.slice(2), process.env)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error('Fatal error', { error: error instanceof Error ? error.message : String(error) });
      process.exitCode = EXIT_FATAL;
    });
}
