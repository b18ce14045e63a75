import type { SyncConfigOverrides } from '../types/sync-config.js';
import { parseLogLevel } from './logger.js';

export type Command = 'sync' | 'show' | 'help';

export interface ParsedArgs {
  command: Command;
  options: SyncConfigOverrides;
}

const COMMANDS: readonly Command[] = ['sync', 'show', 'help'];

const VALUE_FLAGS = [
  'search-url',
  'offset-param',
  'page-size',
  'data-dir',
  'list-file',
  'log-file',
  'marker',
  'log-level'
] as const;

type ValueFlag = typeof VALUE_FLAGS[number];

function isValueFlag(name: string): name is ValueFlag {
  const flags: readonly string[] = VALUE_FLAGS;
  return flags.includes(name);
}

function isCommand(value: string): value is Command {
  const commands: readonly string[] = COMMANDS;
  return commands.includes(value);
}

function parsePositiveInt(flag: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`--${flag} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function applyValue(options: SyncConfigOverrides, flag: ValueFlag, value: string): void {
  switch (flag) {
    case 'search-url':
      options.searchUrl = value;
      break;
    case 'offset-param':
      options.offsetParam = value;
      break;
    case 'page-size':
      options.pageSize = parsePositiveInt(flag, value);
      break;
    case 'data-dir':
      options.dataDir = value;
      break;
    case 'list-file':
      options.listFile = value;
      break;
    case 'log-file':
      options.logFile = value;
      break;
    case 'marker':
      options.orphanMarker = value;
      break;
    case 'log-level':
      options.logLevel = parseLogLevel(value);
      break;
  }
}

/**
 * Parse command line arguments supporting both formats:
 * - --param=value
 * - --param value
 *
 * Boolean flags (like --no-notify) don't take values. The command defaults
 * to `sync` when the first argument is a flag or missing.
 * Throws on unknown commands, unknown flags and missing values.
 */
export function parseArgs(args: string[]): ParsedArgs {
  let rest = args;
  let command: Command = 'sync';

  const first = rest[0];
  if (first !== undefined && !first.startsWith('-')) {
    if (!isCommand(first)) {
      throw new Error(`Unknown command: ${first}`);
    }
    command = first;
    rest = rest.slice(1);
  }

  const options: SyncConfigOverrides = {};

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];

    if (arg === '--no-notify') {
      options.notify = false;
      continue;
    }
    if (arg === '--help' || arg === '-h') {
      command = 'help';
      continue;
    }
    if (!arg.startsWith('--')) {
      throw new Error(`Unexpected argument: ${arg}`);
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    if (!isValueFlag(name)) {
      throw new Error(`Unknown option: --${name}`);
    }

    let value: string;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else if (i + 1 < rest.length) {
      value = rest[++i];
    } else {
      throw new Error(`Missing value for --${name}`);
    }

    applyValue(options, name, value);
  }

  return { command, options };
}

export const USAGE = `Usage: pkglist-sync [sync|show|help] [options]

Commands:
  sync              Fetch the catalog and replace the package list (default)
  show              Print the current package list
  help              Show this message

Options:
  --search-url <url>     Catalog search URL
  --offset-param <name>  Query parameter carrying the result offset (default: O)
  --page-size <n>        Results per catalog page (default: 250)
  --data-dir <dir>       Directory for the list, backup, scratch and log files
  --list-file <path>     Package list file (backup is <path>.bak)
  --log-file <path>      Log file
  --marker <text>        Orphan marker (default: orphan)
  --log-level <level>    quiet | normal | verbose | debug
  --no-notify            Skip the desktop notification
`;
