import { z } from 'zod';
import {
  ERROR_CATEGORIES,
  SYNC_OPERATIONS,
  type ErrorCategory,
  type SyncOperation,
  type SyncState,
} from '@mailsync/shared';

export const USAGE = `
Mail Sync CLI

Usage:
  npm run cli -- <command> [arguments] [options]

Commands:
  sync <query>                    Sync every message matching a Gmail search query
      --operation <op>            fetch (default), trash, delete or mark_read
      --resume                    Continue the latest interrupted run for the query
      --out <dir>                 Directory for fetched messages (default: SYNC_OUTPUT_DIR)

  checkpoints list                List checkpoints, newest first
      --state <state>             pending, in_progress, completed, failed or interrupted
      --query <query>             Only runs for this query
  checkpoints show <syncId>       Show one checkpoint
  checkpoints delete <syncId>     Delete one checkpoint
  checkpoints cleanup             Delete old completed and failed checkpoints
      --keep-completed <n>        Completed runs to keep (default: 10)
      --keep-failed <n>           Failed runs to keep (default: 10)

  dlq list                        List dead-letter entries, most recent first
      --operation <op> --category <category> --sync-id <id> --limit <n>
  dlq stats                       Count dead-letter entries by operation and category
  dlq clear <itemId>              Remove an item's entries (after a manual replay)
      --operation <op>            Only the entry for this operation
  dlq purge --yes                 Remove every entry matching the filters
      --operation <op> --category <category> --sync-id <id>

Examples:
  npm run cli -- sync "in:inbox older_than:1y"
  npm run cli -- sync "in:inbox older_than:1y" --resume
  npm run cli -- sync "label:newsletters" --operation trash
  npm run cli -- dlq list --category not_found
`;

/** Bad command line; the entry point prints the message and the usage text. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type FlagValue = string | true;

export interface ParsedArgs {
  command?: string;
  subcommand?: string;
  positionals: string[];
  flags: Map<string, FlagValue>;
}

const BOOLEAN_FLAGS = new Set(['resume', 'help', 'yes']);

/**
 * Split argv into a command, an optional subcommand and flags.
 * Flags take `--name value` or `--name=value`; `--` ends flag parsing.
 */
export function parseArgs(argv: readonly string[], withSubcommand = (command: string) => command !== 'sync'): ParsedArgs {
  const words: string[] = [];
  const flags = new Map<string, FlagValue>();
  const rest = [...argv];

  let arg = rest.shift();
  while (arg !== undefined) {
    if (arg === '--') {
      words.push(...rest.splice(0));
    } else if (arg.startsWith('--') && arg.length > 2) {
      const body = arg.slice(2);
      const eq = body.indexOf('=');
      if (eq !== -1) {
        flags.set(body.slice(0, eq), body.slice(eq + 1));
      } else if (BOOLEAN_FLAGS.has(body)) {
        flags.set(body, true);
      } else {
        const value = rest.shift();
        if (value === undefined || value.startsWith('--')) {
          throw new UsageError(`Missing value for --${body}`);
        }
        flags.set(body, value);
      }
    } else {
      words.push(arg);
    }
    arg = rest.shift();
  }

  const [command, ...positionals] = words;
  if (command !== undefined && withSubcommand(command)) {
    const [subcommand, ...args] = positionals;
    return { command, subcommand, positionals: args, flags };
  }
  return { command, positionals, flags };
}

export function assertKnownFlags(args: ParsedArgs, allowed: readonly string[]): void {
  for (const name of args.flags.keys()) {
    if (!allowed.includes(name)) throw new UsageError(`Unknown option --${name}`);
  }
}

export function stringFlag(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags.get(name);
  if (value === true) throw new UsageError(`--${name} needs a value`);
  return value;
}

const countSchema = z.coerce.number().int().min(0);

export function countFlag(args: ParsedArgs, name: string, fallback: number): number {
  const value = stringFlag(args, name);
  if (value === undefined) return fallback;
  const parsed = countSchema.safeParse(value);
  if (!parsed.success) throw new UsageError(`--${name} must be a non-negative integer, got '${value}'`);
  return parsed.data;
}

function oneOf<T extends string>(args: ParsedArgs, name: string, values: readonly T[]): T | undefined {
  const value = stringFlag(args, name);
  if (value === undefined) return undefined;
  const match = values.find((candidate) => candidate === value);
  if (match === undefined) throw new UsageError(`--${name} must be one of ${values.join(', ')}; got '${value}'`);
  return match;
}

export function operationFlag(args: ParsedArgs): SyncOperation | undefined {
  return oneOf(args, 'operation', SYNC_OPERATIONS);
}

export function categoryFlag(args: ParsedArgs): ErrorCategory | undefined {
  return oneOf(args, 'category', ERROR_CATEGORIES);
}

const SYNC_STATES: readonly SyncState[] = ['pending', 'in_progress', 'completed', 'failed', 'interrupted'];

export function stateFlag(args: ParsedArgs): SyncState | undefined {
  return oneOf(args, 'state', SYNC_STATES);
}

/** The single required positional argument of a subcommand. */
export function requirePositional(args: ParsedArgs, label: string): string {
  const [value, ...extra] = args.positionals;
  if (value === undefined || value === '') throw new UsageError(`Missing <${label}>`);
  if (extra.length > 0) throw new UsageError(`Unexpected argument '${extra[0]}'`);
  return value;
}
