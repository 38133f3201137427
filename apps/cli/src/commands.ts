import {
  DEFAULT_KEEP_COMPLETED,
  DEFAULT_KEEP_FAILED,
  errorMessage,
  type DeadLetterFilter,
  type SyncCheckpoint,
  type Logger,
  type SyncOperation,
} from '@mailsync/shared';
import type { SyncConfig } from '@mailsync/sync';
import {
  UsageError,
  assertKnownFlags,
  categoryFlag,
  countFlag,
  operationFlag,
  requirePositional,
  stateFlag,
  stringFlag,
  type ParsedArgs,
} from './args.js';
import type { SyncPipeline, SyncStores } from './container.js';
import {
  formatCheckpointDetail,
  formatCheckpointRow,
  formatDeadLetterRow,
  formatDeadLetterStats,
  formatRunReport,
} from './report.js';

const DEFAULT_DLQ_LIST_LIMIT = 50;

export interface CliContext {
  config: SyncConfig;
  stores: SyncStores;
  logger: Logger;
  /** Report output (stdout); logs go to the logger */
  out: (line: string) => void;
  /** Aborted on SIGINT/SIGTERM; a running sync stops after its current chunk */
  signal?: AbortSignal;
  createPipeline: (operation: SyncOperation) => SyncPipeline;
}

/** Run one parsed command. Resolves with the process exit code. */
export async function runCommand(args: ParsedArgs, ctx: CliContext): Promise<number> {
  switch (args.command) {
    case 'sync':
      return syncCommand(args, ctx);
    case 'checkpoints':
      return checkpointsCommand(args, ctx);
    case 'dlq':
      return dlqCommand(args, ctx);
    case undefined:
      throw new UsageError('Missing command');
    default:
      throw new UsageError(`Unknown command '${args.command}'`);
  }
}

async function syncCommand(args: ParsedArgs, ctx: CliContext): Promise<number> {
  assertKnownFlags(args, ['operation', 'resume', 'out']);
  const query = args.positionals.join(' ').trim();
  if (query === '') throw new UsageError('Missing <query>');
  const operation = operationFlag(args) ?? 'fetch';

  const pipeline = ctx.createPipeline(operation);
  const startedAt = Date.now();
  try {
    const checkpoint = await pipeline.orchestrator.run(query, {
      operation,
      resume: args.flags.has('resume'),
      outputLocation: stringFlag(args, 'out'),
      signal: ctx.signal,
    });
    await printRunReport(checkpoint, ctx);
    return checkpoint.state === 'completed' ? 0 : 1;
  } catch (error) {
    ctx.logger.error('sync_command_failed', error, { query });
    const [latest] = await ctx.stores.checkpoints.list({ query });
    const touched = latest && latest.updatedAt.getTime() >= startedAt ? latest : undefined;
    if (touched) await printRunReport(touched, ctx);
    if (!touched?.errorMessage) ctx.out(`Error: ${errorMessage(error)}`);
    return 1;
  } finally {
    pipeline.close();
  }
}

async function printRunReport(checkpoint: SyncCheckpoint, ctx: CliContext): Promise<void> {
  const deadLetters = await ctx.stores.deadLetters.count({ syncId: checkpoint.syncId });
  formatRunReport(checkpoint, deadLetters).forEach((line) => ctx.out(line));
}

async function checkpointsCommand(args: ParsedArgs, ctx: CliContext): Promise<number> {
  const { checkpoints } = ctx.stores;

  switch (args.subcommand) {
    case 'list': {
      assertKnownFlags(args, ['state', 'query']);
      const rows = await checkpoints.list({ state: stateFlag(args), query: stringFlag(args, 'query') });
      if (rows.length === 0) {
        ctx.out('No checkpoints found');
        return 0;
      }
      rows.forEach((checkpoint) => ctx.out(formatCheckpointRow(checkpoint)));
      return 0;
    }
    case 'show': {
      assertKnownFlags(args, []);
      const syncId = requirePositional(args, 'syncId');
      const checkpoint = await checkpoints.load(syncId);
      if (!checkpoint) {
        ctx.out(`Checkpoint not found: ${syncId}`);
        return 1;
      }
      formatCheckpointDetail(checkpoint).forEach((line) => ctx.out(line));
      return 0;
    }
    case 'delete': {
      assertKnownFlags(args, []);
      const syncId = requirePositional(args, 'syncId');
      if (!(await checkpoints.delete(syncId))) {
        ctx.out(`Checkpoint not found: ${syncId}`);
        return 1;
      }
      ctx.out(`Deleted checkpoint ${syncId}`);
      return 0;
    }
    case 'cleanup': {
      assertKnownFlags(args, ['keep-completed', 'keep-failed']);
      const removed = await checkpoints.cleanup({
        keepCompleted: countFlag(args, 'keep-completed', DEFAULT_KEEP_COMPLETED),
        keepFailed: countFlag(args, 'keep-failed', DEFAULT_KEEP_FAILED),
      });
      ctx.out(`Removed ${removed} checkpoint(s)`);
      return 0;
    }
    default:
      throw new UsageError(`Unknown checkpoints command '${args.subcommand ?? ''}'`);
  }
}

function deadLetterFilter(args: ParsedArgs): DeadLetterFilter {
  return {
    operation: operationFlag(args),
    errorCategory: categoryFlag(args),
    syncId: stringFlag(args, 'sync-id'),
  };
}

async function dlqCommand(args: ParsedArgs, ctx: CliContext): Promise<number> {
  const { deadLetters } = ctx.stores;

  switch (args.subcommand) {
    case 'list': {
      assertKnownFlags(args, ['operation', 'category', 'sync-id', 'limit']);
      const filter = deadLetterFilter(args);
      const limit = countFlag(args, 'limit', DEFAULT_DLQ_LIST_LIMIT);
      const entries = await deadLetters.listEntries({ ...filter, limit });
      if (entries.length === 0) {
        ctx.out('No dead-letter entries');
        return 0;
      }
      entries.forEach((entry) => ctx.out(formatDeadLetterRow(entry)));
      const total = await deadLetters.count(filter);
      if (total > entries.length) ctx.out(`(${total - entries.length} more; raise --limit to see them)`);
      return 0;
    }
    case 'stats': {
      assertKnownFlags(args, []);
      formatDeadLetterStats(await deadLetters.stats()).forEach((line) => ctx.out(line));
      return 0;
    }
    case 'clear': {
      assertKnownFlags(args, ['operation']);
      const itemId = requirePositional(args, 'itemId');
      const removed = await deadLetters.clear(itemId, operationFlag(args));
      ctx.out(`Cleared ${removed} dead-letter entr${removed === 1 ? 'y' : 'ies'} for ${itemId}`);
      return removed > 0 ? 0 : 1;
    }
    case 'purge': {
      assertKnownFlags(args, ['operation', 'category', 'sync-id', 'yes']);
      if (!args.flags.has('yes')) {
        throw new UsageError('dlq purge deletes entries permanently; pass --yes to confirm');
      }
      const removed = await deadLetters.purge(deadLetterFilter(args));
      ctx.logger.warn('dead_letters_purged', { removed });
      ctx.out(`Purged ${removed} dead-letter entr${removed === 1 ? 'y' : 'ies'}`);
      return 0;
    }
    default:
      throw new UsageError(`Unknown dlq command '${args.subcommand ?? ''}'`);
  }
}
