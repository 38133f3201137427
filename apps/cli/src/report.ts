import {
  ERROR_CATEGORIES,
  SYNC_OPERATIONS,
  isResumableState,
  type DeadLetterEntry,
  type DeadLetterStats,
  type SyncCheckpoint,
} from '@mailsync/shared';

/** Quote an argument for a POSIX shell when it needs it. */
export function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_./:@=-]+$/.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function resumeCommand(checkpoint: SyncCheckpoint): string {
  const operation = checkpoint.metadata.operation;
  const parts = ['npm run cli -- sync', shellQuote(checkpoint.query), '--resume'];
  if (typeof operation === 'string' && operation !== 'fetch') parts.push('--operation', operation);
  if (checkpoint.outputLocation) parts.push('--out', shellQuote(checkpoint.outputLocation));
  return parts.join(' ');
}

/**
 * Summary printed when a sync run stops: counts, dead letters and, for a
 * run that can continue, the command that resumes it.
 */
export function formatRunReport(checkpoint: SyncCheckpoint, deadLetters: number): string[] {
  const failed = checkpoint.failedItemIds.length;
  const lines = [
    `Sync ${checkpoint.syncId}: ${checkpoint.state}`,
    `  Query:        ${checkpoint.query}`,
    `  Processed:    ${checkpoint.processedItems}/${checkpoint.totalItems}`,
    `  Succeeded:    ${checkpoint.processedItems - failed}`,
    `  Failed:       ${failed}`,
    `  Dead letters: ${deadLetters}`,
  ];
  if (checkpoint.errorMessage) lines.push(`  Error:        ${checkpoint.errorMessage}`);
  if (isResumableState(checkpoint.state)) lines.push(`  Resume with:  ${resumeCommand(checkpoint)}`);
  return lines;
}

export function formatCheckpointRow(checkpoint: SyncCheckpoint): string {
  return [
    checkpoint.syncId,
    checkpoint.state.padEnd(11),
    `${checkpoint.processedItems}/${checkpoint.totalItems}`.padEnd(13),
    checkpoint.updatedAt.toISOString(),
    checkpoint.query,
  ].join('  ');
}

export function formatCheckpointDetail(checkpoint: SyncCheckpoint): string[] {
  const lines = [
    `Sync ID:      ${checkpoint.syncId}`,
    `Query:        ${checkpoint.query}`,
    `State:        ${checkpoint.state}`,
    `Processed:    ${checkpoint.processedItems}/${checkpoint.totalItems}`,
    `Last item:    ${checkpoint.lastItemId ?? 'N/A'}`,
    `Failed items: ${checkpoint.failedItemIds.length}`,
    `Output:       ${checkpoint.outputLocation ?? 'N/A'}`,
    `Created:      ${checkpoint.createdAt.toISOString()}`,
    `Updated:      ${checkpoint.updatedAt.toISOString()}`,
  ];
  if (Object.keys(checkpoint.metadata).length > 0) {
    lines.push(`Metadata:     ${JSON.stringify(checkpoint.metadata)}`);
  }
  if (checkpoint.errorMessage) lines.push(`Error:        ${checkpoint.errorMessage}`);
  for (const itemId of checkpoint.failedItemIds) lines.push(`  failed: ${itemId}`);
  return lines;
}

export function formatDeadLetterRow(entry: DeadLetterEntry): string {
  return [
    entry.itemId,
    entry.operation.padEnd(9),
    entry.errorCategory.padEnd(18),
    `attempts=${entry.attemptCount}`,
    entry.lastSeenAt.toISOString(),
    entry.errorMessage,
  ].join('  ');
}

export function formatDeadLetterStats(stats: DeadLetterStats): string[] {
  const lines = [`Dead letters: ${stats.total}`];
  if (stats.total === 0) return lines;

  lines.push('  By operation:');
  for (const operation of SYNC_OPERATIONS) {
    const count = stats.byOperation[operation];
    if (count) lines.push(`    ${operation}: ${count}`);
  }
  lines.push('  By category:');
  for (const category of ERROR_CATEGORIES) {
    const count = stats.byCategory[category];
    if (count) lines.push(`    ${category}: ${count}`);
  }
  return lines;
}
