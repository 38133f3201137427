import { readdir, unlink } from 'node:fs/promises';
import { join } from 'node:path';
import {
  errorMessage,
  matchesDeadLetterFilter,
  mergeDeadLetter,
  nullLogger,
  selectDeadLetters,
  summarizeDeadLetters,
  type DeadLetterEntry,
  type DeadLetterFilter,
  type DeadLetterQueue,
  type DeadLetterStats,
  type Logger,
  type RecordDeadLetterInput,
  type SyncOperation,
} from '@mailsync/shared';
import { KeyedMutex, isNotFound, readJson, writeJsonAtomic } from './json-file.js';
import { parseDeadLetter } from './schemas.js';

const ENTRY_EXTENSION = '.json';

/**
 * Dead-letter queue stored as one JSON file per (operation, itemId) at
 * `<directory>/<operation>.<encoded itemId>.json`. Writes to different
 * entries never touch the same file, so several queues may share a
 * directory. Repeated failures of one entry are serialized within this
 * instance only.
 */
export class FileDeadLetterQueue implements DeadLetterQueue {
  private readonly mutex = new KeyedMutex();
  private readonly log: Logger;

  constructor(
    private readonly directory: string,
    logger: Logger = nullLogger,
  ) {
    this.log = logger.child({ component: 'file-dead-letter-queue' });
  }

  async record(input: RecordDeadLetterInput): Promise<DeadLetterEntry> {
    const path = this.pathFor(input.itemId, input.operation);
    const entry = await this.mutex.run(path, async () => {
      const merged = mergeDeadLetter((await this.readEntry(path)) ?? undefined, input);
      await writeJsonAtomic(path, merged);
      return merged;
    });
    this.log.warn('dead_letter_recorded', {
      itemId: entry.itemId,
      operation: entry.operation,
      errorCategory: entry.errorCategory,
      attemptCount: entry.attemptCount,
    });
    return entry;
  }

  async listEntries(filter?: DeadLetterFilter): Promise<DeadLetterEntry[]> {
    return selectDeadLetters(await this.readAll(), filter);
  }

  async count(filter?: DeadLetterFilter): Promise<number> {
    return (await this.readAll()).filter((entry) => matchesDeadLetterFilter(entry, filter)).length;
  }

  async clear(itemId: string, operation?: SyncOperation): Promise<number> {
    return this.purge({ itemId, operation });
  }

  async purge(filter?: DeadLetterFilter): Promise<number> {
    let removed = 0;
    for (const entry of await this.readAll()) {
      if (!matchesDeadLetterFilter(entry, filter)) continue;
      const path = this.pathFor(entry.itemId, entry.operation);
      if (await this.mutex.run(path, () => removeFile(path))) removed++;
    }
    this.log.info('dead_letters_purged', { removed });
    return removed;
  }

  async stats(): Promise<DeadLetterStats> {
    return summarizeDeadLetters(await this.readAll());
  }

  private async readEntry(path: string): Promise<DeadLetterEntry | null> {
    const raw = await readJson(path);
    return raw === null ? null : parseDeadLetter(raw);
  }

  /** Every readable entry. Files removed mid-scan and unreadable files are skipped. */
  private async readAll(): Promise<DeadLetterEntry[]> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }

    const entries: DeadLetterEntry[] = [];
    for (const name of names) {
      if (!name.endsWith(ENTRY_EXTENSION)) continue;
      try {
        const entry = await this.readEntry(join(this.directory, name));
        if (entry) entries.push(entry);
      } catch (error) {
        this.log.warn('dead_letter_unreadable', { file: name, error: errorMessage(error) });
      }
    }
    return entries;
  }

  private pathFor(itemId: string, operation: SyncOperation): string {
    return join(this.directory, `${operation}.${encodeURIComponent(itemId)}${ENTRY_EXTENSION}`);
  }
}

async function removeFile(path: string): Promise<boolean> {
  try {
    await unlink(path);
    return true;
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
}
