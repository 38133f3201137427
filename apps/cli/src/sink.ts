import { join } from 'node:path';
import { writeJsonAtomic } from '@mailsync/database';
import type { ItemSink } from '@mailsync/sync';

const SAFE_ITEM_ID = /^[A-Za-z0-9_-]+$/;

/**
 * Sink for fetched messages: one `<itemId>.json` per message under the run's
 * output location, or `defaultDir` when the run has none. Rewriting a file
 * on resume is harmless since the write is atomic.
 */
export function createFileSink(defaultDir: string): ItemSink {
  return async (itemId, payload, _operation, context) => {
    if (!SAFE_ITEM_ID.test(itemId)) throw new Error(`Refusing to write message with unsafe id '${itemId}'`);
    await writeJsonAtomic(join(context.outputLocation ?? defaultDir, `${itemId}.json`), payload);
  };
}
