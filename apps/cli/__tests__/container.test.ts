import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createMockLogger } from '@mailsync/shared/testing';
import { loadSyncConfig } from '@mailsync/sync';
import { openStores } from '../src/container.js';

describe('openStores', () => {
  let stateDir: string;

  beforeEach(async () => {
    stateDir = await mkdtemp(join(tmpdir(), 'cli-state-'));
  });

  afterEach(async () => {
    await rm(stateDir, { recursive: true, force: true });
  });

  it('keeps file-backed checkpoints and dead letters in separate directories', async () => {
    const stores = await openStores(loadSyncConfig({ SYNC_STATE_DIR: stateDir }), createMockLogger());

    const checkpoint = await stores.checkpoints.create('in:inbox', 1);
    await stores.deadLetters.record({
      itemId: 'msg-0001',
      operation: 'fetch',
      errorCategory: 'not_found',
      errorMessage: 'gone',
      syncId: checkpoint.syncId,
    });
    await stores.close();

    expect((await readdir(stateDir)).sort()).toEqual(['checkpoints', 'dead-letters']);
    expect(await readdir(join(stateDir, 'checkpoints'))).toEqual([`${checkpoint.syncId}.json`]);
    expect(await readdir(join(stateDir, 'dead-letters'))).toEqual(['fetch.msg-0001.json']);
  });
});
