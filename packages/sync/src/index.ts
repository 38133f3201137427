export type {
  BatchClientOptions,
  BatchHooks,
  BatchResult,
  BatchTransport,
  ItemEnumerator,
  ItemOutcome,
  ItemSink,
  ListItemsOptions,
  SinkContext,
  SyncOrchestratorOptions,
  SyncRunOptions,
} from './types.js';
export { BatchClient, emptyBatchResult, type BatchClientDeps } from './batch-client.js';
export { AcknowledgementCursor } from './cursor.js';
export { SyncOrchestrator, type SyncOrchestratorDeps } from './orchestrator.js';
export { loadSyncConfig, type SyncConfig, type SyncEnv, type BatchClientOptionsConfig } from './config.js';
