export { getPool, query, ensureSchema, closePool } from './client.js';
export { PgCheckpointStore } from './queries/checkpoints.js';
export { PgDeadLetterQueue } from './queries/dead-letters.js';
export { FileCheckpointStore } from './file/checkpoint-store.js';
export { FileDeadLetterQueue } from './file/dead-letter-queue.js';
export { writeJsonAtomic, readJson } from './file/json-file.js';
