import { z } from 'zod';
import type { DeadLetterEntry, SyncCheckpoint } from '@mailsync/shared';

const isoDate = z.string().datetime({ offset: true }).transform((value) => new Date(value));

const syncStateSchema = z.enum(['pending', 'in_progress', 'completed', 'failed', 'interrupted']);
const operationSchema = z.enum(['fetch', 'trash', 'delete', 'mark_read']);
const errorCategorySchema = z.enum([
  'not_found',
  'invalid_request',
  'forbidden',
  'auth',
  'quota_exceeded',
  'rate_limit',
  'server_error',
  'network',
  'timeout',
  'malformed_response',
  'circuit_open',
  'sink_error',
  'unknown',
]);

export const checkpointDocumentSchema = z.object({
  syncId: z.string().min(1),
  query: z.string(),
  state: syncStateSchema,
  totalItems: z.number().int().nonnegative(),
  processedItems: z.number().int().nonnegative(),
  lastItemId: z.string().optional(),
  failedItemIds: z.array(z.string()),
  outputLocation: z.string().optional(),
  metadata: z.record(z.unknown()),
  errorMessage: z.string().optional(),
  createdAt: isoDate,
  updatedAt: isoDate,
});

export const deadLetterDocumentSchema = z.object({
  itemId: z.string().min(1),
  operation: operationSchema,
  errorCategory: errorCategorySchema,
  errorMessage: z.string(),
  attemptCount: z.number().int().positive(),
  firstSeenAt: isoDate,
  lastSeenAt: isoDate,
  syncId: z.string().optional(),
});

export function parseCheckpoint(value: unknown): SyncCheckpoint {
  return checkpointDocumentSchema.parse(value);
}

export function parseDeadLetter(value: unknown): DeadLetterEntry {
  return deadLetterDocumentSchema.parse(value);
}
