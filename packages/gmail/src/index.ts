export { GmailClient, GmailApiError, toGmailApiError } from './client.js';
export { buildBatchBody, parseBatchResponse, extractBoundary, normalizeContentId } from './multipart.js';
export * from './types.js';
