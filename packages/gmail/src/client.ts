import { randomUUID } from 'node:crypto';
import {
  DEFAULT_MAX_ITEMS,
  GMAIL_DEFAULT_API_BASE_URL,
  GMAIL_LIST_PAGE_SIZE,
  GMAIL_MAX_BATCH_SIZE,
  GMAIL_REQUEST_TIMEOUT_MS,
  MalformedResponseError,
  SystemicError,
  UpstreamHttpError,
  nullLogger,
  type BatchTransport,
  type ItemEnumerator,
  type ItemOutcome,
  type ListItemsOptions,
  type Logger,
  type SyncOperation,
} from '@mailsync/shared';
import { buildBatchBody, parseBatchResponse } from './multipart.js';
import {
  apiErrorSchema,
  messageListSchema,
  type BatchPartRequest,
  type GmailClientOptions,
  type GmailMessageFormat,
} from './types.js';

/**
 * Non-2xx answer from the Gmail API, for a whole call or one batch part.
 */
export class GmailApiError extends UpstreamHttpError {
  constructor(status: number, message: string, reason?: string) {
    super(status, message, reason);
    this.name = 'GmailApiError';
  }
}

/** Build a GmailApiError from a status and the raw error body. */
export function toGmailApiError(status: number, body: string): GmailApiError {
  let message = body.trim() || `HTTP ${status}`;
  let reason: string | undefined;
  try {
    const parsed = apiErrorSchema.safeParse(JSON.parse(body));
    if (parsed.success) {
      message = parsed.data.error.message ?? message;
      reason = parsed.data.error.errors?.[0]?.reason ?? parsed.data.error.status;
    }
  } catch {
    // Not JSON: keep the raw text as the message
  }
  return new GmailApiError(status, `Gmail API error ${status}: ${message}`, reason);
}

function parseJsonPayload(body: string, context: string): unknown {
  if (body.trim() === '') return null;
  try {
    return JSON.parse(body);
  } catch {
    throw new MalformedResponseError(`Unparsable JSON in ${context}`);
  }
}

/**
 * Gmail REST client: enumerates message IDs for a search query and applies
 * one operation to messages individually or through the batch endpoint.
 */
export class GmailClient implements ItemEnumerator, BatchTransport {
  private readonly baseUrl: string;
  private readonly userPath: string;
  private readonly timeoutMs: number;
  private readonly messageFormat: GmailMessageFormat;
  private readonly maxItems: number;
  private readonly getAccessToken: () => string | Promise<string>;
  private readonly log: Logger;

  constructor(options: GmailClientOptions, logger: Logger = nullLogger) {
    this.baseUrl = (options.baseUrl ?? GMAIL_DEFAULT_API_BASE_URL).replace(/\/$/, '');
    this.userPath = `/gmail/v1/users/${encodeURIComponent(options.userId ?? 'me')}`;
    this.timeoutMs = options.timeoutMs ?? GMAIL_REQUEST_TIMEOUT_MS;
    this.messageFormat = options.messageFormat ?? 'full';
    this.maxItems = options.maxItems ?? DEFAULT_MAX_ITEMS;
    this.getAccessToken = options.getAccessToken;
    this.log = logger.child({ component: 'gmail-client' });
  }

  /**
   * Page through users.messages.list for `query`, newest first, stopping at
   * `maxItems`. Duplicate IDs across pages are dropped.
   */
  async listItemIds(query: string, options: ListItemsOptions = {}): Promise<string[]> {
    const maxItems = options.maxItems ?? this.maxItems;
    const ids: string[] = [];
    const seen = new Set<string>();
    let pageToken: string | undefined;
    let pages = 0;

    do {
      const params = new URLSearchParams({
        q: query,
        maxResults: String(Math.min(GMAIL_LIST_PAGE_SIZE, maxItems - ids.length)),
      });
      if (pageToken) params.set('pageToken', pageToken);

      const response = await this.send('GET', `${this.userPath}/messages?${params.toString()}`, {
        signal: options.signal,
      });
      const parsed = messageListSchema.safeParse(parseJsonPayload(response.text, 'messages.list response'));
      if (!parsed.success) {
        throw new MalformedResponseError(`Unexpected messages.list response: ${parsed.error.message}`);
      }

      for (const message of parsed.data.messages ?? []) {
        if (ids.length >= maxItems) break;
        if (seen.has(message.id)) continue;
        seen.add(message.id);
        ids.push(message.id);
      }
      pageToken = parsed.data.nextPageToken;
      pages++;
    } while (pageToken && ids.length < maxItems);

    this.log.info('gmail_messages_listed', { query, count: ids.length, pages, truncated: Boolean(pageToken) });
    return ids;
  }

  async executeOne(operation: SyncOperation, itemId: string): Promise<unknown> {
    const request = this.requestFor(operation, itemId, 'single');
    const response = await this.send(request.method, request.path, { body: request.body });
    return parseJsonPayload(response.text, `${operation} ${itemId} response`);
  }

  /**
   * One multipart call to /batch/gmail/v1. A failed call throws; a failed
   * part becomes that item's error outcome.
   */
  async executeBatch(operation: SyncOperation, itemIds: readonly string[]): Promise<Map<string, ItemOutcome>> {
    if (itemIds.length > GMAIL_MAX_BATCH_SIZE) {
      throw new RangeError(`Gmail batches are limited to ${GMAIL_MAX_BATCH_SIZE} requests, got ${itemIds.length}`);
    }
    const outcomes = new Map<string, ItemOutcome>();
    if (itemIds.length === 0) return outcomes;

    const byContentId = new Map<string, string>();
    const requests = itemIds.map((itemId, index) => {
      const request = this.requestFor(operation, itemId, `item-${index}`);
      byContentId.set(request.contentId, itemId);
      return request;
    });

    const boundary = `batch_${randomUUID().replace(/-/g, '')}`;
    const response = await this.send('POST', '/batch/gmail/v1', {
      rawBody: buildBatchBody(requests, boundary),
      contentType: `multipart/mixed; boundary=${boundary}`,
    });

    for (const part of parseBatchResponse(response.text, response.contentType)) {
      const itemId = byContentId.get(part.contentId);
      if (!itemId) {
        this.log.warn('gmail_batch_unknown_part', { contentId: part.contentId });
        continue;
      }
      if (part.status >= 200 && part.status < 300) {
        try {
          outcomes.set(itemId, { ok: true, payload: parseJsonPayload(part.body, `batch part ${part.contentId}`) });
        } catch (error) {
          outcomes.set(itemId, { ok: false, error });
        }
      } else {
        outcomes.set(itemId, { ok: false, error: toGmailApiError(part.status, part.body) });
      }
    }

    if (outcomes.size < itemIds.length) {
      this.log.warn('gmail_batch_missing_parts', { operation, requested: itemIds.length, answered: outcomes.size });
    }
    return outcomes;
  }

  private requestFor(operation: SyncOperation, itemId: string, contentId: string): BatchPartRequest {
    const messagePath = `${this.userPath}/messages/${encodeURIComponent(itemId)}`;
    switch (operation) {
      case 'fetch':
        return { contentId, method: 'GET', path: `${messagePath}?format=${this.messageFormat}` };
      case 'trash':
        return { contentId, method: 'POST', path: `${messagePath}/trash` };
      case 'delete':
        return { contentId, method: 'DELETE', path: messagePath };
      case 'mark_read':
        return { contentId, method: 'POST', path: `${messagePath}/modify`, body: { removeLabelIds: ['UNREAD'] } };
    }
  }

  private async send(
    method: string,
    path: string,
    options: { body?: unknown; rawBody?: string; contentType?: string; signal?: AbortSignal } = {},
  ): Promise<{ text: string; contentType: string | null }> {
    const url = this.baseUrl + path;
    const startTime = Date.now();
    const token = await this.getAccessToken();

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    const headers: Record<string, string> = { authorization: `Bearer ${token}` };
    let body: string | undefined = options.rawBody;
    if (options.body !== undefined) {
      body = JSON.stringify(options.body);
      headers['content-type'] = 'application/json';
    } else if (options.contentType) {
      headers['content-type'] = options.contentType;
    }

    try {
      const res = await fetch(url, { method, headers, body, signal: controller.signal });
      const text = await res.text();
      const duration = Date.now() - startTime;

      if (!res.ok) {
        const error = toGmailApiError(res.status, text);
        this.log.warn('gmail_request_failed', {
          method,
          path,
          status: res.status,
          reason: error.reason,
          duration,
        });
        throw error;
      }

      this.log.debug('gmail_request_success', { method, path, status: res.status, duration });
      return { text, contentType: res.headers.get('content-type') };
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        if (options.signal?.aborted) throw error;
        throw new SystemicError(`Gmail request timeout after ${this.timeoutMs}ms`, 'timeout');
      }
      throw error;
    } finally {
      clearTimeout(timeout);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }
}
