import { z } from 'zod';

export type GmailMessageFormat = 'full' | 'metadata' | 'minimal' | 'raw';

export interface GmailClientOptions {
  /** Returns a valid OAuth access token; token acquisition is the caller's concern */
  getAccessToken: () => string | Promise<string>;
  /** Default: https://gmail.googleapis.com */
  baseUrl?: string;
  /** Mailbox owner (default: 'me') */
  userId?: string;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
  /** Representation requested by the fetch operation (default: 'full') */
  messageFormat?: GmailMessageFormat;
  /** Default bound on listItemIds when the caller gives none */
  maxItems?: number;
}

export interface GmailMessageRef {
  id: string;
  threadId?: string;
}

export const messageListSchema = z.object({
  messages: z.array(z.object({ id: z.string().min(1), threadId: z.string().optional() })).optional(),
  nextPageToken: z.string().optional(),
  resultSizeEstimate: z.number().optional(),
});

export type GmailMessageList = z.infer<typeof messageListSchema>;

/** Google API error envelope: { error: { code, message, status, errors: [{ reason }] } } */
export const apiErrorSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    status: z.string().optional(),
    errors: z.array(z.object({ reason: z.string().optional(), message: z.string().optional() })).optional(),
  }),
});

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

/** One request inside a multipart batch */
export interface BatchPartRequest {
  contentId: string;
  method: HttpMethod;
  /** Path and query relative to the API host, e.g. /gmail/v1/users/me/messages/abc */
  path: string;
  body?: unknown;
}

/** One decoded response part of a multipart batch */
export interface BatchPartResponse {
  contentId: string;
  status: number;
  headers: Record<string, string>;
  body: string;
}
