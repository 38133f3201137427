import { MalformedResponseError } from '@mailsync/shared';
import type { BatchPartRequest, BatchPartResponse } from './types.js';

const CRLF = '\r\n';

/**
 * Encode sub-requests as a multipart/mixed batch body. Each part is an
 * `application/http` request tagged with a Content-ID the response echoes.
 */
export function buildBatchBody(requests: readonly BatchPartRequest[], boundary: string): string {
  let body = '';
  for (const request of requests) {
    body += `--${boundary}${CRLF}`;
    body += `Content-Type: application/http${CRLF}`;
    body += `Content-ID: <${request.contentId}>${CRLF}`;
    body += CRLF;
    body += `${request.method} ${request.path}${CRLF}`;
    if (request.body !== undefined) {
      const json = JSON.stringify(request.body);
      body += `Content-Type: application/json${CRLF}`;
      body += `Content-Length: ${Buffer.byteLength(json)}${CRLF}`;
      body += CRLF;
      body += json + CRLF;
    } else {
      body += CRLF;
    }
  }
  body += `--${boundary}--${CRLF}`;
  return body;
}

export function extractBoundary(contentType: string | null): string {
  const match = contentType?.match(/boundary=(?:"([^"]+)"|([^;\s]+))/i);
  const boundary = match?.[1] ?? match?.[2];
  if (!boundary) {
    throw new MalformedResponseError(`Batch response has no multipart boundary (content-type: ${contentType ?? 'none'})`);
  }
  return boundary;
}

/** Split a header block into lower-cased name → value pairs. */
function parseHeaders(block: string): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const line of block.split('\n')) {
    const colon = line.indexOf(':');
    if (colon <= 0) continue;
    headers[line.slice(0, colon).trim().toLowerCase()] = line.slice(colon + 1).trim();
  }
  return headers;
}

/** Split on the first blank line. */
function splitHead(text: string): [string, string] {
  const index = text.indexOf('\n\n');
  return index === -1 ? [text, ''] : [text.slice(0, index), text.slice(index + 2)];
}

/**
 * The Content-ID we sent (`item-3`) comes back as `<response-item-3>`.
 */
export function normalizeContentId(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  return raw.replace(/^<|>$/g, '').replace(/^response-/, '');
}

/**
 * Decode a multipart/mixed batch response into its HTTP sub-responses.
 * Parts without a Content-ID or a parsable status line raise
 * MalformedResponseError: they cannot be correlated with a request.
 */
export function parseBatchResponse(payload: string, contentType: string | null): BatchPartResponse[] {
  const boundary = extractBoundary(contentType);
  const text = payload.replace(/\r\n/g, '\n');
  const delimiter = `--${boundary}`;

  const segments = text.split(delimiter).slice(1);
  const parts: BatchPartResponse[] = [];

  for (const segment of segments) {
    if (segment.startsWith('--')) break;
    const trimmed = segment.replace(/^\n/, '');
    if (trimmed.trim() === '') continue;

    const [partHeaderBlock, httpMessage] = splitHead(trimmed);
    const contentId = normalizeContentId(parseHeaders(partHeaderBlock)['content-id']);
    if (!contentId) {
      throw new MalformedResponseError('Batch response part is missing a Content-ID');
    }

    const [responseHead, body] = splitHead(httpMessage);
    const [statusLine = '', ...headerLines] = responseHead.split('\n');
    const statusMatch = statusLine.match(/^HTTP\/[\d.]+\s+(\d{3})/);
    if (!statusMatch?.[1]) {
      throw new MalformedResponseError(`Batch response part ${contentId} has no status line`);
    }

    parts.push({
      contentId,
      status: parseInt(statusMatch[1], 10),
      headers: parseHeaders(headerLines.join('\n')),
      body: body.replace(/\n+$/, ''),
    });
  }

  return parts;
}
