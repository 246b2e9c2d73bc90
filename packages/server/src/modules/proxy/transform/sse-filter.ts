/**
 * SSE usage completion for streamed Responses API events
 *
 * LM Studio streams `data: {"type":"response.completed","response":{"usage":{...}}}`
 * without the token detail objects clients expect. Each event is patched in
 * isolation; anything that is not a single `data: <json>` event is passed
 * through byte-for-byte.
 */

import { SSE_DATA_PREFIX, SSE_DONE_MARKER, isJsonObject } from '@lmstudio-compat-proxy/shared';
import { parseJsonText, serializeJson } from './json-body.js';
import { completeUsage } from './json-patcher.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });
const encoder = new TextEncoder();

/**
 * Patch one SSE event. Returns the input itself when nothing was inserted.
 */
export function filterChunk(chunk: Uint8Array): Uint8Array {
  let text: string;
  try {
    text = utf8.decode(chunk);
  } catch {
    return chunk;
  }

  if (!text.startsWith(SSE_DATA_PREFIX)) return chunk;

  const data = text.slice(SSE_DATA_PREFIX.length).trim();
  if (data === SSE_DONE_MARKER) return chunk;

  const parsed = parseJsonText(data);
  if (!parsed.ok) return chunk;

  const event = parsed.value;
  if (!isJsonObject(event)) return chunk;
  const response = event.response;
  if (!isJsonObject(response) || !isJsonObject(response.usage)) return chunk;

  const { usage, changed } = completeUsage(response.usage);
  if (!changed) return chunk;

  const patched = { ...event, response: { ...response, usage } };
  return encoder.encode(`${SSE_DATA_PREFIX}${serializeJson(patched)}\n\n`);
}

// ==================== Event framing ====================

const LF_DELIMITER = Buffer.from('\n\n');
const CRLF_DELIMITER = Buffer.from('\r\n\r\n');

/** End offset (exclusive) of the first complete event, or -1 */
export function findEventEnd(buffer: Buffer): number {
  const lf = buffer.indexOf(LF_DELIMITER);
  const crlf = buffer.indexOf(CRLF_DELIMITER);

  if (lf === -1 && crlf === -1) return -1;
  if (crlf === -1 || (lf !== -1 && lf < crlf)) return lf + LF_DELIMITER.length;
  return crlf + CRLF_DELIMITER.length;
}

export interface SseEventBufferOptions {
  filter?: (event: Uint8Array) => Uint8Array;
  /** Called when the filter throws; the event is then sent unmodified */
  onFilterError?: (error: unknown) => void;
}

/**
 * Re-frames a byte stream into whole SSE events before filtering.
 *
 * Transport chunks may split an event or carry several; output is emitted
 * per complete event, independent of how the input was chunked.
 */
export class SseEventBuffer {
  private pending: Buffer = Buffer.alloc(0);
  private readonly filter: (event: Uint8Array) => Uint8Array;
  private readonly onFilterError?: (error: unknown) => void;

  constructor(options: SseEventBufferOptions = {}) {
    this.filter = options.filter ?? filterChunk;
    this.onFilterError = options.onFilterError;
  }

  /** Bytes ready to forward after this chunk; empty while an event is incomplete */
  push(chunk: Uint8Array): Buffer {
    this.pending = this.pending.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.pending, chunk]);

    const ready: Uint8Array[] = [];
    let end = findEventEnd(this.pending);
    while (end !== -1) {
      ready.push(this.apply(this.pending.subarray(0, end)));
      this.pending = this.pending.subarray(end);
      end = findEventEnd(this.pending);
    }

    return Buffer.concat(ready);
  }

  /** Trailing bytes of an unterminated event, forwarded as they are */
  flush(): Buffer {
    const rest = this.pending;
    this.pending = Buffer.alloc(0);
    return rest;
  }

  private apply(event: Buffer): Uint8Array {
    try {
      return this.filter(event);
    } catch (error) {
      this.onFilterError?.(error);
      return event;
    }
  }
}
