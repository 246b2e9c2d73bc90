/**
 * Byte-level wrappers around the JSON patcher. Parse failures are returned,
 * not thrown.
 */

import { LosslessNumber, isLosslessNumber, parse, stringify } from 'lossless-json';
import type { JsonValue } from '@lmstudio-compat-proxy/shared';
import { patchRequest, patchResponse } from './json-patcher.js';

export class JsonParseError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'JsonParseError';
  }
}

export type JsonParseResult = { ok: true; value: JsonValue } | { ok: false; error: JsonParseError };

export type BodyPatchResult =
  | { ok: true; body: Buffer; changed: boolean; fixedTools: number }
  | { ok: false; error: JsonParseError };

const utf8 = new TextDecoder('utf-8', { fatal: true });

// Plain numbers only where writing them back yields the same token
function parseNumberToken(token: string): number | LosslessNumber {
  const value = Number(token);
  return String(value) === token ? value : new LosslessNumber(token);
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || isLosslessNumber(value)) return true;
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return true;
    case 'object':
      if (value === null) return false;
      return Array.isArray(value) ? value.every(isJsonValue) : Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

export function parseJsonText(text: string): JsonParseResult {
  try {
    const value = parse(text, undefined, parseNumberToken);
    if (!isJsonValue(value)) return { ok: false, error: new JsonParseError('Body is not valid JSON: unexpected value') };
    return { ok: true, value };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, error: new JsonParseError(`Body is not valid JSON: ${reason}`, error) };
  }
}

/** Compact JSON; number tokens are written back as they were read */
export function serializeJson(value: JsonValue): string {
  return stringify(value) ?? 'null';
}

export function parseJsonBody(body: Uint8Array): JsonParseResult {
  let text: string;
  try {
    text = utf8.decode(body);
  } catch (error) {
    return { ok: false, error: new JsonParseError('Body is not valid UTF-8', error) };
  }
  return parseJsonText(text);
}

/**
 * Unchanged documents keep their original bytes; only a patched document is
 * re-serialized.
 */
export function patchRequestBody(body: Buffer): BodyPatchResult {
  const parsed = parseJsonBody(body);
  if (!parsed.ok) return parsed;

  const { value, fixedTools } = patchRequest(parsed.value);
  if (fixedTools === 0) return { ok: true, body, changed: false, fixedTools: 0 };
  return { ok: true, body: Buffer.from(serializeJson(value), 'utf8'), changed: true, fixedTools };
}

export function patchResponseBody(body: Buffer): BodyPatchResult {
  const parsed = parseJsonBody(body);
  if (!parsed.ok) return parsed;

  const { value, changed } = patchResponse(parsed.value);
  if (!changed) return { ok: true, body, changed: false, fixedTools: 0 };
  return { ok: true, body: Buffer.from(serializeJson(value), 'utf8'), changed: true, fixedTools: 0 };
}
