/**
 * The slices of the OpenAI wire format the proxy inserts.
 * Everything else in a payload is carried through as untyped JSON.
 */

import type { JsonObject } from './json.js';

export interface InputTokensDetails extends JsonObject {
  cached_tokens: number;
}

export interface OutputTokensDetails extends JsonObject {
  reasoning_tokens: number;
}
