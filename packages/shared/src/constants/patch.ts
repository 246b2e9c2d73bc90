/**
 * Values inserted into payloads when LM Studio omits fields clients require.
 */

import type { InputTokensDetails, OutputTokensDetails } from '../types/openai.js';

export const SSE_DATA_PREFIX = 'data: ';
export const SSE_DONE_MARKER = '[DONE]';

export const DEFAULT_TOOL_PARAMETERS_TYPE = 'object';

export function defaultInputTokensDetails(): InputTokensDetails {
  return { cached_tokens: 0 };
}

export function defaultOutputTokensDetails(): OutputTokensDetails {
  return { reasoning_tokens: 0 };
}
