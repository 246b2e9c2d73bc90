/**
 * Structural fixes for LM Studio ↔ OpenAI client payloads
 *
 * 1. Tool parameter schemas without `type` → `type: "object"` (+ empty `properties`)
 * 2. `usage` without token details → `input_tokens_details` / `output_tokens_details`
 *
 * Every function here is total and pure: the input document is never mutated,
 * only the objects on the path to an insertion are copied. Insertions are
 * additive, an existing key is never overwritten.
 */

import {
  DEFAULT_TOOL_PARAMETERS_TYPE,
  defaultInputTokensDetails,
  defaultOutputTokensDetails,
  hasOwn,
  isJsonObject,
  type JsonObject,
  type JsonValue,
} from '@lmstudio-compat-proxy/shared';

export interface RequestPatchResult {
  value: JsonValue;
  /** Number of tool parameter schemas that received a `type` */
  fixedTools: number;
}

export interface ResponsePatchResult {
  value: JsonValue;
  changed: boolean;
}

export interface UsagePatchResult {
  usage: JsonObject;
  changed: boolean;
}

// ==================== Requests ====================

/**
 * Complete the `parameters` schema of every entry in a top-level `tools` array.
 */
export function patchRequest(doc: JsonValue): RequestPatchResult {
  if (!isJsonObject(doc)) return { value: doc, fixedTools: 0 };

  const tools = doc.tools;
  if (!Array.isArray(tools)) return { value: doc, fixedTools: 0 };

  let fixedTools = 0;
  const patchedTools = tools.map((tool) => {
    const patched = patchTool(tool);
    if (patched !== tool) fixedTools++;
    return patched;
  });

  if (fixedTools === 0) return { value: doc, fixedTools: 0 };
  return { value: { ...doc, tools: patchedTools }, fixedTools };
}

/**
 * Nested `function.parameters` wins; the flat `parameters` form is only
 * considered when the tool has no `function` key at all.
 */
function patchTool(tool: JsonValue): JsonValue {
  if (!isJsonObject(tool)) return tool;

  if (hasOwn(tool, 'function')) {
    const fn = tool.function;
    if (!isJsonObject(fn)) return tool;
    const parameters = completeParameters(fn.parameters);
    if (parameters === undefined) return tool;
    return { ...tool, function: { ...fn, parameters } };
  }

  const parameters = completeParameters(tool.parameters);
  if (parameters === undefined) return tool;
  return { ...tool, parameters };
}

/** Returns the completed schema, or undefined when nothing needs inserting */
function completeParameters(parameters: JsonValue | undefined): JsonObject | undefined {
  if (!isJsonObject(parameters) || hasOwn(parameters, 'type')) return undefined;

  const completed: JsonObject = { ...parameters, type: DEFAULT_TOOL_PARAMETERS_TYPE };
  if (!hasOwn(parameters, 'properties')) {
    completed.properties = {};
  }
  return completed;
}

// ==================== Responses ====================

/**
 * Complete the token details of a top-level `usage` object.
 */
export function patchResponse(doc: JsonValue): ResponsePatchResult {
  if (!isJsonObject(doc)) return { value: doc, changed: false };

  const usage = doc.usage;
  if (!isJsonObject(usage)) return { value: doc, changed: false };

  const result = completeUsage(usage);
  if (!result.changed) return { value: doc, changed: false };
  return { value: { ...doc, usage: result.usage }, changed: true };
}

/**
 * Insert the missing `input_tokens_details` / `output_tokens_details`.
 * Shared by buffered responses and streamed `response.usage` events.
 */
export function completeUsage(usage: JsonObject): UsagePatchResult {
  const missingInput = !hasOwn(usage, 'input_tokens_details');
  const missingOutput = !hasOwn(usage, 'output_tokens_details');
  if (!missingInput && !missingOutput) return { usage, changed: false };

  const completed: JsonObject = { ...usage };
  if (missingInput) completed.input_tokens_details = defaultInputTokensDetails();
  if (missingOutput) completed.output_tokens_details = defaultOutputTokensDetails();
  return { usage: completed, changed: true };
}
