/**
 * Smoke test against a running proxy (and the LM Studio server behind it)
 *
 * Checks that both fixes are visible from the client side:
 * - tool schemas without `type` are accepted upstream
 * - usage objects come back with input/output token details, buffered and streamed
 *
 * Usage:
 *   npx tsx scripts/smoke-proxy.ts
 *
 * Optional environment variables:
 *   PROXY_BASE_URL=http://localhost:3000 SMOKE_MODEL=qwen3-8b npx tsx scripts/smoke-proxy.ts
 */

// ===== Configuration =====

const BASE_URL = process.env.PROXY_BASE_URL || 'http://localhost:3000';
const MODEL = process.env.SMOKE_MODEL || 'local-model';

// ===== Types (kept local to the script) =====

type Json = null | boolean | number | string | Json[] | { [key: string]: Json };
type JsonRecord = { [key: string]: Json };

interface Scenario {
  name: string;
  description: string;
  run: () => Promise<string>;
}

interface ScenarioResult {
  name: string;
  passed: boolean;
  durationMs: number;
  error?: string;
}

// Tool whose parameters omit `type`, the shape LM Studio rejects
const LIST_FILES_TOOL = {
  type: 'function',
  function: {
    name: 'list_files',
    description: 'List the files in the current directory.',
    parameters: {},
  },
};

// ===== Helpers =====

function isRecord(value: Json | undefined): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function assert(condition: boolean, message: string): void {
  if (!condition) {
    throw new Error(`Assertion failed: ${message}`);
  }
}

function assertUsageDetails(usage: Json | undefined, where: string): void {
  assert(isRecord(usage), `${where}: "usage" should be an object`);
  if (!isRecord(usage)) return;
  assert(isRecord(usage.input_tokens_details), `${where}: missing input_tokens_details`);
  assert(isRecord(usage.output_tokens_details), `${where}: missing output_tokens_details`);
}

async function postJson(path: string, body: object): Promise<Response> {
  const response = await fetch(`${BASE_URL}${path}`, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body),
  });

  if (!response.ok) {
    const errorBody = await response.text();
    throw new Error(`HTTP ${response.status}: ${errorBody.slice(0, 300)}`);
  }
  return response;
}

/** Collects the JSON payload of every `data:` event, stopping at [DONE] */
async function readEvents(response: Response): Promise<Json[]> {
  const reader = response.body?.getReader();
  if (!reader) throw new Error('Response body is not readable');

  const decoder = new TextDecoder();
  const events: Json[] = [];
  let buffer = '';

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      const parts = buffer.split('\n\n');
      buffer = parts.pop() || '';

      for (const part of parts) {
        const line = part.split('\n').find((l) => l.startsWith('data: '));
        if (!line) continue;
        const data = line.slice(6);
        if (data === '[DONE]') return events;
        try {
          events.push(JSON.parse(data));
        } catch {
          // keep-alives and other non-JSON payloads
        }
      }
    }
  } finally {
    reader.releaseLock();
  }

  return events;
}

// ===== Scenarios =====

const SCENARIOS: Scenario[] = [
  {
    name: 'models',
    description: 'GET /v1/models passes through',
    run: async () => {
      const response = await fetch(`${BASE_URL}/v1/models`);
      assert(response.ok, `Expected 2xx, got ${response.status}`);
      const body: Json = JSON.parse(await response.text());
      assert(isRecord(body) && Array.isArray(body.data), 'Expected a "data" array');
      return isRecord(body) && Array.isArray(body.data) ? `${body.data.length} model(s)` : '';
    },
  },
  {
    name: 'chat-tools',
    description: 'Chat completion with an untyped tool schema',
    run: async () => {
      const response = await postJson('/v1/chat/completions', {
        model: MODEL,
        max_tokens: 64,
        tools: [LIST_FILES_TOOL],
        messages: [{ role: 'user', content: 'Reply with "ok".' }],
      });
      const body: Json = JSON.parse(await response.text());
      assert(isRecord(body), 'Expected a JSON object');
      return isRecord(body) ? `id ${String(body.id)}` : '';
    },
  },
  {
    name: 'responses-buffered',
    description: 'Responses API (non-streaming) usage details',
    run: async () => {
      const response = await postJson('/v1/responses', {
        model: MODEL,
        input: 'Reply with "ok".',
        tools: [{ type: 'function', name: 'list_files', parameters: {} }],
      });
      const body: Json = JSON.parse(await response.text());
      assert(isRecord(body), 'Expected a JSON object');
      if (isRecord(body)) assertUsageDetails(body.usage, 'response');
      return 'usage details present';
    },
  },
  {
    name: 'responses-stream',
    description: 'Responses API (streaming) usage details on response.completed',
    run: async () => {
      const response = await postJson('/v1/responses', {
        model: MODEL,
        input: 'Reply with "ok".',
        stream: true,
      });
      const events = await readEvents(response);
      const completed = events.find((e) => isRecord(e) && e.type === 'response.completed');
      assert(isRecord(completed), 'No response.completed event received');
      if (isRecord(completed) && isRecord(completed.response)) {
        assertUsageDetails(completed.response.usage, 'response.completed');
      }
      return `${events.length} event(s)`;
    },
  },
];

// ===== Runner =====

async function runScenario(scenario: Scenario): Promise<ScenarioResult> {
  const start = Date.now();
  try {
    const summary = await scenario.run();
    const durationMs = Date.now() - start;
    console.log(`   ${summary}`);
    return { name: scenario.name, passed: true, durationMs };
  } catch (error) {
    const durationMs = Date.now() - start;
    const message = error instanceof Error ? error.message : String(error);
    return { name: scenario.name, passed: false, durationMs, error: message };
  }
}

async function main() {
  console.log('========================================');
  console.log(' Proxy smoke test');
  console.log(`   Base URL: ${BASE_URL}`);
  console.log(`   Model: ${MODEL}`);
  console.log('========================================\n');

  const results: ScenarioResult[] = [];

  for (const scenario of SCENARIOS) {
    console.log(`-- [${scenario.name}] ${scenario.description}`);
    const result = await runScenario(scenario);
    results.push(result);
    console.log(result.passed ? `   PASS (${result.durationMs}ms)\n` : `   FAIL: ${result.error}\n`);
  }

  const failed = results.filter((r) => !r.passed);
  console.log('========================================');
  console.log(` Results: ${results.length - failed.length} passed, ${failed.length} failed`);
  console.log('========================================');

  if (failed.length > 0) {
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
