import { describe, it, expect } from 'vitest';
import type { JsonValue } from '@lmstudio-compat-proxy/shared';
import { completeUsage, patchRequest, patchResponse } from '../json-patcher.js';

describe('json-patcher', () => {
  describe('patchRequest', () => {
    it('should complete nested function parameters without a type', () => {
      const doc: JsonValue = {
        model: 'qwen2.5-7b-instruct',
        tools: [{ type: 'function', function: { name: 'list_files', parameters: {} } }],
      };

      const result = patchRequest(doc);

      expect(result.fixedTools).toBe(1);
      expect(result.value).toEqual({
        model: 'qwen2.5-7b-instruct',
        tools: [
          {
            type: 'function',
            function: { name: 'list_files', parameters: { type: 'object', properties: {} } },
          },
        ],
      });
    });

    it('should complete flat parameters when the tool has no function key', () => {
      const doc: JsonValue = {
        tools: [{ type: 'function', name: 'get_time', parameters: { required: [] } }],
      };

      const result = patchRequest(doc);

      expect(result.fixedTools).toBe(1);
      expect(result.value).toEqual({
        tools: [
          {
            type: 'function',
            name: 'get_time',
            parameters: { required: [], type: 'object', properties: {} },
          },
        ],
      });
    });

    it('should keep existing properties when only type is missing', () => {
      const properties = { path: { type: 'string' } };
      const doc: JsonValue = {
        tools: [{ function: { name: 'read_file', parameters: { properties } } }],
      };

      const result = patchRequest(doc);

      expect(result.value).toEqual({
        tools: [{ function: { name: 'read_file', parameters: { properties, type: 'object' } } }],
      });
    });

    it('should leave parameters that already carry a type untouched', () => {
      const parameters = { type: 'object', properties: { q: { type: 'string' } } };
      const doc: JsonValue = { tools: [{ function: { name: 'search', parameters } }] };

      const result = patchRequest(doc);

      expect(result.fixedTools).toBe(0);
      expect(result.value).toBe(doc);
    });

    it('should not fall back to flat parameters when a function key exists', () => {
      const doc: JsonValue = {
        tools: [{ function: { name: 'noop' }, parameters: {} }],
      };

      const result = patchRequest(doc);

      expect(result.fixedTools).toBe(0);
      expect(result.value).toBe(doc);
    });

    it('should ignore non-object parameters and non-object tools', () => {
      const doc: JsonValue = {
        tools: [
          { function: { name: 'a', parameters: 'none' } },
          { function: { name: 'b', parameters: null } },
          { parameters: [1, 2] },
          'not-a-tool',
          42,
        ],
      };

      const result = patchRequest(doc);

      expect(result.fixedTools).toBe(0);
      expect(result.value).toBe(doc);
    });

    it('should count every fixed schema', () => {
      const doc: JsonValue = {
        tools: [
          { function: { name: 'a', parameters: {} } },
          { function: { name: 'b', parameters: { type: 'object' } } },
          { name: 'c', parameters: {} },
        ],
      };

      expect(patchRequest(doc).fixedTools).toBe(2);
    });

    it('should return documents without a tools array unchanged', () => {
      const inputs: JsonValue[] = [
        { messages: [] },
        { tools: { not: 'an array' } },
        [{ tools: [] }],
        'text',
        7,
        null,
      ];

      for (const input of inputs) {
        const result = patchRequest(input);
        expect(result.value).toBe(input);
        expect(result.fixedTools).toBe(0);
      }
    });

    it('should not mutate the input document', () => {
      const doc: JsonValue = { tools: [{ function: { name: 'a', parameters: {} } }] };
      const before = JSON.stringify(doc);

      patchRequest(doc);

      expect(JSON.stringify(doc)).toBe(before);
    });

    it('should be idempotent', () => {
      const doc: JsonValue = {
        tools: [{ function: { name: 'a', parameters: {} } }, { name: 'b', parameters: { properties: {} } }],
      };

      const once = patchRequest(doc);
      const twice = patchRequest(once.value);

      expect(twice.value).toEqual(once.value);
      expect(twice.fixedTools).toBe(0);
    });
  });

  describe('patchResponse', () => {
    it('should add both detail fields to an empty usage block', () => {
      const doc: JsonValue = { id: 'resp_1', usage: { input_tokens: 12, output_tokens: 3 } };

      const result = patchResponse(doc);

      expect(result.changed).toBe(true);
      expect(result.value).toEqual({
        id: 'resp_1',
        usage: {
          input_tokens: 12,
          output_tokens: 3,
          input_tokens_details: { cached_tokens: 0 },
          output_tokens_details: { reasoning_tokens: 0 },
        },
      });
    });

    it('should keep detail fields that are already present', () => {
      const doc: JsonValue = { usage: { input_tokens_details: { cached_tokens: 5 } } };

      const result = patchResponse(doc);

      expect(result.changed).toBe(true);
      expect(result.value).toEqual({
        usage: {
          input_tokens_details: { cached_tokens: 5 },
          output_tokens_details: { reasoning_tokens: 0 },
        },
      });
    });

    it('should report no change when both fields exist', () => {
      const doc: JsonValue = {
        usage: { input_tokens_details: null, output_tokens_details: { reasoning_tokens: 9 } },
      };

      const result = patchResponse(doc);

      expect(result.changed).toBe(false);
      expect(result.value).toBe(doc);
    });

    it('should ignore a missing or non-object usage', () => {
      const inputs: JsonValue[] = [{ choices: [] }, { usage: null }, { usage: [1] }, { usage: 3 }, []];
      for (const input of inputs) {
        const result = patchResponse(input);
        expect(result.changed).toBe(false);
        expect(result.value).toBe(input);
      }
    });

    it('should be idempotent', () => {
      const once = patchResponse({ usage: {} });
      const twice = patchResponse(once.value);

      expect(twice.changed).toBe(false);
      expect(twice.value).toEqual(once.value);
    });
  });

  describe('completeUsage', () => {
    it('should insert fresh default objects per call', () => {
      const a = completeUsage({}).usage;
      const b = completeUsage({}).usage;

      expect(a.input_tokens_details).toEqual({ cached_tokens: 0 });
      expect(a.input_tokens_details).not.toBe(b.input_tokens_details);
    });
  });
});
