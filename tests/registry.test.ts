import test from 'node:test';
import assert from 'node:assert/strict';
import { z } from 'zod';
import { BUILTIN_TOOL_NAMES, createBuiltinRegistry, type ToolBackend } from '../src/tools/builtins';
import { fail, ok, serializeToolResult, ToolRegistry, type ToolResult } from '../src/tools/registry';

class RecordingBackend implements ToolBackend {
  calls: Array<{ tool: string; params: Record<string, unknown> }> = [];

  async run(tool: string, params: Record<string, unknown>): Promise<ToolResult> {
    this.calls.push({ tool, params });
    return ok({ tool });
  }
}

const emptyParameters = { type: 'object' as const, properties: {}, additionalProperties: false as const };

test('builtin registry declares every tool in order', () => {
  const registry = createBuiltinRegistry(new RecordingBackend());
  assert.deepEqual(BUILTIN_TOOL_NAMES, [
    'list_products',
    'find_product',
    'add_product',
    'calculate',
    'calculate_advanced',
    'search_web',
    'get_currency_rates',
    'translate_text'
  ]);
  assert.deepEqual(registry.names(), BUILTIN_TOOL_NAMES);
  for (const decl of registry.declarations()) {
    assert.equal(decl.type, 'function');
    assert.equal(decl.function.parameters.type, 'object');
    assert.equal(decl.function.parameters.additionalProperties, false);
  }
});

test('builtin tools forward validated arguments to the backend', async () => {
  const backend = new RecordingBackend();
  const registry = createBuiltinRegistry(backend);

  assert.deepEqual(await registry.invoke('find_product', { name: '  tea ' }), { ok: true, result: { tool: 'find_product' } });
  await registry.invoke('get_currency_rates', {});
  await registry.invoke('translate_text', { text: 'hello', target_language: 'de' });

  assert.deepEqual(backend.calls, [
    { tool: 'find_product', params: { name: 'tea' } },
    { tool: 'get_currency_rates', params: { base: 'USD' } },
    { tool: 'translate_text', params: { text: 'hello', target_language: 'de', source_language: 'auto' } }
  ]);
});

test('invalid arguments never reach the backend', async () => {
  const backend = new RecordingBackend();
  const registry = createBuiltinRegistry(backend);

  assert.deepEqual(await registry.invoke('find_product', {}), {
    ok: false,
    error: 'invalid arguments: name: Required'
  });
  assert.deepEqual(await registry.invoke('find_product', { name: 'tea', color: 'red' }), {
    ok: false,
    error: "invalid arguments: Unrecognized key(s) in object: 'color'"
  });
  assert.deepEqual(backend.calls, []);
});

test('unknown tool is an error result', async () => {
  const registry = new ToolRegistry();
  assert.equal(registry.has('nope'), false);
  assert.deepEqual(await registry.invoke('nope', {}), { ok: false, error: 'unknown tool: nope' });
});

test('a throwing handler becomes an error result', async () => {
  const registry = new ToolRegistry().register({
    name: 'boom',
    description: 'Always throws.',
    parameters: emptyParameters,
    input: z.object({}),
    handler: async () => {
      throw new Error('kaput');
    }
  });
  assert.deepEqual(await registry.invoke('boom', {}), { ok: false, error: 'tool boom failed: kaput' });
});

test('registering a name twice throws', () => {
  const def = {
    name: 'twice',
    description: 'Registered twice.',
    parameters: emptyParameters,
    input: z.object({}),
    handler: async () => ok({})
  };
  const registry = new ToolRegistry().register(def);
  assert.throws(() => registry.register(def), /tool already registered: twice/);
});

test('serializeToolResult renders results and errors as JSON', () => {
  assert.equal(serializeToolResult(ok({ result: 20 })), '{"result":20}');
  assert.equal(serializeToolResult(fail('unknown tool: x')), '{"error":"unknown tool: x"}');
});
