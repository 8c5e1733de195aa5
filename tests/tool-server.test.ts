import test from 'node:test';
import assert from 'node:assert/strict';
import { buildToolServer } from '../src/backend/app';
import { Catalog } from '../src/backend/catalog';
import { BUILTIN_TOOL_NAMES } from '../src/tools/builtins';
import type { FetchLike } from '../src/tools/backend-client';

function setup(fetchImpl?: FetchLike) {
  const catalog = new Catalog(':memory:', {
    seed: [
      { name: 'Green tea', category: 'drinks', price: 250 },
      { name: 'Honey', category: 'groceries', price: 390 }
    ]
  });
  const server = buildToolServer({ catalog, fetchImpl });
  server.addHook('onClose', async () => {
    catalog.close();
  });
  return server;
}

test('schema lists the same tools the bot declares', async () => {
  const server = setup();
  const res = await server.inject({ method: 'GET', url: '/schema' });
  assert.equal(res.statusCode, 200);
  const body = res.json();
  assert.equal(body.name, 'shop-tools');
  assert.deepEqual(Object.keys(body.tools), BUILTIN_TOOL_NAMES);
  await server.close();
});

test('health reports the tool table', async () => {
  const server = setup();
  const res = await server.inject({ method: 'GET', url: '/health' });
  assert.deepEqual(res.json(), { status: 'ok', tools: BUILTIN_TOOL_NAMES });
  await server.close();
});

test('run_tool evaluates expressions', async () => {
  const server = setup();
  const res = await server.inject({
    method: 'POST',
    url: '/run_tool',
    payload: { tool: 'calculate', params: { expression: '(2 + 3) * 4' } }
  });
  assert.equal(res.statusCode, 200);
  assert.deepEqual(res.json(), { tool: 'calculate', response: { result: 20 } });

  const bad = await server.inject({
    method: 'POST',
    url: '/run_tool',
    payload: { tool: 'calculate', params: { expression: '1 / 0' } }
  });
  assert.deepEqual(bad.json(), {
    tool: 'calculate',
    response: { error: 'could not evaluate expression: division by zero' }
  });
  await server.close();
});

test('run_tool adds and finds products', async () => {
  const server = setup();
  const added = await server.inject({
    method: 'POST',
    url: '/run_tool',
    payload: { tool: 'add_product', params: { name: 'Herbal tea', category: 'drinks', price: 180 } }
  });
  assert.deepEqual(added.json(), {
    tool: 'add_product',
    response: { product: { id: 3, name: 'Herbal tea', category: 'drinks', price: 180 } }
  });

  const found = await server.inject({
    method: 'POST',
    url: '/run_tool',
    payload: { tool: 'find_product', params: { name: 'tea' } }
  });
  assert.deepEqual(found.json(), {
    tool: 'find_product',
    response: {
      products: [
        { id: 1, name: 'Green tea', category: 'drinks', price: 250 },
        { id: 3, name: 'Herbal tea', category: 'drinks', price: 180 }
      ]
    }
  });
  await server.close();
});

test('run_tool reports invalid parameters in the response', async () => {
  const server = setup();
  const res = await server.inject({ method: 'POST', url: '/run_tool', payload: { tool: 'find_product' } });
  assert.equal(res.statusCode, 200);
  assert.deepEqual(res.json(), { tool: 'find_product', response: { error: 'invalid parameters: name: Required' } });
  await server.close();
});

test('unknown tools and malformed bodies are rejected', async () => {
  const server = setup();
  const missing = await server.inject({ method: 'POST', url: '/run_tool', payload: { tool: 'nope', params: {} } });
  assert.equal(missing.statusCode, 404);
  assert.deepEqual(missing.json(), { detail: "Tool 'nope' not found" });

  const malformed = await server.inject({ method: 'POST', url: '/run_tool', payload: { params: {} } });
  assert.equal(malformed.statusCode, 400);
  assert.deepEqual(malformed.json(), { detail: 'tool: Required' });
  await server.close();
});

test('run_tool passes the injected fetch to web providers', async () => {
  const urls: string[] = [];
  const fetchImpl: FetchLike = async (input) => {
    urls.push(String(input));
    return new Response(JSON.stringify({ base: 'EUR', date: '2026-03-04', rates: { USD: 1.1 } }));
  };
  const server = setup(fetchImpl);
  const res = await server.inject({
    method: 'POST',
    url: '/run_tool',
    payload: { tool: 'get_currency_rates', params: { base: 'eur', currencies: 'usd' } }
  });
  assert.deepEqual(res.json(), {
    tool: 'get_currency_rates',
    response: { base: 'EUR', rates: { USD: 1.1 }, date: '2026-03-04' }
  });
  assert.deepEqual(urls, ['https://api.exchangerate-api.com/v4/latest/EUR']);
  await server.close();
});
