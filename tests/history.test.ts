import test from 'node:test';
import assert from 'node:assert/strict';
import { bound, InMemoryHistoryStore, repair, trim } from '../src/core/history';
import { isToolRequest, type Message } from '../src/core/message';

const user = (content: string): Message => ({ role: 'user', content });
const reply = (content: string): Message => ({ role: 'assistant', content });
const ask = (...ids: string[]): Message => ({
  role: 'assistant',
  content: null,
  tool_calls: ids.map((id) => ({ id, type: 'function', function: { name: 'calculate', arguments: '{}' } }))
});
const result = (id: string): Message => ({ role: 'tool', tool_call_id: id, name: 'calculate', content: '{"result":4}' });

// every tool message sits in the result block of an assistant message that asked for its id, once
function toolResultsAnswered(history: readonly Message[]): boolean {
  for (let i = 0; i < history.length; i++) {
    const msg = history[i];
    if (msg.role !== 'tool') continue;
    let j = i - 1;
    while (j >= 0 && history[j].role === 'tool') j--;
    const request = history[j];
    if (!isToolRequest(request)) return false;
    if (!request.tool_calls.some((tc) => tc.id === msg.tool_call_id)) return false;
    const block = history.slice(j + 1, i);
    if (block.some((m) => m.role === 'tool' && m.tool_call_id === msg.tool_call_id)) return false;
  }
  return true;
}

// mixes plain rounds with one- and two-call tool rounds
function conversation(rounds: number): Message[] {
  const out: Message[] = [];
  for (let r = 0; r < rounds; r++) {
    out.push(user(`q${r}`));
    if (r % 3 === 1) out.push(ask(`c${r}`), result(`c${r}`));
    if (r % 3 === 2) out.push(ask(`c${r}a`, `c${r}b`), result(`c${r}a`), result(`c${r}b`));
    out.push(reply(`a${r}`));
  }
  return out;
}

test('repair drops a leading tool message with no request', () => {
  assert.deepEqual(repair([result('a'), user('hi')]), [user('hi')]);
});

test('repair keeps every result of a multi-call request', () => {
  const history = [user('q'), ask('a', 'b'), result('a'), result('b'), reply('done')];
  assert.deepEqual(repair(history), history);
});

test('repair drops unknown and repeated call ids', () => {
  const history = [user('q'), ask('a'), result('x'), result('a'), result('a')];
  assert.deepEqual(repair(history), [user('q'), ask('a'), result('a')]);
});

test('repair drops tool results separated from their request', () => {
  assert.deepEqual(repair([ask('a'), user('x'), result('a')]), [ask('a'), user('x')]);
});

test('repair drops unknown roles and malformed entries', () => {
  const history: unknown[] = [{ role: 'developer', content: 'x' }, user('hi'), { role: 'user' }, null, 'text'];
  assert.deepEqual(repair(history), [user('hi')]);
});

test('repair is idempotent', () => {
  const samples: Message[][] = [
    [result('a'), user('q'), ask('a', 'b'), result('b'), result('b'), result('a'), reply('r')],
    [ask('a'), result('a'), user('x'), result('a')],
    conversation(7)
  ];
  for (const history of samples) {
    const once = repair(history);
    assert.deepEqual(repair(once), once);
  }
});

test('trim returns a copy when the history fits', () => {
  const history = [user('q'), reply('a')];
  const out = trim(history, 5);
  assert.deepEqual(out, history);
  assert.notEqual(out, history);
});

test('trim pulls the requesting assistant message back in', () => {
  const history = [user('q1'), ask('a'), result('a'), reply('r1'), user('q2'), reply('r2')];
  assert.deepEqual(trim(history, 4), [ask('a'), result('a'), reply('r1'), user('q2')]);
});

test('trim drops a leading orphan when the message before it is not a request', () => {
  const history = [user('q1'), ask('a', 'b'), result('a'), result('b'), reply('r'), user('q2')];
  assert.deepEqual(trim(history, 3), [reply('r'), user('q2')]);
});

test('trim to zero empties the history', () => {
  assert.deepEqual(trim([user('q'), reply('a')], 0), []);
});

test('bound keeps histories valid and within size for every limit', () => {
  const history = conversation(9);
  for (let max = 1; max <= history.length + 1; max++) {
    const out = bound(history, max);
    assert.ok(out.length <= max, `length ${out.length} over ${max}`);
    assert.ok(toolResultsAnswered(out), `invalid history at max ${max}`);
    assert.deepEqual(repair(out), out);
  }
});

test('in-memory store stays bounded and valid across appends', async () => {
  const store = new InMemoryHistoryStore(6);
  const rounds = conversation(12);
  for (const msg of rounds) {
    await store.append('u1', msg);
    const history = await store.get('u1');
    assert.ok(history.length <= 6);
    assert.ok(toolResultsAnswered(history));
  }
});

test('in-memory store keeps users apart and resets', async () => {
  const store = new InMemoryHistoryStore();
  assert.deepEqual(await store.get('nobody'), []);

  await store.append('u1', user('hi'), reply('hello'));
  await store.append('u2', user('other'));
  assert.deepEqual(await store.get('u1'), [user('hi'), reply('hello')]);

  await store.reset('u1');
  assert.deepEqual(await store.get('u1'), []);
  assert.deepEqual(await store.get('u2'), [user('other')]);
});

test('in-memory store hands out copies', async () => {
  const store = new InMemoryHistoryStore();
  await store.append('u1', user('hi'));
  const history = await store.get('u1');
  history.push(reply('injected'));
  assert.deepEqual(await store.get('u1'), [user('hi')]);
});
