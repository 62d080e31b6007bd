import { describe, it, expect } from 'vitest';
import { NotFoundError } from '@safehouse/shared';
import { ConversationStore } from '../conversation-store.js';
import { decodeHistory } from '../history-codec.js';
import { InMemoryConversationRepository, staticPersonas, steppingClock } from './helpers/in-memory.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeStore(ids: string[] = ['c1', 'c2', 'c3', 'c4']) {
  const repository = new InMemoryConversationRepository();
  const queue = [...ids];
  const store = new ConversationStore({
    repository,
    personas: staticPersonas([
      { id: 'spy-7', displayName: 'Agent Seven', promptFacts: [] },
      { id: 'raven', displayName: 'Raven', promptFacts: [] },
    ]),
    generateId: () => queue.shift() ?? 'overflow',
    now: steppingClock(),
  });
  return { store, repository };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('ConversationStore', () => {
  it('get-or-create returns the same conversation on the second call', async () => {
    const { store } = makeStore();

    const first = await store.getOrCreateForOwner('spy-7');
    const second = await store.getOrCreateForOwner('spy-7');

    expect(first.ok && first.value.id).toBe('c1');
    expect(first.ok && first.value.messages).toEqual([]);
    expect(second.ok && second.value.id).toBe('c1');
  });

  it('creates a single conversation under concurrent get-or-create', async () => {
    const { store, repository } = makeStore();

    const results = await Promise.all(Array.from({ length: 5 }, () => store.getOrCreateForOwner('spy-7')));

    expect(results.map((r) => (r.ok ? r.value.id : 'error'))).toEqual(['c1', 'c1', 'c1', 'c1', 'c1']);
    expect(repository.records.size).toBe(1);
  });

  it('rejects unknown owners', async () => {
    const { store } = makeStore();
    const result = await store.getOrCreateForOwner('ghost');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(NotFoundError);
      expect(result.error.message).toBe('persona ghost not found');
    }

    const created = await store.create('ghost');
    expect(created.ok).toBe(false);
  });

  it('appends messages in order', async () => {
    const { store } = makeStore();
    await store.getOrCreateForOwner('spy-7');

    await store.append('c1', [{ role: 'user', content: 'hello' }]);
    await store.append('c1', [{ role: 'assistant', content: 'Evening.' }]);

    const log = await store.get('c1');
    expect(log.ok && log.value.messages).toEqual([
      { role: 'user', content: 'hello' },
      { role: 'assistant', content: 'Evening.' },
    ]);
  });

  it('loses no writes under concurrent appends', async () => {
    const { store, repository } = makeStore();
    await store.getOrCreateForOwner('spy-7');

    await Promise.all([
      store.append('c1', [{ role: 'user', content: 'a1' }, { role: 'assistant', content: 'a2' }]),
      store.append('c1', [{ role: 'user', content: 'b1' }, { role: 'assistant', content: 'b2' }]),
      store.append('c1', [{ role: 'user', content: 'c1' }]),
    ]);

    const record = repository.records.get('c1');
    const contents = decodeHistory(record?.blob).map((m) => m.content);
    expect(contents).toEqual(['a1', 'a2', 'b1', 'b2', 'c1']);
  });

  it('reports appends to a missing conversation', async () => {
    const { store } = makeStore();
    const result = await store.append('nope', [{ role: 'user', content: 'hi' }]);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('conversation nope not found');
  });

  it('serializes a locked turn against a plain append', async () => {
    const { store } = makeStore();
    await store.getOrCreateForOwner('spy-7');

    const turn = store.withConversationLock('c1', async (tx) => {
      const before = await tx.read();
      await tx.append([{ role: 'user', content: 'question' }]);
      await new Promise((resolve) => setTimeout(resolve, 10));
      await tx.append([{ role: 'assistant', content: 'answer' }]);
      return before.ok ? before.value.messages.length : -1;
    });
    const other = store.append('c1', [{ role: 'user', content: 'late' }]);

    await expect(turn).resolves.toBe(0);
    await other;
    const log = await store.get('c1');
    expect(log.ok && log.value.messages.map((m) => m.content)).toEqual(['question', 'answer', 'late']);
  });

  it('lists summaries with message counts', async () => {
    const { store } = makeStore();
    await store.create('spy-7', { title: 'Paris debrief' });
    await store.create('raven');
    await store.append('c1', [{ role: 'user', content: 'hi' }, { role: 'assistant', content: 'hello' }]);

    const mine = await store.listForOwner('spy-7');
    expect(mine).toHaveLength(1);
    expect(mine[0]).toMatchObject({ id: 'c1', ownerId: 'spy-7', title: 'Paris debrief', messageCount: 2 });

    const all = await store.list({ limit: 10 });
    expect(all.map((s) => s.id)).toEqual(['c1', 'c2']);
    expect(await store.list({ limit: 1, offset: 1 })).toHaveLength(1);
  });

  it('deletes conversations', async () => {
    const { store } = makeStore();
    await store.create('spy-7');

    expect(await store.delete('c1')).toBe(true);
    expect(await store.delete('c1')).toBe(false);
    const gone = await store.get('c1');
    expect(gone.ok).toBe(false);
  });

  it('reads legacy blobs through the codec', async () => {
    const { store, repository } = makeStore();
    await store.create('spy-7');
    const record = repository.records.get('c1');
    if (!record) throw new Error('conversation was not inserted');
    repository.records.set('c1', {
      ...record,
      blob: JSON.stringify([
        { role: 'user', content: 'old question' },
        { role: 'assistant', content: 'old answer' },
      ]),
    });

    await store.append('c1', [{ role: 'user', content: 'new question' }]);

    const log = await store.get('c1');
    expect(log.ok && log.value.messages.map((m) => m.content)).toEqual(['old question', 'old answer', 'new question']);
  });
});
