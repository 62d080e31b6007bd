import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

// ---------------------------------------------------------------------------
// Each test gets a fresh temp directory + fresh module import
// ---------------------------------------------------------------------------

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await mkdtemp(path.join(tmpdir(), 'safehouse-test-'));
  process.env.DATA_DIR = tmpDir;
  vi.resetModules();
});

afterEach(async () => {
  const { closeDb } = await import('../db.js');
  closeDb();
  await rm(tmpDir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('persona repository', () => {
  it('creates, reads, updates and deletes personas', async () => {
    const { createPersona, getPersona, listPersonas, updatePersona, deletePersona } = await import('../persona-repository.js');

    const created = createPersona({ id: 'spy-7', name: 'Agent Seven', codename: 'NIGHTJAR' });
    expect(created.ok).toBe(true);
    expect(getPersona('spy-7')).toMatchObject({
      id: 'spy-7',
      name: 'Agent Seven',
      codename: 'NIGHTJAR',
      biography: '',
      specialty: '',
    });

    const updated = updatePersona('spy-7', { specialty: 'cryptography' });
    expect(updated.ok && updated.value.specialty).toBe('cryptography');
    expect(updated.ok && updated.value.codename).toBe('NIGHTJAR');

    createPersona({ id: 'raven', name: 'Raven', codename: 'CORVID' });
    expect(listPersonas().map((p) => p.id)).toEqual(['spy-7', 'raven']);

    expect(deletePersona('spy-7')).toBe(true);
    expect(deletePersona('spy-7')).toBe(false);
    expect(getPersona('spy-7')).toBeUndefined();
  });

  it('generates an id when none is given', async () => {
    const { createPersona } = await import('../persona-repository.js');
    const created = createPersona({ name: 'Raven', codename: 'CORVID' });
    expect(created.ok && created.value.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('rejects invalid and duplicate personas', async () => {
    const { createPersona, updatePersona } = await import('../persona-repository.js');

    const invalid = createPersona({ name: '', codename: 'X' });
    expect(invalid.ok).toBe(false);
    if (!invalid.ok) {
      expect(invalid.error.message).toBe('invalid persona');
      expect(invalid.error.issues[0]).toMatch(/^name: /);
    }

    createPersona({ id: 'spy-7', name: 'Agent Seven', codename: 'NIGHTJAR' });
    const duplicate = createPersona({ id: 'spy-7', name: 'Other', codename: 'OTHER' });
    expect(!duplicate.ok && duplicate.error.message).toBe('persona spy-7 already exists');

    const empty = updatePersona('spy-7', {});
    expect(!empty.ok && empty.error.message).toBe('invalid persona update');
    const missing = updatePersona('ghost', { name: 'Ghost' });
    expect(!missing.ok && missing.error.message).toBe('persona ghost not found');
  });

  it('resolves personas into prompt facts with defaults', async () => {
    const { createPersona, resolvePersona } = await import('../persona-repository.js');
    createPersona({ id: 'spy-7', name: 'Agent Seven', codename: 'NIGHTJAR', biography: 'Former cartographer.' });

    const resolved = resolvePersona('spy-7');
    expect(resolved).toEqual({
      ok: true,
      value: {
        id: 'spy-7',
        displayName: 'Agent Seven',
        promptFacts: ['Codename: NIGHTJAR', 'Biography: Former cartographer.', 'Specialty: covert operations'],
      },
    });
    const missing = resolvePersona('ghost');
    expect(!missing.ok && missing.error.message).toBe('persona ghost not found');
  });
});

describe('sqlite conversation repository', () => {
  it('stores, updates and lists conversation rows', async () => {
    const { createPersona } = await import('../persona-repository.js');
    const { createSqliteConversationRepository } = await import('../conversation-repository.js');
    createPersona({ id: 'spy-7', name: 'Agent Seven', codename: 'NIGHTJAR' });
    const repo = createSqliteConversationRepository();

    await repo.insert({ id: 'c1', ownerId: 'spy-7', blob: '', createdAt: '2026-01-01T00:00:00.000Z', updatedAt: '2026-01-01T00:00:00.000Z' });
    await repo.insert({
      id: 'c2',
      ownerId: 'spy-7',
      title: 'Paris',
      blob: '',
      createdAt: '2026-01-02T00:00:00.000Z',
      updatedAt: '2026-01-02T00:00:00.000Z',
    });

    expect((await repo.findLatestForOwner('spy-7'))?.id).toBe('c2');
    expect(await repo.updateBlob('c1', '[]', '2026-01-03T00:00:00.000Z')).toBe(true);
    expect(await repo.updateBlob('nope', '[]', '2026-01-03T00:00:00.000Z')).toBe(false);
    expect((await repo.findLatestForOwner('spy-7'))?.id).toBe('c1');

    expect(await repo.findById('c1')).toEqual({
      id: 'c1',
      ownerId: 'spy-7',
      blob: '[]',
      createdAt: '2026-01-01T00:00:00.000Z',
      updatedAt: '2026-01-03T00:00:00.000Z',
    });
    expect((await repo.findById('c2'))?.title).toBe('Paris');
    expect((await repo.listForOwner('spy-7')).map((r) => r.id)).toEqual(['c1', 'c2']);
    expect((await repo.list(1, 1)).map((r) => r.id)).toEqual(['c2']);
  });

  it('removes conversations with their persona', async () => {
    const { createPersona, deletePersona } = await import('../persona-repository.js');
    const { createSqliteConversationRepository } = await import('../conversation-repository.js');
    createPersona({ id: 'spy-7', name: 'Agent Seven', codename: 'NIGHTJAR' });
    const repo = createSqliteConversationRepository();
    await repo.insert({ id: 'c1', ownerId: 'spy-7', blob: '', createdAt: '2026-01-01T00:00:00.000Z', updatedAt: '2026-01-01T00:00:00.000Z' });

    deletePersona('spy-7');

    expect(await repo.findById('c1')).toBeUndefined();
  });

  it('round-trips a conversation through the store', async () => {
    const { createPersona, sqlitePersonaLookup } = await import('../persona-repository.js');
    const { createSqliteConversationRepository } = await import('../conversation-repository.js');
    const { ConversationStore } = await import('../conversation-store.js');
    createPersona({ id: 'spy-7', name: 'Agent Seven', codename: 'NIGHTJAR' });
    const store = new ConversationStore({
      repository: createSqliteConversationRepository(),
      personas: sqlitePersonaLookup,
      generateId: () => 'c1',
    });

    const created = await store.getOrCreateForOwner('spy-7');
    expect(created.ok && created.value.id).toBe('c1');
    await Promise.all([
      store.append('c1', [{ role: 'user', content: 'one' }]),
      store.append('c1', [{ role: 'user', content: 'two' }]),
    ]);

    const log = await store.get('c1');
    expect(log.ok && log.value.messages).toEqual([
      { role: 'user', content: 'one' },
      { role: 'user', content: 'two' },
    ]);
  });

  it('records model API calls in the audit table', async () => {
    const { getDb, insertApiAudit } = await import('../db.js');
    insertApiAudit({ provider: 'anthropic', model: 'test-model', durationMs: 42, inputTokens: 10, traceId: 'abc' });

    const row = getDb()
      .prepare<[], { provider: string; duration_ms: number; output_tokens: number | null; trace_id: string }>(
        'SELECT provider, duration_ms, output_tokens, trace_id FROM api_audit',
      )
      .get();
    expect(row).toEqual({ provider: 'anthropic', duration_ms: 42, output_tokens: null, trace_id: 'abc' });
  });
});
