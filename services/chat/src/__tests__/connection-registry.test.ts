import { describe, it, expect, vi } from 'vitest';
import type { ServerEnvelope } from '@safehouse/shared';
import { ConnectionRegistry, type ConnectionHandle } from '../connection-registry.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface FakeHandle extends ConnectionHandle {
  sent: ServerEnvelope[];
  closed: Array<{ code: number; reason: string }>;
}

function fakeHandle(send?: (envelope: ServerEnvelope) => Promise<void>): FakeHandle {
  const handle: FakeHandle = {
    sent: [],
    closed: [],
    send: async (envelope) => {
      if (send) await send(envelope);
      handle.sent.push(envelope);
    },
    close: (code, reason) => {
      handle.closed.push({ code, reason });
    },
  };
  return handle;
}

function sequentialIds(): () => string {
  let n = 0;
  return () => `conn-${++n}`;
}

const hello: ServerEnvelope = { type: 'system', message: 'hello' };

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('ConnectionRegistry', () => {
  it('indexes connections by persona and conversation', () => {
    const registry = new ConnectionRegistry({ generateId: sequentialIds() });
    const a = registry.connect(fakeHandle(), { personaId: 'atlas', conversationId: 'c1' });
    const b = registry.connect(fakeHandle(), { personaId: 'atlas' });
    const c = registry.connect(fakeHandle(), { personaId: 'raven', conversationId: 'c2' });

    expect([a, b, c]).toEqual(['conn-1', 'conn-2', 'conn-3']);
    expect(registry.size).toBe(3);
    expect(registry.get(a)?.state).toBe('open');
    expect(registry.connectionsForPersona('atlas')).toEqual(['conn-1', 'conn-2']);
    expect(registry.connectionsForConversation('c1')).toEqual(['conn-1']);
    expect(registry.connectionsForConversation('c3')).toEqual([]);
  });

  it('disconnect is idempotent and removes empty buckets', () => {
    const registry = new ConnectionRegistry({ generateId: sequentialIds() });
    const id = registry.connect(fakeHandle(), { personaId: 'atlas', conversationId: 'c1' });

    registry.disconnect(id);
    registry.disconnect(id);
    registry.disconnect('unknown');

    expect(registry.has(id)).toBe(false);
    expect(registry.size).toBe(0);
    expect(registry.indexSizes).toEqual({ personas: 0, conversations: 0 });
  });

  it('sendTo delivers to open connections and reports gone ones', async () => {
    const registry = new ConnectionRegistry({ generateId: sequentialIds() });
    const handle = fakeHandle();
    const id = registry.connect(handle, { personaId: 'atlas' });

    await expect(registry.sendTo(id, hello)).resolves.toBe(true);
    registry.disconnect(id);
    await expect(registry.sendTo(id, hello)).resolves.toBe(false);
    await expect(registry.sendTo('nobody', hello)).resolves.toBe(false);
    expect(handle.sent).toEqual([hello]);
  });

  it('drops a connection whose send fails without affecting the others', async () => {
    const registry = new ConnectionRegistry({ generateId: sequentialIds() });
    const broken = fakeHandle(async () => {
      throw new Error('socket reset');
    });
    const healthy = fakeHandle();
    const bad = registry.connect(broken, { conversationId: 'c1' });
    registry.connect(healthy, { conversationId: 'c1' });

    const delivered = await registry.broadcastToConversation('c1', hello);

    expect(delivered).toBe(1);
    expect(healthy.sent).toEqual([hello]);
    expect(registry.has(bad)).toBe(false);
    expect(registry.connectionsForConversation('c1')).toEqual(['conn-2']);
  });

  it('delivers to every target even when one disconnects mid-broadcast', async () => {
    const registry = new ConnectionRegistry({ generateId: sequentialIds() });
    let second = '';
    const first = fakeHandle(async () => {
      registry.disconnect(second);
      await new Promise((resolve) => setTimeout(resolve, 5));
    });
    const secondHandle = fakeHandle();
    registry.connect(first, { personaId: 'atlas', conversationId: 'c1' });
    second = registry.connect(secondHandle, { personaId: 'atlas', conversationId: 'c1' });

    const delivered = await registry.broadcastToConversation('c1', hello);

    expect(delivered).toBe(2);
    expect(first.sent).toEqual([hello]);
    expect(secondHandle.sent).toEqual([hello]);
    expect(registry.connectionsForConversation('c1')).toEqual(['conn-1']);
  });

  it('broadcasts by persona and to everyone', async () => {
    const registry = new ConnectionRegistry({ generateId: sequentialIds() });
    const atlas = fakeHandle();
    const raven = fakeHandle();
    registry.connect(atlas, { personaId: 'atlas' });
    registry.connect(raven, { personaId: 'raven' });

    await expect(registry.broadcastToPersona('atlas', hello)).resolves.toBe(1);
    await expect(registry.broadcast(hello)).resolves.toBe(2);
    await expect(registry.broadcastToPersona('nobody', hello)).resolves.toBe(0);
    expect(atlas.sent).toHaveLength(2);
    expect(raven.sent).toHaveLength(1);
  });

  it('attaches a persona-only connection to a conversation', async () => {
    const registry = new ConnectionRegistry({ generateId: sequentialIds() });
    const handle = fakeHandle();
    const id = registry.connect(handle, { personaId: 'atlas' });

    expect(registry.attachConversation(id, 'c7')).toBe(true);
    expect(registry.connectionsForConversation('c7')).toEqual([id]);
    expect(registry.attachConversation(id, 'c8')).toBe(true);
    expect(registry.connectionsForConversation('c7')).toEqual([]);
    expect(registry.attachConversation('nobody', 'c8')).toBe(false);
  });

  it('closeAll closes handles and empties the registry', () => {
    const registry = new ConnectionRegistry({ generateId: sequentialIds() });
    const a = fakeHandle();
    const b = fakeHandle();
    registry.connect(a, { personaId: 'atlas' });
    registry.connect(b, { personaId: 'raven' });

    registry.closeAll(1001, 'server shutting down');

    expect(a.closed).toEqual([{ code: 1001, reason: 'server shutting down' }]);
    expect(b.closed).toEqual([{ code: 1001, reason: 'server shutting down' }]);
    expect(registry.size).toBe(0);
  });

  it('keeps going when a handle fails to close', () => {
    const registry = new ConnectionRegistry({ generateId: sequentialIds() });
    const handle = fakeHandle();
    handle.close = vi.fn(() => {
      throw new Error('already gone');
    });
    registry.connect(handle);
    registry.connect(fakeHandle());

    registry.closeAll(1001, 'bye');
    expect(registry.size).toBe(0);
  });
});
