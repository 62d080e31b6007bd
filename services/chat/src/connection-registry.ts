import { randomUUID } from 'node:crypto';
import { logger, type ServerEnvelope } from '@safehouse/shared';

const log = logger.child({ module: 'connection-registry' });

export type ConnectionState = 'connecting' | 'open' | 'closed';

const VALID_TRANSITIONS: Record<ConnectionState, Set<ConnectionState>> = {
  connecting: new Set(['open', 'closed']),
  open: new Set(['closed']),
  closed: new Set(),
};

/** The transport side of a connection; owned by the network layer. */
export interface ConnectionHandle {
  send(envelope: ServerEnvelope): Promise<void>;
  close(code: number, reason: string): void;
}

export interface Connection {
  id: string;
  handle: ConnectionHandle;
  personaId?: string;
  conversationId?: string;
  state: ConnectionState;
  connectedAt: number;
}

export interface ConnectionRegistryOptions {
  generateId?: () => string;
  now?: () => number;
}

function addToIndex(index: Map<string, Set<string>>, key: string, id: string): void {
  let bucket = index.get(key);
  if (!bucket) {
    bucket = new Set();
    index.set(key, bucket);
  }
  bucket.add(id);
}

function removeFromIndex(index: Map<string, Set<string>>, key: string, id: string): void {
  const bucket = index.get(key);
  if (!bucket) return;
  bucket.delete(id);
  if (bucket.size === 0) index.delete(key);
}

/**
 * Live connections plus two secondary indexes (by persona, by conversation).
 *
 * Index mutation is synchronous. Broadcasts take a snapshot of their targets
 * and start every send in the same pass, so a disconnect that lands while
 * sends are in flight neither blocks the fan-out nor drops a target that was
 * open when the broadcast began.
 */
export class ConnectionRegistry {
  private connections = new Map<string, Connection>();
  private byPersona = new Map<string, Set<string>>();
  private byConversation = new Map<string, Set<string>>();
  private readonly generateId: () => string;
  private readonly now: () => number;

  constructor(opts: ConnectionRegistryOptions = {}) {
    this.generateId = opts.generateId ?? randomUUID;
    this.now = opts.now ?? Date.now;
  }

  connect(handle: ConnectionHandle, opts: { personaId?: string; conversationId?: string } = {}): string {
    const conn: Connection = {
      id: this.generateId(),
      handle,
      personaId: opts.personaId,
      conversationId: opts.conversationId,
      state: 'connecting',
      connectedAt: this.now(),
    };
    this.connections.set(conn.id, conn);
    if (conn.personaId) addToIndex(this.byPersona, conn.personaId, conn.id);
    if (conn.conversationId) addToIndex(this.byConversation, conn.conversationId, conn.id);
    this.transition(conn, 'open');

    log.info(
      { connectionId: conn.id, personaId: conn.personaId, conversationId: conn.conversationId, total: this.connections.size },
      'connection opened',
    );
    return conn.id;
  }

  /** Index an open connection under a conversation it was not opened with. */
  attachConversation(id: string, conversationId: string): boolean {
    const conn = this.connections.get(id);
    if (!conn || conn.state !== 'open') return false;
    if (conn.conversationId === conversationId) return true;
    if (conn.conversationId) removeFromIndex(this.byConversation, conn.conversationId, id);
    conn.conversationId = conversationId;
    addToIndex(this.byConversation, conversationId, id);
    return true;
  }

  /** Idempotent: unknown or already-closed ids are ignored. */
  disconnect(id: string): void {
    const conn = this.connections.get(id);
    if (!conn) return;

    this.transition(conn, 'closed');
    this.connections.delete(id);
    if (conn.personaId) removeFromIndex(this.byPersona, conn.personaId, id);
    if (conn.conversationId) removeFromIndex(this.byConversation, conn.conversationId, id);

    log.info({ connectionId: id, total: this.connections.size }, 'connection closed');
  }

  /** Deliver to one connection. Resolves false when it is gone or the send fails. */
  async sendTo(id: string, envelope: ServerEnvelope): Promise<boolean> {
    const conn = this.connections.get(id);
    if (!conn || conn.state !== 'open') return false;
    return this.deliver(conn, envelope);
  }

  broadcastToPersona(personaId: string, envelope: ServerEnvelope): Promise<number> {
    return this.fanOut(this.snapshot(this.byPersona.get(personaId)), envelope);
  }

  broadcastToConversation(conversationId: string, envelope: ServerEnvelope): Promise<number> {
    return this.fanOut(this.snapshot(this.byConversation.get(conversationId)), envelope);
  }

  broadcast(envelope: ServerEnvelope): Promise<number> {
    return this.fanOut(this.snapshot(this.connections.keys()), envelope);
  }

  /** Close every connection, e.g. on shutdown. */
  closeAll(code: number, reason: string): void {
    for (const conn of [...this.connections.values()]) {
      try {
        conn.handle.close(code, reason);
      } catch (error) {
        log.warn({ err: error, connectionId: conn.id }, 'failed to close connection');
      }
      this.disconnect(conn.id);
    }
  }

  has(id: string): boolean {
    return this.connections.has(id);
  }

  get(id: string): Readonly<Connection> | undefined {
    return this.connections.get(id);
  }

  get size(): number {
    return this.connections.size;
  }

  connectionsForPersona(personaId: string): string[] {
    return [...(this.byPersona.get(personaId) ?? [])];
  }

  connectionsForConversation(conversationId: string): string[] {
    return [...(this.byConversation.get(conversationId) ?? [])];
  }

  /** Number of non-empty index buckets, per index. */
  get indexSizes(): { personas: number; conversations: number } {
    return { personas: this.byPersona.size, conversations: this.byConversation.size };
  }

  private snapshot(ids: Iterable<string> | undefined): Connection[] {
    if (!ids) return [];
    const targets: Connection[] = [];
    for (const id of ids) {
      const conn = this.connections.get(id);
      if (conn && conn.state === 'open') targets.push(conn);
    }
    return targets;
  }

  private async fanOut(targets: Connection[], envelope: ServerEnvelope): Promise<number> {
    const results = await Promise.all(targets.map((conn) => this.deliver(conn, envelope)));
    return results.filter(Boolean).length;
  }

  private async deliver(conn: Connection, envelope: ServerEnvelope): Promise<boolean> {
    try {
      await conn.handle.send(envelope);
      return true;
    } catch (error) {
      log.warn({ err: error, connectionId: conn.id }, 'send failed, dropping connection');
      this.disconnect(conn.id);
      return false;
    }
  }

  private transition(conn: Connection, to: ConnectionState): void {
    if (!VALID_TRANSITIONS[conn.state].has(to)) {
      throw new Error(`Invalid connection state transition: ${conn.state} -> ${to}`);
    }
    conn.state = to;
  }
}
