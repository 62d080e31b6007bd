import { randomUUID } from 'node:crypto';
import { logger, NotFoundError, ok, err, type Result } from '@safehouse/shared';
import { decodeHistory, encodeHistory } from './history-codec.js';
import { KeyedMutex } from './keyed-mutex.js';
import type { ConversationLog, ConversationSummary, Message, ResolvedPersona } from './types.js';

const log = logger.child({ module: 'conversation-store' });

/** Resolves a persona id; the store only needs to know whether it exists. */
export interface PersonaLookup {
  resolvePersona(id: string): Promise<Result<ResolvedPersona, NotFoundError>>;
}

/** A conversation as persisted: the message log is an opaque encoded blob. */
export interface ConversationRecord {
  id: string;
  ownerId: string;
  title?: string;
  blob: string;
  createdAt: string;
  updatedAt: string;
}

export interface ConversationRepository {
  insert(record: ConversationRecord): Promise<void>;
  findById(id: string): Promise<ConversationRecord | undefined>;
  /** Most recently updated conversation for the owner */
  findLatestForOwner(ownerId: string): Promise<ConversationRecord | undefined>;
  listForOwner(ownerId: string): Promise<ConversationRecord[]>;
  list(limit: number, offset: number): Promise<ConversationRecord[]>;
  /** Replace the whole blob; false when the conversation no longer exists */
  updateBlob(id: string, blob: string, updatedAt: string): Promise<boolean>;
  delete(id: string): Promise<boolean>;
}

/** Operations available while holding a conversation's lock. */
export interface ConversationTx {
  read(): Promise<Result<ConversationLog, NotFoundError>>;
  append(messages: readonly Message[]): Promise<Result<void, NotFoundError>>;
}

export interface ConversationStoreOptions {
  repository: ConversationRepository;
  personas: PersonaLookup;
  generateId?: () => string;
  now?: () => Date;
}

function toLog(record: ConversationRecord): ConversationLog {
  const conversation: ConversationLog = {
    id: record.id,
    ownerId: record.ownerId,
    messages: decodeHistory(record.blob),
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
  };
  if (record.title !== undefined) conversation.title = record.title;
  return conversation;
}

function toSummary(record: ConversationRecord): ConversationSummary {
  const summary: ConversationSummary = {
    id: record.id,
    ownerId: record.ownerId,
    messageCount: decodeHistory(record.blob).length,
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
  };
  if (record.title !== undefined) summary.title = record.title;
  return summary;
}

/**
 * Owns conversation logs. Writes are read-modify-write of the whole blob, so
 * every mutation of a conversation runs under that conversation's lock, and
 * get-or-create runs under a per-owner lock.
 */
export class ConversationStore {
  private readonly repository: ConversationRepository;
  private readonly personas: PersonaLookup;
  private readonly generateId: () => string;
  private readonly now: () => Date;
  private readonly conversationLocks = new KeyedMutex();
  private readonly ownerLocks = new KeyedMutex();

  constructor(opts: ConversationStoreOptions) {
    this.repository = opts.repository;
    this.personas = opts.personas;
    this.generateId = opts.generateId ?? randomUUID;
    this.now = opts.now ?? (() => new Date());
  }

  async create(ownerId: string, opts?: { title?: string }): Promise<Result<string, NotFoundError>> {
    const persona = await this.personas.resolvePersona(ownerId);
    if (!persona.ok) return persona;
    return ok(await this.insertEmpty(ownerId, opts?.title));
  }

  async get(id: string): Promise<Result<ConversationLog, NotFoundError>> {
    const record = await this.repository.findById(id);
    if (!record) return err(new NotFoundError('conversation', id));
    return ok(toLog(record));
  }

  async getOrCreateForOwner(ownerId: string): Promise<Result<ConversationLog, NotFoundError>> {
    const persona = await this.personas.resolvePersona(ownerId);
    if (!persona.ok) return persona;

    return this.ownerLocks.withLock(ownerId, async () => {
      const latest = await this.repository.findLatestForOwner(ownerId);
      if (latest) return ok(toLog(latest));

      const id = await this.insertEmpty(ownerId);
      return this.get(id);
    });
  }

  async append(id: string, messages: readonly Message[]): Promise<Result<void, NotFoundError>> {
    return this.conversationLocks.withLock(id, () => this.appendUnlocked(id, messages));
  }

  async delete(id: string): Promise<boolean> {
    return this.conversationLocks.withLock(id, async () => {
      const deleted = await this.repository.delete(id);
      if (deleted) log.info({ conversationId: id }, 'conversation deleted');
      return deleted;
    });
  }

  async listForOwner(ownerId: string): Promise<ConversationSummary[]> {
    const records = await this.repository.listForOwner(ownerId);
    return records.map(toSummary);
  }

  async list(opts?: { limit?: number; offset?: number }): Promise<ConversationSummary[]> {
    const records = await this.repository.list(opts?.limit ?? 50, opts?.offset ?? 0);
    return records.map(toSummary);
  }

  /**
   * Run `fn` while holding the conversation's lock. Reads and appends made
   * through the transaction see each other and no concurrent writer.
   */
  async withConversationLock<T>(id: string, fn: (tx: ConversationTx) => Promise<T>): Promise<T> {
    return this.conversationLocks.withLock(id, () =>
      fn({
        read: () => this.get(id),
        append: (messages) => this.appendUnlocked(id, messages),
      }),
    );
  }

  private async insertEmpty(ownerId: string, title?: string): Promise<string> {
    const id = this.generateId();
    const createdAt = this.now().toISOString();
    await this.repository.insert({
      id,
      ownerId,
      title,
      blob: encodeHistory([]),
      createdAt,
      updatedAt: createdAt,
    });
    log.info({ conversationId: id, ownerId }, 'conversation created');
    return id;
  }

  private async appendUnlocked(id: string, messages: readonly Message[]): Promise<Result<void, NotFoundError>> {
    const record = await this.repository.findById(id);
    if (!record) return err(new NotFoundError('conversation', id));

    const next = [...decodeHistory(record.blob), ...messages];
    const updated = await this.repository.updateBlob(id, encodeHistory(next), this.now().toISOString());
    if (!updated) return err(new NotFoundError('conversation', id));

    log.debug({ conversationId: id, appended: messages.length, total: next.length }, 'messages appended');
    return ok(undefined);
  }
}
