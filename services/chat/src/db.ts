import Database from 'better-sqlite3';
import path from 'node:path';
import { mkdirSync } from 'node:fs';
import { logger } from '@safehouse/shared';

const log = logger.child({ module: 'db' });

let db: Database.Database | undefined;

/** Open (once) the database under `dataDir`; later calls return the same handle. */
export function getDb(dataDir: string = process.env.DATA_DIR ?? './data'): Database.Database {
  if (db) return db;

  const dbPath = path.join(dataDir, 'safehouse.db');
  mkdirSync(dataDir, { recursive: true });

  log.info({ path: dbPath }, 'opening SQLite database');
  const conn = new Database(dbPath);

  // DELETE mode behaves better on network and container-mounted volumes
  conn.pragma('journal_mode = DELETE');
  conn.pragma('busy_timeout = 5000');
  conn.pragma('foreign_keys = ON');

  conn.exec(`
    CREATE TABLE IF NOT EXISTS personas (
      id         TEXT PRIMARY KEY,
      name       TEXT NOT NULL,
      codename   TEXT NOT NULL,
      biography  TEXT NOT NULL DEFAULT '',
      specialty  TEXT NOT NULL DEFAULT '',
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )
  `);

  conn.exec(`
    CREATE TABLE IF NOT EXISTS conversations (
      id         TEXT PRIMARY KEY,
      owner_id   TEXT NOT NULL REFERENCES personas(id) ON DELETE CASCADE,
      title      TEXT,
      messages   TEXT NOT NULL DEFAULT '',
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )
  `);

  conn.exec(`
    CREATE INDEX IF NOT EXISTS idx_conversations_owner
      ON conversations(owner_id, updated_at DESC)
  `);

  conn.exec(`
    CREATE TABLE IF NOT EXISTS api_audit (
      id            INTEGER PRIMARY KEY AUTOINCREMENT,
      provider      TEXT NOT NULL,
      model         TEXT NOT NULL,
      duration_ms   INTEGER NOT NULL,
      input_tokens  INTEGER,
      output_tokens INTEGER,
      error         TEXT,
      trace_id      TEXT,
      created_at    TEXT NOT NULL
    )
  `);

  db = conn;
  return conn;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = undefined;
    log.info('database closed');
  }
}

// ---------------------------------------------------------------------------
// Personas
// ---------------------------------------------------------------------------

export interface PersonaRow {
  id: string;
  name: string;
  codename: string;
  biography: string;
  specialty: string;
  created_at: string;
  updated_at: string;
}

export function insertPersona(params: {
  id: string;
  name: string;
  codename: string;
  biography: string;
  specialty: string;
}): PersonaRow {
  const now = new Date().toISOString();
  getDb()
    .prepare(
      `INSERT INTO personas (id, name, codename, biography, specialty, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
    )
    .run(params.id, params.name, params.codename, params.biography, params.specialty, now, now);
  return { ...params, created_at: now, updated_at: now };
}

export function getPersonaRow(id: string): PersonaRow | undefined {
  return getDb().prepare<[string], PersonaRow>('SELECT * FROM personas WHERE id = ?').get(id);
}

export function listPersonaRows(): PersonaRow[] {
  return getDb().prepare<[], PersonaRow>('SELECT * FROM personas ORDER BY name').all();
}

export function updatePersonaRow(
  id: string,
  updates: Partial<{ name: string; codename: string; biography: string; specialty: string }>,
): PersonaRow | undefined {
  const existing = getPersonaRow(id);
  if (!existing) return undefined;
  const next: PersonaRow = {
    ...existing,
    ...updates,
    updated_at: new Date().toISOString(),
  };
  getDb()
    .prepare(
      `UPDATE personas SET name = ?, codename = ?, biography = ?, specialty = ?, updated_at = ?
       WHERE id = ?`,
    )
    .run(next.name, next.codename, next.biography, next.specialty, next.updated_at, id);
  return next;
}

export function deletePersonaRow(id: string): boolean {
  const result = getDb().prepare('DELETE FROM personas WHERE id = ?').run(id);
  return result.changes > 0;
}

// ---------------------------------------------------------------------------
// Conversations
// ---------------------------------------------------------------------------

export interface ConversationRow {
  id: string;
  owner_id: string;
  title: string | null;
  messages: string;
  created_at: string;
  updated_at: string;
}

export function insertConversation(params: {
  id: string;
  ownerId: string;
  title?: string;
  messages: string;
  createdAt: string;
}): void {
  getDb()
    .prepare(
      `INSERT INTO conversations (id, owner_id, title, messages, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
    )
    .run(params.id, params.ownerId, params.title ?? null, params.messages, params.createdAt, params.createdAt);
}

export function getConversationRow(id: string): ConversationRow | undefined {
  return getDb().prepare<[string], ConversationRow>('SELECT * FROM conversations WHERE id = ?').get(id);
}

/** Most recently updated conversation for an owner; ties go to the later insert. */
export function getLatestConversationRowForOwner(ownerId: string): ConversationRow | undefined {
  return getDb()
    .prepare<[string], ConversationRow>(
      'SELECT * FROM conversations WHERE owner_id = ? ORDER BY updated_at DESC, rowid DESC LIMIT 1',
    )
    .get(ownerId);
}

export function listConversationRowsForOwner(ownerId: string): ConversationRow[] {
  return getDb()
    .prepare<[string], ConversationRow>(
      'SELECT * FROM conversations WHERE owner_id = ? ORDER BY updated_at DESC, rowid DESC',
    )
    .all(ownerId);
}

export function listConversationRows(limit = 50, offset = 0): ConversationRow[] {
  return getDb()
    .prepare<[number, number], ConversationRow>(
      'SELECT * FROM conversations ORDER BY updated_at DESC, rowid DESC LIMIT ? OFFSET ?',
    )
    .all(limit, offset);
}

export function updateConversationMessages(id: string, messages: string, updatedAt: string): boolean {
  const result = getDb()
    .prepare('UPDATE conversations SET messages = ?, updated_at = ? WHERE id = ?')
    .run(messages, updatedAt, id);
  return result.changes > 0;
}

export function deleteConversationRow(id: string): boolean {
  const result = getDb().prepare('DELETE FROM conversations WHERE id = ?').run(id);
  return result.changes > 0;
}

// ---------------------------------------------------------------------------
// API audit
// ---------------------------------------------------------------------------

export function insertApiAudit(params: {
  provider: string;
  model: string;
  durationMs: number;
  inputTokens?: number;
  outputTokens?: number;
  error?: string;
  traceId?: string;
}): void {
  getDb()
    .prepare(
      `INSERT INTO api_audit (provider, model, duration_ms, input_tokens, output_tokens, error, trace_id, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    )
    .run(
      params.provider,
      params.model,
      params.durationMs,
      params.inputTokens ?? null,
      params.outputTokens ?? null,
      params.error ?? null,
      params.traceId ?? null,
      new Date().toISOString(),
    );
}
