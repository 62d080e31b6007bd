import {
  insertConversation,
  getConversationRow,
  getLatestConversationRowForOwner,
  listConversationRowsForOwner,
  listConversationRows,
  updateConversationMessages,
  deleteConversationRow,
  type ConversationRow,
} from './db.js';
import type { ConversationRecord, ConversationRepository } from './conversation-store.js';

function fromRow(row: ConversationRow): ConversationRecord {
  const record: ConversationRecord = {
    id: row.id,
    ownerId: row.owner_id,
    blob: row.messages,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
  if (row.title !== null) record.title = row.title;
  return record;
}

/** SQLite-backed conversation persistence; one row per conversation. */
export function createSqliteConversationRepository(): ConversationRepository {
  return {
    async insert(record) {
      insertConversation({
        id: record.id,
        ownerId: record.ownerId,
        title: record.title,
        messages: record.blob,
        createdAt: record.createdAt,
      });
    },

    async findById(id) {
      const row = getConversationRow(id);
      return row ? fromRow(row) : undefined;
    },

    async findLatestForOwner(ownerId) {
      const row = getLatestConversationRowForOwner(ownerId);
      return row ? fromRow(row) : undefined;
    },

    async listForOwner(ownerId) {
      return listConversationRowsForOwner(ownerId).map(fromRow);
    },

    async list(limit, offset) {
      return listConversationRows(limit, offset).map(fromRow);
    },

    async updateBlob(id, blob, updatedAt) {
      return updateConversationMessages(id, blob, updatedAt);
    },

    async delete(id) {
      return deleteConversationRow(id);
    },
  };
}
