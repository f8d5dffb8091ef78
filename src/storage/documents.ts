import { PersistenceError, describeError } from '../errors.js'
import type { Database } from './database.js'

export const CONVERSATION_KEY = 'conversation_context'
export const MEMORY_SEGMENTS_KEY = 'memory_segments'
export const SUMMARIZATION_STATE_KEY = 'summarization_state'

/**
 * Keyed JSON blob persistence. A missing or unreadable document reads as
 * null; callers fall back to an empty value.
 */
export interface DocumentStore {
  readJSON(key: string): Promise<unknown | null>
  writeJSON(key: string, document: unknown): Promise<void>
  remove(key: string): Promise<void>
}

export class SqliteDocumentStore implements DocumentStore {
  private db: Database

  constructor(db: Database) {
    this.db = db
  }

  async readJSON(key: string): Promise<unknown | null> {
    const row = this.db.getDocument(key)
    if (!row) return null

    try {
      const document: unknown = JSON.parse(row.body)
      return document
    } catch (e) {
      console.error(`[storage] Document "${key}" is not valid JSON, ignoring it:`, describeError(e))
      return null
    }
  }

  async writeJSON(key: string, document: unknown): Promise<void> {
    try {
      this.db.putDocument(key, JSON.stringify(document))
    } catch (e) {
      throw new PersistenceError(`Failed to write document "${key}": ${describeError(e)}`, { cause: e })
    }
  }

  async remove(key: string): Promise<void> {
    try {
      this.db.deleteDocument(key)
    } catch (e) {
      throw new PersistenceError(`Failed to delete document "${key}": ${describeError(e)}`, { cause: e })
    }
  }
}
