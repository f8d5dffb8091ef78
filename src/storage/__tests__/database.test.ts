import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { Database } from '../database.js'
import { unlinkSync, existsSync } from 'fs'

const TEST_DB = '/tmp/confidant-database-test.db'

function removeTestDb(): void {
  for (const suffix of ['', '-wal', '-shm']) {
    if (existsSync(TEST_DB + suffix)) unlinkSync(TEST_DB + suffix)
  }
}

describe('Database', () => {
  let db: Database

  beforeEach(() => {
    removeTestDb()
    db = new Database(TEST_DB)
  })

  afterEach(() => {
    db.close()
    removeTestDb()
  })

  it('returns null for a missing document', () => {
    expect(db.getDocument('nope')).toBeNull()
  })

  it('inserts and retrieves a document', () => {
    db.putDocument('conversation_context', '{"messages":[]}')

    const row = db.getDocument('conversation_context')
    expect(row).not.toBeNull()
    expect(row?.key).toBe('conversation_context')
    expect(row?.body).toBe('{"messages":[]}')
    expect(row?.updated).toBeInstanceOf(Date)
  })

  it('overwrites an existing document', () => {
    db.putDocument('k', '{"v":1}')
    db.putDocument('k', '{"v":2}')

    expect(db.getDocument('k')?.body).toBe('{"v":2}')
  })

  it('deletes documents', () => {
    db.putDocument('a', '1')
    db.putDocument('b', '2')

    expect(db.deleteDocument('a')).toBe(true)
    expect(db.deleteDocument('a')).toBe(false)
    expect(db.getDocument('a')).toBeNull()
    expect(db.getDocument('b')?.body).toBe('2')
  })

  it('keeps documents across reopen', () => {
    db.putDocument('memory_segments', '{"segments":[]}')
    db.close()

    db = new Database(TEST_DB)
    expect(db.getDocument('memory_segments')?.body).toBe('{"segments":[]}')
  })
})
