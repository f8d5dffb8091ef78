import { createHash } from 'node:crypto'
import type { Message } from '../conversation/types.js'

export interface SummaryCacheEntry {
  summary: string
  computedAt: number
}

export interface SummaryCacheOptions {
  ttlMs: number
  cleanupThreshold: number
}

function sha256(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex')
}

/**
 * Stable key for a batch: count, total length, content digest, and a digest
 * of the relevant memory ids. Ids are sorted so their order never matters.
 * Both digests hash a JSON encoding, so no text can forge a separator.
 */
export function fingerprint(messages: readonly Message[], memoryIds: readonly string[] = []): string {
  const totalLength = messages.reduce((sum, m) => sum + m.text.length, 0)
  const contentHash = sha256(JSON.stringify(messages.map(m => [m.isUser, m.text]))).slice(0, 16)

  const memoryHash = memoryIds.length === 0
    ? 'no-memories'
    : sha256(JSON.stringify([...memoryIds].sort())).slice(0, 8)

  return `${messages.length}:${totalLength}:${contentHash}:${memoryHash}`
}

export class SummaryCache {
  private entries: Map<string, SummaryCacheEntry> = new Map()
  private options: SummaryCacheOptions

  constructor(options: SummaryCacheOptions) {
    this.options = options
  }

  get size(): number {
    return this.entries.size
  }

  isExpired(entry: SummaryCacheEntry, now: number = Date.now()): boolean {
    return now - entry.computedAt > this.options.ttlMs
  }

  get(key: string): string | null {
    const entry = this.entries.get(key)
    if (!entry) return null

    if (this.isExpired(entry)) {
      this.entries.delete(key)
      return null
    }
    return entry.summary
  }

  put(key: string, summary: string): void {
    if (this.entries.size > this.options.cleanupThreshold) {
      this.sweep()
    }
    this.entries.set(key, { summary, computedAt: Date.now() })
  }

  sweep(): number {
    const now = Date.now()
    let removed = 0
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key)
        removed++
      }
    }
    if (removed > 0) {
      console.log(`[summary-cache] Cleaned up ${removed} expired entries`)
    }
    return removed
  }

  clear(): void {
    this.entries.clear()
  }
}
