import { nanoid } from 'nanoid'
import { z } from 'zod'
import type { Message } from '../conversation/types.js'
import type { DocumentStore } from '../storage/documents.js'
import { MEMORY_SEGMENTS_KEY } from '../storage/documents.js'
import type { MemoryConfig } from './config.js'
import { classifyTier, qualifiesForSegment, scoreMessage } from './scoring.js'
import { extractKeyTopics, extractTopics, loadTopicTaxonomy, type TopicTaxonomy } from './topics.js'
import { MEMORY_TIERS, tierRank, type MemorySegment, type MemoryTier, type SegmentMetrics } from './types.js'

const MS_PER_DAY = 24 * 60 * 60 * 1000
const MAX_ACCESS_BOOST_COUNT = 10
const ACCESS_BOOST_PER_HIT = 0.05
const MAX_COMPRESSED_LENGTH = 600
const MAX_BATCH_TOPICS = 10

const QUERY_STOP_WORDS = new Set([
  'the', 'and', 'for', 'are', 'was', 'were', 'with', 'that', 'this', 'what',
  'when', 'where', 'how', 'why', 'who', 'you', 'your', 'have', 'has', 'had',
  'about', 'from', 'into', 'just', 'can', 'could', 'would', 'should', 'will',
  'did', 'does', 'not', 'but', 'all', 'any', 'some'
])

const IsoDate = z.string().refine(s => !Number.isNaN(Date.parse(s)))

const SegmentDocumentSchema = z.object({
  id: z.string().min(1),
  content: z.string(),
  type: z.enum(MEMORY_TIERS),
  importance: z.number().min(0).max(1),
  created: IsoDate,
  lastAccessed: IsoDate,
  accessCount: z.number().int().nonnegative(),
  topics: z.array(z.string()),
  metadata: z.record(z.unknown())
})

const SegmentCollectionSchema = z.object({
  lastConsolidatedAt: IsoDate.nullable(),
  segments: z.array(SegmentDocumentSchema)
})

export interface BatchContext {
  source?: string
}

export interface ConsolidationReport {
  expired: number
  promoted: number
  merged: number
  pruned: number
}

export interface SegmentManagerOptions {
  config: MemoryConfig
  taxonomy?: TopicTaxonomy
}

function normalizeContent(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, ' ')
}

function queryTerms(query: string): string[] {
  const terms = query
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, ' ')
    .split(/\s+/)
    .filter(w => w.length >= 3 && !QUERY_STOP_WORDS.has(w))
  return [...new Set(terms)]
}

export class MemorySegmentManager {
  private segments: Map<string, MemorySegment> = new Map()
  private config: MemoryConfig
  private taxonomy: TopicTaxonomy
  private _lastConsolidatedAt: Date | null = null

  constructor(options: SegmentManagerOptions) {
    this.config = options.config
    this.taxonomy = options.taxonomy ?? loadTopicTaxonomy()
  }

  get size(): number { return this.segments.size }
  get lastConsolidatedAt(): Date | null { return this._lastConsolidatedAt }
  get memoryConfig(): MemoryConfig { return this.config }

  getSegment(id: string): MemorySegment | null {
    return this.segments.get(id) ?? null
  }

  getAll(): MemorySegment[] {
    return Array.from(this.segments.values())
  }

  insert(segment: MemorySegment): void {
    this.segments.set(segment.id, segment)
  }

  score(message: Message, now: Date = new Date()): number {
    return scoreMessage(message, this.config, now)
  }

  classify(importance: number): MemoryTier {
    return classifyTier(importance, this.config)
  }

  private expiryFor(tier: MemoryTier): number {
    switch (tier) {
      case 'short-term': return this.config.shortTermExpiry
      case 'medium-term': return this.config.mediumTermExpiry
      case 'long-term': return this.config.longTermExpiry
      case 'critical': return Number.POSITIVE_INFINITY
    }
  }

  private capacityFor(tier: MemoryTier): number {
    switch (tier) {
      case 'short-term': return this.config.maxShortTermSegments
      case 'medium-term': return this.config.maxMediumTermSegments
      case 'long-term': return this.config.maxLongTermSegments
      case 'critical': return Number.POSITIVE_INFINITY
    }
  }

  isExpired(segment: MemorySegment, now: Date = new Date()): boolean {
    if (segment.type === 'critical') return false
    return now.getTime() - segment.created.getTime() > this.expiryFor(segment.type)
  }

  relevanceScore(segment: MemorySegment, now: Date = new Date()): number {
    const daysSinceAccess = Math.max(0, now.getTime() - segment.lastAccessed.getTime()) / MS_PER_DAY
    const timeDecay = Math.pow(0.5, daysSinceAccess / this.config.decayHalfLifeDays)
    const accessBoost = Math.min(segment.accessCount, MAX_ACCESS_BOOST_COUNT) * ACCESS_BOOST_PER_HIT
    return segment.importance * timeDecay * (1 + accessBoost)
  }

  private reinforce(segment: MemorySegment, now: Date): void {
    segment.accessCount += 1
    segment.lastAccessed = now
  }

  processBatch(messages: readonly Message[], context: BatchContext = {}, now: Date = new Date()): MemorySegment[] {
    const touched: MemorySegment[] = []
    const byContent = new Map<string, MemorySegment>()
    for (const segment of this.segments.values()) {
      // an expired segment cannot be revived; a restatement starts a fresh one
      if (this.isExpired(segment, now)) continue
      byContent.set(normalizeContent(segment.content), segment)
    }

    for (const message of messages) {
      const importance = this.score(message, now)
      if (!qualifiesForSegment(message, importance, this.config)) continue

      const key = normalizeContent(message.text)
      const existing = byContent.get(key)

      if (existing) {
        this.reinforce(existing, now)
        existing.importance = Math.max(existing.importance, importance)
        const tier = this.classify(existing.importance)
        if (tierRank(tier) > tierRank(existing.type)) {
          existing.type = tier
        }
        touched.push(existing)
        continue
      }

      const segment: MemorySegment = {
        id: nanoid(),
        content: message.text.trim(),
        type: this.classify(importance),
        importance,
        created: now,
        lastAccessed: now,
        accessCount: 0,
        topics: extractTopics(message.text, this.taxonomy),
        metadata: {
          sender: message.isUser ? 'user' : 'assistant',
          messageTimestamp: message.timestamp.toISOString(),
          source: context.source ?? 'conversation'
        }
      }
      this.segments.set(segment.id, segment)
      byContent.set(key, segment)
      touched.push(segment)
    }

    if (touched.length > 0) {
      console.log(`[memory] Ingested batch of ${messages.length} messages: ${touched.length} segments created or reinforced`)
    }
    return touched
  }

  expire(now: Date = new Date()): number {
    let removed = 0
    for (const [id, segment] of this.segments) {
      if (this.isExpired(segment, now)) {
        this.segments.delete(id)
        removed++
      }
    }
    if (removed > 0) {
      console.log(`[memory] Expired ${removed} segments`)
    }
    return removed
  }

  maybeConsolidate(now: Date = new Date()): ConsolidationReport | null {
    if (!this.config.enableAutoConsolidation) return null
    if (this._lastConsolidatedAt && now.getTime() - this._lastConsolidatedAt.getTime() < this.config.consolidationInterval) {
      return null
    }
    return this.consolidate(now)
  }

  consolidate(now: Date = new Date()): ConsolidationReport {
    const report: ConsolidationReport = { expired: 0, promoted: 0, merged: 0, pruned: 0 }
    if (!this.config.enableAutoConsolidation) return report

    report.expired = this.expire(now)

    // Promotion: each tier asks for proportionally more accesses; never into critical
    for (const segment of this.segments.values()) {
      if (segment.type !== 'short-term' && segment.type !== 'medium-term') continue
      const needed = this.config.promotionAccessCount * (tierRank(segment.type) + 1)
      if (needed > 0 && segment.accessCount >= needed) {
        segment.type = segment.type === 'short-term' ? 'medium-term' : 'long-term'
        report.promoted++
      }
    }

    for (const tier of MEMORY_TIERS) {
      const capacity = this.capacityFor(tier)
      const ranked = this.rankTier(tier, now)
      if (ranked.length <= capacity) continue

      const kept = ranked.slice(0, capacity)
      const overflow = ranked.slice(capacity)
      if (this.config.enableMemoryCompression) {
        report.merged += this.compress(kept, overflow, now)
      }

      for (const segment of overflow) {
        if (this.segments.delete(segment.id)) report.pruned++
      }
    }

    this._lastConsolidatedAt = now
    console.log(`[memory] Consolidated: ${report.expired} expired, ${report.promoted} promoted, ${report.merged} merged, ${report.pruned} pruned`)
    return report
  }

  private rankTier(tier: MemoryTier, now: Date): MemorySegment[] {
    return this.getAll()
      .filter(s => s.type === tier)
      .sort((a, b) =>
        this.relevanceScore(b, now) - this.relevanceScore(a, now) ||
        b.created.getTime() - a.created.getTime()
      )
  }

  /**
   * Folds each overflow segment into the highest-ranked kept segment that
   * shares its primary topic. Topicless segments are left for pruning.
   */
  private compress(kept: readonly MemorySegment[], overflow: readonly MemorySegment[], now: Date): number {
    let folded = 0
    for (const segment of overflow) {
      const topic = segment.topics[0]
      if (topic === undefined) continue
      const target = kept.find(k => k.topics.includes(topic))
      if (!target) continue

      let content = `${target.content} | ${segment.content}`
      if (content.length > MAX_COMPRESSED_LENGTH) {
        content = content.slice(0, MAX_COMPRESSED_LENGTH - 3) + '...'
      }
      const previous = target.metadata.mergedFrom
      const mergedFrom = Array.isArray(previous) ? previous.filter((id): id is string => typeof id === 'string') : []

      target.content = content
      target.importance = Math.max(target.importance, segment.importance)
      target.accessCount += segment.accessCount
      target.topics = [...new Set([...target.topics, ...segment.topics])]
      target.metadata = {
        ...target.metadata,
        compressed: true,
        mergedFrom: [...mergedFrom, segment.id],
        compressedAt: now.toISOString()
      }

      this.segments.delete(segment.id)
      folded++
    }
    return folded
  }

  relevantTo(query: string, limit: number, now: Date = new Date()): MemorySegment[] {
    return this.surface(extractTopics(query, this.taxonomy), queryTerms(query), limit, now)
  }

  /** Memories for a whole batch: its key topics plus the terms of every message. */
  relevantToBatch(messages: readonly Message[], limit: number, now: Date = new Date()): MemorySegment[] {
    const topics = extractKeyTopics(messages, MAX_BATCH_TOPICS, this.taxonomy)
    return this.surface(topics, queryTerms(messages.map(m => m.text).join(' ')), limit, now)
  }

  private surface(topics: readonly string[], terms: readonly string[], limit: number, now: Date): MemorySegment[] {
    if (limit <= 0) return []

    const live = this.getAll().filter(s => !this.isExpired(s, now))

    let scored: { segment: MemorySegment; rank: number }[]
    if (topics.length === 0 && terms.length === 0) {
      scored = live.map(segment => ({ segment, rank: this.relevanceScore(segment, now) }))
    } else {
      scored = []
      for (const segment of live) {
        const topicOverlap = topics.length === 0
          ? 0
          : topics.filter(t => segment.topics.includes(t)).length / topics.length
        const content = segment.content.toLowerCase()
        const termHits = terms.length === 0
          ? 0
          : terms.filter(t => content.includes(t)).length / terms.length
        const match = 0.5 * topicOverlap + 0.5 * termHits
        if (match > 0) {
          scored.push({ segment, rank: match * (0.5 + this.relevanceScore(segment, now)) })
        }
      }
    }

    const surfaced = scored
      .sort((a, b) => b.rank - a.rank)
      .slice(0, limit)
      .map(s => s.segment)

    for (const segment of surfaced) {
      this.reinforce(segment, now)
    }

    return surfaced.map(s => ({ ...s, topics: [...s.topics], metadata: { ...s.metadata } }))
  }

  metrics(): SegmentMetrics {
    const byTier: Record<MemoryTier, number> = { 'short-term': 0, 'medium-term': 0, 'long-term': 0, critical: 0 }
    let importanceSum = 0
    let totalAccessCount = 0

    for (const segment of this.segments.values()) {
      byTier[segment.type]++
      importanceSum += segment.importance
      totalAccessCount += segment.accessCount
    }

    return {
      total: this.segments.size,
      byTier,
      averageImportance: this.segments.size === 0 ? 0 : importanceSum / this.segments.size,
      totalAccessCount
    }
  }

  clear(): void {
    const previous = this.segments.size
    this.segments.clear()
    this._lastConsolidatedAt = null
    console.log(`[memory] Wiped ${previous} segments`)
  }

  async load(documents: DocumentStore): Promise<void> {
    const raw = await documents.readJSON(MEMORY_SEGMENTS_KEY)
    this.segments.clear()
    this._lastConsolidatedAt = null
    if (raw === null) return

    const parsed = SegmentCollectionSchema.safeParse(raw)
    if (!parsed.success) {
      console.error('[memory] Stored segments are invalid, starting empty:', parsed.error.issues[0]?.message)
      return
    }

    for (const s of parsed.data.segments) {
      this.segments.set(s.id, {
        ...s,
        created: new Date(s.created),
        lastAccessed: new Date(s.lastAccessed)
      })
    }
    this._lastConsolidatedAt = parsed.data.lastConsolidatedAt ? new Date(parsed.data.lastConsolidatedAt) : null
    console.log(`[memory] Loaded ${this.segments.size} segments`)
  }

  async save(documents: DocumentStore): Promise<void> {
    await documents.writeJSON(MEMORY_SEGMENTS_KEY, {
      lastConsolidatedAt: this._lastConsolidatedAt?.toISOString() ?? null,
      segments: this.getAll().map(s => ({
        ...s,
        created: s.created.toISOString(),
        lastAccessed: s.lastAccessed.toISOString()
      }))
    })
  }
}
