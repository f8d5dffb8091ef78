export const MEMORY_TIERS = ['short-term', 'medium-term', 'long-term', 'critical'] as const

export type MemoryTier = typeof MEMORY_TIERS[number]

export interface MemorySegment {
  id: string
  content: string
  type: MemoryTier
  importance: number
  created: Date
  lastAccessed: Date
  accessCount: number
  topics: string[]
  metadata: Record<string, unknown>
}

export interface SegmentMetrics {
  total: number
  byTier: Record<MemoryTier, number>
  averageImportance: number
  totalAccessCount: number
}

export function tierRank(tier: MemoryTier): number {
  return MEMORY_TIERS.indexOf(tier)
}
