import { readFileSync } from 'node:fs'
import { z } from 'zod'
import type { Message } from '../conversation/types.js'

export type TopicTaxonomy = Readonly<Record<string, readonly string[]>>

const TaxonomySchema = z.record(z.array(z.string().min(1)))

// src/memory and dist/memory sit at the same depth below the package root
const TAXONOMY_URL = new URL('../../data/topic-keywords.json', import.meta.url)

let defaultTaxonomy: TopicTaxonomy | null = null

export function loadTopicTaxonomy(): TopicTaxonomy {
  if (!defaultTaxonomy) {
    const raw: unknown = JSON.parse(readFileSync(TAXONOMY_URL, 'utf-8'))
    defaultTaxonomy = Object.freeze(TaxonomySchema.parse(raw))
  }
  return defaultTaxonomy
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

const patternCache = new Map<string, RegExp>()

/** Whole-word (or whole-phrase) match, so "ai" does not fire inside "said". */
export function containsKeyword(lowerText: string, keyword: string): boolean {
  let pattern = patternCache.get(keyword)
  if (!pattern) {
    pattern = new RegExp(`\\b${escapeRegExp(keyword.toLowerCase())}\\b`)
    patternCache.set(keyword, pattern)
  }
  return pattern.test(lowerText)
}

export function extractTopics(text: string, taxonomy: TopicTaxonomy = loadTopicTaxonomy()): string[] {
  const lower = text.toLowerCase()
  const topics: string[] = []

  for (const [topic, keywords] of Object.entries(taxonomy)) {
    if (keywords.some(k => containsKeyword(lower, k))) {
      topics.push(topic)
    }
  }

  return topics
}

/** Distinct topics across a batch, in first-seen order. */
export function extractKeyTopics(
  messages: readonly Message[],
  limit: number = 10,
  taxonomy: TopicTaxonomy = loadTopicTaxonomy()
): string[] {
  const all = new Set<string>()
  for (const message of messages) {
    for (const topic of extractTopics(message.text, taxonomy)) {
      all.add(topic)
    }
  }
  return [...all].slice(0, limit)
}
