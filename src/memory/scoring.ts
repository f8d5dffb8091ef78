import type { Message } from '../conversation/types.js'
import type { MemoryConfig } from './config.js'
import type { MemoryTier } from './types.js'
import { containsKeyword } from './topics.js'

const RECENT_WINDOW_MS = 24 * 60 * 60 * 1000

const PERSONAL_INFO_PATTERNS: RegExp[] = [
  /\bmy name(?:'s| is)\b/i,
  /\bcall me\b/i,
  /\bi live (?:in|at|near)\b/i,
  /\bi(?:'m| am) from\b/i,
  /\bmy (?:birthday|wife|husband|partner|son|daughter|mom|dad|mother|father|job|address|email|phone)\b/i,
  /\bi work (?:at|as|for|on)\b/i,
  /\bi(?:'m| am) allergic\b/i,
  /\bi was born\b/i,
]

const EMOTIONAL_KEYWORDS = [
  'happy', 'sad', 'angry', 'excited', 'worried', 'frustrated', 'anxious',
  'scared', 'afraid', 'lonely', 'stressed', 'upset', 'grateful', 'proud',
  'love', 'hate', 'miss', 'hurt'
]

function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value))
}

/**
 * Heuristic importance in [0, 1]. Pure: the same message, config and
 * reference time always give the same score.
 */
export function scoreMessage(message: Message, config: MemoryConfig, now: Date = new Date()): number {
  const text = message.text
  const lower = text.toLowerCase()
  let score = 0.2 // base

  // Length bonus
  const words = text.trim().split(/\s+/).filter(w => w.length > 0).length
  if (words > 10) score += 0.1
  if (words > 50) score += 0.1
  if (words > 100) score += 0.1

  // Questions indicate engagement
  const questionCount = (text.match(/\?/g) || []).length
  score += Math.min(questionCount * 0.05, 0.15)

  const exclamationCount = (text.match(/!/g) || []).length
  score += Math.min(exclamationCount * 0.03, 0.09)

  const priorityHits = config.priorityKeywords.filter(k => containsKeyword(lower, k)).length
  score += Math.min(priorityHits * 0.15, 0.3)

  if (PERSONAL_INFO_PATTERNS.some(p => p.test(text))) score += 0.2

  if (EMOTIONAL_KEYWORDS.some(k => containsKeyword(lower, k))) score += 0.1

  // Sender weight
  if (message.isUser) score += 0.1

  if (now.getTime() - message.timestamp.getTime() < RECENT_WINDOW_MS) score += 0.05

  // Three decimals
  return clamp01(Math.round(score * 1000) / 1000)
}

export function classifyTier(importance: number, config: MemoryConfig): MemoryTier {
  if (importance >= config.criticalImportanceThreshold) return 'critical'
  if (importance >= config.longTermImportanceThreshold) return 'long-term'
  if (importance >= config.mediumTermImportanceThreshold) return 'medium-term'
  return 'short-term'
}

export function qualifiesForSegment(message: Message, importance: number, config: MemoryConfig): boolean {
  return message.text.trim().length >= config.minMessageLength && importance >= config.minMessageImportance
}
