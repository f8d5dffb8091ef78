import { describe, it, expect } from 'vitest'
import { classifyTier, qualifiesForSegment, scoreMessage } from '../scoring.js'
import { MEMORY_PRESETS } from '../config.js'
import type { Message } from '../../conversation/types.js'

const config = MEMORY_PRESETS.standard
const now = new Date('2026-06-10T09:00:00Z')
const twoDaysAgo = new Date(now.getTime() - 2 * 24 * 60 * 60 * 1000)

function msg(text: string, isUser: boolean, timestamp: Date = now): Message {
  return { text, isUser, timestamp }
}

describe('scoreMessage', () => {
  it('gives a short assistant message the base plus recency', () => {
    expect(scoreMessage(msg('ok then', false), config, now)).toBe(0.25)
  })

  it('rewards personal information from the user', () => {
    // base 0.2 + personal 0.2 + user 0.1 + recent 0.05
    expect(scoreMessage(msg('My name is Sam and I live in Porto.', true), config, now)).toBe(0.55)
  })

  it('caps priority keyword hits', () => {
    // four keywords, capped at 0.3
    expect(scoreMessage(msg('Remember this, it is important and urgent and critical', false, twoDaysAgo), config, now)).toBe(0.5)
  })

  it('caps question marks', () => {
    expect(scoreMessage(msg('Why? How? What? When? Really?', false, twoDaysAgo), config, now)).toBe(0.35)
  })

  it('adds length bonuses by word count', () => {
    const elevenWords = 'one two three four five six seven eight nine ten eleven'
    expect(scoreMessage(msg(elevenWords, false, twoDaysAgo), config, now)).toBe(0.3)
  })

  it('adds the emotional bonus for whole words only', () => {
    expect(scoreMessage(msg('I feel sad today', false, twoDaysAgo), config, now)).toBe(0.3)
    expect(scoreMessage(msg('Saddle up today', false, twoDaysAgo), config, now)).toBe(0.2)
  })

  it('clamps to 1', () => {
    const text = 'My name is Sam. This is important, remember it! I am so happy!! Why? How? What? ' + 'word '.repeat(100)
    expect(scoreMessage(msg(text, true), config, now)).toBe(1)
  })

  it('is deterministic', () => {
    const message = msg('I want to run a marathon next year, it is my main goal!', true)
    expect(scoreMessage(message, config, now)).toBe(scoreMessage(message, config, now))
  })
})

describe('classifyTier', () => {
  it('buckets by the configured thresholds', () => {
    expect(classifyTier(0.95, config)).toBe('critical')
    expect(classifyTier(0.9, config)).toBe('critical')
    expect(classifyTier(0.7, config)).toBe('long-term')
    expect(classifyTier(0.4, config)).toBe('medium-term')
    expect(classifyTier(0.39, config)).toBe('short-term')
  })
})

describe('qualifiesForSegment', () => {
  it('requires minimum length and importance', () => {
    expect(qualifiesForSegment(msg('ab', true), 0.5, config)).toBe(false)
    expect(qualifiesForSegment(msg('abc', true), 0.05, config)).toBe(false)
    expect(qualifiesForSegment(msg('abc', true), 0.1, config)).toBe(true)
  })

  it('uses the stricter token-efficient limits', () => {
    const strict = MEMORY_PRESETS['token-efficient']
    expect(qualifiesForSegment(msg('short but important', true), 0.9, strict)).toBe(false)
    expect(qualifiesForSegment(msg('this one is long enough to keep', true), 0.29, strict)).toBe(false)
    expect(qualifiesForSegment(msg('this one is long enough to keep', true), 0.3, strict)).toBe(true)
  })
})
