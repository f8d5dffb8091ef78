import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { Summarizer } from '../summarizer.js'
import { SummaryCache } from '../cache.js'
import type { CompletionMessage, CompletionOptions, CompletionProvider } from '../../providers/llm.js'
import {
  ConfigurationError,
  EmptyBatchError,
  MalformedResponseError,
  QuotaExceededError,
  TransientProviderError
} from '../../errors.js'
import type { Message } from '../../conversation/types.js'
import type { MemorySegment } from '../../memory/types.js'

const at = new Date('2026-04-01T12:00:00Z')

function msg(text: string, isUser = true): Message {
  return { text, isUser, timestamp: at }
}

class FakeProvider implements CompletionProvider {
  configured = true
  calls: { messages: readonly CompletionMessage[]; options: CompletionOptions }[] = []
  respond: () => Promise<string> = async () => '{"summary": "User shared news about their job."}'

  async complete(messages: readonly CompletionMessage[], options: CompletionOptions): Promise<string> {
    this.calls.push({ messages, options })
    return this.respond()
  }
}

const batch = [
  msg('I finally handed in my thesis today'),
  msg('That is a huge milestone, congratulations!', false)
]

describe('Summarizer', () => {
  let provider: FakeProvider
  let cache: SummaryCache
  let summarizer: Summarizer

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
    provider = new FakeProvider()
    cache = new SummaryCache({ ttlMs: 60 * 60 * 1000, cleanupThreshold: 10 })
    summarizer = new Summarizer({
      provider,
      cache,
      model: 'summary-model',
      companionName: 'Alex',
      maxTranscriptLength: 4000,
      structuredOutput: true,
      timeoutMs: 1000
    })
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('checks configuration before anything else', async () => {
    provider.configured = false
    await expect(summarizer.summarize({ messages: [] })).rejects.toBeInstanceOf(ConfigurationError)
    expect(provider.calls).toHaveLength(0)
  })

  it('throws EmptyBatchError for an empty batch without a previous summary', async () => {
    await expect(summarizer.summarize({ messages: [] })).rejects.toBeInstanceOf(EmptyBatchError)
    expect(provider.calls).toHaveLength(0)
  })

  it('returns the previous summary for an empty batch', async () => {
    const result = await summarizer.summarize({ messages: [], previousSummary: 'Earlier summary.' })
    expect(result.summary).toBe('Earlier summary.')
    expect(provider.calls).toHaveLength(0)
  })

  it('treats a batch of only greetings as empty', async () => {
    await expect(summarizer.summarize({ messages: [msg('hi'), msg('hello!')] })).rejects.toBeInstanceOf(EmptyBatchError)
  })

  it('sends the instruction and transcript to the summarization model', async () => {
    const result = await summarizer.summarize({ messages: batch })

    expect(result).toEqual({
      summary: 'User shared news about their job.',
      structured: { summary: 'User shared news about their job.' },
      cached: false,
      variant: 'initial'
    })
    expect(provider.calls).toHaveLength(1)
    const call = provider.calls[0]
    expect(call?.options).toEqual({ model: 'summary-model', timeoutMs: 1000 })
    expect(call?.messages[0]?.role).toBe('system')
    expect(call?.messages[1]?.role).toBe('user')
    expect(call?.messages[1]?.content).toContain('User: I finally handed in my thesis today')
    expect(call?.messages[1]?.content).toContain('Alex: That is a huge milestone, congratulations!')
  })

  it('serves a repeated batch from the cache', async () => {
    await summarizer.summarize({ messages: batch })
    const second = await summarizer.summarize({ messages: batch })

    expect(second.cached).toBe(true)
    expect(second.summary).toBe('User shared news about their job.')
    expect(provider.calls).toHaveLength(1)
  })

  it('misses the cache when the relevant memories differ', async () => {
    const memory: MemorySegment = {
      id: 'mem-1',
      content: 'User is studying biology',
      type: 'long-term',
      importance: 0.8,
      created: at,
      lastAccessed: at,
      accessCount: 0,
      topics: [],
      metadata: {}
    }

    await summarizer.summarize({ messages: batch })
    const result = await summarizer.summarize({ messages: batch, relevantMemories: [memory] })

    expect(result.cached).toBe(false)
    expect(result.variant).toBe('memory-aware')
    expect(provider.calls).toHaveLength(2)
  })

  it('uses the incremental variant with a previous summary', async () => {
    const result = await summarizer.summarize({ messages: batch, previousSummary: 'User is a grad student.' })
    expect(result.variant).toBe('incremental')
    expect(provider.calls[0]?.messages[1]?.content).toContain('PREVIOUS SUMMARY:')
  })

  it('keeps plain prose responses', async () => {
    provider.respond = async () => 'User handed in their thesis.'
    const result = await summarizer.summarize({ messages: batch })
    expect(result.summary).toBe('User handed in their thesis.')
    expect(result.structured).toBeUndefined()
  })

  it('rejects malformed responses and caches nothing', async () => {
    provider.respond = async () => '{"keyTopics": ["school"]}'
    await expect(summarizer.summarize({ messages: batch })).rejects.toBeInstanceOf(MalformedResponseError)
    expect(cache.size).toBe(0)
  })

  it('passes quota errors through with their own kind', async () => {
    provider.respond = async () => { throw new QuotaExceededError(402) }
    const error = await summarizer.summarize({ messages: batch }).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(QuotaExceededError)
    expect(cache.size).toBe(0)
  })

  it('classifies unknown provider failures as transient', async () => {
    provider.respond = async () => { throw new Error('socket hang up') }
    const error = await summarizer.summarize({ messages: batch }).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(TransientProviderError)
  })
})
