import { EventEmitter } from 'node:events'
import type { ConfidantConfig } from '../config.js'
import { loadSummarizationState, initialSummarizationState, saveSummarizationState } from '../conversation/state.js'
import { ConversationStore } from '../conversation/store.js'
import type { SummarizationState } from '../conversation/types.js'
import { EmptyBatchError, QuotaExceededError, describeError } from '../errors.js'
import { resolveMemoryConfig, type MemoryConfig } from '../memory/config.js'
import { assembleContext } from '../memory/context.js'
import { MemorySegmentManager } from '../memory/segments.js'
import type { MemorySegment, SegmentMetrics } from '../memory/types.js'
import { classifyProviderError, type CompletionMessage, type CompletionProvider } from '../providers/llm.js'
import type { DocumentStore } from '../storage/documents.js'
import { CONVERSATION_KEY, MEMORY_SEGMENTS_KEY, SUMMARIZATION_STATE_KEY } from '../storage/documents.js'
import { SummaryCache } from '../summarization/cache.js'
import { Summarizer } from '../summarization/summarizer.js'
import { MAX_RENDERED_MEMORIES } from '../summarization/transcript.js'
import { SummarizationTrigger, type RunReason, type TriggerSignals } from '../summarization/trigger.js'

export type NoticeKind = 'summary-failed' | 'limit-reached' | 'persist-failed'

export interface SessionNotice {
  kind: NoticeKind
  message: string
  error: unknown
}

export interface SessionStats {
  messages: number
  unsummarized: number
  summaryLength: number
  lastSummarizedAt: Date | null
  cachedSummaries: number
  memory: SegmentMetrics | null
}

export interface CompanionSessionOptions {
  config: ConfidantConfig
  documents: DocumentStore
  provider: CompletionProvider
  memoryConfig?: MemoryConfig
}

/**
 * One companion conversation: chat turns, background summarization and the
 * memory tiers, kept in memory and mirrored to the document store.
 *
 * Emits `notice` (SessionNotice) for failures that must not interrupt chat.
 */
export class CompanionSession extends EventEmitter {
  readonly conversation: ConversationStore = new ConversationStore()
  readonly summarizer: Summarizer
  readonly memory: MemorySegmentManager | null

  private config: ConfidantConfig
  private documents: DocumentStore
  private provider: CompletionProvider
  private cache: SummaryCache
  private trigger: SummarizationTrigger
  private state: SummarizationState = initialSummarizationState()
  private epoch = 0
  private pendingWrites: Set<Promise<void>> = new Set()
  private consolidationTimer: ReturnType<typeof setInterval> | null = null

  constructor(options: CompanionSessionOptions) {
    super()
    this.config = options.config
    this.documents = options.documents
    this.provider = options.provider

    const summarization = options.config.summarization
    this.cache = new SummaryCache({
      ttlMs: summarization.cacheTtlMinutes * 60 * 1000,
      cleanupThreshold: summarization.cacheCleanupThreshold
    })
    this.summarizer = new Summarizer({
      provider: options.provider,
      cache: this.cache,
      model: options.config.llm.summarizationModel,
      companionName: options.config.conversation.companionName,
      maxTranscriptLength: summarization.maxTranscriptLength,
      structuredOutput: summarization.structuredOutput,
      timeoutMs: options.config.llm.requestTimeoutMs
    })

    this.memory = options.config.memory.enabled
      ? new MemorySegmentManager({
          config: options.memoryConfig ?? resolveMemoryConfig(options.config.memory.preset, options.config.memory.overrides)
        })
      : null

    this.trigger = new SummarizationTrigger({
      initialThreshold: summarization.initialThreshold,
      updateThreshold: summarization.updateThreshold,
      intervalMs: summarization.intervalMinutes * 60 * 1000,
      minMessagesForInterval: summarization.minMessagesForInterval,
      debounceMs: summarization.debounceMs,
      readSignals: () => this.signals(),
      run: (reason) => this.performSummarization(reason)
    })

    this.trigger.on('failed', (error: unknown) => {
      if (error instanceof QuotaExceededError) {
        this.emitNotice({ kind: 'limit-reached', message: error.message, error })
      } else {
        this.emitNotice({ kind: 'summary-failed', message: `Summarization failed: ${describeError(error)}`, error })
      }
    })
  }

  onNotice(listener: (notice: SessionNotice) => void): () => void {
    this.on('notice', listener)
    return () => { this.off('notice', listener) }
  }

  get summarizationState(): Readonly<SummarizationState> {
    return { ...this.state }
  }

  get summarizing(): boolean {
    return this.trigger.running
  }

  async open(): Promise<void> {
    await this.conversation.load(this.documents)
    const state = await loadSummarizationState(this.documents)
    this.state = {
      lastSummarizedCount: Math.min(state.lastSummarizedCount, this.conversation.messageCount),
      lastSummarizedAt: state.lastSummarizedAt
    }
    if (this.memory) {
      await this.memory.load(this.documents)
    }
  }

  start(): void {
    this.trigger.start()

    const memory = this.memory
    if (memory && memory.memoryConfig.enableAutoConsolidation && !this.consolidationTimer) {
      this.consolidationTimer = setInterval(() => {
        if (memory.maybeConsolidate()) {
          void this.persistSegments()
        }
      }, memory.memoryConfig.consolidationInterval)
    }
  }

  /**
   * Sends one user turn and returns the reply. Provider failures reject with
   * a classified error; the user message stays in the log either way.
   */
  async send(text: string): Promise<string> {
    const previous = this.conversation.recent(1)[0]
    const message = this.conversation.append(text, true)
    void this.persistConversation()

    const memories = this.memory
      ? this.memory.relevantTo(text, this.config.summarization.maxRelevantMemories)
      : []

    const system = assembleContext({
      companionName: this.config.conversation.companionName,
      summary: this.conversation.summary,
      memories,
      timeSinceLastMessage: previous ? message.timestamp.getTime() - previous.timestamp.getTime() : undefined
    })

    const history: CompletionMessage[] = this.conversation
      .recent(this.config.conversation.maxMessagesForContext)
      .map((m): CompletionMessage => ({ role: m.isUser ? 'user' : 'assistant', content: m.text }))

    let reply: string
    try {
      reply = await this.provider.complete(
        [{ role: 'system', content: system }, ...history],
        { model: this.config.llm.chatModel, timeoutMs: this.config.llm.requestTimeoutMs }
      )
    } catch (e) {
      const classified = classifyProviderError(e)
      console.error(`[session] Chat completion failed (${classified.kind}):`, describeError(classified))
      throw classified
    }

    this.conversation.append(reply, false)
    void this.persistConversation()
    this.trigger.notify()
    return reply
  }

  /** Runs a summarization now, or joins the one in flight. Resolves true on success. */
  summarizeNow(): Promise<boolean> {
    return this.trigger.runNow('manual')
  }

  searchMemories(query: string, limit: number = this.config.summarization.maxRelevantMemories): MemorySegment[] {
    return this.memory ? this.memory.relevantTo(query, limit) : []
  }

  async consolidateMemories(): Promise<boolean> {
    if (!this.memory) return false
    this.memory.consolidate()
    await this.persistSegments()
    return true
  }

  stats(): SessionStats {
    const signals = this.signals()
    return {
      messages: signals.totalMessages,
      unsummarized: signals.unsummarizedCount,
      summaryLength: this.conversation.summary.length,
      lastSummarizedAt: this.state.lastSummarizedAt,
      cachedSummaries: this.cache.size,
      memory: this.memory ? this.memory.metrics() : null
    }
  }

  async clear(): Promise<void> {
    this.epoch++
    this.conversation.clear()
    this.state = initialSummarizationState()
    this.cache.clear()
    this.memory?.clear()
    await Promise.all(
      [CONVERSATION_KEY, SUMMARIZATION_STATE_KEY, MEMORY_SEGMENTS_KEY].map(key =>
        this.track(`document ${key}`, () => this.documents.remove(key))
      )
    )
  }

  async close(): Promise<void> {
    await this.trigger.finalize()
    if (this.consolidationTimer) {
      clearInterval(this.consolidationTimer)
      this.consolidationTimer = null
    }
    await this.persistSegments()
    await Promise.all(this.pendingWrites)
    console.log('[session] Closed')
  }

  private signals(): TriggerSignals {
    const total = this.conversation.messageCount
    return {
      hasSummary: this.conversation.summary.trim().length > 0,
      totalMessages: total,
      unsummarizedCount: total - Math.min(this.state.lastSummarizedCount, total),
      lastSummarizedAt: this.state.lastSummarizedAt
    }
  }

  private async performSummarization(reason: RunReason): Promise<void> {
    const epoch = this.epoch
    const end = this.conversation.messageCount
    const start = Math.min(this.state.lastSummarizedCount, end)
    const batch = this.conversation.range(start, end)
    if (batch.length === 0) return

    const previousSummary = this.conversation.summary
    // the summarizer renders at most MAX_RENDERED_MEMORIES; reinforce only those
    const memoryLimit = Math.min(this.config.summarization.maxRelevantMemories, MAX_RENDERED_MEMORIES)
    const relevantMemories = this.memory ? this.memory.relevantToBatch(batch, memoryLimit) : []

    let summary: string | null
    try {
      const result = await this.summarizer.summarize({ messages: batch, previousSummary, relevantMemories })
      summary = result.summary
    } catch (e) {
      if (!(e instanceof EmptyBatchError)) throw e
      console.log(`[session] Messages ${start}..${end} had nothing worth summarizing`)
      summary = null
    }

    if (epoch !== this.epoch) {
      console.log('[session] Conversation was cleared during summarization, discarding result')
      return
    }

    if (summary !== null) {
      this.conversation.replaceSummary(summary)
    }
    this.state = { lastSummarizedCount: end, lastSummarizedAt: new Date() }
    console.log(`[session] Summarized messages ${start}..${end} (${reason})`)

    if (this.memory) {
      this.memory.processBatch(batch, { source: `summarization:${reason}` })
      this.memory.maybeConsolidate()
    }

    await Promise.all([this.persistConversation(), this.persistState(), this.persistSegments()])
  }

  private persistConversation(): Promise<void> {
    return this.track('conversation', () => this.conversation.save(this.documents))
  }

  private persistState(): Promise<void> {
    return this.track('summarization state', () => saveSummarizationState(this.documents, this.state))
  }

  private persistSegments(): Promise<void> {
    const memory = this.memory
    if (!memory) return Promise.resolve()
    return this.track('memory segments', () => memory.save(this.documents))
  }

  /** Never rejects; failures become persist-failed notices. */
  private track(label: string, write: () => Promise<void>): Promise<void> {
    const task: Promise<void> = write()
      .catch((e: unknown) => {
        console.error(`[session] Failed to persist ${label}:`, describeError(e))
        this.emitNotice({ kind: 'persist-failed', message: `Could not save ${label}: ${describeError(e)}`, error: e })
      })
      .finally(() => {
        this.pendingWrites.delete(task)
      })
    this.pendingWrites.add(task)
    return task
  }

  private emitNotice(notice: SessionNotice): void {
    this.emit('notice', notice)
  }
}
