import type { Message } from '../conversation/types.js'
import { ConfigurationError, EmptyBatchError, MalformedResponseError, describeError } from '../errors.js'
import type { MemorySegment } from '../memory/types.js'
import { classifyProviderError, type CompletionProvider } from '../providers/llm.js'
import { fingerprint, type SummaryCache } from './cache.js'
import { formatStructuredSummary, parseSummaryResponse, type StructuredSummary } from './parse.js'
import { buildSummaryInstruction, selectVariant, type SummaryVariant } from './prompts.js'
import { MAX_RENDERED_MEMORIES, filterMessagesForSummary, renderTranscript } from './transcript.js'

export interface SummarizeRequest {
  messages: readonly Message[]
  previousSummary?: string
  relevantMemories?: readonly MemorySegment[]
}

export interface SummaryResult {
  summary: string
  structured?: StructuredSummary
  cached: boolean
  variant: SummaryVariant
}

export interface SummarizerOptions {
  provider: CompletionProvider
  cache: SummaryCache
  model: string
  companionName: string
  maxTranscriptLength: number
  structuredOutput: boolean
  timeoutMs?: number
}

export class Summarizer {
  private options: SummarizerOptions

  constructor(options: SummarizerOptions) {
    this.options = options
  }

  async summarize(request: SummarizeRequest): Promise<SummaryResult> {
    if (!this.options.provider.configured) {
      throw new ConfigurationError('Summarization needs an API key. Set OLLAMA_API_KEY or llm.apiKey in the config file')
    }

    const previousSummary = request.previousSummary?.trim() ? request.previousSummary : undefined
    const messages = filterMessagesForSummary(request.messages)

    if (messages.length === 0) {
      if (previousSummary) {
        console.log(`[summarizer] Nothing meaningful in a batch of ${request.messages.length} messages, keeping previous summary`)
        return { summary: previousSummary, cached: false, variant: 'incremental' }
      }
      throw new EmptyBatchError('No messages to summarize')
    }

    const memories = (request.relevantMemories ?? []).slice(0, MAX_RENDERED_MEMORIES)
    const variant = selectVariant(previousSummary !== undefined, memories.length > 0)
    const key = fingerprint(request.messages, memories.map(m => m.id))

    const hit = this.options.cache.get(key)
    if (hit !== null) {
      console.log('[summarizer] Using cached summary')
      return { summary: hit, cached: true, variant }
    }

    const transcript = renderTranscript(messages, {
      companionName: this.options.companionName,
      maxLength: this.options.maxTranscriptLength,
      previousSummary,
      relevantMemories: memories
    })

    const started = Date.now()
    let raw: string
    try {
      raw = await this.options.provider.complete(
        [
          { role: 'system', content: buildSummaryInstruction(variant, this.options.structuredOutput) },
          { role: 'user', content: transcript }
        ],
        { model: this.options.model, timeoutMs: this.options.timeoutMs }
      )
    } catch (e) {
      const classified = classifyProviderError(e)
      console.error(`[summarizer] ${variant} summarization failed (${classified.kind}):`, describeError(classified))
      throw classified
    }
    console.log(`[summarizer] ${variant} summarization of ${messages.length} messages took ${Date.now() - started}ms`)

    const parsed = parseSummaryResponse(raw)
    if (parsed.kind === 'malformed') {
      console.error(`[summarizer] Discarding malformed response: ${parsed.reason}`)
      throw new MalformedResponseError(`Summarizer returned a malformed response: ${parsed.reason}`)
    }

    const summary = parsed.structured ? formatStructuredSummary(parsed.structured) : parsed.summary
    this.options.cache.put(key, summary)

    return { summary, structured: parsed.structured, cached: false, variant }
  }
}
