export { CompanionSession } from './companion/session.js'
export type { CompanionSessionOptions, NoticeKind, SessionNotice, SessionStats } from './companion/session.js'

export { ConversationStore, conversationFromDocument, conversationToDocument, emptyConversation } from './conversation/store.js'
export { initialSummarizationState, loadSummarizationState, saveSummarizationState } from './conversation/state.js'
export type { ConversationContext, Message, SummarizationState } from './conversation/types.js'

export { SummarizationTrigger, evaluateTrigger } from './summarization/trigger.js'
export type { DueReason, RunReason, TriggerDecision, TriggerSignals, TriggerThresholds } from './summarization/trigger.js'
export { SummaryCache, fingerprint } from './summarization/cache.js'
export type { SummaryCacheEntry, SummaryCacheOptions } from './summarization/cache.js'
export { Summarizer } from './summarization/summarizer.js'
export type { SummarizeRequest, SummaryResult, SummarizerOptions } from './summarization/summarizer.js'
export { parseSummaryResponse, formatStructuredSummary } from './summarization/parse.js'
export type { MalformedResponse, ParsedSummary, StructuredSummary, SummaryParseResult } from './summarization/parse.js'
export { filterMessagesForSummary, renderTranscript, TRUNCATION_MARKER } from './summarization/transcript.js'
export { buildSummaryInstruction, selectVariant } from './summarization/prompts.js'
export type { SummaryVariant } from './summarization/prompts.js'

export { MemorySegmentManager } from './memory/segments.js'
export type { BatchContext, ConsolidationReport, SegmentManagerOptions } from './memory/segments.js'
export { MEMORY_PRESETS, MEMORY_PRESET_NAMES, resolveMemoryConfig, validateMemoryConfig, withMemoryOverrides } from './memory/config.js'
export type { MemoryConfig, MemoryConfigOverrides, MemoryPresetName } from './memory/config.js'
export { MEMORY_TIERS } from './memory/types.js'
export type { MemorySegment, MemoryTier, SegmentMetrics } from './memory/types.js'
export { classifyTier, scoreMessage } from './memory/scoring.js'
export { extractKeyTopics, extractTopics, loadTopicTaxonomy } from './memory/topics.js'
export type { TopicTaxonomy } from './memory/topics.js'

export { AiSdkCompletionProvider, classifyProviderError, createLLMProvider } from './providers/llm.js'
export type { CompletionMessage, CompletionOptions, CompletionProvider } from './providers/llm.js'

export { Database } from './storage/database.js'
export { SqliteDocumentStore } from './storage/documents.js'
export type { DocumentStore } from './storage/documents.js'

export { DEFAULT_CONFIG, loadConfig, resolveConfig, validateConfig } from './config.js'
export type { ConfidantConfig } from './config.js'
export * from './errors.js'
