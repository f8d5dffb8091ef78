import { createOpenAI } from '@ai-sdk/openai'
import { APICallError, RetryError, generateText, type LanguageModel, type ModelMessage } from 'ai'
import type { ConfidantConfig, ProviderName } from '../config.js'
import { isPlaceholderKey } from '../config.js'
import {
  ConfigurationError,
  MalformedResponseError,
  QuotaExceededError,
  TransientProviderError,
  describeError,
  isConfidantError,
  type ConfidantError
} from '../errors.js'

export type LLMConfig = ConfidantConfig['llm']
export type ModelFactory = (modelId: string) => LanguageModel

const DEFAULT_BASE_URLS: Record<ProviderName, string> = {
  ollama: 'https://ollama.com/v1',
  openai: 'https://api.openai.com/v1',
  openrouter: 'https://openrouter.ai/api/v1',
  cerebras: 'https://api.cerebras.ai/v1'
}

export function createLLMProvider(config: LLMConfig): ModelFactory {
  const openai = createOpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseUrl || DEFAULT_BASE_URLS[config.provider],
    name: config.provider
  })

  // Use chat() for OpenAI-compatible providers (Cerebras, Ollama, OpenRouter)
  // The default provider() call uses the Responses API which only OpenAI supports
  return (modelId: string) => openai.chat(modelId)
}

export interface CompletionMessage {
  role: 'system' | 'user' | 'assistant'
  content: string
}

export interface CompletionOptions {
  model: string
  timeoutMs?: number
  maxOutputTokens?: number
}

export interface CompletionProvider {
  /** False when no usable API key is configured. */
  readonly configured: boolean
  complete(messages: readonly CompletionMessage[], options: CompletionOptions): Promise<string>
}

/**
 * Maps whatever the SDK threw onto the error taxonomy. 402 and 429 mean the
 * account is out of quota; everything else is worth another try later.
 */
export function classifyProviderError(error: unknown): ConfidantError {
  if (isConfidantError(error)) return error

  const cause = RetryError.isInstance(error) ? error.lastError : error

  if (APICallError.isInstance(cause)) {
    const status = cause.statusCode
    if (status === 402 || status === 429) {
      return new QuotaExceededError(status, { cause })
    }
    const suffix = status === undefined ? '' : ` with status ${status}`
    return new TransientProviderError(`Provider request failed${suffix}: ${cause.message}`, { cause, statusCode: status })
  }

  if (cause instanceof Error && (cause.name === 'AbortError' || cause.name === 'TimeoutError')) {
    return new TransientProviderError('Provider request timed out', { cause })
  }

  return new TransientProviderError(`Provider request failed: ${describeError(cause)}`, { cause })
}

function toModelMessage(message: CompletionMessage): ModelMessage {
  switch (message.role) {
    case 'system': return { role: 'system', content: message.content }
    case 'user': return { role: 'user', content: message.content }
    case 'assistant': return { role: 'assistant', content: message.content }
  }
}

export class AiSdkCompletionProvider implements CompletionProvider {
  private config: LLMConfig
  private modelFactory: ModelFactory

  constructor(config: LLMConfig, modelFactory?: ModelFactory) {
    this.config = config
    this.modelFactory = modelFactory ?? createLLMProvider(config)
  }

  get configured(): boolean {
    return !isPlaceholderKey(this.config.apiKey)
  }

  async complete(messages: readonly CompletionMessage[], options: CompletionOptions): Promise<string> {
    if (!this.configured) {
      throw new ConfigurationError(`No API key configured for ${this.config.provider}`)
    }

    let text: string
    try {
      const result = await generateText({
        model: this.modelFactory(options.model),
        messages: messages.map(toModelMessage),
        maxOutputTokens: options.maxOutputTokens,
        maxRetries: 0,
        abortSignal: AbortSignal.timeout(options.timeoutMs ?? this.config.requestTimeoutMs)
      })
      text = result.text
    } catch (e) {
      throw classifyProviderError(e)
    }

    if (text.trim().length === 0) {
      throw new MalformedResponseError(`Model ${options.model} returned an empty completion`)
    }
    return text
  }
}
