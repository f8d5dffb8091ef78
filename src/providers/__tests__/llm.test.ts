import { describe, it, expect } from 'vitest'
import { APICallError, RetryError } from 'ai'
import { MockLanguageModelV2 } from 'ai/test'
import { AiSdkCompletionProvider, classifyProviderError, createLLMProvider, type LLMConfig } from '../llm.js'
import { DEFAULT_CONFIG } from '../../config.js'
import {
  ConfigurationError,
  MalformedResponseError,
  QuotaExceededError,
  TransientProviderError
} from '../../errors.js'

const llm: LLMConfig = { ...DEFAULT_CONFIG.llm, apiKey: 'test-secret' }

function apiError(statusCode: number): APICallError {
  return new APICallError({
    message: `status ${statusCode}`,
    url: 'https://example.test/v1/chat/completions',
    requestBodyValues: {},
    statusCode
  })
}

function replying(text: string): MockLanguageModelV2 {
  return new MockLanguageModelV2({
    doGenerate: async () => ({
      content: [{ type: 'text', text }],
      finishReason: 'stop',
      usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 },
      warnings: []
    })
  })
}

describe('createLLMProvider', () => {
  it.each(['ollama', 'openai', 'openrouter', 'cerebras'] as const)('builds chat models for %s', (provider) => {
    const factory = createLLMProvider({ ...llm, provider, baseUrl: undefined })
    const model = factory('some-model')

    expect(typeof model).not.toBe('string')
    if (typeof model !== 'string') {
      expect(model.modelId).toBe('some-model')
      expect(model.provider).toBe(`${provider}.chat`)
    }
  })
})

describe('classifyProviderError', () => {
  it('maps 402 and 429 to quota errors', () => {
    const payment = classifyProviderError(apiError(402))
    const rate = classifyProviderError(apiError(429))

    expect(payment).toBeInstanceOf(QuotaExceededError)
    expect(rate).toBeInstanceOf(QuotaExceededError)
    expect(rate.message).toBe('Hourly usage limit reached')
  })

  it('maps other HTTP failures to transient errors with the status', () => {
    const error = classifyProviderError(apiError(503))
    expect(error).toBeInstanceOf(TransientProviderError)
    if (error instanceof TransientProviderError) {
      expect(error.statusCode).toBe(503)
      expect(error.retryable).toBe(true)
    }
  })

  it('unwraps the last error of a retry error', () => {
    const retry = new RetryError({
      message: 'Failed after 3 attempts',
      reason: 'maxRetriesExceeded',
      errors: [apiError(500), apiError(429)]
    })
    expect(classifyProviderError(retry)).toBeInstanceOf(QuotaExceededError)
  })

  it('reports timeouts as transient', () => {
    const timeout = Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' })
    const error = classifyProviderError(timeout)
    expect(error).toBeInstanceOf(TransientProviderError)
    expect(error.message).toBe('Provider request timed out')
  })

  it('passes already classified errors through', () => {
    const original = new ConfigurationError('no key')
    expect(classifyProviderError(original)).toBe(original)
  })

  it('treats anything else as transient', () => {
    expect(classifyProviderError('socket hang up').message).toBe('Provider request failed: socket hang up')
  })
})

describe('AiSdkCompletionProvider', () => {
  it('returns the generated text for the requested model', async () => {
    const model = replying('Hello there!')
    const requested: string[] = []
    const provider = new AiSdkCompletionProvider(llm, (id) => {
      requested.push(id)
      return model
    })

    const text = await provider.complete(
      [{ role: 'system', content: 'Be brief.' }, { role: 'user', content: 'Hi' }],
      { model: 'chat-model', timeoutMs: 1000 }
    )

    expect(text).toBe('Hello there!')
    expect(requested).toEqual(['chat-model'])
    expect(model.doGenerateCalls).toHaveLength(1)
    expect(model.doGenerateCalls[0]?.prompt[0]).toEqual({ role: 'system', content: 'Be brief.' })
  })

  it('rejects an empty completion as malformed', async () => {
    const provider = new AiSdkCompletionProvider(llm, () => replying('  '))
    await expect(provider.complete([{ role: 'user', content: 'Hi' }], { model: 'chat-model' }))
      .rejects.toBeInstanceOf(MalformedResponseError)
  })

  it('classifies provider failures', async () => {
    const failing = new MockLanguageModelV2({
      doGenerate: async () => { throw apiError(429) }
    })
    const provider = new AiSdkCompletionProvider(llm, () => failing)
    await expect(provider.complete([{ role: 'user', content: 'Hi' }], { model: 'chat-model' }))
      .rejects.toBeInstanceOf(QuotaExceededError)
  })

  it('refuses to call the model without a usable key', async () => {
    const model = replying('unused')
    const provider = new AiSdkCompletionProvider({ ...llm, apiKey: 'your-api-key-here' }, () => model)

    expect(provider.configured).toBe(false)
    await expect(provider.complete([{ role: 'user', content: 'Hi' }], { model: 'chat-model' }))
      .rejects.toBeInstanceOf(ConfigurationError)
    expect(model.doGenerateCalls).toHaveLength(0)
  })
})
