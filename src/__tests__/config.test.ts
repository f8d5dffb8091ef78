import { describe, it, expect } from 'vitest'
import { homedir } from 'node:os'
import { DEFAULT_CONFIG, deepMerge, isPlaceholderKey, resolveConfig, resolveDbPath, validateConfig } from '../config.js'

describe('deepMerge', () => {
  it('merges nested objects and replaces everything else', () => {
    const merged = deepMerge(
      { a: { b: 1, c: 2 }, list: [1, 2], name: 'x' },
      { a: { c: 3 }, list: [9], name: 'y' }
    )
    expect(merged).toEqual({ a: { b: 1, c: 3 }, list: [9], name: 'y' })
  })
})

describe('resolveConfig', () => {
  it('falls back to the defaults', () => {
    expect(resolveConfig({}, {})).toEqual(DEFAULT_CONFIG)
  })

  it('layers the file over the defaults', () => {
    const config = resolveConfig({ conversation: { companionName: 'Robin' }, summarization: { updateThreshold: 40 } }, {})
    expect(config.conversation.companionName).toBe('Robin')
    expect(config.conversation.maxMessagesForContext).toBe(50)
    expect(config.summarization.updateThreshold).toBe(40)
    expect(config.summarization.initialThreshold).toBe(10)
  })

  it('takes the API key from the environment when the file has none', () => {
    expect(resolveConfig({}, { OLLAMA_API_KEY: 'test-secret' }).llm.apiKey).toBe('test-secret')
    expect(resolveConfig({ llm: { provider: 'openai' } }, { OPENAI_API_KEY: 'test-secret', OLLAMA_API_KEY: 'other' }).llm.apiKey)
      .toBe('test-secret')
    expect(resolveConfig({ llm: { apiKey: 'file-secret' } }, { OLLAMA_API_KEY: 'test-secret' }).llm.apiKey).toBe('file-secret')
  })

  it('lets the environment pick the models', () => {
    const config = resolveConfig({}, { CONFIDANT_MODEL: 'chat-x', CONFIDANT_SUMMARY_MODEL: 'summary-x' })
    expect(config.llm.chatModel).toBe('chat-x')
    expect(config.llm.summarizationModel).toBe('summary-x')
  })

  it('rejects invalid values', () => {
    expect(() => resolveConfig({ summarization: { maxTranscriptLength: 10 } }, {})).toThrow()
    expect(() => resolveConfig({ memory: { preset: 'huge' } }, {})).toThrow()
  })
})

describe('validateConfig', () => {
  it('flags a missing or placeholder key', () => {
    const problems = validateConfig(resolveConfig({ llm: { apiKey: 'your-ollama-api-key-here' } }, {}))
    expect(problems.map(p => p.field)).toEqual(['llm.apiKey'])
    expect(problems[0]?.message).toContain('OLLAMA_API_KEY')
  })

  it('flags an update threshold below the initial one', () => {
    const config = resolveConfig({ llm: { apiKey: 'test-secret' }, summarization: { initialThreshold: 20, updateThreshold: 5 } }, {})
    expect(validateConfig(config).map(p => p.field)).toEqual(['summarization.updateThreshold'])
  })

  it('accepts a complete configuration', () => {
    expect(validateConfig(resolveConfig({ llm: { apiKey: 'test-secret' } }, {}))).toEqual([])
  })
})

describe('isPlaceholderKey', () => {
  it('treats blank and template keys as missing', () => {
    expect(isPlaceholderKey(undefined)).toBe(true)
    expect(isPlaceholderKey('  ')).toBe(true)
    expect(isPlaceholderKey('changeme')).toBe(true)
    expect(isPlaceholderKey('test-secret')).toBe(false)
  })
})

describe('resolveDbPath', () => {
  it('expands the home directory', () => {
    expect(resolveDbPath(DEFAULT_CONFIG)).toBe(`${homedir()}/.confidant/confidant.db`)
  })
})
