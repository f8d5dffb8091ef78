import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'node:fs'
import { homedir } from 'node:os'
import path from 'node:path'
import { z } from 'zod'
import { MEMORY_PRESET_NAMES } from './memory/config.js'

const ProviderSchema = z.enum(['ollama', 'openai', 'openrouter', 'cerebras'])

const MemoryOverridesSchema = z.object({
  maxShortTermSegments: z.number().int().nonnegative(),
  maxMediumTermSegments: z.number().int().nonnegative(),
  maxLongTermSegments: z.number().int().nonnegative(),
  criticalImportanceThreshold: z.number().min(0).max(1),
  longTermImportanceThreshold: z.number().min(0).max(1),
  mediumTermImportanceThreshold: z.number().min(0).max(1),
  shortTermExpiry: z.number().positive(),
  mediumTermExpiry: z.number().positive(),
  longTermExpiry: z.number().positive(),
  consolidationInterval: z.number().positive(),
  enableAutoConsolidation: z.boolean(),
  enableMemoryCompression: z.boolean(),
  minMessageImportance: z.number().min(0).max(1),
  minMessageLength: z.number().int().nonnegative(),
  priorityKeywords: z.array(z.string()),
  decayHalfLifeDays: z.number().positive(),
  promotionAccessCount: z.number().int().nonnegative()
}).partial()

export const ConfidantConfigSchema = z.object({
  llm: z.object({
    provider: ProviderSchema,
    apiKey: z.string().optional(),
    baseUrl: z.string().optional(),
    chatModel: z.string().min(1),
    summarizationModel: z.string().min(1),
    requestTimeoutMs: z.number().int().positive()
  }),
  summarization: z.object({
    initialThreshold: z.number().int().positive(),
    updateThreshold: z.number().int().positive(),
    intervalMinutes: z.number().positive(),
    minMessagesForInterval: z.number().int().nonnegative(),
    debounceMs: z.number().int().nonnegative(),
    maxTranscriptLength: z.number().int().min(200),
    maxRelevantMemories: z.number().int().nonnegative(),
    cacheTtlMinutes: z.number().positive(),
    cacheCleanupThreshold: z.number().int().nonnegative(),
    structuredOutput: z.boolean()
  }),
  memory: z.object({
    enabled: z.boolean(),
    preset: z.enum(MEMORY_PRESET_NAMES),
    overrides: MemoryOverridesSchema
  }),
  conversation: z.object({
    companionName: z.string().min(1),
    maxMessagesForContext: z.number().int().positive()
  }),
  storage: z.object({
    dbPath: z.string().min(1)
  })
})

export type ConfidantConfig = z.infer<typeof ConfidantConfigSchema>
export type ProviderName = z.infer<typeof ProviderSchema>

export const DEFAULT_CONFIG: ConfidantConfig = {
  llm: {
    provider: 'ollama',
    baseUrl: 'https://ollama.com/v1',
    chatModel: 'gpt-oss:120b-cloud',
    summarizationModel: 'deepseek-v3.1:671b',
    requestTimeoutMs: 60_000
  },
  summarization: {
    initialThreshold: 10,
    updateThreshold: 25,
    intervalMinutes: 30,
    minMessagesForInterval: 10,
    debounceMs: 5_000,
    maxTranscriptLength: 4000,
    maxRelevantMemories: 5,
    cacheTtlMinutes: 60,
    cacheCleanupThreshold: 10,
    structuredOutput: true
  },
  memory: {
    enabled: true,
    preset: 'standard',
    overrides: {}
  },
  conversation: {
    companionName: 'Alex',
    maxMessagesForContext: 50
  },
  storage: {
    dbPath: '~/.confidant/confidant.db'
  }
}

const CONFIG_DIR = path.join(homedir(), '.confidant')
const CONFIG_PATH = path.join(CONFIG_DIR, 'config.json')

const PLACEHOLDER_KEYS = ['your-ollama-api-key-here', 'your-api-key-here', 'changeme']

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target }
  for (const key of Object.keys(source)) {
    const value = source[key]
    if (isRecord(value)) {
      const existing = target[key]
      result[key] = deepMerge(isRecord(existing) ? existing : {}, value)
    } else {
      result[key] = value
    }
  }
  return result
}

function readConfigFile(): Record<string, unknown> {
  if (!existsSync(CONFIG_PATH)) return {}
  try {
    const parsed: unknown = JSON.parse(readFileSync(CONFIG_PATH, 'utf-8'))
    return isRecord(parsed) ? parsed : {}
  } catch (e) {
    console.error('Failed to load config:', e)
    return {}
  }
}

/**
 * Merges file config over the defaults, applies environment overrides and
 * validates the result. Throws a ZodError describing every bad field.
 */
export function resolveConfig(fileConfig: Record<string, unknown>, env: NodeJS.ProcessEnv = process.env): ConfidantConfig {
  const merged = ConfidantConfigSchema.parse(deepMerge(DEFAULT_CONFIG, fileConfig))

  if (!merged.llm.apiKey) {
    const fromEnv = merged.llm.provider === 'openai'
      ? env.OPENAI_API_KEY
      : env.OLLAMA_API_KEY ?? env.OPENAI_API_KEY
    if (fromEnv) merged.llm.apiKey = fromEnv
  }
  if (env.CONFIDANT_MODEL) {
    merged.llm.chatModel = env.CONFIDANT_MODEL
  }
  if (env.CONFIDANT_SUMMARY_MODEL) {
    merged.llm.summarizationModel = env.CONFIDANT_SUMMARY_MODEL
  }

  return merged
}

export function loadConfig(): ConfidantConfig {
  return resolveConfig(readConfigFile())
}

export function saveConfig(config: Record<string, unknown>): void {
  mkdirSync(CONFIG_DIR, { recursive: true })
  const merged = deepMerge(readConfigFile(), config)
  writeFileSync(CONFIG_PATH, JSON.stringify(merged, null, 2))
}

export function isPlaceholderKey(apiKey: string | undefined): boolean {
  if (!apiKey || apiKey.trim() === '') return true
  return PLACEHOLDER_KEYS.some(p => apiKey.includes(p))
}

export interface ConfigProblem {
  field: string
  message: string
}

export function validateConfig(config: ConfidantConfig): ConfigProblem[] {
  const problems: ConfigProblem[] = []

  if (isPlaceholderKey(config.llm.apiKey)) {
    const envVar = config.llm.provider === 'openai' ? 'OPENAI_API_KEY' : 'OLLAMA_API_KEY'
    problems.push({
      field: 'llm.apiKey',
      message: `No API key configured for ${config.llm.provider}. Set ${envVar} or run: confidant config set llm.apiKey <key>`
    })
  }

  if (config.summarization.updateThreshold < config.summarization.initialThreshold) {
    problems.push({
      field: 'summarization.updateThreshold',
      message: 'summarization.updateThreshold should not be lower than summarization.initialThreshold'
    })
  }

  return problems
}

export function resolveDbPath(config: ConfidantConfig): string {
  return config.storage.dbPath.replace(/^~/, homedir())
}
