import { ConfigurationError } from '../errors.js'

const HOUR = 60 * 60 * 1000
const DAY = 24 * HOUR

export interface MemoryConfig {
  readonly maxShortTermSegments: number
  readonly maxMediumTermSegments: number
  readonly maxLongTermSegments: number

  readonly criticalImportanceThreshold: number
  readonly longTermImportanceThreshold: number
  readonly mediumTermImportanceThreshold: number

  readonly shortTermExpiry: number
  readonly mediumTermExpiry: number
  readonly longTermExpiry: number
  readonly consolidationInterval: number

  readonly enableAutoConsolidation: boolean
  readonly enableMemoryCompression: boolean

  readonly minMessageImportance: number
  readonly minMessageLength: number
  readonly priorityKeywords: readonly string[]

  readonly decayHalfLifeDays: number
  readonly promotionAccessCount: number
}

export const MEMORY_PRESET_NAMES = ['minimal', 'standard', 'comprehensive', 'token-efficient'] as const

export type MemoryPresetName = typeof MEMORY_PRESET_NAMES[number]

export type MemoryConfigOverrides = Partial<Omit<MemoryConfig, 'priorityKeywords'>> & {
  priorityKeywords?: readonly string[]
}

const DEFAULT_PRIORITY_KEYWORDS = [
  'important', 'remember', 'never forget', 'critical',
  'urgent', 'priority', 'essential', 'key', 'main',
  'preferences', 'goals', 'objectives', 'plans'
]

const STANDARD: MemoryConfig = {
  maxShortTermSegments: 100,
  maxMediumTermSegments: 50,
  maxLongTermSegments: 25,
  criticalImportanceThreshold: 0.9,
  longTermImportanceThreshold: 0.7,
  mediumTermImportanceThreshold: 0.4,
  shortTermExpiry: 24 * HOUR,
  mediumTermExpiry: 7 * DAY,
  longTermExpiry: 30 * DAY,
  consolidationInterval: 6 * HOUR,
  enableAutoConsolidation: true,
  enableMemoryCompression: true,
  minMessageImportance: 0.1,
  minMessageLength: 3,
  priorityKeywords: DEFAULT_PRIORITY_KEYWORDS,
  decayHalfLifeDays: 30,
  promotionAccessCount: 5
}

export function validateMemoryConfig(config: MemoryConfig): string[] {
  const problems: string[] = []
  const { criticalImportanceThreshold: critical, longTermImportanceThreshold: long, mediumTermImportanceThreshold: medium } = config

  for (const [name, value] of [['critical', critical], ['long-term', long], ['medium-term', medium], ['minimum', config.minMessageImportance]] as const) {
    if (!(value >= 0 && value <= 1)) {
      problems.push(`${name} importance threshold must be within [0, 1], got ${value}`)
    }
  }
  if (!(critical > long && long > medium)) {
    problems.push(`importance thresholds must be strictly descending (critical ${critical} > long-term ${long} > medium-term ${medium})`)
  }
  for (const key of ['maxShortTermSegments', 'maxMediumTermSegments', 'maxLongTermSegments', 'minMessageLength', 'promotionAccessCount'] as const) {
    if (!Number.isInteger(config[key]) || config[key] < 0) {
      problems.push(`${key} must be a non-negative integer`)
    }
  }
  for (const key of ['shortTermExpiry', 'mediumTermExpiry', 'longTermExpiry', 'consolidationInterval', 'decayHalfLifeDays'] as const) {
    if (!(config[key] > 0)) {
      problems.push(`${key} must be positive`)
    }
  }
  return problems
}

function freeze(config: MemoryConfig): MemoryConfig {
  const problems = validateMemoryConfig(config)
  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid memory config: ${problems.join('; ')}`)
  }
  return Object.freeze({ ...config, priorityKeywords: Object.freeze([...config.priorityKeywords]) })
}

/** Returns a new config; the base value is never touched. */
export function withMemoryOverrides(base: MemoryConfig, overrides: MemoryConfigOverrides): MemoryConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  )
  return freeze({ ...base, ...defined })
}

export const MEMORY_PRESETS: Readonly<Record<MemoryPresetName, MemoryConfig>> = Object.freeze({
  minimal: freeze({
    ...STANDARD,
    maxShortTermSegments: 50,
    maxMediumTermSegments: 20,
    maxLongTermSegments: 10,
    criticalImportanceThreshold: 0.95,
    longTermImportanceThreshold: 0.8,
    mediumTermImportanceThreshold: 0.5,
    enableAutoConsolidation: false,
    enableMemoryCompression: false
  }),
  standard: freeze(STANDARD),
  comprehensive: freeze({
    ...STANDARD,
    maxShortTermSegments: 200,
    maxMediumTermSegments: 100,
    maxLongTermSegments: 50,
    criticalImportanceThreshold: 0.85,
    longTermImportanceThreshold: 0.6,
    mediumTermImportanceThreshold: 0.3,
    consolidationInterval: 3 * HOUR
  }),
  'token-efficient': freeze({
    ...STANDARD,
    maxShortTermSegments: 40,
    maxMediumTermSegments: 15,
    maxLongTermSegments: 8,
    longTermImportanceThreshold: 0.75,
    mediumTermImportanceThreshold: 0.5,
    minMessageImportance: 0.3,
    minMessageLength: 20
  })
})

export function resolveMemoryConfig(preset: MemoryPresetName, overrides: MemoryConfigOverrides = {}): MemoryConfig {
  return withMemoryOverrides(MEMORY_PRESETS[preset], overrides)
}
