import { mkdirSync } from 'node:fs'
import path from 'node:path'
import { CompanionSession } from '../companion/session.js'
import { loadConfig, resolveDbPath, saveConfig, validateConfig, type ConfidantConfig } from '../config.js'
import { describeError } from '../errors.js'
import { AiSdkCompletionProvider } from '../providers/llm.js'
import { Database } from '../storage/database.js'
import { SqliteDocumentStore } from '../storage/documents.js'
import { startChat } from './chat.js'
import { printMetrics, printSegments } from './format.js'

export interface OpenedSession {
  config: ConfidantConfig
  session: CompanionSession
  close: () => Promise<void>
}

export async function openSession(config: ConfidantConfig = loadConfig()): Promise<OpenedSession> {
  const dbPath = resolveDbPath(config)
  if (dbPath !== ':memory:') {
    mkdirSync(path.dirname(dbPath), { recursive: true })
  }

  const db = new Database(dbPath)
  const session = new CompanionSession({
    config,
    documents: new SqliteDocumentStore(db),
    provider: new AiSdkCompletionProvider(config.llm)
  })
  session.onNotice(notice => {
    console.error(`! ${notice.message}`)
  })
  await session.open()

  return {
    config,
    session,
    close: async () => {
      await session.close()
      db.close()
    }
  }
}

/** Prints every configuration problem and returns false when there is one. */
function checkConfig(config: ConfidantConfig): boolean {
  const problems = validateConfig(config)
  if (problems.length === 0) return true

  console.error('Missing or invalid configuration:\n')
  for (const problem of problems) {
    console.error(`  ${problem.message}\n`)
  }
  return false
}

export async function defaultCommand(): Promise<void> {
  const config = loadConfig()
  if (!checkConfig(config)) {
    process.exit(1)
  }
  await startChat(await openSession(config))
}

export async function summarizeCommand(): Promise<void> {
  const config = loadConfig()
  if (!checkConfig(config)) {
    process.exit(1)
  }

  const opened = await openSession(config)
  try {
    const { session } = opened
    if (session.stats().unsummarized === 0) {
      console.log('Nothing new to summarize.')
    } else if (await session.summarizeNow()) {
      console.log('')
      console.log(session.conversation.summary)
      console.log('')
    }
  } finally {
    await opened.close()
  }
}

export async function memoryCommand(options: { search?: string }): Promise<void> {
  const opened = await openSession()
  try {
    const { session } = opened
    if (!session.memory) {
      console.log('Memory segments are disabled (memory.enabled = false).')
      return
    }
    if (options.search) {
      printSegments(session.searchMemories(options.search))
      return
    }
    printMetrics(session.memory.metrics())
  } finally {
    await opened.close()
  }
}

export async function consolidateCommand(): Promise<void> {
  const opened = await openSession()
  try {
    const { session } = opened
    if (await session.consolidateMemories()) {
      console.log('Consolidation complete.')
    } else {
      console.log('Memory segments are disabled (memory.enabled = false).')
    }
  } finally {
    await opened.close()
  }
}

export async function clearCommand(): Promise<void> {
  const opened = await openSession()
  try {
    await opened.session.clear()
    console.log('Conversation, summary and memories cleared.')
  } finally {
    await opened.close()
  }
}

function maskKey(config: ConfidantConfig): ConfidantConfig {
  const apiKey = config.llm.apiKey
  return {
    ...config,
    llm: { ...config.llm, apiKey: apiKey ? `${apiKey.slice(0, 4)}...` : undefined }
  }
}

export async function configCommand(action?: string, key?: string, value?: string): Promise<void> {
  if (!action) {
    try {
      console.log(JSON.stringify(maskKey(loadConfig()), null, 2))
    } catch (e) {
      console.error(`Config is invalid: ${describeError(e)}`)
      process.exitCode = 1
    }
    return
  }

  if (action === 'set' && key && value !== undefined) {
    // Set a config value using dot notation
    const parts = key.split('.')
    const leaf = parts.pop()
    if (!leaf) {
      console.log('Usage: confidant config set <key> <value>')
      return
    }

    let parsed: unknown
    // Try to parse as JSON (for numbers, booleans)
    try {
      parsed = JSON.parse(value)
    } catch {
      parsed = value
    }

    let update: Record<string, unknown> = { [leaf]: parsed }
    for (const part of parts.reverse()) {
      update = { [part]: update }
    }
    saveConfig(update)
    console.log(`Set ${key} = ${value}`)
    return
  }

  console.log('Usage: confidant config [set <key> <value>]')
}
