import { z } from 'zod'
import type { DocumentStore } from '../storage/documents.js'
import { CONVERSATION_KEY } from '../storage/documents.js'
import type { ConversationContext, Message } from './types.js'

const IsoDate = z.string().refine(s => !Number.isNaN(Date.parse(s)), 'expected an ISO-8601 timestamp')

const MessageDocumentSchema = z.object({
  text: z.string(),
  isUser: z.boolean(),
  timestamp: IsoDate
})

export const ConversationDocumentSchema = z.object({
  messages: z.array(MessageDocumentSchema),
  summary: z.string(),
  lastUpdated: IsoDate
})

export type ConversationDocument = z.infer<typeof ConversationDocumentSchema>

export function emptyConversation(now: Date = new Date()): ConversationContext {
  return { messages: [], summary: '', lastUpdated: now }
}

export function conversationToDocument(context: ConversationContext): ConversationDocument {
  return {
    messages: context.messages.map(m => ({
      text: m.text,
      isUser: m.isUser,
      timestamp: m.timestamp.toISOString()
    })),
    summary: context.summary,
    lastUpdated: context.lastUpdated.toISOString()
  }
}

/** Falls back to an empty context for anything that does not match the schema. */
export function conversationFromDocument(document: unknown): ConversationContext {
  const parsed = ConversationDocumentSchema.safeParse(document)
  if (!parsed.success) {
    if (document !== null && document !== undefined) {
      console.error('[conversation] Stored conversation is invalid, starting fresh:', parsed.error.issues[0]?.message)
    }
    return emptyConversation()
  }

  return {
    messages: parsed.data.messages.map(m => ({
      text: m.text,
      isUser: m.isUser,
      timestamp: new Date(m.timestamp)
    })),
    summary: parsed.data.summary,
    lastUpdated: new Date(parsed.data.lastUpdated)
  }
}

/**
 * The canonical, append-only log of turns plus the rolling summary.
 * Mutations never persist on their own; call save() when ready.
 */
export class ConversationStore {
  private messages: Message[]
  private _summary: string
  private _lastUpdated: Date

  constructor(initial: ConversationContext = emptyConversation()) {
    this.messages = [...initial.messages]
    this._summary = initial.summary
    this._lastUpdated = initial.lastUpdated
  }

  get messageCount(): number { return this.messages.length }
  get summary(): string { return this._summary }
  get lastUpdated(): Date { return this._lastUpdated }

  get context(): ConversationContext {
    return {
      messages: [...this.messages],
      summary: this._summary,
      lastUpdated: this._lastUpdated
    }
  }

  append(text: string, isUser: boolean): Message {
    const message: Message = Object.freeze({ text, isUser, timestamp: new Date() })
    this.messages.push(message)
    this._lastUpdated = message.timestamp
    return message
  }

  recent(limit: number): Message[] {
    if (limit <= 0) return []
    return this.messages.slice(-limit)
  }

  /** Messages in [start, end), clamped to the log. */
  range(start: number, end: number = this.messages.length): Message[] {
    return this.messages.slice(Math.max(0, start), Math.min(end, this.messages.length))
  }

  replaceSummary(text: string): void {
    this._summary = text
    this._lastUpdated = new Date()
  }

  clear(): void {
    const previous = this.messages.length
    this.messages = []
    this._summary = ''
    this._lastUpdated = new Date()
    console.log(`[conversation] Cleared conversation (${previous} messages)`)
  }

  async load(documents: DocumentStore): Promise<void> {
    const context = conversationFromDocument(await documents.readJSON(CONVERSATION_KEY))
    this.messages = [...context.messages]
    this._summary = context.summary
    this._lastUpdated = context.lastUpdated
    console.log(`[conversation] Loaded ${this.messages.length} messages, summary length ${this._summary.length}`)
  }

  async save(documents: DocumentStore): Promise<void> {
    await documents.writeJSON(CONVERSATION_KEY, conversationToDocument(this.context))
  }
}
