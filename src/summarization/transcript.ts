import type { Message } from '../conversation/types.js'
import type { MemorySegment } from '../memory/types.js'
import { containsKeyword } from '../memory/topics.js'

export const TRUNCATION_MARKER = '[Conversation truncated for efficiency]'
export const MAX_RENDERED_MEMORIES = 5

export interface TranscriptOptions {
  companionName: string
  maxLength: number
  previousSummary?: string
  relevantMemories?: readonly MemorySegment[]
}

/** Drops fragments and bare greetings that add nothing to a summary. */
export function filterMessagesForSummary(messages: readonly Message[]): Message[] {
  return messages.filter(message => {
    const text = message.text
    if (text.trim().length < 3) return false

    const lower = text.toLowerCase()
    if (lower.includes('hello') && text.length < 20) return false
    if (containsKeyword(lower, 'hi') && text.length < 15) return false
    if (lower.includes('thanks') && text.length < 20) return false
    if (lower.includes('thank you') && text.length < 25) return false

    return true
  })
}

export function truncateTranscript(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text
  return `${text.slice(0, Math.max(0, maxLength - 100))}\n\n${TRUNCATION_MARKER}`
}

/**
 * Renders the user-side payload for the summarizer: memory block, previous
 * summary, then the speaker-labelled transcript. Expects an already filtered
 * batch.
 */
export function renderTranscript(messages: readonly Message[], options: TranscriptOptions): string {
  const lines: string[] = []
  const memories = options.relevantMemories ?? []

  if (memories.length > 0) {
    lines.push('RELEVANT MEMORIES AND CONTEXT:')
    lines.push('The following memories may be relevant to understanding this conversation:')
    lines.push('')
    memories.slice(0, MAX_RENDERED_MEMORIES).forEach((memory, i) => {
      lines.push(`Memory ${i + 1} (${memory.type}, importance: ${memory.importance.toFixed(2)}):`)
      lines.push(memory.content)
      lines.push('')
    })
    lines.push('--- End of relevant memories ---')
    lines.push('')
  }

  if (options.previousSummary) {
    lines.push('PREVIOUS SUMMARY:')
    lines.push('This is the summary of the conversation so far. Update it with the new messages below:')
    lines.push('')
    lines.push(options.previousSummary)
    lines.push('')
    lines.push('--- End of previous summary ---')
    lines.push('')
    lines.push('NEW MESSAGES TO INTEGRATE:')
  } else {
    lines.push('CURRENT CONVERSATION TO ANALYZE:')
  }
  lines.push('')

  for (const message of messages) {
    const speaker = message.isUser ? 'User' : options.companionName
    lines.push(`${speaker}: ${message.text}`)
    lines.push('')
  }

  return truncateTranscript(lines.join('\n'), options.maxLength)
}
