import type { MemorySegment } from './types.js'

export interface ContextInput {
  companionName: string
  summary: string
  memories: readonly MemorySegment[]
  /** Milliseconds since the previous message, if there was one. */
  timeSinceLastMessage?: number
}

const MAX_SUMMARY_CHARS = 3000

export function assembleContext(input: ContextInput): string {
  const sections: string[] = []

  // 0. Behavioral guidance
  sections.push(buildBehavioralSection(input.companionName))

  // 1. Temporal awareness
  if (input.timeSinceLastMessage && input.timeSinceLastMessage >= 60 * 60 * 1000) {
    sections.push(buildTemporalSection(input.timeSinceLastMessage))
  }

  // 2. What the conversation has covered so far
  if (input.summary.trim()) {
    sections.push(buildSummarySection(input.summary))
  }

  // 3. Relevant memories
  if (input.memories.length > 0) {
    sections.push(buildMemoriesSection(input.memories))
  }

  if (sections.length === 1) {
    sections.push('This is the beginning of your conversations with this person. You know nothing about them yet.')
  }

  return sections.join('\n\n')
}

function buildBehavioralSection(companionName: string): string {
  return [
    `You are ${companionName}, a personal companion. You remember earlier conversations through the summary and memories below.`,
    '',
    'How to behave in conversation:',
    '- Engage with what the person SAYS. Their message is the focus.',
    '- Be direct and warm. Have opinions. Be curious about their world.',
    '- If you have relevant memories or context, use them naturally. Don\'t announce them.',
    '- Never claim to remember something that is not in the summary or memories.',
    '- Match the register of the conversation. Casual greeting = casual response. Technical question = technical answer.',
  ].join('\n')
}

function buildTemporalSection(elapsedMs: number): string {
  const hours = Math.floor(elapsedMs / (1000 * 60 * 60))
  if (hours >= 48) {
    return `Time since the last message: ${Math.floor(hours / 24)} days`
  }
  return `Time since the last message: ${hours}h`
}

function buildSummarySection(summary: string): string {
  const truncated = summary.length > MAX_SUMMARY_CHARS
    ? summary.slice(0, MAX_SUMMARY_CHARS) + '...'
    : summary
  return ['Summary of your conversations so far:', truncated].join('\n')
}

function buildMemoriesSection(memories: readonly MemorySegment[]): string {
  const lines: string[] = ['Relevant memories:']
  for (const memory of memories) {
    lines.push(`- ${memory.content}`)
  }
  return lines.join('\n')
}
