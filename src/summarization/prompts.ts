export type SummaryVariant = 'initial' | 'incremental' | 'memory-aware' | 'incremental+memory-aware'

export function selectVariant(hasPreviousSummary: boolean, hasMemories: boolean): SummaryVariant {
  if (hasPreviousSummary && hasMemories) return 'incremental+memory-aware'
  if (hasPreviousSummary) return 'incremental'
  if (hasMemories) return 'memory-aware'
  return 'initial'
}

const JSON_ENVELOPE = `Return JSON only: {
  "keyTopics": ["topic"],
  "importantFacts": ["fact about the user or their life"],
  "userPreferences": ["likes, dislikes, ways they want to be treated"],
  "goals": ["what the user is working towards"],
  "recurringThemes": ["theme that keeps coming back"],
  "summary": "a short paragraph, written in past tense"
}`

function initialInstruction(structured: boolean): string {
  return `Analyze this conversation between the user and their companion.
Capture what matters for continuing the relationship: who the user is, what they care about, what they are dealing with.
Skip small talk and pleasantries.
${structured ? JSON_ENVELOPE : 'Return a concise summary paragraph in plain prose.'}`
}

function incrementalInstruction(structured: boolean): string {
  return `Update the previous summary with the new messages, keeping the key information.
Keep facts from the previous summary unless the new messages contradict them.
Do not repeat the transcript; fold the new information into the existing picture.
${structured ? JSON_ENVELOPE : 'Return the updated summary paragraph in plain prose.'}`
}

const MEMORY_AWARE_SUFFIX = `
The user-side message starts with memories retrieved from earlier conversations.
Connect the current conversation with those memories where they relate, but do not restate memories that the conversation does not touch.`

export function buildSummaryInstruction(variant: SummaryVariant, structured: boolean): string {
  const base = variant === 'incremental' || variant === 'incremental+memory-aware'
    ? incrementalInstruction(structured)
    : initialInstruction(structured)

  return variant === 'memory-aware' || variant === 'incremental+memory-aware'
    ? base + '\n' + MEMORY_AWARE_SUFFIX
    : base
}
