import { z } from 'zod'

const StringList = z.array(z.string()).catch([])

const StructuredSummarySchema = z.object({
  summary: z.string().trim().min(1),
  keyTopics: StringList.optional(),
  importantFacts: StringList.optional(),
  userPreferences: StringList.optional(),
  goals: StringList.optional(),
  recurringThemes: StringList.optional()
})

export type StructuredSummary = z.infer<typeof StructuredSummarySchema>

export interface ParsedSummary {
  kind: 'summary'
  summary: string
  structured?: StructuredSummary
}

export interface MalformedResponse {
  kind: 'malformed'
  reason: string
}

export type SummaryParseResult = ParsedSummary | MalformedResponse

// LLMs often wrap JSON in ```json ... ```
export function stripCodeFences(text: string): string {
  return text.replace(/^```(?:json)?\s*\n?/i, '').replace(/\n?```\s*$/i, '').trim()
}

export function parseSummaryResponse(raw: string): SummaryParseResult {
  const cleaned = stripCodeFences(raw.trim())
  if (cleaned.length === 0) {
    return { kind: 'malformed', reason: 'empty response' }
  }

  if (!cleaned.startsWith('{')) {
    return { kind: 'summary', summary: cleaned }
  }

  let json: unknown
  try {
    json = JSON.parse(cleaned)
  } catch (e) {
    return { kind: 'malformed', reason: `invalid JSON envelope: ${e instanceof Error ? e.message : String(e)}` }
  }

  const parsed = StructuredSummarySchema.safeParse(json)
  if (!parsed.success) {
    return { kind: 'malformed', reason: 'JSON envelope has no usable summary field' }
  }

  return { kind: 'summary', summary: parsed.data.summary.trim(), structured: parsed.data }
}

/** Flattens a structured summary into the text kept as the rolling summary. */
export function formatStructuredSummary(structured: StructuredSummary): string {
  const sections: string[] = [structured.summary.trim()]
  const lists: [string, string[] | undefined][] = [
    ['Key topics', structured.keyTopics],
    ['Important facts', structured.importantFacts],
    ['User preferences', structured.userPreferences],
    ['Goals', structured.goals],
    ['Recurring themes', structured.recurringThemes]
  ]

  for (const [title, items] of lists) {
    const nonEmpty = (items ?? []).map(i => i.trim()).filter(i => i.length > 0)
    if (nonEmpty.length === 0) continue
    sections.push(`${title}:\n${nonEmpty.map(i => `- ${i}`).join('\n')}`)
  }

  return sections.join('\n\n')
}
