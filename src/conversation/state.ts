import { z } from 'zod'
import type { DocumentStore } from '../storage/documents.js'
import { SUMMARIZATION_STATE_KEY } from '../storage/documents.js'
import type { SummarizationState } from './types.js'

const SummarizationStateSchema = z.object({
  lastSummarizedCount: z.number().int().nonnegative(),
  lastSummarizedAt: z.string().refine(s => !Number.isNaN(Date.parse(s))).nullable()
})

export function initialSummarizationState(): SummarizationState {
  return { lastSummarizedCount: 0, lastSummarizedAt: null }
}

export async function loadSummarizationState(documents: DocumentStore): Promise<SummarizationState> {
  const raw = await documents.readJSON(SUMMARIZATION_STATE_KEY)
  if (raw === null) return initialSummarizationState()

  const parsed = SummarizationStateSchema.safeParse(raw)
  if (!parsed.success) {
    console.error('[conversation] Stored summarization state is invalid, resetting cursor')
    return initialSummarizationState()
  }
  return {
    lastSummarizedCount: parsed.data.lastSummarizedCount,
    lastSummarizedAt: parsed.data.lastSummarizedAt ? new Date(parsed.data.lastSummarizedAt) : null
  }
}

export async function saveSummarizationState(documents: DocumentStore, state: SummarizationState): Promise<void> {
  await documents.writeJSON(SUMMARIZATION_STATE_KEY, {
    lastSummarizedCount: state.lastSummarizedCount,
    lastSummarizedAt: state.lastSummarizedAt?.toISOString() ?? null
  })
}
