export interface Message {
  readonly text: string
  readonly isUser: boolean
  readonly timestamp: Date
}

export interface ConversationContext {
  readonly messages: readonly Message[]
  readonly summary: string
  readonly lastUpdated: Date
}

export interface SummarizationState {
  lastSummarizedCount: number
  lastSummarizedAt: Date | null
}
