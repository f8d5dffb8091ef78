import { EventEmitter } from 'node:events'
import { describeError } from '../errors.js'

export type DueReason = 'initial' | 'update' | 'interval'
export type RunReason = DueReason | 'manual' | 'final'

export interface TriggerSignals {
  hasSummary: boolean
  totalMessages: number
  unsummarizedCount: number
  lastSummarizedAt: Date | null
}

export interface TriggerThresholds {
  initialThreshold: number
  updateThreshold: number
  intervalMs: number
  minMessagesForInterval: number
}

export interface TriggerDecision {
  due: boolean
  reason: DueReason | null
}

export function evaluateTrigger(signals: TriggerSignals, thresholds: TriggerThresholds, now: Date = new Date()): TriggerDecision {
  if (!signals.hasSummary && signals.unsummarizedCount >= thresholds.initialThreshold) {
    return { due: true, reason: 'initial' }
  }
  if (signals.hasSummary && signals.unsummarizedCount >= thresholds.updateThreshold) {
    return { due: true, reason: 'update' }
  }
  if (
    signals.lastSummarizedAt !== null &&
    now.getTime() - signals.lastSummarizedAt.getTime() > thresholds.intervalMs &&
    signals.totalMessages > thresholds.minMessagesForInterval &&
    signals.unsummarizedCount > 0
  ) {
    return { due: true, reason: 'interval' }
  }
  return { due: false, reason: null }
}

export interface SummarizationTriggerOptions extends TriggerThresholds {
  debounceMs: number
  readSignals: () => TriggerSignals
  run: (reason: RunReason) => Promise<void>
}

/**
 * Decides when to summarize and guarantees a single run in flight.
 *
 * Events:
 * - `summarized` (reason) after a successful run
 * - `failed` (error, reason) after a failed run; state is left untouched and
 *   the next natural trigger point retries
 */
export class SummarizationTrigger extends EventEmitter {
  private options: SummarizationTriggerOptions
  private debounceTimer: ReturnType<typeof setTimeout> | null = null
  private intervalTimer: ReturnType<typeof setInterval> | null = null
  private inFlight: Promise<boolean> | null = null

  constructor(options: SummarizationTriggerOptions) {
    super()
    this.options = options
  }

  get running(): boolean {
    return this.inFlight !== null
  }

  /** Call after every append. Evaluates once the conversation goes quiet. */
  notify(): void {
    if (this.debounceTimer) clearTimeout(this.debounceTimer)
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null
      void this.evaluateNow()
    }, this.options.debounceMs)
  }

  start(): void {
    if (this.intervalTimer) return
    this.intervalTimer = setInterval(() => this.notify(), this.options.intervalMs)
  }

  stop(): void {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer)
      this.debounceTimer = null
    }
    if (this.intervalTimer) {
      clearInterval(this.intervalTimer)
      this.intervalTimer = null
    }
  }

  /** Never rejects. */
  async evaluateNow(now: Date = new Date()): Promise<TriggerDecision> {
    const decision = evaluateTrigger(this.options.readSignals(), this.options, now)
    if (decision.reason !== null) {
      console.log(`[trigger] Summarization due (${decision.reason})`)
      await this.runNow(decision.reason)
    }
    return decision
  }

  /**
   * Starts a run unless one is already in flight, in which case the caller
   * shares the outstanding one. Resolves true on success, never rejects.
   */
  runNow(reason: RunReason): Promise<boolean> {
    if (this.inFlight) return this.inFlight

    this.inFlight = this.execute(reason).finally(() => {
      this.inFlight = null
    })
    return this.inFlight
  }

  private async execute(reason: RunReason): Promise<boolean> {
    try {
      await this.options.run(reason)
      this.emit('summarized', reason)
      return true
    } catch (e) {
      console.error(`[trigger] Summarization (${reason}) failed:`, describeError(e))
      this.emit('failed', e, reason)
      return false
    }
  }

  /** Shutdown path: flush whatever has not been summarized yet. */
  async finalize(): Promise<void> {
    this.stop()
    if (this.inFlight) await this.inFlight

    const signals = this.options.readSignals()
    if (signals.totalMessages > 0 && signals.unsummarizedCount > 0) {
      await this.runNow('final')
    }
  }
}
