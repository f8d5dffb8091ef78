import { describe, it, expect } from 'vitest'
import { assembleContext } from '../context.js'
import type { MemorySegment } from '../types.js'

const at = new Date('2026-02-10T08:00:00Z')

function memory(content: string): MemorySegment {
  return {
    id: content,
    content,
    type: 'long-term',
    importance: 0.8,
    created: at,
    lastAccessed: at,
    accessCount: 0,
    topics: [],
    metadata: {}
  }
}

describe('assembleContext', () => {
  it('introduces the companion by name', () => {
    const context = assembleContext({ companionName: 'Alex', summary: '', memories: [] })
    expect(context.startsWith('You are Alex, a personal companion.')).toBe(true)
  })

  it('marks a first conversation when there is nothing to recall', () => {
    const context = assembleContext({ companionName: 'Alex', summary: '  ', memories: [] })
    expect(context.endsWith('This is the beginning of your conversations with this person. You know nothing about them yet.')).toBe(true)
  })

  it('includes the summary and memories in order', () => {
    const context = assembleContext({
      companionName: 'Alex',
      summary: 'User is training for a half marathon.',
      memories: [memory('User lives in Leeds'), memory('User has a dog named Biscuit')]
    })

    const summaryAt = context.indexOf('Summary of your conversations so far:\nUser is training for a half marathon.')
    const memoriesAt = context.indexOf('Relevant memories:\n- User lives in Leeds\n- User has a dog named Biscuit')
    expect(summaryAt).toBeGreaterThan(0)
    expect(memoriesAt).toBeGreaterThan(summaryAt)
    expect(context).not.toContain('This is the beginning')
  })

  it('truncates a long summary', () => {
    const context = assembleContext({ companionName: 'Alex', summary: 'x'.repeat(3500), memories: [] })
    expect(context).toContain(`${'x'.repeat(3000)}...`)
    expect(context).not.toContain('x'.repeat(3001))
  })

  it('mentions elapsed time only after an hour', () => {
    const base = { companionName: 'Alex', summary: 'Some summary.', memories: [] }
    expect(assembleContext({ ...base, timeSinceLastMessage: 59 * 60 * 1000 })).not.toContain('Time since the last message')
    expect(assembleContext({ ...base, timeSinceLastMessage: 5 * 60 * 60 * 1000 })).toContain('Time since the last message: 5h')
    expect(assembleContext({ ...base, timeSinceLastMessage: 72 * 60 * 60 * 1000 })).toContain('Time since the last message: 3 days')
  })
})
