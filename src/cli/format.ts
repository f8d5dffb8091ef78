import type { MemorySegment, SegmentMetrics } from '../memory/types.js'

export function printMetrics(metrics: SegmentMetrics): void {
  console.log('')
  console.log('  Memory Stats')
  console.log('  ------------')
  console.log(`  Segments:            ${metrics.total}`)
  console.log(`  Critical:            ${metrics.byTier.critical}`)
  console.log(`  Long-term:           ${metrics.byTier['long-term']}`)
  console.log(`  Medium-term:         ${metrics.byTier['medium-term']}`)
  console.log(`  Short-term:          ${metrics.byTier['short-term']}`)
  console.log(`  Average importance:  ${metrics.averageImportance.toFixed(3)}`)
  console.log(`  Total accesses:      ${metrics.totalAccessCount}`)
  console.log('')
}

export function printSegments(segments: readonly MemorySegment[]): void {
  if (segments.length === 0) {
    console.log('No memories found.')
    return
  }

  console.log(`\n  Found ${segments.length} memory(s):\n`)
  for (const segment of segments) {
    console.log(`  [${segment.id}] ${segment.type}`)
    console.log(`    Content:      ${segment.content}`)
    console.log(`    Topics:       ${segment.topics.join(', ') || '-'}`)
    console.log(`    Importance:   ${segment.importance.toFixed(3)}`)
    console.log(`    Accessed:     ${segment.accessCount} times`)
    console.log('')
  }
}
