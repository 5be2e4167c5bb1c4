import { isFixed } from './bucket'
import type { TierEntry } from './types'

export type TierIssue =
  | { kind: 'gap'; below: string; above: string; missing: readonly [number, number] }
  | { kind: 'overlap'; below: string; above: string }
  | { kind: 'open-bottom-missing'; tag: string }
  | { kind: 'open-top-missing'; tag: string }
  | { kind: 'axis-mismatch'; tag: string }

/**
 * Check that an ordered tier partitions its axis: lowest bucket open at the
 * bottom, highest open at the top, and each neighbour starting exactly one
 * pixel above the previous maximum.
 *
 * Returns every issue found; an empty list means the tier is a partition.
 */
export function validateTier(tier: readonly TierEntry[]): TierIssue[] {
  const issues: TierIssue[] = []
  if (tier.length === 0) return issues

  const first = tier[0]
  const last = tier[tier.length - 1]

  if (isFixed(first.bucket.min)) {
    issues.push({ kind: 'open-bottom-missing', tag: first.tag })
  }
  if (isFixed(last.bucket.max)) {
    issues.push({ kind: 'open-top-missing', tag: last.tag })
  }

  tier.forEach((entry, i) => {
    if (entry.bucket.axis !== first.bucket.axis) {
      issues.push({ kind: 'axis-mismatch', tag: entry.tag })
    }
    if (i === 0) return

    const below = tier[i - 1]
    const belowMax = below.bucket.max
    const aboveMin = entry.bucket.min

    if (!isFixed(belowMax) || !isFixed(aboveMin) || aboveMin.value <= belowMax.value) {
      issues.push({ kind: 'overlap', below: below.tag, above: entry.tag })
    } else if (aboveMin.value > belowMax.value + 1) {
      issues.push({
        kind: 'gap',
        below: below.tag,
        above: entry.tag,
        missing: [belowMax.value + 1, aboveMin.value - 1],
      })
    }
  })

  return issues
}
