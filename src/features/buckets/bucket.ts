/**
 * Bucket model: boundaries, bucket construction and membership.
 *
 * A bucket is a closed pixel range on one axis whose ends may be open
 * (`unbounded`). Adjacent catalog buckets are joined with `stepBelow`, so a
 * bucket's maximum is always one pixel under its neighbour's minimum.
 */

import { valueOnAxis, type Metrics } from '../metrics/metrics'
import { BucketError } from './errors'
import type { Axis, Boundary, Bucket, FixedBoundary, Tier } from './types'

export const unbounded: Boundary = Object.freeze({ kind: 'unbounded' })

/**
 * Build an exact, inclusive boundary.
 *
 * @throws BucketError INVALID_BOUNDARY for non-integer pixel values
 */
export function fixed(value: number): FixedBoundary {
  if (!Number.isInteger(value)) {
    throw new BucketError(`Boundary must be a whole pixel value, got ${value}`, 'INVALID_BOUNDARY')
  }
  return Object.freeze({ kind: 'fixed', value })
}

export function isFixed(boundary: Boundary): boundary is FixedBoundary {
  return boundary.kind === 'fixed'
}

export function boundaryEquals(a: Boundary, b: Boundary): boolean {
  if (isFixed(a) && isFixed(b)) return a.value === b.value
  return a.kind === b.kind
}

/**
 * Create a bucket on `axis` from `min` to `max`, both inclusive.
 *
 * A zero minimum is spelled `unbounded`, never `fixed(0)`.
 *
 * @throws BucketError INVALID_BOUNDARY when a fixed minimum is not positive
 * @throws BucketError INVERTED_RANGE when min is above max
 */
export function create(axis: Axis, min: Boundary, max: Boundary): Bucket {
  if (isFixed(min) && min.value <= 0) {
    throw new BucketError(
      `Minimum ${min.value} is not positive; use unbounded for "no lower limit"`,
      'INVALID_BOUNDARY'
    )
  }
  if (isFixed(min) && isFixed(max) && min.value > max.value) {
    throw new BucketError(`Inverted ${axis} range: ${min.value} > ${max.value}`, 'INVERTED_RANGE')
  }
  return Object.freeze({ axis, min, max })
}

/**
 * Span from `low`'s minimum to `high`'s maximum.
 * Used to derive broad buckets from a contiguous run of fine ones.
 *
 * @throws BucketError AXIS_MISMATCH when either bucket is on another axis
 */
export function encompass(axis: Axis, low: Bucket, high: Bucket): Bucket {
  if (low.axis !== axis || high.axis !== axis) {
    throw new BucketError(
      `Cannot encompass ${low.axis} and ${high.axis} buckets on the ${axis} axis`,
      'AXIS_MISMATCH'
    )
  }
  return create(axis, low.min, high.max)
}

/**
 * The boundary that ends a range one pixel before `bucket` begins.
 * An unbounded minimum has nothing below it and stays unbounded.
 */
export function stepBelow(bucket: Bucket): Boundary {
  return isFixed(bucket.min) ? fixed(bucket.min.value - 1) : unbounded
}

/**
 * Membership test. `value` must already be the dimension on the bucket's axis.
 */
export function inBucket(bucket: Bucket, value: number): boolean {
  const { min, max } = bucket
  const aboveMin = !isFixed(min) || value >= min.value
  const belowMax = !isFixed(max) || value <= max.value
  return aboveMin && belowMax
}

/**
 * True when any bucket contains the metrics value on that bucket's own axis.
 * Width and height buckets may be mixed freely.
 */
export function isIn(buckets: readonly Bucket[], metrics: Metrics): boolean {
  return buckets.some(bucket => inBucket(bucket, valueOnAxis(metrics, bucket.axis)))
}

/**
 * Classify `value` against an ordered tier, lowest bucket first.
 *
 * The first containing bucket wins. When none contains the value the last
 * tag is returned: the topmost bucket is open-ended in a contiguous tier,
 * so this only fires for values below a tier that lacks an open bottom.
 */
export function toValueBucket<Tag extends string>(value: number, tier: Tier<Tag>): Tag {
  for (const entry of tier) {
    if (inBucket(entry.bucket, value)) return entry.tag
  }
  return tier[tier.length - 1].tag
}

function formatRange(bucket: Bucket): string {
  const { min, max } = bucket
  if (isFixed(min) && isFixed(max)) return `${min.value}–${max.value}px`
  if (isFixed(min)) return `≥${min.value}px`
  if (isFixed(max)) return `≤${max.value}px`
  return 'any'
}

/** Human-readable range, e.g. `width 352–383px` or `height ≥864px`. */
export function describeBucket(bucket: Bucket): string {
  return `${bucket.axis} ${formatRange(bucket)}`
}
