/**
 * Projection of buckets into CSS media queries.
 *
 * `toMediaQuery` yields a structured condition; `serializeMediaQuery` turns it
 * into the text that follows `@media`, and `withMedia` nests a style object
 * under the combined rule for CSS-in-JS consumers.
 */

import type { CSSProperties } from 'react'
import { isFixed } from '../buckets/bucket'
import type { Axis, Bucket } from '../buckets/types'

export type MediaFeatureName = `${'min' | 'max'}-${Axis}`

export type MediaFeature = {
  readonly name: MediaFeatureName
  /** CSS pixels; one bucket pixel is one output pixel. */
  readonly px: number
}

export type MediaQueryCondition = {
  readonly mediaType: 'screen'
  /** Joined with `and`. */
  readonly features: readonly MediaFeature[]
}

/** Style declarations keyed by their `@media` rule. */
export type StyleBlock = Record<string, CSSProperties>

export function toMediaQuery(bucket: Bucket): MediaQueryCondition {
  const { axis, min, max } = bucket
  const features: MediaFeature[] = []

  if (isFixed(min)) {
    features.push({ name: `min-${axis}`, px: min.value })
  }
  if (isFixed(max)) {
    features.push({ name: `max-${axis}`, px: max.value })
  } else if (!isFixed(min)) {
    // Open on both ends. No catalog bucket is; emit something well-formed.
    features.push({ name: `max-${axis}`, px: 0 })
  }

  return { mediaType: 'screen', features }
}

/**
 * @example
 * serializeMediaQuery(toMediaQuery(portable1))
 * // => 'screen and (min-width: 512px) and (max-width: 863px)'
 */
export function serializeMediaQuery(condition: MediaQueryCondition): string {
  const features = condition.features.map(f => `(${f.name}: ${f.px}px)`)
  return [condition.mediaType, ...features].join(' and ')
}

export function toMediaString(bucket: Bucket): string {
  return serializeMediaQuery(toMediaQuery(bucket))
}

/**
 * Guard `styles` with a media rule matching any of `buckets`.
 *
 * Buckets are alternatives (comma-separated in the rule), not a conjunction.
 * An empty list guards nothing and yields an empty block.
 *
 * @example
 * withMedia([handset1, handset2], { padding: 8 })
 * // => { '@media screen and (max-width: 351px), screen and (min-width: 352px) and (max-width: 383px)': { padding: 8 } }
 */
export function withMedia(buckets: readonly Bucket[], styles: CSSProperties): StyleBlock {
  if (buckets.length === 0) return {}
  const rule = `@media ${buckets.map(toMediaString).join(', ')}`
  return { [rule]: styles }
}
