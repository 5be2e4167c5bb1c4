/**
 * The shipped bucket catalog.
 *
 * Fine tiers are built from the raw tables in breakpoints.ts, top bucket
 * first, so every maximum is `stepBelow` of the bucket above it. Broad
 * buckets are `encompass`ed from their first and last fine bucket and
 * never authored by hand.
 */

import {
  FINE_WIDTH_MINIMUMS,
  FINE_WIDTH_TAGS,
  HEIGHT_MINIMUMS,
  HEIGHT_TAGS,
  type BroadWidthTag,
  type FineWidthTag,
  type HeightTag,
} from '../../breakpoints'
import type { Metrics } from '../metrics/metrics'
import { isDev } from '../../utils/env'
import { logWarn } from '../../utils/log'
import { create, encompass, fixed, stepBelow, toValueBucket, unbounded } from './bucket'
import { BucketError } from './errors'
import type { Axis, Bucket, Tier, TierEntry } from './types'
import { validateTier } from './validate'

export type BucketTag = FineWidthTag | BroadWidthTag | HeightTag

/**
 * Build an ordered tier from a table of minimums.
 *
 * `minimums[k]` is where `tags[k + 1]` starts; the first bucket starts
 * unbounded and the last ends unbounded.
 *
 * @throws BucketError TABLE_MISMATCH when there is not one minimum per gap between tags
 * @throws BucketError UNSORTED_TABLE when minimums are not strictly ascending
 */
export function buildTier<Tag extends string>(
  axis: Axis,
  tags: readonly [Tag, ...Tag[]],
  minimums: readonly number[]
): Tier<Tag> {
  if (minimums.length !== tags.length - 1) {
    throw new BucketError(
      `${tags.length} ${axis} buckets need ${tags.length - 1} minimums, got ${minimums.length}`,
      'TABLE_MISMATCH'
    )
  }
  minimums.forEach((value, i) => {
    if (i > 0 && value <= minimums[i - 1]) {
      throw new BucketError(
        `${axis} minimums must be strictly ascending: ${minimums[i - 1]} then ${value}`,
        'UNSORTED_TABLE'
      )
    }
  })

  const entries: TierEntry<Tag>[] = []
  let above: Bucket | null = null
  for (let i = tags.length - 1; i >= 0; i--) {
    const min = i === 0 ? unbounded : fixed(minimums[i - 1])
    const max = above ? stepBelow(above) : unbounded
    above = create(axis, min, max)
    entries.unshift({ tag: tags[i], bucket: above })
  }

  const [lowest, ...rest] = entries
  return [lowest, ...rest]
}

function bucketOf<Tag extends string>(entries: readonly TierEntry<Tag>[], tag: Tag): Bucket {
  const entry = entries.find(e => e.tag === tag)
  if (!entry) throw new BucketError(`No bucket tagged ${tag}`, 'TABLE_MISMATCH')
  return entry.bucket
}

// ─────────────────────────────────────────────────────────────────────────────
// Width
// ─────────────────────────────────────────────────────────────────────────────

export const fineWidthTier: Tier<FineWidthTag> = buildTier('width', FINE_WIDTH_TAGS, FINE_WIDTH_MINIMUMS)

export const handset1 = bucketOf(fineWidthTier, 'handset1')
export const handset2 = bucketOf(fineWidthTier, 'handset2')
export const handset3 = bucketOf(fineWidthTier, 'handset3')
export const portable1 = bucketOf(fineWidthTier, 'portable1')
export const portable2 = bucketOf(fineWidthTier, 'portable2')
export const portable3 = bucketOf(fineWidthTier, 'portable3')
export const wide1 = bucketOf(fineWidthTier, 'wide1')
export const wide2 = bucketOf(fineWidthTier, 'wide2')

export const handset = encompass('width', handset1, handset3)
export const portable = encompass('width', portable1, portable3)
export const wide = encompass('width', wide1, wide2)

export const broadWidthTier: Tier<BroadWidthTag> = [
  { tag: 'handset', bucket: handset },
  { tag: 'portable', bucket: portable },
  { tag: 'wide', bucket: wide },
]

// ─────────────────────────────────────────────────────────────────────────────
// Height
// ─────────────────────────────────────────────────────────────────────────────

export const heightTier: Tier<HeightTag> = buildTier('height', HEIGHT_TAGS, HEIGHT_MINIMUMS)

export const limited = bucketOf(heightTier, 'limited')
export const medium = bucketOf(heightTier, 'medium')
export const tall = bucketOf(heightTier, 'tall')

// ─────────────────────────────────────────────────────────────────────────────
// Classification
// ─────────────────────────────────────────────────────────────────────────────

export const toFineWidth = (width: number): FineWidthTag => toValueBucket(width, fineWidthTier)

export const toBroadWidth = (width: number): BroadWidthTag => toValueBucket(width, broadWidthTier)

export const toHeightBucket = (height: number): HeightTag => toValueBucket(height, heightTier)

export type Classification = {
  broadWidth: BroadWidthTag
  fineWidth: FineWidthTag
  height: HeightTag
}

export function classify(metrics: Metrics): Classification {
  return {
    broadWidth: toBroadWidth(metrics.width),
    fineWidth: toFineWidth(metrics.width),
    height: toHeightBucket(metrics.height),
  }
}

const ALL_ENTRIES: readonly TierEntry<BucketTag>[] = [...fineWidthTier, ...broadWidthTier, ...heightTier]

/** Look up any catalog bucket by its tag. */
export function findBucket(tag: BucketTag): Bucket {
  return bucketOf(ALL_ENTRIES, tag)
}

export const CATALOG_TIERS = {
  fineWidth: fineWidthTier,
  broadWidth: broadWidthTier,
  height: heightTier,
} as const

/**
 * Warn about every tier that does not partition its axis. Dev builds only;
 * production builds skip the check and log nothing.
 */
export function reportCatalogIssues(tiers: Readonly<Record<string, readonly TierEntry[]>>): void {
  if (!isDev()) return
  for (const [name, tier] of Object.entries(tiers)) {
    const issues = validateTier(tier)
    if (issues.length > 0) {
      logWarn(`${name} tier does not partition its axis:`, issues)
    }
  }
}

reportCatalogIssues(CATALOG_TIERS)
