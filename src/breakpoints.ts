/**
 * ============================================================================
 * CENTRALIZED BREAKPOINT TABLE
 * ============================================================================
 *
 * This file is the SINGLE SOURCE OF TRUTH for bucket boundaries. Every
 * number is the inclusive MINIMUM of the next bucket up; the bucket below
 * ends one pixel earlier. The lowest bucket of each tier starts at zero and
 * the highest is open-ended, so neither appears here.
 *
 * Buckets are derived from these tables in features/buckets/catalog.ts.
 * Edit the numbers here, never the derived buckets.
 *
 * ============================================================================
 * WIDTH (fine tier)
 * ============================================================================
 *
 *   handset1   0 – 351      portable1   512 – 863     wide1   1280 – 1599
 *   handset2 352 – 383      portable2   864 – 1023    wide2   1600 – ∞
 *   handset3 384 – 511      portable3  1024 – 1279
 *
 * Broad tier: handset 0–511, portable 512–1279, wide 1280–∞
 *
 * ============================================================================
 * HEIGHT
 * ============================================================================
 *
 *   limited 0 – 511, medium 512 – 863, tall 864 – ∞
 *
 * Height cut-offs deliberately repeat the portable1 and portable2 width
 * minimums. They are separate numbers: changing a width breakpoint must not
 * move a height one.
 *
 * ============================================================================
 */

export const FINE_WIDTH_TAGS = [
  'handset1',
  'handset2',
  'handset3',
  'portable1',
  'portable2',
  'portable3',
  'wide1',
  'wide2',
] as const

export type FineWidthTag = (typeof FINE_WIDTH_TAGS)[number]

export const FINE_WIDTH_MINIMUMS = [352, 384, 512, 864, 1024, 1280, 1600] as const

export const BROAD_WIDTH_TAGS = ['handset', 'portable', 'wide'] as const

export type BroadWidthTag = (typeof BROAD_WIDTH_TAGS)[number]

export const HEIGHT_TAGS = ['limited', 'medium', 'tall'] as const

export type HeightTag = (typeof HEIGHT_TAGS)[number]

export const HEIGHT_MINIMUMS = [512, 864] as const
