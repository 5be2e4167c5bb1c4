/**
 * screen-buckets: viewport size classification and media-query projection.
 *
 * Usage:
 * import { isIn, handset, withMedia, useClassification } from 'screen-buckets'
 */

// Bucket model
export {
  boundaryEquals,
  create,
  describeBucket,
  encompass,
  fixed,
  inBucket,
  isFixed,
  isIn,
  stepBelow,
  toValueBucket,
  unbounded,
} from './features/buckets/bucket'
export { BucketError, type BucketErrorCode } from './features/buckets/errors'
export type { Axis, Boundary, Bucket, FixedBoundary, Tier, TierEntry } from './features/buckets/types'
export { validateTier, type TierIssue } from './features/buckets/validate'

// Catalog
export * from './features/buckets/catalog'
export {
  BROAD_WIDTH_TAGS,
  FINE_WIDTH_MINIMUMS,
  FINE_WIDTH_TAGS,
  HEIGHT_MINIMUMS,
  HEIGHT_TAGS,
  type BroadWidthTag,
  type FineWidthTag,
  type HeightTag,
} from './breakpoints'

// Media projection
export {
  serializeMediaQuery,
  toMediaQuery,
  toMediaString,
  withMedia,
  type MediaFeature,
  type MediaFeatureName,
  type MediaQueryCondition,
  type StyleBlock,
} from './features/media/mediaQuery'
export { useBucketMediaQuery, useMediaQuery } from './features/media/hooks'

// Metrics
export {
  fromFloats,
  fromInts,
  MetricsError,
  set,
  setFloats,
  valueOnAxis,
  zero,
  type Metrics,
} from './features/metrics/metrics'
export { useScreenMetrics } from './features/metrics/useScreenMetrics'
export { useClassification, useIsIn, useMetrics } from './features/metrics/useMetrics'
export { ScreenMetricsProvider } from './features/metrics/ScreenMetricsProvider'
