/** Which screen dimension a bucket measures. */
export type Axis = 'width' | 'height'

/**
 * One edge of a bucket.
 *
 * `unbounded` means "no limit": zero when used as a minimum, infinity when
 * used as a maximum. `fixed` values are inclusive pixel counts.
 */
export type Boundary = { readonly kind: 'unbounded' } | { readonly kind: 'fixed'; readonly value: number }

export type FixedBoundary = Extract<Boundary, { kind: 'fixed' }>

/** A contiguous, inclusive pixel range on one axis. */
export type Bucket = {
  readonly axis: Axis
  readonly min: Boundary
  readonly max: Boundary
}

/** A bucket paired with the tag a classifier reports for it. */
export type TierEntry<Tag extends string = string> = {
  readonly tag: Tag
  readonly bucket: Bucket
}

/**
 * Ordered, contiguous buckets covering one axis, lowest first.
 * Non-empty so that classification always has a fallback.
 */
export type Tier<Tag extends string = string> = readonly [TierEntry<Tag>, ...TierEntry<Tag>[]]
