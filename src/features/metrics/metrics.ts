/**
 * Viewport metrics snapshot.
 *
 * Values are immutable and always replaced as a whole, so a reader never
 * sees a width from one resize paired with a height from another.
 */

import type { Axis } from '../buckets/types'

export type Metrics = {
  readonly width: number
  readonly height: number
}

export class MetricsError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'MetricsError'
  }
}

export const zero: Metrics = Object.freeze({ width: 0, height: 0 })

function assertDimension(name: keyof Metrics, value: number, requireInteger: boolean) {
  if (!Number.isFinite(value) || value < 0) {
    throw new MetricsError(`${name} must be a non-negative number, got ${value}`)
  }
  if (requireInteger && !Number.isInteger(value)) {
    throw new MetricsError(`${name} must be a whole pixel value, got ${value}`)
  }
}

/**
 * Metrics from whole pixel values.
 *
 * @throws MetricsError for negative, non-finite or fractional values
 */
export function fromInts(width: number, height: number): Metrics {
  assertDimension('width', width, true)
  assertDimension('height', height, true)
  return Object.freeze({ width, height })
}

/**
 * Metrics from fractional pixel values (e.g. devicePixelRatio-scaled sizes).
 *
 * Rounds up, never down: a viewport 0.1px short of a breakpoint must not be
 * classified as having reached it.
 *
 * @throws MetricsError for negative or non-finite values
 */
export function fromFloats(width: number, height: number): Metrics {
  assertDimension('width', width, false)
  assertDimension('height', height, false)
  return fromInts(Math.ceil(width), Math.ceil(height))
}

/** Replace both dimensions at once. The input is left untouched. */
export function set(metrics: Metrics, width: number, height: number): Metrics {
  return Object.freeze({ ...metrics, ...fromInts(width, height) })
}

/** `set` for fractional values, rounding up like `fromFloats`. */
export function setFloats(metrics: Metrics, width: number, height: number): Metrics {
  return Object.freeze({ ...metrics, ...fromFloats(width, height) })
}

export function valueOnAxis(metrics: Metrics, axis: Axis): number {
  return axis === 'width' ? metrics.width : metrics.height
}
