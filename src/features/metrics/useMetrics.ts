import { createContext, useContext } from 'react'
import { isIn } from '../buckets/bucket'
import { classify, type Classification } from '../buckets/catalog'
import type { Bucket } from '../buckets/types'
import type { Metrics } from './metrics'

export const ScreenMetricsCtx = createContext<Metrics | null>(null)

export function useMetrics(): Metrics {
  const context = useContext(ScreenMetricsCtx)
  if (!context) throw new Error('useMetrics must be used within a ScreenMetricsProvider')
  return context
}

/** Whether the shared viewport metrics fall in any of `buckets`. */
export function useIsIn(buckets: readonly Bucket[]): boolean {
  return isIn(buckets, useMetrics())
}

export function useClassification(): Classification {
  return classify(useMetrics())
}
