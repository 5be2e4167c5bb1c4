import { useEffect, useState } from 'react'
import { fromFloats, setFloats, zero, type Metrics } from './metrics'

/** Current window size, or `zero` when there is no window (server rendering). */
export function readViewport(): Metrics {
  if (typeof window === 'undefined') return zero
  return fromFloats(window.innerWidth, window.innerHeight)
}

/**
 * Current viewport size, updated on every `resize`.
 *
 * Each event produces one new Metrics value holding both dimensions; an
 * update that rounds to the same size keeps the previous object so
 * consumers don't re-render.
 */
export function useScreenMetrics(): Metrics {
  const [metrics, setMetrics] = useState<Metrics>(readViewport)

  useEffect(() => {
    const onResize = () => {
      setMetrics(prev => {
        const next = setFloats(prev, window.innerWidth, window.innerHeight)
        return next.width === prev.width && next.height === prev.height ? prev : next
      })
    }
    window.addEventListener('resize', onResize)
    // Catch resizes between first render and subscription
    onResize()
    return () => window.removeEventListener('resize', onResize)
  }, [])

  return metrics
}
