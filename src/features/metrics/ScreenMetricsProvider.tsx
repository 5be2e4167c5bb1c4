import React from 'react'
import { ScreenMetricsCtx } from './useMetrics'
import { useScreenMetrics } from './useScreenMetrics'

type ProviderProps = {
  children: React.ReactNode
}

/** Shares one resize subscription with every `useMetrics` consumer below it. */
export function ScreenMetricsProvider({ children }: ProviderProps) {
  const metrics = useScreenMetrics()
  return <ScreenMetricsCtx.Provider value={metrics}>{children}</ScreenMetricsCtx.Provider>
}
