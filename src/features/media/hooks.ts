import { useEffect, useState } from 'react'
import { logWarn } from '../../utils/log'
import type { Bucket } from '../buckets/types'
import { toMediaString } from './mediaQuery'

/** False during server rendering and in environments without matchMedia. */
export const canMatchMedia = () => typeof window !== 'undefined' && typeof window.matchMedia === 'function'

export const useMediaQuery = (query: string) => {
  const [matches, setMatches] = useState<boolean>(() => (canMatchMedia() ? window.matchMedia(query).matches : false))
  useEffect(() => {
    if (!canMatchMedia()) {
      logWarn('window.matchMedia is unavailable; media query treated as not matching:', query)
      return
    }
    const mql = window.matchMedia(query)
    const onChange = (e: MediaQueryListEvent) => setMatches(e.matches)
    // Prefer standard EventTarget API; fallback for older Safari
    if (typeof mql.addEventListener === 'function') {
      mql.addEventListener('change', onChange)
    } else {
      mql.addListener(onChange)
    }
    setMatches(mql.matches)
    return () => {
      if (typeof mql.removeEventListener === 'function') {
        mql.removeEventListener('change', onChange)
      } else {
        mql.removeListener(onChange)
      }
    }
  }, [query])
  return matches
}

/** Whether the viewport currently falls inside `bucket`, per the browser. */
export const useBucketMediaQuery = (bucket: Bucket) => useMediaQuery(toMediaString(bucket))
