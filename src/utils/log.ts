import { isDev } from './env'

const LOG_PREFIX = '[screen-buckets]'

export function logWarn(...args: unknown[]) {
  if (isDev()) {
    console.warn(LOG_PREFIX, ...args)
  }
}
