/**
 * Environment utilities for consistent environment checks across the library.
 *
 * Vite (and Vitest) replace import.meta.env at build time, so consumers
 * bundling with Vite get dev-only diagnostics stripped from production.
 * Other loaders (plain Node, webpack, Jest) leave import.meta.env undefined,
 * which reads as a production build.
 */

type EnvFlags = { readonly DEV?: boolean }

/** Read the dev flag from an env object that may be missing. */
export function readDevFlag(env: EnvFlags | undefined): boolean {
  return env?.DEV ?? false
}

/**
 * Check if the library is running in a development build.
 */
export function isDev(): boolean {
  return readDevFlag(import.meta.env)
}
