/**
 * Shared mocks for TypeScript test environments.
 *
 *   import { installViewport, resizeViewport } from '../../mocks/typescript'
 *
 * Everything here touches `window` and needs a DOM (jsdom under Vitest).
 */

// Viewport mocks
export {
  evaluateMediaQuery,
  installViewport,
  resizeViewport,
  uninstallViewport,
  type InstallViewportOptions,
  type ViewportSize,
} from "./viewport";
