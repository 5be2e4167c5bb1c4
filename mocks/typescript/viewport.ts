/**
 * Viewport mocks for testing (browser / jsdom only).
 *
 * jsdom has no layout engine: window.matchMedia is missing and
 * innerWidth/innerHeight are fixed. These helpers fake both so hooks can
 * be driven through resize and media-query changes.
 *
 * - installViewport() - sets innerWidth/innerHeight and a matchMedia that
 *   evaluates min-/max- width/height queries against them
 * - resizeViewport() - changes the size, fires `resize` and `change` events
 */

export interface ViewportSize {
  width: number;
  height: number;
}

export interface InstallViewportOptions {
  /** Register listeners through the legacy addListener API only. */
  legacyListeners?: boolean;
}

const FEATURE_PATTERN = /\((min|max)-(width|height):\s*(\d+(?:\.\d+)?)px\)/g;

let current: ViewportSize = { width: 1024, height: 768 };
const liveLists = new Set<FakeMediaQueryList>();

/**
 * Evaluate a media query list (comma-separated alternatives, each a chain
 * of `and`ed min-/max- features) against a viewport size.
 */
export function evaluateMediaQuery(query: string, size: ViewportSize): boolean {
  return query.split(",").some((alternative) => {
    for (const [, bound, dimension, px] of alternative.matchAll(FEATURE_PATTERN)) {
      const actual = dimension === "width" ? size.width : size.height;
      const limit = Number(px);
      if (bound === "min" && actual < limit) return false;
      if (bound === "max" && actual > limit) return false;
    }
    return true;
  });
}

class FakeMediaQueryList extends EventTarget {
  matches: boolean;
  onchange: ((event: Event) => void) | null = null;
  private legacy = new Set<(event: Event) => void>();

  constructor(
    readonly media: string,
    legacyOnly: boolean,
  ) {
    super();
    this.matches = evaluateMediaQuery(media, current);
    if (legacyOnly) {
      Object.defineProperty(this, "addEventListener", { value: undefined });
      Object.defineProperty(this, "removeEventListener", { value: undefined });
    }
  }

  addListener(listener: (event: Event) => void) {
    this.legacy.add(listener);
  }

  removeListener(listener: (event: Event) => void) {
    this.legacy.delete(listener);
  }

  get legacyListenerCount(): number {
    return this.legacy.size;
  }

  refresh() {
    const matches = evaluateMediaQuery(this.media, current);
    if (matches === this.matches) return;
    this.matches = matches;
    const event = Object.assign(new Event("change"), { matches, media: this.media });
    this.dispatchEvent(event);
    this.legacy.forEach((listener) => listener(event));
    this.onchange?.(event);
  }
}

function defineWindowValue(key: string, value: unknown) {
  Object.defineProperty(window, key, { configurable: true, writable: true, value });
}

/**
 * Install a fake viewport on the jsdom window.
 * Returns every media query list created so far, for assertions.
 */
export function installViewport(size: ViewportSize, options: InstallViewportOptions = {}) {
  current = { ...size };
  liveLists.clear();
  defineWindowValue("innerWidth", size.width);
  defineWindowValue("innerHeight", size.height);
  defineWindowValue("matchMedia", (query: string) => {
    const list = new FakeMediaQueryList(query, options.legacyListeners ?? false);
    liveLists.add(list);
    return list;
  });
  return { lists: liveLists };
}

/** Remove the fake matchMedia, leaving jsdom's default (absent) behavior. */
export function uninstallViewport() {
  liveLists.clear();
  defineWindowValue("matchMedia", undefined);
}

/**
 * Change the viewport size. Fires `resize` on window, then `change` on
 * every media query list whose result flipped.
 */
export function resizeViewport(width: number, height: number) {
  current = { width, height };
  defineWindowValue("innerWidth", width);
  defineWindowValue("innerHeight", height);
  window.dispatchEvent(new Event("resize"));
  liveLists.forEach((list) => list.refresh());
}
