import { afterEach, describe, expect, it, vi } from 'vitest'
import { FINE_WIDTH_MINIMUMS, HEIGHT_MINIMUMS } from '../../breakpoints'
import { expectBucketError } from '../../test/assertions'
import { fromInts } from '../metrics/metrics'
import { boundaryEquals, create, fixed, inBucket, isFixed, unbounded } from './bucket'
import {
  broadWidthTier,
  buildTier,
  classify,
  fineWidthTier,
  findBucket,
  handset,
  handset1,
  handset3,
  heightTier,
  limited,
  medium,
  portable,
  portable1,
  portable2,
  portable3,
  reportCatalogIssues,
  tall,
  toBroadWidth,
  toFineWidth,
  toHeightBucket,
  wide,
  wide1,
  wide2,
} from './catalog'
import type { TierEntry } from './types'
import { validateTier } from './validate'

const SCAN_LIMIT = 3000

function containingTags(tier: readonly TierEntry[], value: number): string[] {
  return tier.filter(entry => inBucket(entry.bucket, value)).map(entry => entry.tag)
}

describe('bucket catalog', () => {
  describe('partition', () => {
    const tiers = { 'fine width': fineWidthTier, 'broad width': broadWidthTier, height: heightTier }

    for (const [name, tier] of Object.entries(tiers)) {
      it(`places every value in exactly one ${name} bucket`, () => {
        for (let value = 0; value <= SCAN_LIMIT; value++) {
          expect(containingTags(tier, value)).toHaveLength(1)
        }
      })
    }

    it('passes tier validation', () => {
      expect(validateTier(fineWidthTier)).toEqual([])
      expect(validateTier(broadWidthTier)).toEqual([])
      expect(validateTier(heightTier)).toEqual([])
    })
  })

  describe('contiguity', () => {
    it("ends each fine bucket one pixel before the next one's minimum", () => {
      for (let i = 0; i < fineWidthTier.length - 1; i++) {
        const { max } = fineWidthTier[i].bucket
        const { min } = fineWidthTier[i + 1].bucket
        if (!isFixed(min)) throw new Error(`${fineWidthTier[i + 1].tag} has no fixed minimum`)
        expect(max).toEqual(fixed(min.value - 1))
      }
    })

    it('builds fine minimums straight from the breakpoint table', () => {
      const minimums = fineWidthTier.slice(1).map(entry => entry.bucket.min)
      expect(minimums).toEqual(FINE_WIDTH_MINIMUMS.map(value => fixed(value)))
      expect(heightTier.slice(1).map(entry => entry.bucket.min)).toEqual(
        HEIGHT_MINIMUMS.map(value => fixed(value))
      )
    })

    it('leaves the extremes open', () => {
      expect(handset1.min).toBe(unbounded)
      expect(wide2.max).toBe(unbounded)
      expect(limited.min).toBe(unbounded)
      expect(tall.max).toBe(unbounded)
      expect(inBucket(handset1, 0)).toBe(true)
      expect(inBucket(wide2, 100000)).toBe(true)
      expect(inBucket(tall, 100000)).toBe(true)
    })
  })

  describe('broad buckets', () => {
    it('span their first and last fine bucket', () => {
      expect(handset.min).toBe(handset1.min)
      expect(boundaryEquals(handset.max, handset3.max)).toBe(true)
      expect(portable.min).toBe(portable1.min)
      expect(boundaryEquals(portable.max, portable3.max)).toBe(true)
      expect(wide.min).toBe(wide1.min)
      expect(wide.max).toBe(wide2.max)
    })

    it('cover the published ranges', () => {
      expect(handset).toEqual({ axis: 'width', min: unbounded, max: fixed(511) })
      expect(portable).toEqual({ axis: 'width', min: fixed(512), max: fixed(1279) })
      expect(wide).toEqual({ axis: 'width', min: fixed(1280), max: unbounded })
    })
  })

  describe('height buckets', () => {
    it('reuse the portable width cut-offs as numbers', () => {
      expect(medium).toEqual({ axis: 'height', min: fixed(512), max: fixed(863) })
      expect(boundaryEquals(medium.min, portable1.min)).toBe(true)
      expect(boundaryEquals(tall.min, portable2.min)).toBe(true)
    })
  })

  describe('classification', () => {
    it('classifies fine width at the published boundaries', () => {
      const widths = [0, 351, 352, 383, 384, 511, 512]
      expect(widths.map(toFineWidth)).toEqual([
        'handset1',
        'handset1',
        'handset2',
        'handset2',
        'handset3',
        'handset3',
        'portable1',
      ])
    })

    it('classifies the upper fine buckets', () => {
      expect(toFineWidth(863)).toBe('portable1')
      expect(toFineWidth(864)).toBe('portable2')
      expect(toFineWidth(1023)).toBe('portable2')
      expect(toFineWidth(1024)).toBe('portable3')
      expect(toFineWidth(1279)).toBe('portable3')
      expect(toFineWidth(1280)).toBe('wide1')
      expect(toFineWidth(1599)).toBe('wide1')
      expect(toFineWidth(1600)).toBe('wide2')
      expect(toFineWidth(100000)).toBe('wide2')
    })

    it('never moves to a lower fine bucket as width grows', () => {
      const order = fineWidthTier.map(entry => entry.tag)
      let previous = 0
      for (let width = 0; width <= SCAN_LIMIT; width++) {
        const index = order.indexOf(toFineWidth(width))
        expect(index).toBeGreaterThanOrEqual(previous)
        previous = index
      }
      expect(previous).toBe(order.length - 1)
    })

    it('classifies broad width and height', () => {
      expect(toBroadWidth(511)).toBe('handset')
      expect(toBroadWidth(512)).toBe('portable')
      expect(toBroadWidth(1280)).toBe('wide')
      expect(toHeightBucket(511)).toBe('limited')
      expect(toHeightBucket(512)).toBe('medium')
      expect(toHeightBucket(864)).toBe('tall')
    })

    it('classifies metrics on every tier at once', () => {
      expect(classify(fromInts(700, 400))).toEqual({
        broadWidth: 'portable',
        fineWidth: 'portable1',
        height: 'limited',
      })
      expect(classify(fromInts(1920, 1080))).toEqual({
        broadWidth: 'wide',
        fineWidth: 'wide2',
        height: 'tall',
      })
    })
  })

  describe('findBucket', () => {
    it('looks up buckets from every tier', () => {
      expect(findBucket('portable2')).toBe(portable2)
      expect(findBucket('portable')).toBe(portable)
      expect(findBucket('tall')).toBe(tall)
    })
  })

  describe('buildTier', () => {
    it('builds contiguous buckets from a table', () => {
      const tier = buildTier('height', ['short', 'long'], [100])
      expect(tier).toEqual([
        { tag: 'short', bucket: { axis: 'height', min: unbounded, max: fixed(99) } },
        { tag: 'long', bucket: { axis: 'height', min: fixed(100), max: unbounded } },
      ])
    })

    it('builds a single open bucket from an empty table', () => {
      expect(buildTier('width', ['any'], [])).toEqual([
        { tag: 'any', bucket: { axis: 'width', min: unbounded, max: unbounded } },
      ])
    })

    it('rejects a table with the wrong number of minimums', () => {
      expectBucketError(() => buildTier('width', ['a', 'b', 'c'], [100]), 'TABLE_MISMATCH')
    })

    it('rejects minimums that do not ascend', () => {
      expectBucketError(() => buildTier('width', ['a', 'b', 'c'], [100, 100]), 'UNSORTED_TABLE')
      expectBucketError(() => buildTier('width', ['a', 'b', 'c'], [200, 100]), 'UNSORTED_TABLE')
    })

    it('rejects a zero minimum', () => {
      expectBucketError(() => buildTier('width', ['a', 'b'], [0]), 'INVALID_BOUNDARY')
    })
  })
})

describe('reportCatalogIssues', () => {
  const gappy: TierEntry[] = [
    { tag: 'low', bucket: create('width', unbounded, fixed(99)) },
    { tag: 'high', bucket: create('width', fixed(110), unbounded) },
  ]

  afterEach(() => {
    vi.unstubAllEnvs()
    vi.restoreAllMocks()
  })

  it('warns about a tier with a gap in dev builds', () => {
    vi.stubEnv('DEV', true)
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    reportCatalogIssues({ broken: gappy, fineWidth: fineWidthTier })
    expect(warn).toHaveBeenCalledTimes(1)
    expect(warn).toHaveBeenCalledWith('[screen-buckets]', 'broken tier does not partition its axis:', [
      { kind: 'gap', below: 'low', above: 'high', missing: [100, 109] },
    ])
  })

  it('stays silent for the shipped catalog', () => {
    vi.stubEnv('DEV', true)
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    reportCatalogIssues({ fineWidth: fineWidthTier, broadWidth: broadWidthTier, height: heightTier })
    expect(warn).not.toHaveBeenCalled()
  })

  it('logs nothing in production builds', () => {
    vi.stubEnv('DEV', false)
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    reportCatalogIssues({ broken: gappy })
    expect(warn).not.toHaveBeenCalled()
  })

  it('loads and classifies in a production build', async () => {
    vi.stubEnv('DEV', false)
    vi.resetModules()
    const catalog = await import('./catalog')
    expect(catalog.toFineWidth(512)).toBe('portable1')
  })
})
