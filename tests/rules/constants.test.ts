/**
 * Sanity checks on the FY 2025-26 tables.
 */

import { describe, it, expect } from 'vitest'
import {
  NEW_REGIME_SLABS,
  OLD_REGIME_SLABS,
  SURCHARGE_NEW,
  SURCHARGE_OLD,
} from '../../src/rules/2025/constants'
import type { SurchargeBand, TaxSlab } from '../../src/rules/2025/constants'

function expectWellFormed(slabs: readonly TaxSlab[]) {
  const bounds = slabs.slice(0, -1).map((slab) => slab.upTo)
  for (let i = 1; i < bounds.length; i++) {
    expect(bounds[i] ?? 0).toBeGreaterThan(bounds[i - 1] ?? 0)
  }
  for (let i = 1; i < slabs.length; i++) {
    expect(slabs[i].rate).toBeGreaterThanOrEqual(slabs[i - 1].rate)
  }
  expect(slabs[slabs.length - 1].upTo).toBeNull()
  expect(bounds.every((bound) => bound !== null)).toBe(true)
}

function expectAscending(bands: readonly SurchargeBand[]) {
  for (let i = 1; i < bands.length; i++) {
    expect(bands[i].above).toBeGreaterThan(bands[i - 1].above)
    expect(bands[i].rate).toBeGreaterThan(bands[i - 1].rate)
  }
}

describe('slab tables', () => {
  it('new regime slabs are ascending and open-ended', () => {
    expectWellFormed(NEW_REGIME_SLABS)
    expect(NEW_REGIME_SLABS).toHaveLength(7)
  })

  it('old regime slabs are ascending and open-ended for every age', () => {
    expectWellFormed(OLD_REGIME_SLABS.below_60)
    expectWellFormed(OLD_REGIME_SLABS.senior)
    expectWellFormed(OLD_REGIME_SLABS.super_senior)
  })

  it('nil slab widens with age', () => {
    expect(OLD_REGIME_SLABS.below_60[0].upTo).toBe(250_000)
    expect(OLD_REGIME_SLABS.senior[0].upTo).toBe(300_000)
    expect(OLD_REGIME_SLABS.super_senior[0].upTo).toBe(500_000)
  })
})

describe('surcharge tables', () => {
  it('are ascending', () => {
    expectAscending(SURCHARGE_OLD)
    expectAscending(SURCHARGE_NEW)
  })

  it('old regime tops out at 37%, new at 25%', () => {
    expect(SURCHARGE_OLD[SURCHARGE_OLD.length - 1].rate).toBe(0.37)
    expect(SURCHARGE_NEW[SURCHARGE_NEW.length - 1].rate).toBe(0.25)
  })
})
