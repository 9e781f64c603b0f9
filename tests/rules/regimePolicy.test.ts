/**
 * Tests for regimePolicy.ts — what each regime allows
 */

import { describe, it, expect } from 'vitest'
import { NEW_REGIME, OLD_REGIME, getRegimePolicy } from '../../src/rules/2025/regimePolicy'
import {
  NEW_REGIME_SLABS,
  OLD_REGIME_SLABS,
  REBATE_87A_NEW,
  REBATE_87A_OLD,
  SURCHARGE_NEW,
  SURCHARGE_OLD,
} from '../../src/rules/2025/constants'

describe('getRegimePolicy', () => {
  it('resolves both regimes', () => {
    expect(getRegimePolicy('old')).toBe(OLD_REGIME)
    expect(getRegimePolicy('new')).toBe(NEW_REGIME)
  })
})

describe('OLD_REGIME', () => {
  it('picks slabs by age', () => {
    expect(OLD_REGIME.slabs('below_60')).toBe(OLD_REGIME_SLABS.below_60)
    expect(OLD_REGIME.slabs('senior')).toBe(OLD_REGIME_SLABS.senior)
    expect(OLD_REGIME.slabs('super_senior')).toBe(OLD_REGIME_SLABS.super_senior)
  })

  it('uses the old rebate and surcharge tables', () => {
    expect(OLD_REGIME.rebate).toBe(REBATE_87A_OLD)
    expect(OLD_REGIME.surcharge).toBe(SURCHARGE_OLD)
    expect(OLD_REGIME.allowsSelfOccupiedInterest).toBe(true)
  })
})

describe('NEW_REGIME', () => {
  it('uses one slab table for every age', () => {
    expect(NEW_REGIME.slabs('below_60')).toBe(NEW_REGIME_SLABS)
    expect(NEW_REGIME.slabs('super_senior')).toBe(NEW_REGIME_SLABS)
  })

  it('uses the new rebate and surcharge tables', () => {
    expect(NEW_REGIME.rebate).toBe(REBATE_87A_NEW)
    expect(NEW_REGIME.surcharge).toBe(SURCHARGE_NEW)
    expect(NEW_REGIME.allowsSelfOccupiedInterest).toBe(false)
  })

  it('has display labels', () => {
    expect(OLD_REGIME.label).toBe('Old Regime')
    expect(NEW_REGIME.label).toBe('New Regime')
  })
})
