/**
 * Tests for exemptions.ts — Section 10 exempt allowances
 */

import { describe, it, expect } from 'vitest'
import {
  computeExemptionsNew,
  computeExemptionsOld,
  computeHRAExemption,
} from '../../src/rules/2025/exemptions'
import type { ExemptionItem, ExemptionTag } from '../../src/rules/2025/exemptions'
import { makeProfile, metroSalariedProfile } from '../fixtures/profiles'

function amountOf(items: ExemptionItem[], tag: ExemptionTag): number | undefined {
  return items.find((item) => item.tag === tag)?.amount
}

// ── HRA ──────────────────────────────────────────────────────────

describe('computeHRAExemption', () => {
  it('metro — rent minus 10% of salary is the least', () => {
    // least of 4,00,000 / 3,60,000 − 1,00,000 / 5,00,000
    expect(computeHRAExemption(metroSalariedProfile())).toBeCloseTo(260_000, 6)
  })

  it('non-metro — 40% of salary is the least', () => {
    const profile = makeProfile({
      cityType: 'non_metro',
      basicSalary: 1_000_000,
      hraReceived: 450_000,
      rentPaidAnnual: 600_000,
    })
    // least of 4,50,000 / 5,00,000 / 4,00,000
    expect(computeHRAExemption(profile)).toBeCloseTo(400_000, 6)
  })

  it('HRA received is the least', () => {
    const profile = makeProfile({
      cityType: 'metro',
      basicSalary: 1_000_000,
      hraReceived: 120_000,
      rentPaidAnnual: 600_000,
    })
    expect(computeHRAExemption(profile)).toBe(120_000)
  })

  it('includes dearness allowance in the salary base', () => {
    const profile = makeProfile({
      cityType: 'non_metro',
      basicSalary: 600_000,
      dearnessAllowance: 400_000,
      hraReceived: 500_000,
      rentPaidAnnual: 900_000,
    })
    // least of 5,00,000 / 8,00,000 / 40% of 10,00,000
    expect(computeHRAExemption(profile)).toBeCloseTo(400_000, 6)
  })

  it('is 0 when no rent is paid', () => {
    const profile = makeProfile({ basicSalary: 1_000_000, hraReceived: 400_000 })
    expect(computeHRAExemption(profile)).toBe(0)
  })

  it('is 0 when rent is below 10% of salary', () => {
    const profile = makeProfile({
      basicSalary: 1_000_000,
      hraReceived: 400_000,
      rentPaidAnnual: 50_000,
    })
    expect(computeHRAExemption(profile)).toBe(0)
  })

  it('stays within [0, HRA received] across rents and cities', () => {
    for (const cityType of ['metro', 'non_metro'] as const) {
      for (let rent = 0; rent <= 1_000_000; rent += 50_000) {
        const profile = makeProfile({
          cityType,
          basicSalary: 900_000,
          hraReceived: 300_000,
          rentPaidAnnual: rent,
        })
        const exemption = computeHRAExemption(profile)
        expect(exemption).toBeGreaterThanOrEqual(0)
        expect(exemption).toBeLessThanOrEqual(300_000)
      }
    }
  })
})

// ── Old regime ───────────────────────────────────────────────────

describe('computeExemptionsOld', () => {
  it('returns nothing for an empty profile', () => {
    expect(computeExemptionsOld(makeProfile())).toEqual([])
  })

  it('caps children allowances at two children', () => {
    const items = computeExemptionsOld(makeProfile({
      numberOfChildren: 3,
      childrenEducationAllowance: 6_000,
      hostelAllowance: 10_000,
    }))
    expect(amountOf(items, 'childrenEducation')).toBe(2_400)  // 2 × 100 × 12
    expect(amountOf(items, 'hostel')).toBe(7_200)             // 2 × 300 × 12
  })

  it('gives no children allowance without children', () => {
    const items = computeExemptionsOld(makeProfile({ childrenEducationAllowance: 6_000 }))
    expect(amountOf(items, 'childrenEducation')).toBeUndefined()
  })

  it('limits LTA, helper, uniform and conveyance to the actual amount', () => {
    const items = computeExemptionsOld(makeProfile({
      ltaReceived: 50_000,
      ltaClaimed: 30_000,
      helperAllowance: 20_000,
      helperActualExpenses: 25_000,
      uniformAllowance: 10_000,
      uniformActualExpenses: 4_000,
      conveyanceAllowance: 12_000,
      conveyanceActualExpenses: 9_000,
    }))
    expect(amountOf(items, 'lta')).toBe(30_000)
    expect(amountOf(items, 'helper')).toBe(20_000)
    expect(amountOf(items, 'uniform')).toBe(4_000)
    expect(amountOf(items, 'conveyance')).toBe(9_000)
  })

  it('caps meal vouchers at ₹50 × 2 meals × working days', () => {
    const items = computeExemptionsOld(makeProfile({ mealAllowance: 30_000 }))
    expect(amountOf(items, 'mealVoucher')).toBe(22_000)  // 220 default working days
  })

  it('uses the working-day count given', () => {
    const items = computeExemptionsOld(makeProfile({ mealAllowance: 30_000, numberOfWorkingDays: 100 }))
    expect(amountOf(items, 'mealVoucher')).toBe(10_000)
  })

  it('transport allowance is exempt only for the disabled', () => {
    const able = computeExemptionsOld(makeProfile({ transportAllowance: 50_000 }))
    const disabled = computeExemptionsOld(makeProfile({ transportAllowance: 50_000, isDisabled: true }))
    expect(amountOf(able, 'transportDisabled')).toBeUndefined()
    expect(amountOf(disabled, 'transportDisabled')).toBe(38_400)  // 3,200 × 12
  })

  it('caps gratuity at ₹20 lakh', () => {
    const items = computeExemptionsOld(makeProfile({ gratuityReceived: 2_500_000 }))
    expect(amountOf(items, 'gratuity')).toBe(2_000_000)
  })

  it('caps leave encashment at ₹25 lakh for non-government employees', () => {
    const items = computeExemptionsOld(makeProfile({ leaveEncashmentReceived: 3_000_000 }))
    expect(amountOf(items, 'leaveEncashment')).toBe(2_500_000)
  })

  it('leaves leave encashment uncapped for government employees', () => {
    const items = computeExemptionsOld(makeProfile({
      leaveEncashmentReceived: 3_000_000,
      isGovernmentEmployee: true,
    }))
    expect(amountOf(items, 'leaveEncashment')).toBe(3_000_000)
  })

  it('passes other Section 10 exemptions through', () => {
    const items = computeExemptionsOld(makeProfile({ otherSection10Exemptions: 15_000 }))
    expect(items).toEqual([{ tag: 'otherSection10', amount: 15_000 }])
  })

  it('lists items in statutory order', () => {
    const items = computeExemptionsOld(makeProfile({
      basicSalary: 1_000_000,
      hraReceived: 100_000,
      rentPaidAnnual: 300_000,
      ltaReceived: 20_000,
      ltaClaimed: 20_000,
      gratuityReceived: 10_000,
    }))
    expect(items.map((item) => item.tag)).toEqual(['hra', 'lta', 'gratuity'])
  })
})

// ── New regime ───────────────────────────────────────────────────

describe('computeExemptionsNew', () => {
  it('drops HRA, LTA and the other old-regime allowances', () => {
    const items = computeExemptionsNew(metroSalariedProfile())
    expect(items).toEqual([])
  })

  it('keeps transport for the disabled and official conveyance', () => {
    const items = computeExemptionsNew(makeProfile({
      isDisabled: true,
      transportAllowance: 20_000,
      conveyanceAllowance: 12_000,
      conveyanceActualExpenses: 9_000,
      mealAllowance: 30_000,
    }))
    expect(items).toEqual([
      { tag: 'transportDisabled', amount: 20_000 },
      { tag: 'conveyance', amount: 9_000 },
    ])
  })

  it('caps gratuity at ₹5 lakh', () => {
    const items = computeExemptionsNew(makeProfile({ gratuityReceived: 2_500_000 }))
    expect(amountOf(items, 'gratuity')).toBe(500_000)
  })

  it('keeps leave encashment with the same cap', () => {
    const items = computeExemptionsNew(makeProfile({ leaveEncashmentReceived: 3_000_000 }))
    expect(amountOf(items, 'leaveEncashment')).toBe(2_500_000)
  })
})
