/**
 * Tests for section16.ts — deductions from salary
 */

import { describe, it, expect } from 'vitest'
import { computeSection16New, computeSection16Old } from '../../src/rules/2025/section16'
import { makeProfile } from '../fixtures/profiles'

describe('computeSection16Old', () => {
  it('always grants the ₹50,000 standard deduction', () => {
    expect(computeSection16Old(makeProfile())).toEqual([
      { tag: 'standardDeduction', amount: 50_000 },
    ])
  })

  it('caps professional tax at ₹2,500', () => {
    const items = computeSection16Old(makeProfile({ professionalTaxPaid: 3_000 }))
    expect(items).toContainEqual({ tag: 'professionalTax', amount: 2_500 })
  })

  it('allows professional tax below the cap in full', () => {
    const items = computeSection16Old(makeProfile({ professionalTaxPaid: 1_800 }))
    expect(items).toContainEqual({ tag: 'professionalTax', amount: 1_800 })
  })

  it('entertainment allowance — least of actual, one-fifth of basic, ₹5,000', () => {
    const items = computeSection16Old(makeProfile({
      isGovernmentEmployee: true,
      basicSalary: 20_000,
      entertainmentAllowance: 10_000,
    }))
    expect(items).toContainEqual({ tag: 'entertainmentAllowance', amount: 4_000 })
  })

  it('entertainment allowance — ₹5,000 ceiling', () => {
    const items = computeSection16Old(makeProfile({
      isGovernmentEmployee: true,
      basicSalary: 600_000,
      entertainmentAllowance: 10_000,
    }))
    expect(items).toContainEqual({ tag: 'entertainmentAllowance', amount: 5_000 })
  })

  it('no entertainment allowance for non-government employees', () => {
    const items = computeSection16Old(makeProfile({
      basicSalary: 600_000,
      entertainmentAllowance: 10_000,
    }))
    expect(items.map((item) => item.tag)).toEqual(['standardDeduction'])
  })
})

describe('computeSection16New', () => {
  it('grants only the ₹75,000 standard deduction', () => {
    const items = computeSection16New(makeProfile({
      professionalTaxPaid: 2_500,
      isGovernmentEmployee: true,
      basicSalary: 600_000,
      entertainmentAllowance: 10_000,
    }))
    expect(items).toEqual([{ tag: 'standardDeduction', amount: 75_000 }])
  })
})
