/**
 * Tests for salary.ts — gross salary and employer contributions
 */

import { describe, it, expect } from 'vitest'
import {
  SALARY_COMPONENTS,
  basicPlusDA,
  computeGrossSalary,
  taxableEmployerContribution,
} from '../../src/rules/2025/salary'
import { makeProfile, metroSalariedProfile } from '../fixtures/profiles'

describe('computeGrossSalary', () => {
  it('is 0 for an empty profile', () => {
    expect(computeGrossSalary(makeProfile())).toBe(0)
  })

  it('sums every salary component', () => {
    // 10,00,000 + 4,00,000 + 2,00,000 + 50,000
    expect(computeGrossSalary(metroSalariedProfile())).toBe(1_650_000)
  })

  it('counts each of the nineteen components once', () => {
    const profile = makeProfile()
    for (const field of SALARY_COMPONENTS) profile[field] = 1_000
    expect(computeGrossSalary(profile)).toBe(19_000)
  })

  it('ignores deduction and house-property fields', () => {
    const profile = makeProfile({
      basicSalary: 500_000,
      ppfContribution: 100_000,
      rentalIncomeAnnual: 200_000,
      otherIncome: 10_000,
    })
    expect(computeGrossSalary(profile)).toBe(500_000)
  })

  it('adds employer contributions above ₹7.5 lakh', () => {
    const profile = makeProfile({
      basicSalary: 2_000_000,
      employerEpfContribution: 500_000,
      employerNpsContribution: 300_000,
    })
    expect(computeGrossSalary(profile)).toBe(2_050_000)
  })
})

describe('taxableEmployerContribution', () => {
  it('is 0 within the combined limit', () => {
    const profile = makeProfile({
      employerEpfContribution: 400_000,
      employerNpsContribution: 200_000,
      employerSuperannuationContribution: 150_000,
    })
    expect(taxableEmployerContribution(profile)).toBe(0)
  })

  it('is the excess over ₹7,50,000', () => {
    const profile = makeProfile({
      employerEpfContribution: 400_000,
      employerNpsContribution: 200_000,
      employerSuperannuationContribution: 250_000,
    })
    expect(taxableEmployerContribution(profile)).toBe(100_000)
  })
})

describe('basicPlusDA', () => {
  it('adds basic salary and dearness allowance', () => {
    expect(basicPlusDA(makeProfile({ basicSalary: 800_000, dearnessAllowance: 200_000 }))).toBe(1_000_000)
  })
})
