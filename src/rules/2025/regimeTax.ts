/**
 * Regime tax pipeline — total liability for one regime.
 *
 * Steps, strictly in order (each reads only earlier results):
 *   1  gross salary
 *   2  Section 10 exemptions
 *   3  income from salary          = gross − exemptions
 *   4  Section 16 deductions
 *   5  net salary income           = max(0, income from salary − Section 16)
 *   6  income from house property  (signed)
 *   7  other income                = other interest + other income + savings interest
 *   8  gross total income          = 5 + 6 + 7
 *   9  Chapter VI-A deductions
 *  10  taxable income              = max(0, gross total − Chapter VI-A)
 *  11  tax on income               (slabs)
 *  12  rebate u/s 87A
 *  13  tax after rebate            = max(0, tax − rebate)
 *  14  surcharge
 *  15  cess                        = 4% of (tax after rebate + surcharge)
 *  16  total tax, effective rate   = total / gross salary × 100
 *
 * All amounts are in rupees and left unrounded.
 */

import type { Regime, TaxpayerProfile } from '../../model/types'
import { freezeLineItems, sumLineItems } from '../../model/types'
import { computeGrossSalary } from './salary'
import type { ExemptionItem } from './exemptions'
import type { Section16Item } from './section16'
import { computeHouseProperty } from './houseProperty'
import type { HousePropertyItem } from './houseProperty'
import type { ChapterVIAItem } from './chapterVIA'
import { computeCess, computeRebate87A, computeSlabTax, computeSurcharge } from './taxComputation'
import { getRegimePolicy } from './regimePolicy'
import type { RegimePolicy } from './regimePolicy'

// ── Result type ──────────────────────────────────────────────────

export interface RegimeBreakdown {
  regime: Regime
  grossSalary: number

  exemptions: readonly Readonly<ExemptionItem>[]
  totalExemptions: number
  incomeFromSalary: number

  section16Deductions: readonly Readonly<Section16Item>[]
  totalSection16: number
  netSalaryIncome: number

  incomeFromHouseProperty: number        // signed
  housePropertyItems: readonly Readonly<HousePropertyItem>[]
  housePropertyLossCapped: boolean

  otherIncome: number
  grossTotalIncome: number

  chapterVIADeductions: readonly Readonly<ChapterVIAItem>[]
  totalChapterVIA: number
  preventiveHealthCheckup: number        // informational, not deducted

  taxableIncome: number
  taxOnIncome: number
  rebate87A: number
  taxAfterRebate: number
  surcharge: number
  cess: number
  totalTax: number

  effectiveTaxRate: number               // percent of gross salary
}

// ── Pipeline ─────────────────────────────────────────────────────

export function computeWithPolicy(
  profile: TaxpayerProfile,
  policy: RegimePolicy,
): Readonly<RegimeBreakdown> {
  const grossSalary = computeGrossSalary(profile)

  const exemptions = freezeLineItems(policy.exemptions(profile))
  const totalExemptions = sumLineItems(exemptions)
  const incomeFromSalary = grossSalary - totalExemptions

  const section16Deductions = freezeLineItems(policy.section16(profile))
  const totalSection16 = sumLineItems(section16Deductions)
  const netSalaryIncome = Math.max(0, incomeFromSalary - totalSection16)

  const houseProperty = computeHouseProperty(profile, {
    allowSelfOccupiedInterest: policy.allowsSelfOccupiedInterest,
  })

  const otherIncome =
    profile.interestIncomeOther + profile.otherIncome + profile.savingsAccountInterest

  const grossTotalIncome = netSalaryIncome + houseProperty.netIncome + otherIncome

  const chapterVIA = policy.chapterVIA(profile)
  const chapterVIADeductions = freezeLineItems(chapterVIA.items)
  const totalChapterVIA = sumLineItems(chapterVIADeductions)
  const taxableIncome = Math.max(0, grossTotalIncome - totalChapterVIA)

  const taxOnIncome = computeSlabTax(taxableIncome, policy.slabs(profile.ageCategory))
  const rebate87A = computeRebate87A(taxableIncome, taxOnIncome, policy.rebate)
  const taxAfterRebate = Math.max(0, taxOnIncome - rebate87A)
  const surcharge = computeSurcharge(taxableIncome, taxAfterRebate, policy.surcharge)
  const cess = computeCess(taxAfterRebate, surcharge)
  const totalTax = taxAfterRebate + surcharge + cess

  const effectiveTaxRate = grossSalary > 0 ? (totalTax / grossSalary) * 100 : 0

  return Object.freeze({
    regime: policy.regime,
    grossSalary,
    exemptions,
    totalExemptions,
    incomeFromSalary,
    section16Deductions,
    totalSection16,
    netSalaryIncome,
    incomeFromHouseProperty: houseProperty.netIncome,
    housePropertyItems: freezeLineItems(houseProperty.items),
    housePropertyLossCapped: houseProperty.lossCapped,
    otherIncome,
    grossTotalIncome,
    chapterVIADeductions,
    totalChapterVIA,
    preventiveHealthCheckup: chapterVIA.preventiveHealthCheckup,
    taxableIncome,
    taxOnIncome,
    rebate87A,
    taxAfterRebate,
    surcharge,
    cess,
    totalTax,
    effectiveTaxRate,
  })
}

/** Compute the full breakdown for one regime. */
export function computeRegimeTax(profile: TaxpayerProfile, regime: Regime): Readonly<RegimeBreakdown> {
  return computeWithPolicy(profile, getRegimePolicy(regime))
}
