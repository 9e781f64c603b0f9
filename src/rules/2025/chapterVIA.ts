/**
 * Chapter VI-A — Deductions from gross total income
 *
 * Old regime: sixteen sections, some pooled (80C), some tiered by age or
 * severity, one age-gated pair (80TTA for under-60s, 80TTB for seniors).
 * New regime: only 80CCD(2), employer NPS contribution.
 */

import type { LineItem, TaxpayerProfile } from '../../model/types'
import {
  SEC_80CCD_1B_LIMIT,
  SEC_80CCD_2_RATE,
  SEC_80C_LIMIT,
  SEC_80DDB_NORMAL,
  SEC_80DDB_SENIOR,
  SEC_80DD_NORMAL,
  SEC_80DD_SEVERE,
  SEC_80D_PARENTS,
  SEC_80D_PARENTS_SENIOR,
  SEC_80D_PREVENTIVE,
  SEC_80D_SELF,
  SEC_80D_SELF_SENIOR,
  SEC_80EEA_LIMIT,
  SEC_80EEB_LIMIT,
  SEC_80EE_LIMIT,
  SEC_80GG_MONTHLY,
  SEC_80G_HALF_RATE,
  SEC_80TTA_LIMIT,
  SEC_80TTB_LIMIT,
  SEC_80U_NORMAL,
  SEC_80U_SEVERE,
} from './constants'
import { basicPlusDA } from './salary'

// ── Result types ──────────────────────────────────────────────────

export type ChapterVIATag =
  | '80C'
  | '80CCD(1B)'
  | '80CCD(2)'
  | '80D'
  | '80DD'
  | '80DDB'
  | '80E'
  | '80EE'
  | '80EEA'
  | '80EEB'
  | '80G-100'
  | '80G-50'
  | '80GG'
  | '80TTA'
  | '80TTB'
  | '80U'

export type ChapterVIAItem = LineItem<ChapterVIATag>

export interface ChapterVIAResult {
  items: ChapterVIAItem[]
  /**
   * 80D preventive check-up, capped at ₹5,000. Computed for display but
   * not added to the 80D amount: the self and parent caps already cover it.
   */
  preventiveHealthCheckup: number
}

// ── Helpers ───────────────────────────────────────────────────────

/** Fields pooled under the 80C ceiling (with 80CCC and 80CCD(1)). */
export const SEC_80C_FIELDS = [
  'epfContributionEmployee',
  'ppfContribution',
  'lifeInsurancePremium',
  'elssInvestment',
  'nscInvestment',
  'sukanyaSamriddhi',
  'taxSaverFd',
  'tuitionFees',
  'homeLoanPrincipal',
  'scssInvestment',
  'other80c',
  'pensionFundContribution',
] as const satisfies readonly (keyof TaxpayerProfile)[]

function isSenior(profile: TaxpayerProfile): boolean {
  return profile.ageCategory !== 'below_60'
}

/** 80CCD(2): employer NPS up to 14% of basic + DA. Same in both regimes. */
export function computeEmployerNPSDeduction(profile: TaxpayerProfile): number {
  return Math.min(profile.employerNpsContribution, basicPlusDA(profile) * SEC_80CCD_2_RATE)
}

export function computeSection80C(profile: TaxpayerProfile): number {
  const pooled = SEC_80C_FIELDS.reduce((sum, field) => sum + profile[field], 0)
  const total = pooled + Math.min(profile.employeeNpsContribution, SEC_80C_LIMIT)
  return Math.min(total, SEC_80C_LIMIT)
}

export function computeSection80D(profile: TaxpayerProfile): number {
  const selfLimit = isSenior(profile) ? SEC_80D_SELF_SENIOR : SEC_80D_SELF
  const parentsLimit = profile.parentsAreSeniorCitizen ? SEC_80D_PARENTS_SENIOR : SEC_80D_PARENTS
  return (
    Math.min(profile.healthInsuranceSelf, selfLimit) +
    Math.min(profile.healthInsuranceParents, parentsLimit)
  )
}

export function computePreventiveCheckup(profile: TaxpayerProfile): number {
  return Math.min(profile.preventiveHealthCheckup, SEC_80D_PREVENTIVE)
}

function collect(entries: [ChapterVIATag, number][]): ChapterVIAItem[] {
  return entries
    .filter(([, amount]) => amount > 0)
    .map(([tag, amount]) => ({ tag, amount }))
}

// ── Old regime ────────────────────────────────────────────────────

export function computeChapterVIAOld(profile: TaxpayerProfile): ChapterVIAResult {
  const senior = isSenior(profile)

  const sec80DD = profile.disabledDependentExpenses > 0
    ? (profile.isSevereDisability ? SEC_80DD_SEVERE : SEC_80DD_NORMAL)
    : 0

  const sec80DDB = Math.min(
    profile.medicalTreatmentExpenses,
    senior ? SEC_80DDB_SENIOR : SEC_80DDB_NORMAL,
  )

  // 80GG is for those who receive no HRA at all
  const sec80GG = profile.hraReceived === 0
    ? Math.min(profile.rentPaidNoHra, SEC_80GG_MONTHLY * 12)
    : 0

  const sec80TTA = senior ? 0 : Math.min(profile.savingsAccountInterest, SEC_80TTA_LIMIT)
  const sec80TTB = senior ? Math.min(profile.seniorCitizenInterestIncome, SEC_80TTB_LIMIT) : 0

  const sec80U = profile.selfDisabilityClaim
    ? (profile.selfSevereDisability ? SEC_80U_SEVERE : SEC_80U_NORMAL)
    : 0

  const items = collect([
    ['80C', computeSection80C(profile)],
    ['80CCD(1B)', Math.min(profile.additionalNpsContribution, SEC_80CCD_1B_LIMIT)],
    ['80CCD(2)', computeEmployerNPSDeduction(profile)],
    ['80D', computeSection80D(profile)],
    ['80DD', sec80DD],
    ['80DDB', sec80DDB],
    ['80E', profile.educationLoanInterest],
    ['80EE', Math.min(profile.homeLoanInterest80ee, SEC_80EE_LIMIT)],
    ['80EEA', Math.min(profile.homeLoanInterest80eea, SEC_80EEA_LIMIT)],
    ['80EEB', Math.min(profile.evLoanInterest, SEC_80EEB_LIMIT)],
    ['80G-100', profile.donations100Percent],
    ['80G-50', profile.donations50Percent * SEC_80G_HALF_RATE],
    ['80GG', sec80GG],
    ['80TTA', sec80TTA],
    ['80TTB', sec80TTB],
    ['80U', sec80U],
  ])

  return { items, preventiveHealthCheckup: computePreventiveCheckup(profile) }
}

// ── New regime ────────────────────────────────────────────────────

export function computeChapterVIANew(profile: TaxpayerProfile): ChapterVIAResult {
  return {
    items: collect([['80CCD(2)', computeEmployerNPSDeduction(profile)]]),
    preventiveHealthCheckup: 0,
  }
}
