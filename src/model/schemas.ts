/**
 * Zod runtime validation schema — mirrors TaxpayerProfile in types.ts.
 *
 * Validates a profile coming from configuration before it reaches the
 * rules. Invalid values are rejected, never clamped.
 *
 * Conventions:
 *  - Monetary amounts are non-negative finite rupees.
 *  - Counts (children, working days) are non-negative integers.
 *  - Absent keys take the defaults of emptyTaxpayerProfile().
 *  - Unrecognized keys are an error.
 */

import { z } from 'zod'
import { emptyTaxpayerProfile } from './types'
import type { TaxpayerProfile } from './types'

// ── Reusable validators ──────────────────────────────────────────

/** Non-negative rupees. */
const amountSchema = z.number().finite().min(0, 'Amount must be non-negative')

/** Non-negative integer count. */
const countSchema = z.number().int('Count must be a whole number').min(0, 'Count must be non-negative')

const ageCategorySchema = z.enum(['below_60', 'senior', 'super_senior'])

const cityTypeSchema = z.enum(['metro', 'non_metro'])

const defaults = emptyTaxpayerProfile()

const money = amountSchema.default(0)
const flag = z.boolean().default(false)

// ── Taxpayer profile ─────────────────────────────────────────────

export const taxpayerProfileSchema = z.object({
  ageCategory: ageCategorySchema.default(defaults.ageCategory),
  cityType: cityTypeSchema.default(defaults.cityType),
  isGovernmentEmployee: flag,
  isDisabled: flag,
  parentsAreSeniorCitizen: flag,

  basicSalary: money,
  dearnessAllowance: money,
  hraReceived: money,
  ltaReceived: money,
  conveyanceAllowance: money,
  specialAllowance: money,
  medicalAllowance: money,
  transportAllowance: money,
  childrenEducationAllowance: money,
  hostelAllowance: money,
  helperAllowance: money,
  uniformAllowance: money,
  mealAllowance: money,
  bonus: money,
  commission: money,
  overtimePay: money,
  gratuityReceived: money,
  leaveEncashmentReceived: money,
  entertainmentAllowance: money,

  employerEpfContribution: money,
  employerNpsContribution: money,
  employerSuperannuationContribution: money,

  rentPaidAnnual: money,
  ltaClaimed: money,
  numberOfChildren: countSchema.default(defaults.numberOfChildren),
  helperActualExpenses: money,
  uniformActualExpenses: money,
  conveyanceActualExpenses: money,
  numberOfWorkingDays: countSchema.default(defaults.numberOfWorkingDays),
  otherSection10Exemptions: money,

  professionalTaxPaid: money,

  epfContributionEmployee: money,
  ppfContribution: money,
  lifeInsurancePremium: money,
  elssInvestment: money,
  nscInvestment: money,
  sukanyaSamriddhi: money,
  taxSaverFd: money,
  tuitionFees: money,
  homeLoanPrincipal: money,
  scssInvestment: money,
  other80c: money,
  pensionFundContribution: money,
  employeeNpsContribution: money,

  additionalNpsContribution: money,
  healthInsuranceSelf: money,
  healthInsuranceParents: money,
  preventiveHealthCheckup: money,
  disabledDependentExpenses: money,
  isSevereDisability: flag,
  medicalTreatmentExpenses: money,
  educationLoanInterest: money,
  homeLoanInterest80ee: money,
  homeLoanInterest80eea: money,
  evLoanInterest: money,
  donations100Percent: money,
  donations50Percent: money,
  rentPaidNoHra: money,
  savingsAccountInterest: money,
  seniorCitizenInterestIncome: money,
  selfDisabilityClaim: flag,
  selfSevereDisability: flag,

  homeLoanInterestSelfOccupied: money,
  homeLoanInterestLetOut: money,
  rentalIncomeAnnual: money,
  preConstructionInterest: money,
  constructionCompleted: flag,

  interestIncomeOther: money,
  otherIncome: money,

  tdsDeducted: money,
  advanceTaxPaid: money,
}).strict() satisfies z.ZodType<TaxpayerProfile, z.ZodTypeDef, unknown>

/** Shape accepted before defaults are applied (every key optional). */
export type TaxpayerProfileInput = z.input<typeof taxpayerProfileSchema>

/**
 * Validate and complete a raw profile. Throws ZodError listing every
 * offending field.
 */
export function parseTaxpayerProfile(input: unknown): Readonly<TaxpayerProfile> {
  return Object.freeze(taxpayerProfileSchema.parse(input))
}

// ── Export sub-schemas for testing ────────────────────────────────

export {
  amountSchema,
  countSchema,
  ageCategorySchema,
  cityTypeSchema,
}
