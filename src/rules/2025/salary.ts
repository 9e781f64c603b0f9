/**
 * Gross Salary — Section 17(1)
 *
 * Sum of every salary component, plus the part of the employer's
 * retirement contributions (EPF + NPS + superannuation) that exceeds the
 * combined ₹7.5 lakh limit of Section 17(2)(vii).
 */

import type { TaxpayerProfile } from '../../model/types'
import { EMPLOYER_CONTRIBUTION_LIMIT } from './constants'

/** Salary components that add directly to gross salary. */
export const SALARY_COMPONENTS = [
  'basicSalary',
  'dearnessAllowance',
  'hraReceived',
  'ltaReceived',
  'conveyanceAllowance',
  'specialAllowance',
  'medicalAllowance',
  'transportAllowance',
  'childrenEducationAllowance',
  'hostelAllowance',
  'helperAllowance',
  'uniformAllowance',
  'mealAllowance',
  'bonus',
  'commission',
  'overtimePay',
  'gratuityReceived',
  'leaveEncashmentReceived',
  'entertainmentAllowance',
] as const satisfies readonly (keyof TaxpayerProfile)[]

/** Basic + DA, the base for HRA and the 80CCD(2) ceiling. */
export function basicPlusDA(profile: TaxpayerProfile): number {
  return profile.basicSalary + profile.dearnessAllowance
}

/** Employer contributions above the combined limit (0 when within it). */
export function taxableEmployerContribution(profile: TaxpayerProfile): number {
  const total =
    profile.employerEpfContribution +
    profile.employerNpsContribution +
    profile.employerSuperannuationContribution
  return Math.max(0, total - EMPLOYER_CONTRIBUTION_LIMIT)
}

export function computeGrossSalary(profile: TaxpayerProfile): number {
  const components = SALARY_COMPONENTS.reduce((sum, field) => sum + profile[field], 0)
  return components + taxableEmployerContribution(profile)
}
