/**
 * Section 16 — Deductions from salary
 *
 * Old regime: standard deduction, professional tax (capped) and, for
 * government employees, entertainment allowance.
 * New regime: the larger standard deduction only.
 */

import type { LineItem, TaxpayerProfile } from '../../model/types'
import {
  ENTERTAINMENT_ALLOWANCE_LIMIT,
  ENTERTAINMENT_BASIC_DIVISOR,
  PROFESSIONAL_TAX_LIMIT,
  STANDARD_DEDUCTION_NEW,
  STANDARD_DEDUCTION_OLD,
} from './constants'

export type Section16Tag = 'standardDeduction' | 'professionalTax' | 'entertainmentAllowance'

export type Section16Item = LineItem<Section16Tag>

export function computeSection16Old(profile: TaxpayerProfile): Section16Item[] {
  const items: Section16Item[] = [{ tag: 'standardDeduction', amount: STANDARD_DEDUCTION_OLD }]

  // 16(iii)
  if (profile.professionalTaxPaid > 0) {
    items.push({
      tag: 'professionalTax',
      amount: Math.min(profile.professionalTaxPaid, PROFESSIONAL_TAX_LIMIT),
    })
  }

  // 16(ii) — least of actual, one-fifth of basic, ₹5,000
  if (profile.isGovernmentEmployee && profile.entertainmentAllowance > 0) {
    items.push({
      tag: 'entertainmentAllowance',
      amount: Math.min(
        profile.entertainmentAllowance,
        profile.basicSalary / ENTERTAINMENT_BASIC_DIVISOR,
        ENTERTAINMENT_ALLOWANCE_LIMIT,
      ),
    })
  }

  return items
}

export function computeSection16New(_profile: TaxpayerProfile): Section16Item[] {
  return [{ tag: 'standardDeduction', amount: STANDARD_DEDUCTION_NEW }]
}
