/**
 * Section 10 — Exempt allowances
 *
 * The old regime exempts most salary allowances up to their statutory
 * caps. The new regime keeps only transport for the disabled, official
 * conveyance, gratuity (lower cap) and leave encashment.
 *
 * Every calculator returns only the items with a positive amount, in
 * statutory order.
 */

import type { LineItem, TaxpayerProfile } from '../../model/types'
import {
  CHILDREN_EDUCATION_PER_CHILD_MONTHLY,
  GRATUITY_LIMIT_NEW,
  GRATUITY_LIMIT_OLD,
  HOSTEL_PER_CHILD_MONTHLY,
  HRA_METRO_RATE,
  HRA_NON_METRO_RATE,
  HRA_RENT_EXCESS_RATE,
  LEAVE_ENCASHMENT_LIMIT,
  MAX_CHILDREN_FOR_EXEMPTION,
  MEALS_PER_DAY,
  MEAL_PER_MEAL,
  TRANSPORT_DISABLED_MONTHLY,
} from './constants'
import { basicPlusDA } from './salary'

// ── Tags ────────────────────────────────────────────────────────

export type ExemptionTag =
  | 'hra'
  | 'lta'
  | 'childrenEducation'
  | 'hostel'
  | 'helper'
  | 'uniform'
  | 'conveyance'
  | 'transportDisabled'
  | 'mealVoucher'
  | 'gratuity'
  | 'leaveEncashment'
  | 'otherSection10'

export type ExemptionItem = LineItem<ExemptionTag>

// ── Individual exemptions ───────────────────────────────────────

/**
 * HRA exemption, Section 10(13A) with Rule 2A. Least of:
 *   (a) HRA actually received
 *   (b) rent paid − 10% of (basic + DA)
 *   (c) 50% of (basic + DA) in a metro, 40% elsewhere
 * floored at zero.
 */
export function computeHRAExemption(profile: TaxpayerProfile): number {
  if (profile.hraReceived === 0 || profile.rentPaidAnnual === 0) return 0

  const salary = basicPlusDA(profile)
  const rentExcess = profile.rentPaidAnnual - HRA_RENT_EXCESS_RATE * salary
  const cityRate = profile.cityType === 'metro' ? HRA_METRO_RATE : HRA_NON_METRO_RATE

  return Math.max(0, Math.min(profile.hraReceived, rentExcess, cityRate * salary))
}

function eligibleChildren(profile: TaxpayerProfile): number {
  return Math.min(profile.numberOfChildren, MAX_CHILDREN_FOR_EXEMPTION)
}

function transportDisabled(profile: TaxpayerProfile): number {
  if (!profile.isDisabled) return 0
  return Math.min(profile.transportAllowance, TRANSPORT_DISABLED_MONTHLY * 12)
}

function conveyance(profile: TaxpayerProfile): number {
  return Math.min(profile.conveyanceAllowance, profile.conveyanceActualExpenses)
}

/** Section 10(10AA): fully exempt for government employees. */
function leaveEncashment(profile: TaxpayerProfile): number {
  if (profile.isGovernmentEmployee) return profile.leaveEncashmentReceived
  return Math.min(profile.leaveEncashmentReceived, LEAVE_ENCASHMENT_LIMIT)
}

function collect(entries: [ExemptionTag, number][]): ExemptionItem[] {
  return entries
    .filter(([, amount]) => amount > 0)
    .map(([tag, amount]) => ({ tag, amount }))
}

// ── Old regime ──────────────────────────────────────────────────

export function computeExemptionsOld(profile: TaxpayerProfile): ExemptionItem[] {
  const children = eligibleChildren(profile)

  return collect([
    ['hra', computeHRAExemption(profile)],
    ['lta', Math.min(profile.ltaReceived, profile.ltaClaimed)],
    ['childrenEducation', Math.min(
      profile.childrenEducationAllowance,
      children * CHILDREN_EDUCATION_PER_CHILD_MONTHLY * 12,
    )],
    ['hostel', Math.min(profile.hostelAllowance, children * HOSTEL_PER_CHILD_MONTHLY * 12)],
    ['helper', Math.min(profile.helperAllowance, profile.helperActualExpenses)],
    ['uniform', Math.min(profile.uniformAllowance, profile.uniformActualExpenses)],
    ['conveyance', conveyance(profile)],
    ['transportDisabled', transportDisabled(profile)],
    ['mealVoucher', Math.min(
      profile.mealAllowance,
      MEAL_PER_MEAL * MEALS_PER_DAY * profile.numberOfWorkingDays,
    )],
    ['gratuity', Math.min(profile.gratuityReceived, GRATUITY_LIMIT_OLD)],
    ['leaveEncashment', leaveEncashment(profile)],
    ['otherSection10', profile.otherSection10Exemptions],
  ])
}

// ── New regime ──────────────────────────────────────────────────

export function computeExemptionsNew(profile: TaxpayerProfile): ExemptionItem[] {
  return collect([
    ['transportDisabled', transportDisabled(profile)],
    ['conveyance', conveyance(profile)],
    ['gratuity', Math.min(profile.gratuityReceived, GRATUITY_LIMIT_NEW)],
    ['leaveEncashment', leaveEncashment(profile)],
  ])
}
