/**
 * Income from House Property — Sections 22 to 27
 *
 * Self-occupied property: home-loan interest u/s 24(b), capped at ₹2 lakh,
 *   old regime only.
 * Let-out property: rent − 30% standard deduction u/s 24(a) − loan
 *   interest (no cap).
 * Pre-construction interest: deductible in five equal instalments from the
 *   year construction completes, added to the self-occupied bucket, old
 *   regime only.
 *
 * The combined loss that can be set off in the year is limited to ₹2 lakh.
 * The excess would be carried forward, which is not modelled here.
 *
 * Detail lines carry their sign: income positive, deductions negative.
 */

import type { LineItem, TaxpayerProfile } from '../../model/types'
import {
  HOUSE_PROPERTY_LOSS_LIMIT,
  LET_OUT_STANDARD_DEDUCTION_RATE,
  PRE_CONSTRUCTION_INSTALMENTS,
  SELF_OCCUPIED_INTEREST_LIMIT,
} from './constants'

// ── Result types ──────────────────────────────────────────────────

export type HousePropertyTag =
  | 'selfOccupiedInterest'
  | 'rentalIncome'
  | 'letOutStandardDeduction'
  | 'letOutInterest'
  | 'preConstructionInterest'

export type HousePropertyItem = LineItem<HousePropertyTag>

export interface HousePropertyResult {
  items: HousePropertyItem[]
  selfOccupiedLoss: number  // ≥ 0
  letOutIncome: number      // signed
  netIncome: number         // signed, ≥ −HOUSE_PROPERTY_LOSS_LIMIT
  lossCapped: boolean       // true when the set-off limit cut the loss
}

export interface HousePropertyOptions {
  /** Whether self-occupied and pre-construction interest are deductible. */
  allowSelfOccupiedInterest: boolean
}

// ── Computation ───────────────────────────────────────────────────

export function computeHouseProperty(
  profile: TaxpayerProfile,
  options: HousePropertyOptions,
): HousePropertyResult {
  const items: HousePropertyItem[] = []

  // Self-occupied
  let selfOccupiedLoss = 0
  if (options.allowSelfOccupiedInterest && profile.homeLoanInterestSelfOccupied > 0) {
    selfOccupiedLoss = Math.min(profile.homeLoanInterestSelfOccupied, SELF_OCCUPIED_INTEREST_LIMIT)
    items.push({ tag: 'selfOccupiedInterest', amount: -selfOccupiedLoss })
  }

  // Let-out
  let letOutIncome = 0
  if (profile.rentalIncomeAnnual > 0) {
    const grossRent = profile.rentalIncomeAnnual
    const standardDeduction = grossRent * LET_OUT_STANDARD_DEDUCTION_RATE
    const interest = profile.homeLoanInterestLetOut

    letOutIncome = grossRent - standardDeduction - interest

    items.push({ tag: 'rentalIncome', amount: grossRent })
    items.push({ tag: 'letOutStandardDeduction', amount: -standardDeduction })
    if (interest > 0) {
      items.push({ tag: 'letOutInterest', amount: -interest })
    }
  }

  // Pre-construction interest, one-fifth this year
  if (
    options.allowSelfOccupiedInterest &&
    profile.constructionCompleted &&
    profile.preConstructionInterest > 0
  ) {
    const instalment = profile.preConstructionInterest / PRE_CONSTRUCTION_INSTALMENTS
    selfOccupiedLoss += instalment
    items.push({ tag: 'preConstructionInterest', amount: -instalment })
  }

  const uncapped = letOutIncome - selfOccupiedLoss
  const lossCapped = uncapped < -HOUSE_PROPERTY_LOSS_LIMIT
  const netIncome = lossCapped ? -HOUSE_PROPERTY_LOSS_LIMIT : uncapped

  return { items, selfOccupiedLoss, letOutIncome, netIncome, lossCapped }
}
