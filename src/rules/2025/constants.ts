/**
 * FY 2025-26 Constants (assessment year 2026-27)
 *
 * Single source of truth for every limit, rate and slab used by the
 * 2025 rules. All monetary amounts are in rupees.
 *
 * Primary source: Income-tax Act, 1961 as amended by the Finance Act, 2025
 * Slab source: Section 115BAC (new regime) and the First Schedule (old regime)
 */

import type { AgeCategory } from '../../model/types'

// ── Helpers ────────────────────────────────────────────────────

/** Lakh → rupees, for readability in this file. */
function lakh(n: number): number {
  return n * 100_000
}

// ── Tax Year ───────────────────────────────────────────────────

export const TAX_YEAR = 2025
export const ASSESSMENT_YEAR = '2026-27'

// ── Slabs ──────────────────────────────────────────────────────
//
// Each slab is { upTo, rate }. The floor of a slab is the upTo of the
// previous one (0 for the first). upTo = null marks the open top slab.
// Tax = sum of rate × (min(income, upTo) − previous upTo).

export interface TaxSlab {
  upTo: number | null  // rupees; null = unbounded
  rate: number         // decimal, e.g. 0.05 for 5%
}

// Section 115BAC — same for every age
export const NEW_REGIME_SLABS: readonly TaxSlab[] = [
  { upTo: lakh(4), rate: 0.00 },
  { upTo: lakh(8), rate: 0.05 },
  { upTo: lakh(12), rate: 0.10 },
  { upTo: lakh(16), rate: 0.15 },
  { upTo: lakh(20), rate: 0.20 },
  { upTo: lakh(24), rate: 0.25 },
  { upTo: null, rate: 0.30 },
]

export const OLD_REGIME_SLABS: Record<AgeCategory, readonly TaxSlab[]> = {
  below_60: [
    { upTo: lakh(2.5), rate: 0.00 },
    { upTo: lakh(5), rate: 0.05 },
    { upTo: lakh(10), rate: 0.20 },
    { upTo: null, rate: 0.30 },
  ],
  // 60 to 80 years
  senior: [
    { upTo: lakh(3), rate: 0.00 },
    { upTo: lakh(5), rate: 0.05 },
    { upTo: lakh(10), rate: 0.20 },
    { upTo: null, rate: 0.30 },
  ],
  // Above 80 years
  super_senior: [
    { upTo: lakh(5), rate: 0.00 },
    { upTo: lakh(10), rate: 0.20 },
    { upTo: null, rate: 0.30 },
  ],
}

// ── Rebate (Section 87A) ───────────────────────────────────────

export interface RebateSchedule {
  threshold: number  // taxable income at or below this qualifies
  maxRebate: number
}

export const REBATE_87A_OLD: RebateSchedule = { threshold: lakh(5), maxRebate: 12_500 }
export const REBATE_87A_NEW: RebateSchedule = { threshold: lakh(12), maxRebate: 60_000 }

// ── Surcharge ──────────────────────────────────────────────────
// Rate applies when taxable income is strictly above the threshold.
// Listed in ascending order of threshold.

export interface SurchargeBand {
  above: number
  rate: number
}

export const SURCHARGE_50L = lakh(50)
export const SURCHARGE_1CR = lakh(100)
export const SURCHARGE_2CR = lakh(200)
export const SURCHARGE_5CR = lakh(500)

export const SURCHARGE_OLD: readonly SurchargeBand[] = [
  { above: SURCHARGE_50L, rate: 0.10 },
  { above: SURCHARGE_1CR, rate: 0.15 },
  { above: SURCHARGE_2CR, rate: 0.25 },
  { above: SURCHARGE_5CR, rate: 0.37 },
]

// New regime caps the surcharge at 25%
export const SURCHARGE_NEW: readonly SurchargeBand[] = [
  { above: SURCHARGE_50L, rate: 0.10 },
  { above: SURCHARGE_1CR, rate: 0.15 },
  { above: SURCHARGE_2CR, rate: 0.25 },
]

// ── Health & Education Cess ────────────────────────────────────

export const CESS_RATE = 0.04

// ── Section 16 ─────────────────────────────────────────────────

export const STANDARD_DEDUCTION_OLD = 50_000
export const STANDARD_DEDUCTION_NEW = 75_000
export const PROFESSIONAL_TAX_LIMIT = 2_500
export const ENTERTAINMENT_ALLOWANCE_LIMIT = 5_000
export const ENTERTAINMENT_BASIC_DIVISOR = 5   // one-fifth of basic

// ── Section 10 exemptions ──────────────────────────────────────

export const HRA_RENT_EXCESS_RATE = 0.10   // rent paid minus 10% of basic + DA
export const HRA_METRO_RATE = 0.50
export const HRA_NON_METRO_RATE = 0.40

export const GRATUITY_LIMIT_OLD = lakh(20)
export const GRATUITY_LIMIT_NEW = lakh(5)
export const LEAVE_ENCASHMENT_LIMIT = lakh(25)
export const CHILDREN_EDUCATION_PER_CHILD_MONTHLY = 100
export const HOSTEL_PER_CHILD_MONTHLY = 300
export const MAX_CHILDREN_FOR_EXEMPTION = 2
export const TRANSPORT_DISABLED_MONTHLY = 3_200
export const MEAL_PER_MEAL = 50
export const MEALS_PER_DAY = 2

// ── Employer retirement contributions ──────────────────────────
// EPF + NPS + superannuation above this combined amount is taxable salary.

export const EMPLOYER_CONTRIBUTION_LIMIT = lakh(7.5)

// ── Section 24 — house property ────────────────────────────────

export const SELF_OCCUPIED_INTEREST_LIMIT = lakh(2)
export const LET_OUT_STANDARD_DEDUCTION_RATE = 0.30
export const PRE_CONSTRUCTION_INSTALMENTS = 5
export const HOUSE_PROPERTY_LOSS_LIMIT = lakh(2)

// ── Chapter VI-A ───────────────────────────────────────────────

export const SEC_80C_LIMIT = lakh(1.5)
export const SEC_80CCD_1B_LIMIT = 50_000
export const SEC_80CCD_2_RATE = 0.14      // of basic + DA
export const SEC_80D_SELF = 25_000
export const SEC_80D_SELF_SENIOR = 50_000
export const SEC_80D_PARENTS = 25_000
export const SEC_80D_PARENTS_SENIOR = 50_000
export const SEC_80D_PREVENTIVE = 5_000
export const SEC_80DD_NORMAL = 75_000
export const SEC_80DD_SEVERE = lakh(1.25)
export const SEC_80DDB_NORMAL = 40_000
export const SEC_80DDB_SENIOR = lakh(1)
export const SEC_80EE_LIMIT = 50_000
export const SEC_80EEA_LIMIT = lakh(1.5)
export const SEC_80EEB_LIMIT = lakh(1.5)
export const SEC_80G_HALF_RATE = 0.5
export const SEC_80GG_MONTHLY = 5_000
export const SEC_80TTA_LIMIT = 10_000
export const SEC_80TTB_LIMIT = 50_000
export const SEC_80U_NORMAL = 75_000
export const SEC_80U_SEVERE = lakh(1.25)
