/**
 * Tax Computation — slab math, rebate, surcharge and cess
 *
 * Shared primitives used by both regimes. Each takes its table as an
 * argument, so a regime only decides which table to pass.
 *
 * Source: Section 87A (rebate), First Schedule Part I (surcharge),
 * Finance Act 2025 (Health & Education Cess)
 */

import type { RebateSchedule, SurchargeBand, TaxSlab } from './constants'
import { CESS_RATE } from './constants'

// ── Slab computation ────────────────────────────────────────────

/**
 * Compute tax using progressive slabs.
 *
 * @param taxableIncome - rupees; zero or negative yields 0
 * @param slabs - ordered ascending by upTo, last upTo = null
 */
export function computeSlabTax(taxableIncome: number, slabs: readonly TaxSlab[]): number {
  if (taxableIncome <= 0) return 0

  let tax = 0
  let previous = 0
  for (const slab of slabs) {
    if (taxableIncome <= previous) break
    const ceiling = slab.upTo ?? Infinity
    tax += (Math.min(taxableIncome, ceiling) - previous) * slab.rate
    previous = ceiling
  }

  return tax
}

// ── Rebate u/s 87A ──────────────────────────────────────────────

/**
 * Full rebate up to the schedule's maximum when taxable income is at or
 * below the threshold; nothing above it. There is no taper: one rupee
 * over the threshold loses the whole rebate.
 */
export function computeRebate87A(
  taxableIncome: number,
  tax: number,
  schedule: RebateSchedule,
): number {
  if (taxableIncome <= schedule.threshold) {
    return Math.min(tax, schedule.maxRebate)
  }
  return 0
}

// ── Surcharge ───────────────────────────────────────────────────

/**
 * Surcharge rate for a taxable income: the rate of the highest band whose
 * threshold the income strictly exceeds, 0 when it exceeds none.
 */
export function surchargeRate(taxableIncome: number, bands: readonly SurchargeBand[]): number {
  let rate = 0
  for (const band of bands) {
    if (taxableIncome > band.above) rate = band.rate
  }
  return rate
}

/**
 * Surcharge on tax after rebate.
 *
 * Limitation: marginal relief is not applied. Just above a threshold the
 * surcharge can exceed the income earned past that threshold.
 */
export function computeSurcharge(
  taxableIncome: number,
  taxAfterRebate: number,
  bands: readonly SurchargeBand[],
): number {
  return taxAfterRebate * surchargeRate(taxableIncome, bands)
}

// ── Cess ────────────────────────────────────────────────────────

export function computeCess(taxAfterRebate: number, surcharge: number): number {
  return (taxAfterRebate + surcharge) * CESS_RATE
}
