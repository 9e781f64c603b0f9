/**
 * Formatting utilities for the comparison report.
 *
 * Inputs are unrounded rupees from the rules; rounding happens here and
 * nowhere else.
 */

const RUPEE_GROUPING = new Intl.NumberFormat('en-IN', { maximumFractionDigits: 0 })

// ── Rupee formatting ─────────────────────────────────────────

/**
 * Whole rupees with Indian digit grouping.
 *
 *   formatRupees(1200000)  → "₹12,00,000"
 *   formatRupees(0)        → "₹0"
 *   formatRupees(-200000)  → "-₹2,00,000"
 */
export function formatRupees(amount: number): string {
  const rounded = Math.round(amount)
  if (rounded < 0) {
    return `-₹${RUPEE_GROUPING.format(-rounded)}`
  }
  return `₹${RUPEE_GROUPING.format(Math.abs(rounded))}`  // abs: no "-0"
}

/**
 * Amount in lakhs, two decimals.
 *
 *   formatLakhs(1125000) → "₹11.25L"
 */
export function formatLakhs(amount: number): string {
  return `₹${(amount / 100_000).toFixed(2)}L`
}

/** formatPercent(8.3333) → "8.33%" */
export function formatPercent(percent: number): string {
  return `${percent.toFixed(2)}%`
}

/** Slab rate as shown in the reference table: 0 → "Nil", 0.05 → "5%". */
export function formatRate(rate: number): string {
  if (rate === 0) return 'Nil'
  return `${Math.round(rate * 100)}%`
}

/** "below_60" → "Below 60", "super_senior" → "Super Senior" */
export function titleCase(value: string): string {
  return value
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ')
}
