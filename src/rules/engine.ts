/**
 * Regime comparison engine
 *
 * Runs the pipeline once per regime against the same profile. The two
 * runs share nothing mutable, so their order does not matter. Choosing a
 * winner is left to the caller (see report/comparison.ts).
 */

import type { Regime, TaxpayerProfile } from '../model/types'
import type { RegimeBreakdown } from './2025/regimeTax'
import { DEFAULT_TAX_YEAR, getYearModule } from './yearModules'

// ── Types ────────────────────────────────────────────────────────

export interface RegimeComparison {
  taxYear: number
  assessmentYear: string
  old: Readonly<RegimeBreakdown>
  new: Readonly<RegimeBreakdown>
}

export const REGIMES: readonly Regime[] = ['old', 'new']

// ── compareRegimes ───────────────────────────────────────────────

export function compareRegimes(
  profile: TaxpayerProfile,
  taxYear: number = DEFAULT_TAX_YEAR,
): RegimeComparison {
  const mod = getYearModule(taxYear)
  return {
    taxYear: mod.taxYear,
    assessmentYear: mod.assessmentYear,
    old: mod.computeRegimeTax(profile, 'old'),
    new: mod.computeRegimeTax(profile, 'new'),
  }
}
