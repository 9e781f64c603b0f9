/**
 * Financial-year dispatch.
 *
 * A year is keyed by the calendar year its April starts in: 2025 is
 * FY 2025-26, assessed in AY 2026-27. Each year directory exports one
 * YearRulesModule; engine.ts and the report resolve it here.
 */

import type { Regime, TaxpayerProfile } from '../model/types'
import type { RegimeBreakdown } from './2025/regimeTax'
import type { RegimePolicy } from './2025/regimePolicy'
import { yearModule2025 } from './2025/yearModule'

export interface YearRulesModule {
  taxYear: number

  /** e.g. "2026-27" for FY 2025-26. */
  assessmentYear: string

  computeRegimeTax: (profile: TaxpayerProfile, regime: Regime) => Readonly<RegimeBreakdown>
  getRegimePolicy: (regime: Regime) => RegimePolicy
}

const YEAR_MODULES: ReadonlyMap<number, YearRulesModule> = new Map([
  [yearModule2025.taxYear, yearModule2025],
])

export const DEFAULT_TAX_YEAR = yearModule2025.taxYear

/** `2025` → `2025-26` */
export function financialYearSpan(year: number): string {
  return `${year}-${String((year + 1) % 100).padStart(2, '0')}`
}

function financialYearLabel(year: number): string {
  return `FY ${financialYearSpan(year)}`
}

export function getYearModule(year: number): YearRulesModule {
  const mod = YEAR_MODULES.get(year)
  if (mod) return mod

  const available = [...YEAR_MODULES.keys()].map(financialYearLabel).join(', ')
  throw new Error(`No tax rules for ${financialYearLabel(year)} (available: ${available})`)
}
