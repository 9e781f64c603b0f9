/**
 * FY 2025-26 Rules Module
 *
 * Bundles the 2025 regime entry points into a single YearRulesModule
 * for the year registry.
 */

import type { YearRulesModule } from '../yearModules'
import { ASSESSMENT_YEAR, TAX_YEAR } from './constants'
import { computeRegimeTax } from './regimeTax'
import { getRegimePolicy } from './regimePolicy'

export const yearModule2025: YearRulesModule = {
  taxYear: TAX_YEAR,
  assessmentYear: ASSESSMENT_YEAR,
  computeRegimeTax,
  getRegimePolicy,
}
