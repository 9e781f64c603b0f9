/**
 * Regime policies
 *
 * Everything that differs between the old and new regime sits behind one
 * contract, so the pipeline in regimeTax.ts is written once.
 */

import type { AgeCategory, Regime, TaxpayerProfile } from '../../model/types'
import type { RebateSchedule, SurchargeBand, TaxSlab } from './constants'
import {
  NEW_REGIME_SLABS,
  OLD_REGIME_SLABS,
  REBATE_87A_NEW,
  REBATE_87A_OLD,
  SURCHARGE_NEW,
  SURCHARGE_OLD,
} from './constants'
import { computeExemptionsNew, computeExemptionsOld } from './exemptions'
import type { ExemptionItem } from './exemptions'
import { computeSection16New, computeSection16Old } from './section16'
import type { Section16Item } from './section16'
import { computeChapterVIANew, computeChapterVIAOld } from './chapterVIA'
import type { ChapterVIAResult } from './chapterVIA'

export interface RegimePolicy {
  regime: Regime
  label: string

  /** Section 10 exemptions allowed under this regime. */
  exemptions: (profile: TaxpayerProfile) => ExemptionItem[]

  /** Section 16 deductions allowed under this regime. */
  section16: (profile: TaxpayerProfile) => Section16Item[]

  /** Whether self-occupied and pre-construction interest reduce house-property income. */
  allowsSelfOccupiedInterest: boolean

  /** Chapter VI-A deductions allowed under this regime. */
  chapterVIA: (profile: TaxpayerProfile) => ChapterVIAResult

  /** Slab table for a taxpayer's age. */
  slabs: (ageCategory: AgeCategory) => readonly TaxSlab[]

  rebate: RebateSchedule
  surcharge: readonly SurchargeBand[]
}

export const OLD_REGIME: RegimePolicy = {
  regime: 'old',
  label: 'Old Regime',
  exemptions: computeExemptionsOld,
  section16: computeSection16Old,
  allowsSelfOccupiedInterest: true,
  chapterVIA: computeChapterVIAOld,
  slabs: (ageCategory) => OLD_REGIME_SLABS[ageCategory],
  rebate: REBATE_87A_OLD,
  surcharge: SURCHARGE_OLD,
}

export const NEW_REGIME: RegimePolicy = {
  regime: 'new',
  label: 'New Regime',
  exemptions: computeExemptionsNew,
  section16: computeSection16New,
  allowsSelfOccupiedInterest: false,
  chapterVIA: computeChapterVIANew,
  slabs: () => NEW_REGIME_SLABS,
  rebate: REBATE_87A_NEW,
  surcharge: SURCHARGE_NEW,
}

const POLICIES: Record<Regime, RegimePolicy> = {
  old: OLD_REGIME,
  new: NEW_REGIME,
}

export function getRegimePolicy(regime: Regime): RegimePolicy {
  return POLICIES[regime]
}
