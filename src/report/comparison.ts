/**
 * Comparison report — plain-text side-by-side view of both regimes.
 *
 * Reads breakdowns produced by the engine and never feeds anything back.
 * The recommendation rule lives here, not in the rules: lower total tax
 * wins, and a tie goes to the new regime.
 */

import type { AgeCategory, LineItem, Regime, TaxpayerProfile } from '../model/types'
import { REGIMES } from '../rules/engine'
import { financialYearSpan, getYearModule } from '../rules/yearModules'
import type { RegimeComparison } from '../rules/engine'
import type { RegimeBreakdown } from '../rules/2025/regimeTax'
import type { ItemLabel } from '../rules/2025/labels'
import {
  CHAPTER_VIA_LABELS,
  EXEMPTION_LABELS,
  HOUSE_PROPERTY_LABELS,
  SECTION16_LABELS,
  describeItem,
} from '../rules/2025/labels'
import {
  CESS_RATE,
  HOUSE_PROPERTY_LOSS_LIMIT,
  NEW_REGIME_SLABS,
  OLD_REGIME_SLABS,
  PROFESSIONAL_TAX_LIMIT,
  REBATE_87A_NEW,
  REBATE_87A_OLD,
  SEC_80CCD_1B_LIMIT,
  SEC_80CCD_2_RATE,
  SEC_80C_LIMIT,
  SEC_80DDB_NORMAL,
  SEC_80DDB_SENIOR,
  SEC_80DD_NORMAL,
  SEC_80DD_SEVERE,
  SEC_80D_PARENTS,
  SEC_80D_PARENTS_SENIOR,
  SEC_80D_SELF,
  SEC_80D_SELF_SENIOR,
  SEC_80EEA_LIMIT,
  SEC_80EEB_LIMIT,
  SEC_80EE_LIMIT,
  SEC_80GG_MONTHLY,
  SEC_80TTA_LIMIT,
  SEC_80TTB_LIMIT,
  SELF_OCCUPIED_INTEREST_LIMIT,
  STANDARD_DEDUCTION_NEW,
  STANDARD_DEDUCTION_OLD,
} from '../rules/2025/constants'
import type { TaxSlab } from '../rules/2025/constants'
import { SALARY_COMPONENTS } from '../rules/2025/salary'
import { formatLakhs, formatPercent, formatRate, formatRupees, titleCase } from './format'

// ── Layout ──────────────────────────────────────────────────────

const WIDTH = 70
const LABEL_WIDTH = 40
const VALUE_WIDTH = 13
const RULE = '─'.repeat(WIDTH - 4)

export function formatRow(label: string, oldValue: string, newValue: string): string {
  return `  ${label.padEnd(LABEL_WIDTH)} ${oldValue.padStart(VALUE_WIDTH)} ${newValue.padStart(VALUE_WIDTH)}`
}

function itemRow(label: string, oldValue: string, newValue: string): string {
  return `    ${label.padEnd(LABEL_WIDTH - 2)} ${oldValue.padStart(VALUE_WIDTH)} ${newValue.padStart(VALUE_WIDTH)}`
}

function heading(title: string): string[] {
  return ['', title, '─'.repeat(WIDTH)]
}

function columnHeader(): string[] {
  return [
    formatRow('PARTICULARS', 'OLD REGIME', 'NEW REGIME'),
    formatRow('─'.repeat(LABEL_WIDTH), '─'.repeat(VALUE_WIDTH), '─'.repeat(VALUE_WIDTH)),
  ]
}

/**
 * One row per tag present in either regime, in label-table order. A tag
 * missing from one side shows "-".
 */
function itemRows<Tag extends string>(
  title: string,
  labels: Record<Tag, ItemLabel>,
  oldItems: readonly LineItem<Tag>[],
  newItems: readonly LineItem<Tag>[],
): string[] {
  const oldByTag = new Map<Tag, number>(oldItems.map((item) => [item.tag, item.amount]))
  const newByTag = new Map<Tag, number>(newItems.map((item) => [item.tag, item.amount]))
  const order = Object.keys(labels)
  const tags = [...new Set([...oldByTag.keys(), ...newByTag.keys()])]
    .sort((a, b) => order.indexOf(a) - order.indexOf(b))

  const rows = tags.map((tag) => {
    const oldAmount = oldByTag.get(tag)
    const newAmount = newByTag.get(tag)
    return itemRow(
      describeItem(labels[tag]),
      oldAmount === undefined ? '-' : formatRupees(oldAmount),
      newAmount === undefined ? '-' : formatRupees(newAmount),
    )
  })

  return rows.length > 0 ? ['', `  ${title}`, ...rows] : []
}

// ── Recommendation ──────────────────────────────────────────────

export interface Recommendation {
  regime: Regime
  savings: number  // ≥ 0
  message: string
}

export function recommendRegime(comparison: RegimeComparison): Recommendation {
  const difference = comparison.old.totalTax - comparison.new.totalTax

  if (difference > 0) {
    return {
      regime: 'new',
      savings: difference,
      message: `NEW TAX REGIME is better for you. You save ${formatRupees(difference)} by choosing the New Regime.`,
    }
  }
  if (difference < 0) {
    return {
      regime: 'old',
      savings: -difference,
      message: `OLD TAX REGIME is better for you. You save ${formatRupees(-difference)} by choosing the Old Regime.`,
    }
  }
  return {
    regime: 'new',
    savings: 0,
    message: 'Both regimes result in the same tax liability. The New Regime is simpler with fewer compliance requirements.',
  }
}

// ── Balance due ─────────────────────────────────────────────────

export function totalTaxPaid(profile: TaxpayerProfile): number {
  return profile.tdsDeducted + profile.advanceTaxPaid
}

/** Positive = payable, negative = refund. */
export function computeBalanceDue(breakdown: RegimeBreakdown, profile: TaxpayerProfile): number {
  return breakdown.totalTax - totalTaxPaid(profile)
}

/** False when every salary component is zero; the comparison is then meaningless. */
export function hasSalaryData(profile: TaxpayerProfile): boolean {
  return SALARY_COMPONENTS.some((field) => profile[field] > 0)
}

// ── Comparison table ────────────────────────────────────────────

function totalDeductions(b: RegimeBreakdown): number {
  return b.totalExemptions + b.totalSection16 + b.totalChapterVIA
}

export function renderComparison(comparison: RegimeComparison, profile: TaxpayerProfile): string {
  const { old: o, new: n } = comparison
  const money = (label: string, pick: (b: RegimeBreakdown) => number) =>
    formatRow(label, formatRupees(pick(o)), formatRupees(pick(n)))

  const lines: string[] = [
    '═'.repeat(WIDTH),
    'INDIA TAX REGIME COMPARISON'.padStart((WIDTH + 27) / 2 | 0),
    '═'.repeat(WIDTH),
    `Assessment Year: ${comparison.assessmentYear} (Financial Year: ${financialYearSpan(comparison.taxYear)})`,
    `Age Category: ${titleCase(profile.ageCategory)}`,
  ]

  lines.push(...heading('COMPARISON'), ...columnHeader())
  lines.push(money('Gross Salary', (b) => b.grossSalary))
  lines.push(...itemRows('Section 10 Exemptions', EXEMPTION_LABELS, o.exemptions, n.exemptions))
  lines.push(money('Total Exemptions', (b) => b.totalExemptions))
  lines.push(`  ${RULE}`, money('Income from Salary', (b) => b.incomeFromSalary))
  lines.push(...itemRows('Section 16 Deductions', SECTION16_LABELS, o.section16Deductions, n.section16Deductions))
  lines.push(money('Total Section 16', (b) => b.totalSection16))
  lines.push(`  ${RULE}`, money('Net Salary Income', (b) => b.netSalaryIncome))
  if (o.housePropertyItems.length > 0 || n.housePropertyItems.length > 0) {
    lines.push(...itemRows('House Property', HOUSE_PROPERTY_LABELS, o.housePropertyItems, n.housePropertyItems))
    lines.push(money('Income from House Property', (b) => b.incomeFromHouseProperty))
    if (o.housePropertyLossCapped) {
      lines.push(`  (House property loss limited to ${formatRupees(HOUSE_PROPERTY_LOSS_LIMIT)}; the excess is carried forward)`)
    }
  }
  if (o.otherIncome > 0 || n.otherIncome > 0) {
    lines.push(money('Other Income', (b) => b.otherIncome))
  }
  lines.push(`  ${RULE}`, money('GROSS TOTAL INCOME', (b) => b.grossTotalIncome))
  lines.push(...itemRows('Chapter VI-A Deductions', CHAPTER_VIA_LABELS, o.chapterVIADeductions, n.chapterVIADeductions))
  lines.push(money('Total Chapter VI-A', (b) => b.totalChapterVIA))
  lines.push(`  ${RULE}`, money('TAXABLE INCOME', (b) => b.taxableIncome))

  lines.push(...heading('TAX CALCULATION'), ...columnHeader())
  lines.push(money('Tax on Income', (b) => b.taxOnIncome))
  lines.push(money('Less: Rebate u/s 87A', (b) => b.rebate87A))
  lines.push(money('Tax after Rebate', (b) => b.taxAfterRebate))
  if (o.surcharge > 0 || n.surcharge > 0) {
    lines.push(money('Add: Surcharge', (b) => b.surcharge))
  }
  lines.push(money(`Add: Health & Education Cess (${formatRate(CESS_RATE)})`, (b) => b.cess))
  lines.push(`  ${RULE}`, money('TOTAL TAX PAYABLE', (b) => b.totalTax))
  lines.push(formatRow('Effective Tax Rate', formatPercent(o.effectiveTaxRate), formatPercent(n.effectiveTaxRate)))

  if (totalTaxPaid(profile) > 0) {
    lines.push(`  ${RULE}`)
    lines.push(formatRow('TDS Deducted', formatRupees(profile.tdsDeducted), ''))
    lines.push(formatRow('Advance Tax Paid', formatRupees(profile.advanceTaxPaid), ''))
    lines.push(money('Balance Tax Payable / (Refund)', (b) => computeBalanceDue(b, profile)))
  }

  lines.push(...heading('RECOMMENDATION'), `  ${recommendRegime(comparison).message}`)

  lines.push(...heading('SUMMARY'))
  const rules = getYearModule(comparison.taxYear)
  for (const regime of REGIMES) {
    const b = comparison[regime]
    lines.push(`  ${rules.getRegimePolicy(regime).label.toUpperCase()}`)
    lines.push(`    Gross Salary:     ${formatLakhs(b.grossSalary).padStart(12)}`)
    lines.push(`    Total Deductions: ${formatLakhs(totalDeductions(b)).padStart(12)}`)
    lines.push(`    Taxable Income:   ${formatLakhs(b.taxableIncome).padStart(12)}`)
    lines.push(`    Total Tax:        ${formatLakhs(b.totalTax).padStart(12)}`)
  }

  return lines.join('\n')
}

// ── Reference tables ────────────────────────────────────────────

/** "Up to ₹4,00,000", "₹4,00,001 - ₹8,00,000", "Above ₹24,00,000" */
export function describeSlab(slabs: readonly TaxSlab[], index: number): string {
  const floor = index === 0 ? 0 : slabs[index - 1].upTo ?? 0
  const upTo = slabs[index].upTo
  if (index === 0 && upTo !== null) return `Up to ${formatRupees(upTo)}`
  if (upTo === null) return `Above ${formatRupees(floor)}`
  return `${formatRupees(floor + 1)} - ${formatRupees(upTo)}`
}

function slabTable(title: string, slabs: readonly TaxSlab[]): string[] {
  const lines = ['', `  ${title}`, `  ${'Income Slab'.padEnd(25)} ${'Tax Rate'.padStart(10)}`]
  lines.push(`  ${'─'.repeat(25)} ${'─'.repeat(10)}`)
  slabs.forEach((slab, i) => {
    lines.push(`  ${describeSlab(slabs, i).padEnd(25)} ${formatRate(slab.rate).padStart(10)}`)
  })
  return lines
}

export function renderSlabTables(ageCategory: AgeCategory): string {
  const lines = heading('TAX SLABS')
  lines.push(...slabTable('NEW TAX REGIME (Default)', NEW_REGIME_SLABS))
  lines.push(`  Rebate: ${formatRupees(REBATE_87A_NEW.maxRebate)} if income ≤ ${formatRupees(REBATE_87A_NEW.threshold)}`)
  lines.push(`  Standard Deduction: ${formatRupees(STANDARD_DEDUCTION_NEW)}`)
  lines.push(...slabTable('OLD TAX REGIME (Below 60 Years)', OLD_REGIME_SLABS.below_60))
  lines.push(`  Rebate: ${formatRupees(REBATE_87A_OLD.maxRebate)} if income ≤ ${formatRupees(REBATE_87A_OLD.threshold)}`)
  lines.push(`  Standard Deduction: ${formatRupees(STANDARD_DEDUCTION_OLD)}`)
  if (ageCategory === 'senior') {
    lines.push(...slabTable('OLD TAX REGIME (Senior Citizen: 60-80 Years)', OLD_REGIME_SLABS.senior))
  }
  if (ageCategory === 'super_senior') {
    lines.push(...slabTable('OLD TAX REGIME (Super Senior Citizen: 80+ Years)', OLD_REGIME_SLABS.super_senior))
  }
  return lines.join('\n')
}

function limitRow(label: string, limit: string): string {
  return `  ${label.padEnd(35)} ${limit.padStart(20)}`
}

function limitSection(title: string, rows: [string, string][]): string[] {
  return ['', `  ${title}`, `  ${'─'.repeat(56)}`, ...rows.map(([label, limit]) => limitRow(label, limit))]
}

function tiered(normal: number, higher: number): string {
  return `${formatRupees(normal)}/${formatRupees(higher)}`
}

export function renderDeductionLimits(): string {
  const lines = heading('DEDUCTION LIMITS REFERENCE')

  lines.push(...limitSection('Section 16 - Standard Deductions', [
    ['Standard Deduction (Old Regime)', formatRupees(STANDARD_DEDUCTION_OLD)],
    ['Standard Deduction (New Regime)', formatRupees(STANDARD_DEDUCTION_NEW)],
    ['Professional Tax (Old Regime)', formatRupees(PROFESSIONAL_TAX_LIMIT)],
  ]))

  lines.push(...limitSection('Chapter VI-A Deductions (Old Regime)', [
    ['80C (Combined)', formatRupees(SEC_80C_LIMIT)],
    ['80CCD(1B) - Additional NPS', formatRupees(SEC_80CCD_1B_LIMIT)],
    ['80CCD(2) - Employer NPS (Both)', `${formatRate(SEC_80CCD_2_RATE)} of Basic+DA`],
    ['80D - Self/Family', tiered(SEC_80D_SELF, SEC_80D_SELF_SENIOR)],
    ['80D - Parents', tiered(SEC_80D_PARENTS, SEC_80D_PARENTS_SENIOR)],
    ['80DD - Disabled Dependent', tiered(SEC_80DD_NORMAL, SEC_80DD_SEVERE)],
    ['80DDB - Medical Treatment', tiered(SEC_80DDB_NORMAL, SEC_80DDB_SENIOR)],
    ['80E - Education Loan Interest', 'No limit'],
    ['80EE - Home Loan Interest', formatRupees(SEC_80EE_LIMIT)],
    ['80EEA - Add. Home Loan', formatRupees(SEC_80EEA_LIMIT)],
    ['80EEB - EV Loan Interest', formatRupees(SEC_80EEB_LIMIT)],
    ['80G - Donations', '50%/100%'],
    ['80GG - Rent (No HRA)', `${formatRupees(SEC_80GG_MONTHLY * 12)}/year`],
    ['80TTA - Savings Interest', formatRupees(SEC_80TTA_LIMIT)],
    ['80TTB - Senior Interest', formatRupees(SEC_80TTB_LIMIT)],
  ]))

  lines.push(...limitSection('Section 24 - Home Loan Interest', [
    ['Self-Occupied (Old Regime)', formatRupees(SELF_OCCUPIED_INTEREST_LIMIT)],
    ['Let-Out Property (Both)', 'No limit'],
  ]))

  return lines.join('\n')
}
