/**
 * Display labels and statutory citations for every line-item tag.
 *
 * Each table is keyed by the full tag union, so adding a tag without a
 * label fails to compile.
 */

import type { ExemptionTag } from './exemptions'
import type { Section16Tag } from './section16'
import type { HousePropertyTag } from './houseProperty'
import type { ChapterVIATag } from './chapterVIA'

export interface ItemLabel {
  label: string
  citation: string
}

export const EXEMPTION_LABELS: Record<ExemptionTag, ItemLabel> = {
  hra:               { label: 'HRA Exemption', citation: '10(13A)' },
  lta:               { label: 'LTA Exemption', citation: '10(5)' },
  childrenEducation: { label: 'Children Education', citation: '10(14)(ii)' },
  hostel:            { label: 'Hostel Allowance', citation: '10(14)(ii)' },
  helper:            { label: 'Helper/Driver', citation: '10(14)(i)' },
  uniform:           { label: 'Uniform Allowance', citation: '10(14)(i)' },
  conveyance:        { label: 'Conveyance (Official)', citation: '10(14)(i)' },
  transportDisabled: { label: 'Transport (Disabled)', citation: '10(14)(ii)' },
  mealVoucher:       { label: 'Meal Voucher', citation: '17(2)(viii)' },
  gratuity:          { label: 'Gratuity', citation: '10(10)' },
  leaveEncashment:   { label: 'Leave Encashment', citation: '10(10AA)' },
  otherSection10:    { label: 'Other Section 10 Exemptions', citation: '10' },
}

export const SECTION16_LABELS: Record<Section16Tag, ItemLabel> = {
  standardDeduction:      { label: 'Standard Deduction', citation: '16(ia)' },
  professionalTax:        { label: 'Professional Tax', citation: '16(iii)' },
  entertainmentAllowance: { label: 'Entertainment Allowance', citation: '16(ii)' },
}

export const HOUSE_PROPERTY_LABELS: Record<HousePropertyTag, ItemLabel> = {
  selfOccupiedInterest:    { label: 'Self-Occupied Interest', citation: '24(b)' },
  rentalIncome:            { label: 'Rental Income', citation: '22' },
  letOutStandardDeduction: { label: 'Standard Deduction (30%)', citation: '24(a)' },
  letOutInterest:          { label: 'Let-Out Interest', citation: '24(b)' },
  preConstructionInterest: { label: 'Pre-construction Interest (1/5)', citation: '24(b)' },
}

export const CHAPTER_VIA_LABELS: Record<ChapterVIATag, ItemLabel> = {
  '80C':       { label: 'Investments (80C pool)', citation: '80C' },
  '80CCD(1B)': { label: 'Additional NPS', citation: '80CCD(1B)' },
  '80CCD(2)':  { label: 'Employer NPS', citation: '80CCD(2)' },
  '80D':       { label: 'Health Insurance', citation: '80D' },
  '80DD':      { label: 'Disabled Dependent', citation: '80DD' },
  '80DDB':     { label: 'Medical Treatment', citation: '80DDB' },
  '80E':       { label: 'Education Loan Interest', citation: '80E' },
  '80EE':      { label: 'Home Loan Interest', citation: '80EE' },
  '80EEA':     { label: 'Additional Home Loan Interest', citation: '80EEA' },
  '80EEB':     { label: 'EV Loan Interest', citation: '80EEB' },
  '80G-100':   { label: 'Donations (100%)', citation: '80G' },
  '80G-50':    { label: 'Donations (50%)', citation: '80G' },
  '80GG':      { label: 'Rent Paid (no HRA)', citation: '80GG' },
  '80TTA':     { label: 'Savings Interest', citation: '80TTA' },
  '80TTB':     { label: 'Interest Income (Senior)', citation: '80TTB' },
  '80U':       { label: 'Self Disability', citation: '80U' },
}

/** "HRA Exemption [10(13A)]" */
export function describeItem(label: ItemLabel): string {
  return `${label.label} [${label.citation}]`
}
