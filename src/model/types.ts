/**
 * Canonical taxpayer model — the single input to the regime engine.
 *
 * One flat record per financial year. The rules read from it and never
 * write to it. Monetary values are annual amounts in rupees.
 */

// ── Taxpayer attributes ───────────────────────────────────────

export type AgeCategory = 'below_60' | 'senior' | 'super_senior'

export type CityType = 'metro' | 'non_metro'

/** Old (legacy) regime or new (simplified) regime. */
export type Regime = 'old' | 'new'

// ── Itemized lines ────────────────────────────────────────────

/** One named exemption or deduction. Tags are closed unions per category. */
export interface LineItem<Tag extends string> {
  tag: Tag
  amount: number
}

export function sumLineItems<Tag extends string>(items: readonly LineItem<Tag>[]): number {
  return items.reduce((sum, item) => sum + item.amount, 0)
}

/** Freeze the list and every item in it, so amounts cannot drift from their totals. */
export function freezeLineItems<Item extends LineItem<string>>(items: Item[]): readonly Readonly<Item>[] {
  return Object.freeze(items.map((item) => Object.freeze(item)))
}

// ── Taxpayer profile ──────────────────────────────────────────

export interface TaxpayerProfile {
  // Attributes
  ageCategory: AgeCategory
  cityType: CityType               // HRA: metro = Delhi, Mumbai, Chennai, Kolkata
  isGovernmentEmployee: boolean
  isDisabled: boolean              // transport allowance exemption
  parentsAreSeniorCitizen: boolean

  // Salary components
  basicSalary: number
  dearnessAllowance: number
  hraReceived: number
  ltaReceived: number
  conveyanceAllowance: number
  specialAllowance: number
  medicalAllowance: number
  transportAllowance: number
  childrenEducationAllowance: number
  hostelAllowance: number
  helperAllowance: number
  uniformAllowance: number
  mealAllowance: number
  bonus: number
  commission: number
  overtimePay: number
  gratuityReceived: number
  leaveEncashmentReceived: number
  entertainmentAllowance: number   // Section 16(ii), government employees only

  // Employer retirement contributions (jointly capped)
  employerEpfContribution: number
  employerNpsContribution: number
  employerSuperannuationContribution: number

  // Section 10 facts
  rentPaidAnnual: number
  ltaClaimed: number
  numberOfChildren: number         // integer
  helperActualExpenses: number
  uniformActualExpenses: number
  conveyanceActualExpenses: number
  numberOfWorkingDays: number      // integer, meal voucher exemption
  otherSection10Exemptions: number

  // Section 16
  professionalTaxPaid: number

  // Section 80C bucket
  epfContributionEmployee: number
  ppfContribution: number
  lifeInsurancePremium: number
  elssInvestment: number
  nscInvestment: number
  sukanyaSamriddhi: number
  taxSaverFd: number
  tuitionFees: number
  homeLoanPrincipal: number
  scssInvestment: number
  other80c: number
  pensionFundContribution: number  // 80CCC
  employeeNpsContribution: number  // 80CCD(1)

  // Other Chapter VI-A
  additionalNpsContribution: number      // 80CCD(1B)
  healthInsuranceSelf: number            // 80D
  healthInsuranceParents: number         // 80D
  preventiveHealthCheckup: number        // 80D
  disabledDependentExpenses: number      // 80DD
  isSevereDisability: boolean            // 80DD
  medicalTreatmentExpenses: number       // 80DDB
  educationLoanInterest: number          // 80E
  homeLoanInterest80ee: number
  homeLoanInterest80eea: number
  evLoanInterest: number                 // 80EEB
  donations100Percent: number            // 80G
  donations50Percent: number             // 80G
  rentPaidNoHra: number                  // 80GG
  savingsAccountInterest: number         // 80TTA, also other income
  seniorCitizenInterestIncome: number    // 80TTB
  selfDisabilityClaim: boolean           // 80U
  selfSevereDisability: boolean          // 80U

  // House property (Section 24)
  homeLoanInterestSelfOccupied: number
  homeLoanInterestLetOut: number
  rentalIncomeAnnual: number
  preConstructionInterest: number
  constructionCompleted: boolean

  // Other sources
  interestIncomeOther: number
  otherIncome: number

  // Taxes already paid (balance due only)
  tdsDeducted: number
  advanceTaxPaid: number
}

export type TaxpayerProfileField = keyof TaxpayerProfile

export const DEFAULT_WORKING_DAYS = 220

// ── Factory ───────────────────────────────────────────────────

export function emptyTaxpayerProfile(): TaxpayerProfile {
  return {
    ageCategory: 'below_60',
    cityType: 'non_metro',
    isGovernmentEmployee: false,
    isDisabled: false,
    parentsAreSeniorCitizen: false,

    basicSalary: 0,
    dearnessAllowance: 0,
    hraReceived: 0,
    ltaReceived: 0,
    conveyanceAllowance: 0,
    specialAllowance: 0,
    medicalAllowance: 0,
    transportAllowance: 0,
    childrenEducationAllowance: 0,
    hostelAllowance: 0,
    helperAllowance: 0,
    uniformAllowance: 0,
    mealAllowance: 0,
    bonus: 0,
    commission: 0,
    overtimePay: 0,
    gratuityReceived: 0,
    leaveEncashmentReceived: 0,
    entertainmentAllowance: 0,

    employerEpfContribution: 0,
    employerNpsContribution: 0,
    employerSuperannuationContribution: 0,

    rentPaidAnnual: 0,
    ltaClaimed: 0,
    numberOfChildren: 0,
    helperActualExpenses: 0,
    uniformActualExpenses: 0,
    conveyanceActualExpenses: 0,
    numberOfWorkingDays: DEFAULT_WORKING_DAYS,
    otherSection10Exemptions: 0,

    professionalTaxPaid: 0,

    epfContributionEmployee: 0,
    ppfContribution: 0,
    lifeInsurancePremium: 0,
    elssInvestment: 0,
    nscInvestment: 0,
    sukanyaSamriddhi: 0,
    taxSaverFd: 0,
    tuitionFees: 0,
    homeLoanPrincipal: 0,
    scssInvestment: 0,
    other80c: 0,
    pensionFundContribution: 0,
    employeeNpsContribution: 0,

    additionalNpsContribution: 0,
    healthInsuranceSelf: 0,
    healthInsuranceParents: 0,
    preventiveHealthCheckup: 0,
    disabledDependentExpenses: 0,
    isSevereDisability: false,
    medicalTreatmentExpenses: 0,
    educationLoanInterest: 0,
    homeLoanInterest80ee: 0,
    homeLoanInterest80eea: 0,
    evLoanInterest: 0,
    donations100Percent: 0,
    donations50Percent: 0,
    rentPaidNoHra: 0,
    savingsAccountInterest: 0,
    seniorCitizenInterestIncome: 0,
    selfDisabilityClaim: false,
    selfSevereDisability: false,

    homeLoanInterestSelfOccupied: 0,
    homeLoanInterestLetOut: 0,
    rentalIncomeAnnual: 0,
    preConstructionInterest: 0,
    constructionCompleted: false,

    interestIncomeOther: 0,
    otherIncome: 0,

    tdsDeducted: 0,
    advanceTaxPaid: 0,
  }
}
