/**
 * Environment → TaxpayerProfile loader.
 *
 * Values come from the process environment, over an optional .env file.
 * Every profile field has an UPPER_SNAKE environment key
 * (basicSalary → BASIC_SALARY, other80c → OTHER_80C). Absent or empty keys
 * take the profile defaults; present values are converted by the kind of
 * the field's default and then validated by the profile schema.
 */

import { existsSync, readFileSync } from 'node:fs'
import { parseEnv } from 'node:util'
import { z } from 'zod'
import type { ZodError } from 'zod'
import { emptyTaxpayerProfile } from '../src/model/types'
import type { TaxpayerProfile } from '../src/model/types'
import { parseTaxpayerProfile } from '../src/model/schemas'
import { DEFAULT_TAX_YEAR } from '../src/rules/yearModules'

export type Env = Record<string, string | undefined>

// ── .env file ────────────────────────────────────────────────────

/**
 * Layer an optional .env file under `env`. Variables already set keep
 * their values; a missing file leaves `env` as it is.
 */
export function withEnvFile(env: Env, path: string): Env {
  if (!existsSync(path)) return env

  const merged: Env = {}
  for (const [key, value] of Object.entries(parseEnv(readFileSync(path, 'utf8')))) {
    if (typeof value === 'string') merged[key] = value
  }
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) merged[key] = value
  }
  return merged
}

// ── Keys ─────────────────────────────────────────────────────────

/** `homeLoanInterest80ee` → `HOME_LOAN_INTEREST_80EE` */
export function envKeyFor(field: string): string {
  return field
    .replace(/([a-z])([A-Z])/g, '$1_$2')
    .replace(/([a-zA-Z])(\d)/g, '$1_$2')
    .replace(/(\d)([A-Z])/g, '$1_$2')
    .toUpperCase()
}

// ── Values ───────────────────────────────────────────────────────

const TRUTHY = /^(true|1|yes)$/i
const DECIMAL = /^-?\d+(\.\d+)?$/

/**
 * Plain decimals only: hex, binary, octal and exponent forms stay text,
 * as does anything else non-numeric, so the schema reports them.
 */
function parseNumber(raw: string): number | string {
  return DECIMAL.test(raw) ? Number(raw) : raw
}

function convert(raw: string, fallback: TaxpayerProfile[keyof TaxpayerProfile]): unknown {
  switch (typeof fallback) {
    case 'number': return parseNumber(raw.trim())
    case 'boolean': return TRUTHY.test(raw.trim())
    default: return raw.trim()
  }
}

/**
 * Build and validate a profile from environment variables.
 * Throws ZodError when any value is out of range or of the wrong kind.
 */
export function loadProfileFromEnv(env: Env): Readonly<TaxpayerProfile> {
  const input: Record<string, unknown> = {}

  for (const [field, fallback] of Object.entries(emptyTaxpayerProfile())) {
    const raw = env[envKeyFor(field)]
    if (raw === undefined || raw.trim() === '') continue
    input[field] = convert(raw, fallback)
  }

  return parseTaxpayerProfile(input)
}

// ── Tax year ─────────────────────────────────────────────────────

const taxYearEnvSchema = z.object({
  TAX_YEAR: z.coerce.number().int('TAX_YEAR must be a whole year').positive(),
})

/** TAX_YEAR, or the default financial year when unset. */
export function resolveTaxYear(env: Env): number {
  const raw = env.TAX_YEAR
  if (raw === undefined || raw.trim() === '') return DEFAULT_TAX_YEAR
  return taxYearEnvSchema.parse({ TAX_YEAR: raw.trim() }).TAX_YEAR
}

// ── Errors ───────────────────────────────────────────────────────

export interface ConfigIssue {
  field: string
  message: string
}

/** One entry per validation issue, named by its environment key. */
export function configIssues(error: ZodError): ConfigIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? envKeyFor(String(issue.path[0])) : '(root)',
    message: issue.message,
  }))
}
