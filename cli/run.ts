/**
 * CLI flow: environment → profile → comparison report.
 *
 * Returns the process exit code; main.ts sets it. The report goes through
 * `write`, log lines through `log` (stderr by default, level from LOG_LEVEL).
 */

import { ZodError } from 'zod'
import { compareRegimes } from '../src/rules/engine'
import {
  hasSalaryData,
  recommendRegime,
  renderComparison,
  renderDeductionLimits,
  renderSlabTables,
} from '../src/report/comparison'
import { configIssues, envKeyFor, loadProfileFromEnv, resolveTaxYear } from './config'
import type { Env } from './config'
import { Logger, resolveLevel } from './utils/logger'

export type Writer = (text: string) => void

const NO_SALARY_GUIDANCE = [
  '',
  'No salary data found!',
  '',
  'Set the salary components in .env or as environment variables (annual rupees), for example:',
  `  ${envKeyFor('basicSalary')}=1200000`,
  `  ${envKeyFor('hraReceived')}=480000`,
  '  ... and so on. Copy .env.example to .env for every recognized key.',
].join('\n')

export function runCli(
  env: Env,
  write: Writer,
  log: Logger = new Logger(resolveLevel(env.LOG_LEVEL)),
): number {
  const cliLog = log.child({ component: 'cli' })

  try {
    const taxYear = resolveTaxYear(env)
    const profile = loadProfileFromEnv(env)
    cliLog.debug('Profile loaded', { taxYear, ageCategory: profile.ageCategory })

    if (!hasSalaryData(profile)) {
      write(NO_SALARY_GUIDANCE + '\n')
      write(renderDeductionLimits() + '\n')
      return 0
    }

    const comparison = compareRegimes(profile, taxYear)
    const recommendation = recommendRegime(comparison)
    cliLog.debug('Regimes compared', {
      oldTotalTax: comparison.old.totalTax,
      newTotalTax: comparison.new.totalTax,
      recommended: recommendation.regime,
    })

    write(renderComparison(comparison, profile) + '\n')
    write(renderSlabTables(profile.ageCategory) + '\n')
    return 0
  } catch (err) {
    if (err instanceof ZodError) {
      for (const issue of configIssues(err)) {
        cliLog.error('Invalid configuration', { field: issue.field, reason: issue.message })
      }
      return 1
    }
    cliLog.error('Tax comparison failed', {
      error: err instanceof Error ? err.message : String(err),
    })
    return 1
  }
}
