/**
 * Regime comparison CLI.
 *
 * Usage:
 *   cp .env.example .env   # fill in the amounts
 *   npm run cli
 *
 * Every profile field is read from its UPPER_SNAKE key, in the environment
 * or in ./.env (the environment wins). TAX_YEAR selects the financial year,
 * LOG_LEVEL=debug adds debug lines on stderr.
 */

import { withEnvFile } from './config'
import { runCli } from './run'

process.exitCode = runCli(withEnvFile(process.env, '.env'), (text) => {
  process.stdout.write(text)
})
