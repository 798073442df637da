/**
 * Runtime configuration, read from the environment.
 *
 *   LOG_LEVEL               debug | info | warn | error   (default: info)
 *   SIM_VERIFY_INVARIANTS   "1" / "true" runs the quality gates after every
 *                           applied transaction           (default: off)
 */

import { z } from 'zod'
import { resolveLevel } from './utils/logger'
import type { LogLevel } from './utils/logger'

export interface SimulationConfig {
  logLevel: LogLevel
  verifyInvariants: boolean
}

const flagSchema = z
  .string()
  .trim()
  .toLowerCase()
  .transform((v) => v === '1' || v === 'true' || v === 'yes')

const envSchema = z.object({
  LOG_LEVEL: z.string().optional(),
  SIM_VERIFY_INVARIANTS: flagSchema.optional(),
})

export function loadConfig(env: Record<string, string | undefined> = process.env): SimulationConfig {
  const parsed = envSchema.parse(env)
  return {
    logLevel: resolveLevel(parsed.LOG_LEVEL),
    verifyInvariants: parsed.SIM_VERIFY_INVARIANTS ?? false,
  }
}
