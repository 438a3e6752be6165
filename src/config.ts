import dotenv from 'dotenv'
import { z } from 'zod'
import { ConfigError } from './domain/errors.js'

const hhmm = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected HH:MM')

export const envSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3000),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    REPOSITORY: z.string().default('memory'),
    RESERVATIONS_FILE: z.string().min(1).default('reservations.json'),
    ROOMS_FILE: z.string().min(1).default('data/rooms.json'),
    NOTIFIER: z.string().default('log'),
    MIN_DURATION_HOURS: z.coerce.number().positive().default(1),
    MAX_DURATION_HOURS: z.coerce.number().positive().default(8),
    BUSINESS_START: hhmm.default('07:00'),
    BUSINESS_END: hhmm.default('22:00'),
    MAX_ADVANCE_DAYS: z.coerce.number().int().nonnegative().default(90),
  })
  .refine(env => env.MIN_DURATION_HOURS <= env.MAX_DURATION_HOURS, {
    message: 'MIN_DURATION_HOURS must not exceed MAX_DURATION_HOURS',
    path: ['MIN_DURATION_HOURS'],
  })
  .refine(env => env.BUSINESS_START < env.BUSINESS_END, {
    message: 'BUSINESS_START must be before BUSINESS_END',
    path: ['BUSINESS_START'],
  })

export type AppConfig = z.infer<typeof envSchema>

// Repository and notifier names are checked by the factories, which know the registered types.
export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(
      'invalid configuration',
      parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
    )
  }
  return parsed.data
}

export function loadConfig(): AppConfig {
  dotenv.config()
  return parseConfig(process.env)
}
