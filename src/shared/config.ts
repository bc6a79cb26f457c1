import { z } from 'zod'
import { config } from 'dotenv'

// A .env file is optional for the CLI: every value has a default.
config({ path: '.env' })

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

const configSchema = z.object({
  // Sources and outputs
  JOBS_CSV_PATH: z.string().default('data/jobs.csv'),
  PROFILE_PATH: z.string().default('data/profile.json'),
  OUTPUT_DIR: z.string().default('out'),

  // Selection
  PER_GROUP_CAP: z.coerce.number().int().min(0).default(3),
  GLOBAL_CAP: z.coerce.number().int().min(0).default(12),
  SELECTION_KEYWORD_TOP_K: z.coerce.number().int().min(0).default(60),
  COVER_LETTER_KEYWORD_TOP_K: z.coerce.number().int().min(0).default(20),

  LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
})

const configServer = configSchema.safeParse(process.env)
if (!configServer.success) {
  console.log('Invalid values in environment configuration')
  console.error(configServer.error)
  process.exit(1)
}

const envConfig = configServer.data

export default envConfig
