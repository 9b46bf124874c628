import { z } from 'zod'
import fs from 'fs'
import path from 'path'
import { config } from 'dotenv'

if (fs.existsSync(path.resolve('.env'))) {
  config({ path: '.env' })
}

const configSchema = z.object({
  PORT: z.coerce.number().int().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // CORS Configuration
  CORS_ORIGIN: z.string().default('http://localhost:3000'),

  // Resume judge (LLM collaborator)
  GEMINI_API_KEY: z.string().min(1).optional(),
  GEMINI_MODEL: z.string().default('gemini-2.0-flash'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  LLM_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(4096),
  LLM_MAX_RETRIES: z.coerce.number().int().min(1).default(3),
  LLM_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),

  // Scoring
  // Open tuning parameter: earlier deployments used 1.2 and 0.77
  SEVERITY_PENALTY_COEFFICIENT: z.coerce.number().min(0).default(1.0),

  // Document intake
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024), // 10MB
  MIN_RESUME_TEXT_LENGTH: z.coerce.number().int().min(1).default(50),

  // Rate Limiting
  RATE_LIMIT_SHORT_TTL: z.coerce.number().int().default(60000), // 1 minute
  RATE_LIMIT_SHORT_MAX: z.coerce.number().int().default(10),
  RATE_LIMIT_LONG_TTL: z.coerce.number().int().default(3600000), // 1 hour
  RATE_LIMIT_LONG_MAX: z.coerce.number().int().default(100),
})

export type EnvConfig = z.infer<typeof configSchema>

const configServer = configSchema.safeParse(process.env)
if (!configServer.success) {
  console.log('Invalid values in environment')
  console.error(configServer.error)
  process.exit(1)
}

const envConfig: EnvConfig = configServer.data

export default envConfig
