import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

// Empty values in .env mean "not configured"
const optionalString = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().min(1).optional()
);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

  REDIS_URL: optionalString,
  SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
  DATABASE_URL: optionalString,

  PROVIDER_PASSWORD: z.string().min(1).default('admin'),
  TIMETABLE_CSV_PATH: z.string().min(1).default('data/timetable.csv'),
  DEPARTURE_INTERVAL_MINUTES: z.coerce.number().int().positive().default(60),

  FARE_PREDICTOR_URL: optionalString.pipe(z.string().url().optional()),
  FARE_PREDICTOR_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),

  WA_API_VERSION: z.string().default('v18.0'),
  WA_PHONE_NUMBER_ID: optionalString,
  WA_ACCESS_TOKEN: optionalString,
  WA_VERIFY_TOKEN: optionalString,
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);
