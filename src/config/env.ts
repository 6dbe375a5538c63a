import { z } from 'zod';
import dotenv from 'dotenv';
import { existsSync } from 'fs';
import { resolve } from 'path';

/**
 * Load the first .env file found. The app root wins over the project root
 * so a deployed container can shadow the checked-out defaults.
 */
export function loadEnvFile(): string | null {
  const possiblePaths = [
    resolve(process.cwd(), '.env'),
    resolve(__dirname, '../../.env'),
  ];

  for (const envPath of possiblePaths) {
    if (existsSync(envPath)) {
      const result = dotenv.config({ path: envPath });
      if (result.error) {
        console.log(`Failed to load ${envPath}:`, result.error.message);
      } else {
        return envPath;
      }
    }
  }

  return null;
}

const numeric = (fallback: string) => z.string().regex(/^\d+$/).transform(Number).default(fallback);
const ratio = (fallback: string) =>
  z
    .string()
    .regex(/^(0(\.\d+)?|1(\.0+)?)$/, 'must be a number between 0 and 1')
    .transform(Number)
    .default(fallback);

export const envSchema = z.object({
  // Storage
  DATABASE_URL: z.string().url(),
  REDIS_URL: z.string().url().default('redis://localhost:6379'),

  // Stage gateways
  INTENT_SERVICE_URL: z.string().url().default('http://nlp-service:8001'),
  VISION_SERVICE_URL: z.string().url().default('http://vision-service:8002'),
  ORDER_SERVICE_URL: z.string().url().default('http://ecommerce:8082'),
  NOTIFICATION_SERVICE_URL: z.string().url().default('http://ecommerce:8082'),
  INTENT_TIMEOUT_MS: numeric('10000'),
  VISION_TIMEOUT_MS: numeric('15000'),
  ORDER_TIMEOUT_MS: numeric('10000'),
  NOTIFICATION_TIMEOUT_MS: numeric('10000'),

  // Gating policy
  INTENT_THRESHOLD: ratio('0.5'),
  VISION_THRESHOLD: ratio('0.7'),

  // Retry policy
  RETRY_MAX_ATTEMPTS: numeric('3'),
  RETRY_BASE_DELAY_MS: numeric('500'),
  RETRY_MAX_DELAY_MS: numeric('8000'),

  // Queue and workers
  QUEUE_TTL_SECONDS: numeric('604800'),
  QUEUE_POP_TIMEOUT_SECONDS: numeric('1'),
  WORKER_COUNT: numeric('4'),
  WORKER_IDLE_MS: numeric('1000'),

  // Orders and notifications
  ORDER_SOURCE: z.string().min(1).default('tiktok_live'),
  NOTIFICATION_CHANNEL: z.enum(['whatsapp', 'sms']).default('whatsapp'),
  VISION_FRAME_WINDOW_SECONDS: numeric('10'),
  VISION_FRAME_LIMIT: numeric('5'),

  // Runtime
  RUN_MODE: z.enum(['web', 'worker']).default('web'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: numeric('3000'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
}).refine(
  (data) => data.WORKER_COUNT >= 1,
  { message: 'WORKER_COUNT must be at least 1', path: ['WORKER_COUNT'] }
);

export type Env = z.infer<typeof envSchema>;

/**
 * Parse an environment source. Throws ZodError on invalid input.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(source);
}

let cachedEnv: Env | null = null;

/**
 * Validate process.env once per process, exiting with a readable report on failure.
 * Only entry points call this; library code receives a PipelineConfig instead.
 */
export function validateEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  const loadedFrom = loadEnvFile();
  if (!loadedFrom) {
    console.log('No .env file found - using process environment variables only');
  }

  try {
    cachedEnv = parseEnv(process.env);
    return cachedEnv;
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('\nEnvironment validation failed:');
      error.errors.forEach((err) => {
        const varName = err.path.join('.');
        console.error(`  - ${varName}: ${err.message}`);
      });
      console.error('\nRequired: DATABASE_URL. See .env.example for the full list.\n');
      process.exit(1);
    }
    throw error;
  }
}
