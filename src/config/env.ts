import dotenv from 'dotenv';
import { z } from 'zod';

// Load .env from the working directory
dotenv.config();

export const SERVICE_ROLES = ['orquestador', 'consultas', 'cuentas', 'identidad', 'ia', 'all'] as const;

const nonNegativeInt = z.number().int().nonnegative();

// Define the environment schema
const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().transform(Number).pipe(nonNegativeInt).default('8000'),
  HOST: z.string().default('0.0.0.0'),
  SERVICE_ROLE: z.enum(SERVICE_ROLES).default('orquestador'),

  // Orchestrator delegation
  SPECIALIST_ENDPOINTS: z.string().optional(),
  MICROS_ENDPOINTS: z.string().optional(),
  SPECIALIST_TIMEOUT_MS: z.string().transform(Number).pipe(nonNegativeInt).default('5000'),

  // Auth
  TOKEN_TTL_SECONDS: z.string().transform(Number).pipe(nonNegativeInt).default('0'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  LOG_FORMAT: z.enum(['json', 'simple']).default('json'),

  // CORS
  CORS_ORIGIN: z.string().default('*'),
  CORS_CREDENTIALS: z.string().transform(val => val === 'true').default('false')
});

// Parse and validate environment variables
const parseEnv = () => {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('❌ Invalid environment variables:', error.flatten().fieldErrors);
      process.exit(1);
    }
    throw error;
  }
};

export const env = parseEnv();

export type Env = z.infer<typeof envSchema>;
export type ServiceRole = Env['SERVICE_ROLE'];
