import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().transform(Number).default('3001'),

  // CORS (local server only, API Gateway owns CORS on Lambda)
  CORS_ORIGIN: z.string().default('http://localhost:5173'),

  // Request limits
  BODY_LIMIT: z.string().default('100kb'),
  RATE_LIMIT_PER_MINUTE: z.string().transform(Number).default('100'),

  // Set by the Lambda runtime
  AWS_LAMBDA_FUNCTION_NAME: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error('Invalid environment variables:');
    console.error(result.error.format());
    process.exit(1);
  }

  if (!Number.isInteger(result.data.PORT) || !Number.isInteger(result.data.RATE_LIMIT_PER_MINUTE)) {
    console.error('PORT and RATE_LIMIT_PER_MINUTE must be integers');
    process.exit(1);
  }

  return result.data;
}

export const env = loadEnv();

export const isLambda = !!env.AWS_LAMBDA_FUNCTION_NAME;
