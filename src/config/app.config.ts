import path from 'path';
import { z } from 'zod';
import { ACCESS_TOKEN_EXPIRY, DEFAULT_BCRYPT_ROUNDS } from '../utils/constants';
import { JwtSettings } from './jwt';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(5000),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
  ROSTER_DIR: z.string().default('students_list'),
  SECTIONS_FILE: z.string().default('config/sections.json'),
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().optional(),
  JWT_ACCESS_SECRET: z.string().min(1, 'JWT_ACCESS_SECRET is required'),
  JWT_ACCESS_EXPIRY: z.string().default(ACCESS_TOKEN_EXPIRY),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(DEFAULT_BCRYPT_ROUNDS),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(900000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(100),
});

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  corsOrigin: string;
  rosterDir: string;
  sectionsFile: string;
  supabase: { url: string; serviceRoleKey: string } | null;
  jwt: JwtSettings;
  bcryptRounds: number;
  rateLimit: { windowMs: number; max: number };
}

export const loadAppConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  const vars = parsed.data;

  const supabase =
    vars.SUPABASE_URL && vars.SUPABASE_SERVICE_ROLE_KEY
      ? { url: vars.SUPABASE_URL.trim().replace(/\/+$/, ''), serviceRoleKey: vars.SUPABASE_SERVICE_ROLE_KEY }
      : null;

  return Object.freeze({
    nodeEnv: vars.NODE_ENV,
    port: vars.PORT,
    corsOrigin: vars.CORS_ORIGIN,
    rosterDir: path.resolve(vars.ROSTER_DIR),
    sectionsFile: path.resolve(vars.SECTIONS_FILE),
    supabase,
    jwt: { accessSecret: vars.JWT_ACCESS_SECRET, accessExpiry: vars.JWT_ACCESS_EXPIRY },
    bcryptRounds: vars.BCRYPT_ROUNDS,
    rateLimit: { windowMs: vars.RATE_LIMIT_WINDOW_MS, max: vars.RATE_LIMIT_MAX_REQUESTS },
  });
};
