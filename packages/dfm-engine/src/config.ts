/**
 * Runtime configuration, read once from the environment.
 * Every value has a default; a present-but-invalid value is a startup error.
 */

import { z } from 'zod';

const ConfigSchema = z.object({
  CAD_HOST: z.enum(['http', 'memory']).default('http'),
  CAD_HOST_URL: z.string().url().default('http://localhost:5000'),
  CAD_HOST_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  CAD_HOST_RETRIES: z.coerce.number().int().min(1).max(10).default(3),
  CAD_HOST_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1_000),
  FIX_VALIDATION_RETRIES: z.coerce.number().int().min(1).max(20).default(3),
  FIX_VALIDATION_DELAY_MS: z.coerce.number().int().min(0).default(1_000),
  FIX_MAX_FILLET_ROUNDS: z.coerce.number().int().min(1).default(20),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  DFM_RULES_PATH: z.string().min(1).optional(),
  DFM_DRILLS_PATH: z.string().min(1).optional(),
  DFM_MATERIALS_PATH: z.string().min(1).optional(),
  DFM_MACHINES_PATH: z.string().min(1).optional(),
});

export interface HostConfig {
  kind: 'http' | 'memory';
  baseUrl: string;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
}

export interface FixPolicy {
  validationRetries: number;
  validationDelayMs: number;
  maxFilletRounds: number;
}

export interface Config {
  host: HostConfig;
  fix: FixPolicy;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  rulesPath?: string;
  drillsPath?: string;
  materialsPath?: string;
  machinesPath?: string;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;
  return {
    host: {
      kind: e.CAD_HOST,
      baseUrl: e.CAD_HOST_URL,
      timeoutMs: e.CAD_HOST_TIMEOUT_MS,
      retries: e.CAD_HOST_RETRIES,
      retryDelayMs: e.CAD_HOST_RETRY_DELAY_MS,
    },
    fix: {
      validationRetries: e.FIX_VALIDATION_RETRIES,
      validationDelayMs: e.FIX_VALIDATION_DELAY_MS,
      maxFilletRounds: e.FIX_MAX_FILLET_ROUNDS,
    },
    logLevel: e.LOG_LEVEL,
    rulesPath: e.DFM_RULES_PATH,
    drillsPath: e.DFM_DRILLS_PATH,
    materialsPath: e.DFM_MATERIALS_PATH,
    machinesPath: e.DFM_MACHINES_PATH,
  };
}
