/**
 * Runtime configuration, read once from the Lambda environment.
 */

import path from 'path';
import { MAX_SESSION_TURNS, SESSION_TTL_SECONDS } from './models/session';

export interface AppConfig {
  region: string;
  bedrockRegion: string;
  modelId: string;
  routerModelId: string;
  sessionsTable: string;
  doctorsTable: string;
  schedulesTable: string;
  sessionTtlSeconds: number;
  maxSessionTurns: number;
  extractionTimeoutMs: number;
  ragLambdaArn: string | null;
  ragMaxResults: number;
  dangerTriggersPath: string;
  workshopsCatalogPath: string;
  environment: string;
  /** CORS origins; ['*'] allows any. */
  allowedOrigins: string[];
}

type Env = Record<string, string | undefined>;

const DEFAULT_MODEL_ID = 'anthropic.claude-3-haiku-20240307-v1:0';

// src/ and dist/ both sit one level below the project root.
const CONFIG_DIR = path.join(__dirname, '..', 'config');

export function parseInteger(raw: string | undefined, fallback: number): number {
  if (!raw) {
    return fallback;
  }

  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value) || value <= 0) {
    return fallback;
  }
  return value;
}

export function parseOrigins(raw: string | undefined): string[] {
  const origins = (raw ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
  return origins.length > 0 ? origins : ['*'];
}

export function loadConfig(env: Env = process.env): AppConfig {
  const region = env.AWS_REGION || 'us-east-1';
  const modelId = env.BEDROCK_INFERENCE_PROFILE_ARN || env.BEDROCK_MODEL || DEFAULT_MODEL_ID;

  return {
    region,
    bedrockRegion: env.BEDROCK_REGION || region,
    modelId,
    routerModelId: env.BEDROCK_ROUTER_MODEL || modelId,
    sessionsTable: env.SESSION_TABLE_NAME || 'user_sessions',
    doctorsTable: env.DOCTORS_TABLE_NAME || 'doctores',
    schedulesTable: env.SCHEDULES_TABLE_NAME || 'horarios_doctores',
    sessionTtlSeconds: parseInteger(env.SESSION_TTL_SECONDS, SESSION_TTL_SECONDS),
    maxSessionTurns: parseInteger(env.MAX_SESSION_TURNS, MAX_SESSION_TURNS),
    extractionTimeoutMs: parseInteger(env.EXTRACTION_TIMEOUT_MS, 15_000),
    ragLambdaArn: env.RAG_WORKER_LAMBDA_ARN || null,
    ragMaxResults: parseInteger(env.RAG_MAX_RESULTS, 5),
    dangerTriggersPath: env.DANGER_TRIGGERS_PATH || path.join(CONFIG_DIR, 'danger-combinations.json'),
    workshopsCatalogPath: env.WORKSHOPS_CATALOG_PATH || path.join(CONFIG_DIR, 'workshops.json'),
    environment: env.ENVIRONMENT || 'development',
    allowedOrigins: parseOrigins(env.ALLOWED_ORIGINS),
  };
}

// ─── Environment validation ─────────────────────────────────────────────────

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

const REQUIRED_ENV_VARS = ['AWS_REGION', 'SESSION_TABLE_NAME'];

/** At least one of these must name the Bedrock model. */
const BEDROCK_ENV_VARS = ['BEDROCK_MODEL', 'BEDROCK_INFERENCE_PROFILE_ARN'];

const NUMERIC_ENV_VARS = [
  'SESSION_TTL_SECONDS',
  'MAX_SESSION_TURNS',
  'EXTRACTION_TIMEOUT_MS',
  'RAG_MAX_RESULTS',
];

export function validateEnvironment(env: Env = process.env): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const name of REQUIRED_ENV_VARS) {
    if (!env[name]) {
      errors.push(`Required environment variable '${name}' is missing or empty`);
    }
  }

  if (!BEDROCK_ENV_VARS.some((name) => env[name])) {
    errors.push(`At least one of ${BEDROCK_ENV_VARS.join(', ')} must be set for Bedrock configuration`);
  }

  if (!env.BEDROCK_REGION && env.AWS_REGION) {
    warnings.push('BEDROCK_REGION not set, will default to AWS_REGION');
  }

  if (env.ENVIRONMENT === 'production' && parseOrigins(env.ALLOWED_ORIGINS).includes('*')) {
    warnings.push('ALLOWED_ORIGINS allows any origin in production');
  }

  if (!env.ENVIRONMENT) {
    warnings.push("ENVIRONMENT not set, will default to 'development'");
  }

  for (const name of NUMERIC_ENV_VARS) {
    const raw = env[name];
    if (raw !== undefined && parseInteger(raw, -1) === -1) {
      warnings.push(`${name}='${raw}' is not a positive integer, using the default`);
    }
  }

  return { isValid: errors.length === 0, errors, warnings };
}
