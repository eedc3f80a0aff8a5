/**
 * Tests for configuration loading and environment validation.
 */

import path from 'path';
import { loadConfig, parseInteger, parseOrigins, validateEnvironment } from '../src/config';

describe('loadConfig', () => {
  test('defaults', () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      region: 'us-east-1',
      bedrockRegion: 'us-east-1',
      modelId: 'anthropic.claude-3-haiku-20240307-v1:0',
      routerModelId: 'anthropic.claude-3-haiku-20240307-v1:0',
      sessionsTable: 'user_sessions',
      doctorsTable: 'doctores',
      schedulesTable: 'horarios_doctores',
      sessionTtlSeconds: 3600,
      maxSessionTurns: 10,
      extractionTimeoutMs: 15_000,
      ragLambdaArn: null,
      ragMaxResults: 5,
      environment: 'development',
      allowedOrigins: ['*'],
    });
    expect(path.basename(config.workshopsCatalogPath)).toBe('workshops.json');
    expect(path.basename(config.dangerTriggersPath)).toBe('danger-combinations.json');
  });

  test('reads overrides from the environment', () => {
    const config = loadConfig({
      AWS_REGION: 'eu-west-1',
      BEDROCK_REGION: 'us-west-2',
      BEDROCK_MODEL: 'test-model',
      BEDROCK_ROUTER_MODEL: 'test-router-model',
      SESSION_TABLE_NAME: 'sessions-test',
      SESSION_TTL_SECONDS: '600',
      MAX_SESSION_TURNS: '4',
      RAG_WORKER_LAMBDA_ARN: 'arn:aws:lambda:eu-west-1:000000000000:function:rag',
      ALLOWED_ORIGINS: 'https://a.example.com, https://b.example.com',
    });

    expect(config).toMatchObject({
      region: 'eu-west-1',
      bedrockRegion: 'us-west-2',
      modelId: 'test-model',
      routerModelId: 'test-router-model',
      sessionsTable: 'sessions-test',
      sessionTtlSeconds: 600,
      maxSessionTurns: 4,
      ragLambdaArn: 'arn:aws:lambda:eu-west-1:000000000000:function:rag',
      allowedOrigins: ['https://a.example.com', 'https://b.example.com'],
    });
  });

  test('an inference profile takes precedence over the model id', () => {
    const config = loadConfig({ BEDROCK_MODEL: 'test-model', BEDROCK_INFERENCE_PROFILE_ARN: 'test-profile' });
    expect(config.modelId).toBe('test-profile');
    expect(config.routerModelId).toBe('test-profile');
  });
});

describe('parseInteger', () => {
  test('falls back on missing, invalid or non-positive values', () => {
    expect(parseInteger(undefined, 7)).toBe(7);
    expect(parseInteger('abc', 7)).toBe(7);
    expect(parseInteger('0', 7)).toBe(7);
    expect(parseInteger('12', 7)).toBe(12);
  });
});

describe('parseOrigins', () => {
  test('an empty list allows any origin', () => {
    expect(parseOrigins(undefined)).toEqual(['*']);
    expect(parseOrigins(' , ')).toEqual(['*']);
  });
});

describe('validateEnvironment', () => {
  test('a complete environment is valid', () => {
    const result = validateEnvironment({
      AWS_REGION: 'us-east-1',
      BEDROCK_REGION: 'us-east-1',
      SESSION_TABLE_NAME: 'user_sessions',
      BEDROCK_MODEL: 'test-model',
      ENVIRONMENT: 'staging',
    });

    expect(result).toEqual({ isValid: true, errors: [], warnings: [] });
  });

  test('reports missing variables', () => {
    const result = validateEnvironment({});

    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual([
      "Required environment variable 'AWS_REGION' is missing or empty",
      "Required environment variable 'SESSION_TABLE_NAME' is missing or empty",
      'At least one of BEDROCK_MODEL, BEDROCK_INFERENCE_PROFILE_ARN must be set for Bedrock configuration',
    ]);
  });

  test('warns about open CORS in production and bad numbers', () => {
    const result = validateEnvironment({
      AWS_REGION: 'us-east-1',
      BEDROCK_REGION: 'us-east-1',
      SESSION_TABLE_NAME: 'user_sessions',
      BEDROCK_MODEL: 'test-model',
      ENVIRONMENT: 'production',
      MAX_SESSION_TURNS: 'ten',
    });

    expect(result.isValid).toBe(true);
    expect(result.warnings).toEqual([
      'ALLOWED_ORIGINS allows any origin in production',
      "MAX_SESSION_TURNS='ten' is not a positive integer, using the default",
    ]);
  });
});
