/**
 * Configuration Module
 *
 * Loads and validates environment variables for citysearch.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { VERSION } from '../cli/version.js';

export const DEFAULT_NOMINATIM_URL = 'https://nominatim.openstreetmap.org/search';
export const DEFAULT_USER_AGENT = `citysearch/${VERSION}`;

// Numeric variables arrive as strings; empty values fall back to defaults
function intVar(min: number, max: number, fallback: number) {
  return z.preprocess(
    (value) => (value === undefined || value === '' ? undefined : value),
    z.coerce.number().int().min(min).max(max).default(fallback)
  );
}

// Environment schema with optional values and defaults
const envSchema = z.object({
  // Provider selection (free-form; unknown names fall back with a warning)
  CITYSEARCH_PROVIDER: z.string().default('nominatim'),

  // Nominatim endpoint
  NOMINATIM_BASE_URL: z.string().url().default(DEFAULT_NOMINATIM_URL),
  NOMINATIM_USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),

  // Request tuning
  CITYSEARCH_TIMEOUT_MS: intVar(100, 120_000, 10_000),
  CITYSEARCH_RESULT_LIMIT: intVar(1, 100, 50),

  // Presentation
  CITYSEARCH_MAP_ZOOM: intVar(1, 19, 15),

  // Mock provider latency
  CITYSEARCH_MOCK_DELAY_MS: intVar(0, 60_000, 500),

  // Runtime options
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

type Env = z.infer<typeof envSchema>;

/**
 * Raised when one or more environment variables fail validation.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Application configuration
 */
export interface Config {
  nodeEnv: Env['NODE_ENV'];
  isProduction: boolean;
  isDevelopment: boolean;
  isTest: boolean;

  /** Provider name as given; resolved by the provider registry */
  provider: string;

  nominatim: {
    baseUrl: string;
    userAgent: string;
    timeoutMs: number;
    limit: number;
  };

  mock: {
    delayMs: number;
  };

  mapZoom: number;
}

/**
 * Build configuration from an environment map.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    const issues = parseResult.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigError(`Invalid environment variables:\n  ${issues.join('\n  ')}`, issues);
  }

  const env = parseResult.data;

  return {
    nodeEnv: env.NODE_ENV,
    isProduction: env.NODE_ENV === 'production',
    isDevelopment: env.NODE_ENV === 'development',
    isTest: env.NODE_ENV === 'test',

    provider: env.CITYSEARCH_PROVIDER,

    nominatim: {
      baseUrl: env.NOMINATIM_BASE_URL,
      userAgent: env.NOMINATIM_USER_AGENT,
      timeoutMs: env.CITYSEARCH_TIMEOUT_MS,
      limit: env.CITYSEARCH_RESULT_LIMIT,
    },

    mock: {
      delayMs: env.CITYSEARCH_MOCK_DELAY_MS,
    },

    mapZoom: env.CITYSEARCH_MAP_ZOOM,
  };
}

let cachedConfig: Config | undefined;

/**
 * Configuration for the current process, parsed once.
 */
export function getConfig(): Config {
  if (!cachedConfig) {
    cachedConfig = loadConfig(process.env);
  }
  return cachedConfig;
}

/**
 * Drop the memoised configuration so the next getConfig() re-reads the
 * environment.
 */
export function resetConfig(): void {
  cachedConfig = undefined;
}
