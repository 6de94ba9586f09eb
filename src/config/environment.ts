/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * Builds the immutable application configuration from environment variables.
 * This is the only place that reads process.env; every component receives the
 * resulting AppConfig (or a slice of it) through its constructor.
 *
 * FOR DEVELOPERS:
 * - Add new settings to envSchema and AppConfig together
 * - Tests pass a plain object instead of process.env
 * =============================================================================
 */

import { z } from 'zod';
import { IANAZone } from 'luxon';
import {
  ConfigurationError,
  ConfigurationIssue,
  DEFAULTS,
  DIRECTION_CODES,
  DirectionCode,
  TravelDirection,
} from '../core';

// =============================================================================
// TYPES
// =============================================================================

export interface PlaceConfig {
  label: string;
  address: string;
}

export interface AppConfig {
  nodeEnv: string;
  isProduction: boolean;
  logLevel: string;
  /** Directory for the production file transports */
  logDir: string;

  googleMaps: {
    apiKey: string;
  };

  home: PlaceConfig;
  work: PlaceConfig;

  /** IANA zone used for the direction windows */
  timezone: string;
  /** Set when DIRECTION forces a direction regardless of the clock */
  forcedDirection?: TravelDirection;

  database: {
    path: string;
  };
}

// =============================================================================
// SCHEMA
// =============================================================================

const required = (name: string) =>
  z.string({ required_error: `${name} is required` })
    .trim()
    .min(1, `${name} is required`);

/** Empty strings count as unset for optional values */
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(value => (typeof value === 'string' && value.trim() === '' ? undefined : value), schema);

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

const envSchema = z.object({
  NODE_ENV: optional(z.string().default('development')),
  LOG_LEVEL: optional(z.enum(LOG_LEVELS).default(DEFAULTS.LOG_LEVEL)),
  LOG_DIR: optional(z.string().trim().default(DEFAULTS.LOG_DIR)),

  GOOGLE_MAPS_API_KEY: required('GOOGLE_MAPS_API_KEY'),

  HOME_LABEL: required('HOME_LABEL'),
  HOME_ADDRESS: required('HOME_ADDRESS'),
  WORK_LABEL: required('WORK_LABEL'),
  WORK_ADDRESS: required('WORK_ADDRESS'),

  LOCAL_TZ: optional(
    z.string()
      .trim()
      .refine(zone => IANAZone.isValidZone(zone), 'must be a valid IANA timezone')
      .default(DEFAULTS.TIMEZONE)
  ),

  DIRECTION: optional(
    z.string()
      .trim()
      .transform(value => value.toUpperCase())
      .pipe(z.enum(['H2W', 'W2H'], { errorMap: () => ({ message: 'must be H2W or W2H' }) }))
      .optional()
  ),

  DB_PATH: optional(z.string().trim().default(DEFAULTS.DB_PATH)),
}).refine(env => env.HOME_LABEL !== env.WORK_LABEL, {
  message: 'must differ from HOME_LABEL',
  path: ['WORK_LABEL'],
});

export type EnvSource = Record<string, string | undefined>;

// =============================================================================
// LOADER
// =============================================================================

/**
 * Validate the environment and build the frozen configuration.
 * Collects every problem before failing, so one run reports them all.
 */
export function loadConfig(env: EnvSource = process.env): Readonly<AppConfig> {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues: ConfigurationIssue[] = parsed.error.issues.map(issue => ({
      variable: issue.path.join('.') || 'environment',
      message: issue.message,
    }));
    throw new ConfigurationError(issues);
  }

  const values = parsed.data;
  const directionCode: DirectionCode | undefined = values.DIRECTION;

  const config: AppConfig = {
    nodeEnv: values.NODE_ENV,
    isProduction: values.NODE_ENV === 'production',
    logLevel: values.LOG_LEVEL,
    logDir: values.LOG_DIR,
    googleMaps: {
      apiKey: values.GOOGLE_MAPS_API_KEY,
    },
    home: { label: values.HOME_LABEL, address: values.HOME_ADDRESS },
    work: { label: values.WORK_LABEL, address: values.WORK_ADDRESS },
    timezone: values.LOCAL_TZ,
    ...(directionCode && { forcedDirection: DIRECTION_CODES[directionCode] }),
    database: {
      path: values.DB_PATH,
    },
  };

  return deepFreeze(config);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
