/**
 * Library-wide configuration
 *
 * @description Derives error messaging, log level and validation mode from the
 * process environment. The options objects never read it; only the errors they raise read `NODE_ENV`.
 */

import { z } from 'zod'
import {
  ConfigurationError,
  ErrorCategory,
  ErrorCodeRegistry,
  ErrorEnvironment,
  ErrorSeverity
} from '../errors/taxonomy'

export type ValidationMode = 'strict' | 'lenient'

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const
export type LogLevel = typeof LOG_LEVELS[number]

export interface OptionsConfig {
  environment: ErrorEnvironment
  logLevel: LogLevel
  validationMode: ValidationMode
}

const CONFIG_ENV_INVALID = ErrorCodeRegistry.register({
  code: 'CONFIG_ENV_INVALID',
  category: ErrorCategory.CONFIGURATION,
  severity: ErrorSeverity.CRITICAL,
  devMessage: 'Invalid environment configuration: {issues}',
  prodMessage: 'Invalid environment configuration',
  suggestions: [
    `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`,
    'PROVISIONING_VALIDATION_MODE must be "strict" or "lenient"'
  ]
})

const EnvSchema = z.object({
  NODE_ENV: z.string().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  PROVISIONING_VALIDATION_MODE: z.enum(['strict', 'lenient']).optional(),
})

function environmentFromNodeEnv(nodeEnv: string | undefined): ErrorEnvironment {
  switch (nodeEnv) {
    case 'production':
      return ErrorEnvironment.PRODUCTION
    case 'test':
      return ErrorEnvironment.TEST
    default:
      return ErrorEnvironment.DEVELOPMENT
  }
}

/**
 * Message environment for errors raised by the options objects.
 * Reads `NODE_ENV` only, so a bad `LOG_LEVEL` never changes which error a setter throws.
 */
export function resolveErrorEnvironment(env: NodeJS.ProcessEnv = process.env): ErrorEnvironment {
  return environmentFromNodeEnv(env.NODE_ENV)
}

/**
 * Builds the config from an environment map (defaults to `process.env`).
 * Production is strict and logs at info; tests are silent; everything else is lenient debug.
 * @throws ConfigurationError when a recognized variable holds an unsupported value
 */
export function getDefaultOptionsConfig(env: NodeJS.ProcessEnv = process.env): OptionsConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    throw new ConfigurationError(CONFIG_ENV_INVALID, { issues }, parsed.error)
  }

  const environment = environmentFromNodeEnv(parsed.data.NODE_ENV)
  const isProduction = environment === ErrorEnvironment.PRODUCTION

  const defaultLevel: LogLevel = environment === ErrorEnvironment.TEST
    ? 'silent'
    : isProduction ? 'info' : 'debug'

  return {
    environment,
    logLevel: parsed.data.LOG_LEVEL ?? defaultLevel,
    validationMode: parsed.data.PROVISIONING_VALIDATION_MODE ?? (isProduction ? 'strict' : 'lenient'),
  }
}
