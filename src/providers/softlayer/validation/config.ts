/**
 * Configuration for plain-config parsing
 * Controls strict vs lenient parsing with environment-based defaults
 */

import { getDefaultOptionsConfig, type ValidationMode } from '../../../core/config'
import { getLogger } from '../../../log/utils'

export type { ValidationMode }

export interface ValidationConfig {
  mode: ValidationMode;
  logger?: ValidationLogger;
}

export interface ValidationLogger {
  logRepair(field: string, original: unknown, repaired: unknown): void;
  logDropped(field: string, value: unknown): void;
}

/**
 * Default validation config based on environment
 */
export function getDefaultValidationConfig(): ValidationConfig {
  return {
    mode: getDefaultOptionsConfig().validationMode,
    logger: loggingValidationLogger(),
  };
}

/**
 * Reports repairs and dropped keys at debug level
 */
export function loggingValidationLogger(name = 'SoftLayerOptionsParser'): ValidationLogger {
  const logger = getLogger(name);
  return {
    logRepair(field: string, original: unknown, repaired: unknown): void {
      logger.debug({ field, original, repaired }, `Normalized ${field}`);
    },

    logDropped(field: string, value: unknown): void {
      logger.debug({ field, value }, `Ignored unknown option ${field}`);
    },
  };
}

export const silentValidationLogger: ValidationLogger = {
  logRepair: () => {},
  logDropped: () => {},
};
