/**
 * Plain-config parsing for SoftLayer options - Zod details stay internal
 */

export {
  parseProvisioningOptions,
  safeParseProvisioningOptions,
  type ProvisioningOptionsInput
} from './schemas'
export type { ValidationConfig, ValidationMode, ValidationLogger } from './config'
export { getDefaultValidationConfig, loggingValidationLogger, silentValidationLogger } from './config'
export { normalizeOptionsInput, DEFAULT_NORMALIZATION, type NormalizationOptions } from './normalization'
export { mapValidationError, formatErrors, type FriendlyError } from './error-mapping'
