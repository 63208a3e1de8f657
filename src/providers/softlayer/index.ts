/**
 * SoftLayer provider module
 */

export {
  SoftLayerProvisioningOptions,
  type ProvisioningCopyTarget,
  type ProvisioningOptionsSnapshot
} from './options'
export { SoftLayerOptionsBuilder } from './builder'
export { SOFTLAYER_DEFAULT_DOMAIN_NAME, SOFTLAYER_OPTIONS_KIND } from './constants'
export {
  parseProvisioningOptions,
  safeParseProvisioningOptions,
  getDefaultValidationConfig,
  type ProvisioningOptionsInput,
  type ValidationConfig,
  type ValidationLogger
} from './validation'
