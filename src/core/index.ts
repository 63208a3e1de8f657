/**
 * Core module: provider-agnostic options, validation and shared types
 */

export {
  TemplateOptions,
  GenericTemplateOptions,
  DEFAULT_INBOUND_PORTS,
  type PortWait,
  type TemplateOptionsSnapshot,
  type UserMetadataInput
} from './options/template-options'

export { Optional, isNullish, type Present, type Absent, type Maybe, type Nullable } from './types'

export type { Brand, DomainName, Port } from './types/branded'
export { CoreBrandedTypeCreators } from './types/branded'

export { CoreValidators, CORE_VALIDATION_PATTERNS, PORT_RANGE } from './validation/patterns'

export { getDefaultOptionsConfig, resolveErrorEnvironment, LOG_LEVELS, type OptionsConfig, type LogLevel, type ValidationMode } from './config'
