/**
 * Error codes raised by the options objects, with small factories
 * that pick the message variant from the current environment.
 */

import { resolveErrorEnvironment } from '../config'
import {
  ErrorCategory,
  ErrorCodeRegistry,
  ErrorSeverity,
  InvalidArgumentError,
  InvalidDomainError
} from './taxonomy'

export const OptionsErrorCodes = {
  ARGUMENT_NULL: ErrorCodeRegistry.register({
    code: 'OPTIONS_ARGUMENT_NULL',
    category: ErrorCategory.VALIDATION,
    severity: ErrorSeverity.ERROR,
    devMessage: '{field} was null',
    prodMessage: 'A required option value is missing',
  }),

  ARGUMENT_INVALID: ErrorCodeRegistry.register({
    code: 'OPTIONS_ARGUMENT_INVALID',
    category: ErrorCategory.VALIDATION,
    severity: ErrorSeverity.ERROR,
    devMessage: '{field}: {reason}',
    prodMessage: 'An option value is invalid',
  }),

  DEFAULTS_SEALED: ErrorCodeRegistry.register({
    code: 'OPTIONS_DEFAULTS_SEALED',
    category: ErrorCategory.VALIDATION,
    severity: ErrorSeverity.ERROR,
    devMessage: 'cannot set {field} on the shared default options; clone() them first',
    prodMessage: 'Shared default options are read-only',
    suggestions: ['Call clone() on the default options before configuring them'],
  }),

  DOMAIN_NO_PUBLIC_SUFFIX: ErrorCodeRegistry.register({
    code: 'OPTIONS_DOMAIN_NO_PUBLIC_SUFFIX',
    category: ErrorCategory.VALIDATION,
    severity: ErrorSeverity.ERROR,
    devMessage: 'domainName {domainName} has no public suffix',
    prodMessage: 'The domain name is invalid',
    suggestions: ['Use a registrable domain such as "example.com"'],
  }),

  CONFIG_INVALID: ErrorCodeRegistry.register({
    code: 'OPTIONS_CONFIG_INVALID',
    category: ErrorCategory.VALIDATION,
    severity: ErrorSeverity.ERROR,
    devMessage: 'Invalid provisioning options:\n{summary}',
    prodMessage: 'Invalid provisioning options',
  }),
} as const

const environment = () => resolveErrorEnvironment()

export function nullArgument(field: string): InvalidArgumentError {
  return new InvalidArgumentError(OptionsErrorCodes.ARGUMENT_NULL, { field }, undefined, environment())
}

export function invalidArgument(field: string, reason: string, value?: unknown): InvalidArgumentError {
  return new InvalidArgumentError(OptionsErrorCodes.ARGUMENT_INVALID, { field, reason, value }, undefined, environment())
}

export function sealedDefaults(field: string): InvalidArgumentError {
  return new InvalidArgumentError(OptionsErrorCodes.DEFAULTS_SEALED, { field }, undefined, environment())
}

export function invalidDomain(domainName: string): InvalidDomainError {
  return new InvalidDomainError(OptionsErrorCodes.DOMAIN_NO_PUBLIC_SUFFIX, { domainName }, undefined, environment())
}
