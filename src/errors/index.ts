/**
 * Error system module
 */

export {
  ErrorCategory,
  ErrorSeverity,
  ErrorEnvironment,
  ErrorCodeRegistry,
  ProvisioningError,
  ValidationError,
  InvalidArgumentError,
  InvalidDomainError,
  ConfigurationError,
  formatErrorMessage,
  type ErrorCode
} from '../core/errors/taxonomy';

export { OptionsErrorCodes } from '../core/errors/codes';
