/**
 * Errors Module
 */

export {
  RAGErrorCode,
  Capability,
  type RAGErrorOptions,
  RAGError,
  ConfigurationError,
  TransientProviderError,
  DataError,
  QueryCancelledError,
  ValidationWarningCode,
  type ValidationWarning,
  isRAGError,
  isConfigurationError,
  isTransientProviderError,
  toMessage,
} from './types.js';

export {
  type CapabilityResult,
  type CapabilityCallOptions,
  callCapability,
} from './capability.js';
