/**
 * @extensor/core - Exception Module
 *
 * Error taxonomy of the extension registry
 */

export {
  ExtensionError,
  // Caller errors
  InvalidServiceTypeError,
  InvalidArgumentError,
  ServiceNotFoundError,
  // Configuration errors
  ConfigurationError,
  DuplicateServiceNameError,
  // Runtime errors
  ServiceInstantiationError,
  ReentrantComputationError,
  // Discovery errors
  ResourceScanError,
  TypeResolutionError,
} from './exceptions';
