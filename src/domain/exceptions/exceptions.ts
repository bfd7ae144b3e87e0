/**
 * @extensor/core - Extension Errors
 *
 * Error taxonomy for the extension registry. Structural and configuration
 * errors are thrown to the caller; resource scanning and type resolution
 * errors are logged by the scanner and never escape discovery.
 */

// ==================== Base Error ====================

/**
 * Base class for every error raised by the registry
 */
export class ExtensionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExtensionError';
    Error.captureStackTrace(this, this.constructor);
  }
}

// ==================== Caller Errors ====================

/**
 * The type handed to the registry is absent, not a class, concrete,
 * or lacks the `@Extensible` marker.
 */
export class InvalidServiceTypeError extends ExtensionError {
  constructor(
    message: string,
    public readonly serviceType?: string,
  ) {
    super(message);
    this.name = 'InvalidServiceTypeError';
  }
}

/**
 * Blank or absent extension name
 */
export class InvalidArgumentError extends ExtensionError {
  constructor(message: string = 'extension name must not be blank') {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Requested name is not bound in the service type's descriptors
 */
export class ServiceNotFoundError extends ExtensionError {
  constructor(
    public readonly serviceType: string,
    public readonly serviceName: string,
  ) {
    super(`No extension of ${serviceType} named '${serviceName}'`);
    this.name = 'ServiceNotFoundError';
  }
}

// ==================== Configuration Errors ====================

/**
 * Deployment mistake: more than one default name, or an implementation
 * that does not extend its service type.
 */
export class ConfigurationError extends ExtensionError {
  constructor(
    message: string,
    public readonly serviceType?: string,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * One name bound to two different implementations
 */
export class DuplicateServiceNameError extends ConfigurationError {
  constructor(
    serviceType: string,
    public readonly serviceName: string,
    public readonly firstType: string,
    public readonly secondType: string,
  ) {
    super(
      `Duplicate extension ${serviceType} name '${serviceName}' on ${firstType} and ${secondType}`,
      serviceType,
    );
    this.name = 'DuplicateServiceNameError';
  }
}

// ==================== Runtime Errors ====================

/**
 * Zero-argument construction of an implementation failed
 */
export class ServiceInstantiationError extends ExtensionError {
  constructor(
    public readonly serviceType: string,
    public readonly serviceName: string,
    cause: unknown,
  ) {
    super(
      `Extension instance (name: ${serviceName}, type: ${serviceType}) could not be instantiated: ${describeCause(cause)}`,
      { cause },
    );
    this.name = 'ServiceInstantiationError';
  }
}

/**
 * A lazy value was asked for again while its own computation was running
 */
export class ReentrantComputationError extends ExtensionError {
  constructor(public readonly label: string) {
    super(`Re-entrant computation of ${label}`);
    this.name = 'ReentrantComputationError';
  }
}

// ==================== Discovery Errors (logged only) ====================

/**
 * Locating or reading a descriptor resource failed
 */
export class ResourceScanError extends ExtensionError {
  constructor(
    public readonly serviceType: string,
    public readonly location: string,
    cause: unknown,
  ) {
    super(
      `Failed to scan extension descriptors (type: ${serviceType}, resource: ${location}): ${describeCause(cause)}`,
      { cause },
    );
    this.name = 'ResourceScanError';
  }
}

/**
 * A descriptor named a type the type catalog does not know
 */
export class TypeResolutionError extends ExtensionError {
  constructor(public readonly typeReference: string) {
    super(`Unknown implementation type '${typeReference}'`);
    this.name = 'TypeResolutionError';
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
