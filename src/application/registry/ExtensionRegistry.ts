/**
 * @fileoverview Extension Registry
 *
 * @packageDocumentation
 * @module @extensor/core/application/registry
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * The registry is the table of directors: exactly one
 * {@link ExtensionDirector} per service type, plus the shared instance
 * table that lets every name bound to the same class reuse one object.
 *
 * It is an ordinary object with an explicit lifetime. Applications
 * usually create one at startup and pass it around; tests create their
 * own so caches never leak between them. {@link getDefaultRegistry}
 * provides a lazily created process-wide instance for code that wants
 * the ambient style.
 *
 * ```
 * ExtensionRegistry
 * ├─ directors:       Language → ExtensionDirector<Language>
 * │                   Codec    → ExtensionDirector<Codec>
 * └─ sharedInstances: PythonLanguage → <instance>
 * ```
 *
 * @example
 * ```typescript
 * const registry = new ExtensionRegistry({
 *   locator: new FileSystemResourceLocator([process.cwd()]),
 *   catalog: new TypeCatalog().register('langs.Python', PythonLanguage),
 * });
 *
 * const python = registry.getOrCreateDirector(Language).resolve('python');
 * ```
 */

import type { Logger } from 'pino';
import { ServiceType, getExtensibleMetadata } from '../../domain/extension';
import { InvalidServiceTypeError } from '../../domain/exceptions';
import { SharedInstanceTable } from '../../infrastructure/cache/SharedInstanceTable';
import { DescriptorScanner } from '../../infrastructure/descriptors/DescriptorScanner';
import {
  FileSystemResourceLocator,
  IResourceLocator,
} from '../../infrastructure/descriptors/ResourceLocator';
import { getDefaultLogger } from '../../infrastructure/logging/logger';
import { TypeCatalog, defaultTypeCatalog } from '../../infrastructure/types/TypeCatalog';
import { ExtensionDirector } from './ExtensionDirector';

/**
 * Registry construction options
 */
export interface ExtensionRegistryOptions {
  /** Where descriptors are found (default: current working directory) */
  locator?: IResourceLocator;

  /** Resolves descriptor type references (default: `defaultTypeCatalog`) */
  catalog?: TypeCatalog;

  /** Descriptor directory prefix (default: `extensions/`) */
  directory?: string;

  logger?: Logger;
}

export class ExtensionRegistry {
  readonly sharedInstances = new SharedInstanceTable();
  readonly catalog: TypeCatalog;

  private readonly scanner: DescriptorScanner;
  private readonly logger: Logger;
  // eslint-disable-next-line @typescript-eslint/ban-types
  private readonly directors = new Map<Function, unknown>();

  constructor(options: ExtensionRegistryOptions = {}) {
    this.catalog = options.catalog ?? defaultTypeCatalog;
    this.logger = options.logger ?? getDefaultLogger();
    this.scanner = new DescriptorScanner({
      locator: options.locator ?? new FileSystemResourceLocator([process.cwd()]),
      catalog: this.catalog,
      logger: this.logger,
      directory: options.directory,
    });
  }

  /**
   * Get the director of `type`, creating it on first request.
   *
   * The concrete-implementation check consults the catalog as it is at
   * the time of the call. A class registered with the catalog after its
   * director exists is rejected when the class map is computed instead.
   *
   * @throws InvalidServiceTypeError if `type` is absent, not a class, a
   * registered implementation, or not marked `@Extensible`
   */
  getOrCreateDirector<T>(type: ServiceType<T> | null | undefined): ExtensionDirector<T> {
    if (type === null || type === undefined) {
      throw new InvalidServiceTypeError('extension type == null');
    }
    if (typeof type !== 'function') {
      throw new InvalidServiceTypeError(`extension type (${String(type)}) is not a class`);
    }
    if (this.catalog.isImplementation(type)) {
      throw new InvalidServiceTypeError(
        `extension type (${type.name}) is a concrete implementation, not a service contract`,
        type.name,
      );
    }

    const metadata = getExtensibleMetadata(type);
    if (!metadata) {
      throw new InvalidServiceTypeError(
        `extension type (${type.name}) is not extensible, because it is NOT decorated with @Extensible`,
        type.name,
      );
    }

    const existing = this.directors.get(type);
    if (isDirectorOf(existing, type)) {
      return existing;
    }

    const candidate = new ExtensionDirector<T>(type, {
      qualifiedName: metadata.name,
      defaultValue: metadata.defaultValue,
      scanner: this.scanner,
      sharedInstances: this.sharedInstances,
      logger: this.logger,
    });
    if (!this.directors.has(type)) {
      this.directors.set(type, candidate);
    }

    const published = this.directors.get(type);
    return isDirectorOf(published, type) ? published : candidate;
  }

  /**
   * Service types that have a director
   */
  // eslint-disable-next-line @typescript-eslint/ban-types
  listServiceTypes(): Function[] {
    return [...this.directors.keys()];
  }
}

function isDirectorOf<T>(
  director: unknown,
  type: ServiceType<T>,
): director is ExtensionDirector<T> {
  return director instanceof ExtensionDirector && director.serviceType === type;
}

// ==================== Default Registry ====================

let defaultRegistry: ExtensionRegistry | undefined;

/**
 * Lazily created process-wide registry
 */
export function getDefaultRegistry(): ExtensionRegistry {
  if (!defaultRegistry) {
    defaultRegistry = new ExtensionRegistry();
  }
  return defaultRegistry;
}

/**
 * Replace the process-wide registry, e.g. with one built from
 * `createRegistryFromConfig`.
 */
export function setDefaultRegistry(registry: ExtensionRegistry): void {
  defaultRegistry = registry;
}

/**
 * Director of `type` in the process-wide registry
 */
export function getExtensionDirector<T>(
  type: ServiceType<T> | null | undefined,
): ExtensionDirector<T> {
  return getDefaultRegistry().getOrCreateDirector(type);
}
