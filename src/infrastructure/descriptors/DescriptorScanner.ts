/**
 * @extensor/core - Descriptor Scanner
 *
 * Locates every descriptor resource of a service type, parses each one
 * and merges the bindings into one name → implementation map.
 *
 * Failure policy:
 * - service type registered as an implementation → InvalidServiceTypeError
 * - locating or reading a resource fails → logged, that contributor
 *   yields nothing
 * - malformed line or unknown type reference → logged, line skipped
 * - implementation does not extend the service type → ConfigurationError
 * - one name bound to two implementations → DuplicateServiceNameError
 */

import type { Logger } from 'pino';
import {
  ImplementationType,
  ServiceType,
  extendsServiceType,
} from '../../domain/extension';
import {
  ConfigurationError,
  DuplicateServiceNameError,
  InvalidServiceTypeError,
  ResourceScanError,
  TypeResolutionError,
} from '../../domain/exceptions';
import { TypeCatalog } from '../types/TypeCatalog';
import { DescriptorEntry, parseDescriptor } from './DescriptorParser';
import { DescriptorResource, IResourceLocator } from './ResourceLocator';

/**
 * Default directory prefix of descriptor resources
 */
export const DEFAULT_DESCRIPTOR_DIRECTORY = 'extensions/';

export interface DescriptorScannerOptions {
  locator: IResourceLocator;
  catalog: TypeCatalog;
  logger: Logger;
  /** Directory prefix; a trailing '/' is added when missing */
  directory?: string;
}

export class DescriptorScanner {
  readonly directory: string;
  private readonly locator: IResourceLocator;
  private readonly catalog: TypeCatalog;
  private readonly logger: Logger;

  constructor(options: DescriptorScannerOptions) {
    this.locator = options.locator;
    this.catalog = options.catalog;
    this.logger = options.logger;
    this.directory = normalizeDirectory(options.directory ?? DEFAULT_DESCRIPTOR_DIRECTORY);
  }

  /**
   * Resource path of the descriptors for `qualifiedName`
   */
  resourcePathOf(qualifiedName: string): string {
    return this.directory + qualifiedName;
  }

  /**
   * Scan all descriptors of `serviceType`
   */
  scan(
    serviceType: ServiceType<unknown>,
    qualifiedName: string,
  ): Map<string, ImplementationType> {
    if (this.catalog.isImplementation(serviceType)) {
      throw new InvalidServiceTypeError(
        `extension type (${serviceType.name}) is a concrete implementation, not a service contract`,
        serviceType.name,
      );
    }

    const types = new Map<string, ImplementationType>();
    const resourcePath = this.resourcePathOf(qualifiedName);

    let resources: DescriptorResource[];
    try {
      resources = this.locator.findResources(resourcePath);
    } catch (error) {
      this.report(new ResourceScanError(qualifiedName, resourcePath, error));
      return types;
    }

    this.logger.debug(
      { serviceType: qualifiedName, resources: resources.length },
      'scanning extension descriptors',
    );

    for (const resource of resources) {
      let text: string;
      try {
        text = resource.read();
      } catch (error) {
        this.report(new ResourceScanError(qualifiedName, resource.location, error));
        continue;
      }
      this.loadResource(types, serviceType, qualifiedName, resource.location, text);
    }

    return types;
  }

  private loadResource(
    types: Map<string, ImplementationType>,
    serviceType: ServiceType<unknown>,
    qualifiedName: string,
    location: string,
    text: string,
  ): void {
    const { entries, malformed } = parseDescriptor(text);

    for (const bad of malformed) {
      this.logger.warn(
        { serviceType: qualifiedName, location, line: bad.line, reason: bad.reason },
        'skipping malformed descriptor line',
      );
    }

    for (const entry of entries) {
      const type = this.resolveType(qualifiedName, location, entry);
      if (type) {
        this.bind(types, serviceType, qualifiedName, entry.name, type);
      }
    }
  }

  private resolveType(
    qualifiedName: string,
    location: string,
    entry: DescriptorEntry,
  ): ImplementationType | undefined {
    try {
      return this.catalog.forName(entry.typeReference);
    } catch (error) {
      if (!(error instanceof TypeResolutionError)) throw error;
      this.logger.warn(
        { serviceType: qualifiedName, location, line: entry.line, err: error },
        'skipping descriptor line with unknown type',
      );
      return undefined;
    }
  }

  private bind(
    types: Map<string, ImplementationType>,
    serviceType: ServiceType<unknown>,
    qualifiedName: string,
    name: string,
    type: ImplementationType,
  ): void {
    const typeName = this.catalog.nameOf(type);
    if (!extendsServiceType(type, serviceType)) {
      throw new ConfigurationError(
        `Extension class ${typeName} (name: ${name}) does not extend ${qualifiedName}`,
        qualifiedName,
      );
    }

    const existing = types.get(name);
    if (!existing) {
      types.set(name, type);
    } else if (existing !== type) {
      throw new DuplicateServiceNameError(
        qualifiedName,
        name,
        this.catalog.nameOf(existing),
        typeName,
      );
    }
  }

  private report(error: ResourceScanError): void {
    this.logger.error({ err: error, location: error.location }, error.message);
  }
}

function normalizeDirectory(directory: string): string {
  if (directory.length === 0 || directory.endsWith('/')) return directory;
  return `${directory}/`;
}
