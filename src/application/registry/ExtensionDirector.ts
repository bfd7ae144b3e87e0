/**
 * @fileoverview Extension Director
 *
 * @packageDocumentation
 * @module @extensor/core/application/registry
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * One director exists per service type. It owns the type's class map
 * (name → implementation, read from descriptors on first use) and one
 * lazily populated instance slot per requested name.
 *
 * ## Lifecycle of a lookup
 *
 * ```
 * director.resolve('python')
 *   ├─ slot for 'python'?      no → create empty slot
 *   ├─ slot populated?         yes → return cached instance
 *   ├─ class map ready?        no → scan descriptors once
 *   ├─ 'python' bound?         no → ServiceNotFoundError
 *   └─ construct through the shared instance table, populate slot
 * ```
 *
 * Slots are per name, so constructing one extension never waits on
 * another. Two names bound to the same class share a single instance
 * through the registry's {@link SharedInstanceTable}.
 *
 * @example
 * ```typescript
 * const languages = registry.getOrCreateDirector(Language);
 *
 * languages.listSupported();            // Set { 'python', 'ruby' }
 * const python = languages.resolve('python');
 * languages.resolve('python') === python; // true
 * languages.resolveOrDefault('cobol');  // falls back to @Extensible default
 * ```
 */

import type { Logger } from 'pino';
import {
  ClassMap,
  ImplementationType,
  ServiceType,
} from '../../domain/extension';
import {
  ConfigurationError,
  InvalidArgumentError,
  ServiceInstantiationError,
  ServiceNotFoundError,
} from '../../domain/exceptions';
import { Lazy } from '../../infrastructure/cache/Lazy';
import { SharedInstanceTable } from '../../infrastructure/cache/SharedInstanceTable';
import { DescriptorScanner } from '../../infrastructure/descriptors/DescriptorScanner';

const NAME_SEPARATOR = /\s*,+\s*/;

/**
 * Collaborators handed to a director by its registry
 */
export interface ExtensionDirectorContext {
  /** Qualified name of the service type; names its descriptor files */
  qualifiedName: string;

  /** Raw `@Extensible` default value */
  defaultValue: string;

  scanner: DescriptorScanner;
  sharedInstances: SharedInstanceTable;
  logger: Logger;
}

export class ExtensionDirector<T> {
  readonly qualifiedName: string;

  private readonly defaultValue: string;
  private readonly scanner: DescriptorScanner;
  private readonly sharedInstances: SharedInstanceTable;
  private readonly logger: Logger;

  private readonly classMap: Lazy<ClassMap>;
  private readonly instances = new Map<string, Lazy<T>>();

  constructor(
    readonly serviceType: ServiceType<T>,
    context: ExtensionDirectorContext,
  ) {
    this.qualifiedName = context.qualifiedName;
    this.defaultValue = context.defaultValue;
    this.scanner = context.scanner;
    this.sharedInstances = context.sharedInstances;
    this.logger = context.logger.child({ serviceType: context.qualifiedName });
    this.classMap = new Lazy<ClassMap>(`class map of ${context.qualifiedName}`);
  }

  // ==================== Lookup ====================

  /**
   * Get the extension bound to `name`, instantiating it on first use.
   *
   * @throws InvalidArgumentError if `name` is blank
   * @throws ServiceNotFoundError if no descriptor binds `name`
   * @throws ServiceInstantiationError if construction fails
   */
  resolve(name: string | null | undefined): T {
    const key = requireName(name);
    const slot = this.slotFor(key);

    const loaded = slot.peek();
    if (loaded !== undefined) {
      return loaded;
    }

    const type = this.getClassMap().types.get(key);
    if (!type) {
      throw new ServiceNotFoundError(this.qualifiedName, key);
    }

    return slot.getOrCompute(() => this.instantiate(key, type));
  }

  /**
   * Get the extension bound to `name` only if it is already loaded.
   * Never reads descriptors or constructs anything, but the name is
   * recorded in {@link listLoaded}.
   */
  resolveIfLoaded(name: string | null | undefined): T | undefined {
    return this.slotFor(requireName(name)).peek();
  }

  /**
   * `resolve(name)` when `name` is bound, otherwise the default extension
   */
  resolveOrDefault(name: string | null | undefined): T | undefined {
    return this.hasExtension(name) ? this.resolve(name) : this.resolveDefault();
  }

  /**
   * The default extension, or `undefined` if the service type declares
   * no default.
   */
  resolveDefault(): T | undefined {
    const { defaultName } = this.getClassMap();
    if (defaultName === undefined) {
      return undefined;
    }
    return this.resolve(defaultName);
  }

  // ==================== Introspection ====================

  /**
   * Whether a descriptor binds `name`
   */
  hasExtension(name: string | null | undefined): boolean {
    if (!isPresent(name)) return false;
    return this.getClassMap().types.has(name);
  }

  /**
   * The declared default extension name
   */
  getDefaultName(): string | undefined {
    return this.getClassMap().defaultName;
  }

  /**
   * All names bound by descriptors, sorted
   */
  listSupported(): ReadonlySet<string> {
    return sortedSet(this.getClassMap().types.keys());
  }

  /**
   * Names requested so far through `resolve` or `resolveIfLoaded`,
   * sorted. Unbound names and failed constructions are included.
   */
  listLoaded(): ReadonlySet<string> {
    return sortedSet(this.instances.keys());
  }

  // ==================== Internals ====================

  private getClassMap(): ClassMap {
    return this.classMap.getOrCompute(() => this.loadClassMap());
  }

  private loadClassMap(): ClassMap {
    const defaultName = this.parseDefaultName();
    const types = this.scanner.scan(this.serviceType, this.qualifiedName);

    this.logger.debug(
      { extensions: [...types.keys()], defaultName },
      'extension descriptors loaded',
    );

    return { types, defaultName };
  }

  private parseDefaultName(): string | undefined {
    const value = this.defaultValue.trim();
    if (value.length === 0) {
      return undefined;
    }

    const names = value.split(NAME_SEPARATOR);
    if (names.length > 1) {
      throw new ConfigurationError(
        `More than 1 default extension name on ${this.qualifiedName}: [${names.join(', ')}]`,
        this.qualifiedName,
      );
    }
    return names[0];
  }

  private slotFor(name: string): Lazy<T> {
    let slot = this.instances.get(name);
    if (!slot) {
      slot = new Lazy<T>(`extension '${name}' of ${this.qualifiedName}`);
      this.instances.set(name, slot);
    }
    return slot;
  }

  private instantiate(name: string, type: ImplementationType): T {
    let instance: unknown;
    try {
      instance = this.sharedInstances.getOrCreate(type, () => new type());
    } catch (error) {
      throw new ServiceInstantiationError(this.qualifiedName, name, error);
    }

    if (!(instance instanceof this.serviceType)) {
      throw new ServiceInstantiationError(
        this.qualifiedName,
        name,
        new TypeError(`${type.name} instance is not a ${this.qualifiedName}`),
      );
    }

    this.logger.debug({ extension: name, implementation: type.name }, 'extension instantiated');
    return instance;
  }
}

function isPresent(name: string | null | undefined): name is string {
  return typeof name === 'string' && name.trim().length > 0;
}

function requireName(name: string | null | undefined): string {
  if (!isPresent(name)) {
    throw new InvalidArgumentError();
  }
  return name;
}

function sortedSet(names: Iterable<string>): ReadonlySet<string> {
  return new Set([...names].sort());
}
