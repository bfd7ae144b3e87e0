/**
 * @fileoverview Type Catalog
 *
 * @packageDocumentation
 * @module @extensor/core/infrastructure/types
 *
 * Resolves the type references written in descriptor files to
 * constructors. Every implementation that descriptors may name must be
 * registered here up front, either explicitly or with the
 * `@Implementation` decorator.
 *
 * @example Explicit registration
 * ```typescript
 * const catalog = new TypeCatalog()
 *   .register('langs.PythonLanguage', PythonLanguage)
 *   .registerAll({ 'langs.RubyLanguage': RubyLanguage });
 * ```
 *
 * @example Decorator registration (default catalog)
 * ```typescript
 * @Implementation('langs.PythonLanguage')
 * class PythonLanguage extends Language { ... }
 * ```
 */

import { ImplementationType } from '../../domain/extension';
import { ConfigurationError, TypeResolutionError } from '../../domain/exceptions';

export class TypeCatalog {
  private readonly byName = new Map<string, ImplementationType>();
  // eslint-disable-next-line @typescript-eslint/ban-types
  private readonly names = new Map<Function, string>();

  /**
   * Register `type` under `qualifiedName`.
   *
   * @throws ConfigurationError if the name is blank or already bound to
   * another constructor
   */
  register(qualifiedName: string, type: ImplementationType): this {
    const name = qualifiedName.trim();
    if (name.length === 0) {
      throw new ConfigurationError(`Blank type name for ${type.name}`);
    }

    const existing = this.byName.get(name);
    if (existing && existing !== type) {
      throw new ConfigurationError(
        `Type name '${name}' is already registered for ${existing.name}`,
      );
    }

    this.byName.set(name, type);
    if (!this.names.has(type)) {
      this.names.set(type, name);
    }
    return this;
  }

  /**
   * Register several types at once
   */
  registerAll(types: Readonly<Record<string, ImplementationType>>): this {
    for (const [name, type] of Object.entries(types)) {
      this.register(name, type);
    }
    return this;
  }

  /**
   * Resolve a type reference
   *
   * @throws TypeResolutionError for unknown references
   */
  forName(typeReference: string): ImplementationType {
    const type = this.byName.get(typeReference);
    if (!type) {
      throw new TypeResolutionError(typeReference);
    }
    return type;
  }

  has(typeReference: string): boolean {
    return this.byName.has(typeReference);
  }

  /**
   * Whether `type` is a registered (and so concrete) implementation
   */
  // eslint-disable-next-line @typescript-eslint/ban-types
  isImplementation(type: Function): boolean {
    return this.names.has(type);
  }

  /**
   * Qualified name of `type`, falling back to its class name
   */
  // eslint-disable-next-line @typescript-eslint/ban-types
  nameOf(type: Function): string {
    return this.names.get(type) ?? type.name;
  }

  get size(): number {
    return this.byName.size;
  }
}

/**
 * Catalog used by `@Implementation` and the default registry
 */
export const defaultTypeCatalog = new TypeCatalog();

/**
 * Decorator registering a class in a type catalog
 *
 * @param qualifiedName - Name descriptors use for this class
 * @param catalog - Target catalog (default: `defaultTypeCatalog`)
 */
export function Implementation(
  qualifiedName: string,
  catalog: TypeCatalog = defaultTypeCatalog,
) {
  return function <C extends ImplementationType>(target: C): void {
    catalog.register(qualifiedName, target);
  };
}
