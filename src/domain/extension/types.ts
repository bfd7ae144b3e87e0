/**
 * @fileoverview Extension Type Model
 *
 * @packageDocumentation
 * @module @extensor/core/domain/extension
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Run-time shapes for service contracts and their implementations.
 * TypeScript interfaces vanish at compile time, so a service contract is
 * an abstract class and every implementation `extends` it.
 *
 * ```
 * @Extensible('python')              ← ServiceType<Language>
 * abstract class Language { ... }
 *
 * class PythonLanguage extends Language { ... }   ← ImplementationType
 * ```
 */

/**
 * A service contract as seen at run time: the (usually abstract) class
 * whose prototype every implementation inherits from.
 *
 * @template T - Instance type of the contract
 */
// eslint-disable-next-line @typescript-eslint/ban-types
export interface ServiceType<T> extends Function {
  readonly prototype: T;
}

/**
 * An implementation class with a zero-argument constructor
 */
export type ImplementationType = new () => unknown;

/**
 * Marker data stored on a service type by `@Extensible`
 */
export interface ExtensibleMetadata {
  /** Qualified name used as the descriptor file name */
  readonly name: string;

  /** Raw default value as declared; may be blank or a comma list */
  readonly defaultValue: string;
}

/**
 * The aggregated, per-service-type descriptor view
 */
export interface ClassMap {
  /** name → implementation */
  readonly types: ReadonlyMap<string, ImplementationType>;

  /** Configured default extension name, if any */
  readonly defaultName?: string;
}

/**
 * Whether `candidate` inherits from `contract` through its static
 * prototype chain (`class B extends A` ⇒ `Object.getPrototypeOf(B) === A`).
 */
export function extendsServiceType(
  candidate: ImplementationType,
  contract: ServiceType<unknown>,
): boolean {
  if (candidate === contract) return true;
  let current: unknown = Object.getPrototypeOf(candidate);
  while (typeof current === 'function') {
    if (current === contract) return true;
    current = Object.getPrototypeOf(current);
  }
  return false;
}
