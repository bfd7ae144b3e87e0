/**
 * @fileoverview Extensible Marker Decorator
 *
 * @packageDocumentation
 * @module @extensor/core/domain/extension
 *
 * Marks an abstract class as an extension point. The registry refuses to
 * build a director for any type that does not carry this marker itself
 * (inherited markers do not count).
 *
 * @example Default implementation by name
 * ```typescript
 * @Extensible('python')
 * export abstract class Language {
 *   abstract greet(): string;
 * }
 * ```
 *
 * @example Explicit qualified name
 * ```typescript
 * @Extensible({ name: 'acme.codecs.Codec', defaultName: 'gzip' })
 * export abstract class Codec {
 *   abstract encode(input: Buffer): Buffer;
 * }
 * // descriptors are read from extensions/acme.codecs.Codec
 * ```
 */

import 'reflect-metadata';
import { ExtensibleMetadata } from './types';

/**
 * Metadata key of the marker
 */
export const EXTENSIBLE_METADATA_KEY = Symbol.for('extensor:extensible');

/**
 * Options accepted by `@Extensible`
 */
export interface ExtensibleOptions {
  /**
   * Qualified name of the service type. Defaults to the class name.
   */
  name?: string;

  /**
   * Name of the default implementation. At most one name may be given;
   * a comma list with several names is rejected when descriptors load.
   */
  defaultName?: string;
}

/**
 * Decorator marking a service contract as extensible.
 *
 * @param value - Default implementation name, or full options
 */
export function Extensible(value?: string | ExtensibleOptions): ClassDecorator {
  const options: ExtensibleOptions =
    typeof value === 'string' ? { defaultName: value } : value ?? {};

  return function (target) {
    const metadata: ExtensibleMetadata = {
      name: options.name?.trim() || target.name,
      defaultValue: options.defaultName ?? '',
    };
    Reflect.defineMetadata(EXTENSIBLE_METADATA_KEY, metadata, target);
  };
}

/**
 * Read the marker declared directly on `type`.
 */
// eslint-disable-next-line @typescript-eslint/ban-types
export function getExtensibleMetadata(type: Function): ExtensibleMetadata | undefined {
  const metadata: unknown = Reflect.getOwnMetadata(EXTENSIBLE_METADATA_KEY, type);
  return isExtensibleMetadata(metadata) ? metadata : undefined;
}

function isExtensibleMetadata(value: unknown): value is ExtensibleMetadata {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'defaultValue' in value &&
    typeof value.defaultValue === 'string'
  );
}
