/**
 * @fileoverview @extensor/core - Extension Registry
 * @description
 * Discovers named implementations of extensible service types from
 * descriptor files, instantiates them lazily and caches them as
 * singletons.
 *
 * ## Architecture Layers
 *
 * - **Domain**: service contracts, the `@Extensible` marker, errors
 * - **Application**: directors, the registry, configuration
 * - **Infrastructure**: descriptor parsing and scanning, resource
 *   locators, the type catalog, caches, logging
 *
 * @example
 * ```typescript
 * import 'reflect-metadata';
 * import { Extensible, ExtensionRegistry, TypeCatalog } from '@extensor/core';
 *
 * @Extensible('python')
 * abstract class Language {
 *   abstract greet(): string;
 * }
 *
 * class PythonLanguage extends Language {
 *   greet() { return 'hello from python'; }
 * }
 *
 * // extensions/Language:
 * //   python = langs.PythonLanguage
 * const registry = new ExtensionRegistry({
 *   catalog: new TypeCatalog().register('langs.PythonLanguage', PythonLanguage),
 * });
 * registry.getOrCreateDirector(Language).resolveDefault()?.greet();
 * ```
 *
 * @packageDocumentation
 * @module @extensor/core
 * @version 1.0.0
 */

import 'reflect-metadata';

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS
// ============================================================================

export * from './application';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS
// ============================================================================

export * from './infrastructure';
