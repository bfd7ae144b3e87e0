/**
 * @fileoverview Infrastructure Layer Exports
 * @description
 * Implementations behind the registry:
 *
 * - **Descriptors**: parsing, resource location and scanning
 * - **Types**: the catalog resolving descriptor type references
 * - **Cache**: lazy values and the shared instance table
 * - **Logging**: pino loggers
 *
 * @packageDocumentation
 * @module @extensor/core/infrastructure
 */

export * from './descriptors';
export * from './types';
export * from './cache';
export * from './logging';
