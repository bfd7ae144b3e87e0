/**
 * @module @extensor/core/application
 * @description Application layer exports
 */

// ============================================================================
// Registry
// ============================================================================

export * from './registry';

// ============================================================================
// Configuration
// ============================================================================

export * from './config';
