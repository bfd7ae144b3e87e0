/**
 * @module @extensor/core/domain
 * @description Domain layer exports
 */

// ============================================================================
// Service Contracts
// ============================================================================

export * from './extension';

// ============================================================================
// Errors
// ============================================================================

export * from './exceptions';
