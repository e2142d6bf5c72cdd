/**
 * @module @spanlink/core/domain
 * @description Domain layer exports
 */

// ============================================================================
// Attribute Contract
// ============================================================================

export * from './contracts';

// ============================================================================
// Telemetry-bearing Messages
// ============================================================================

export * from './messaging';

// ============================================================================
// Exceptions
// ============================================================================

export * from './exceptions';
