/**
 * @fileoverview @spanlink/core - Declarative span interception
 * @description
 * Declare traced operations with decorators, enrich the active span from
 * domain objects, and link consumer spans back to the producer span whose
 * coordinates travelled inside a message.
 *
 * ## Architecture Layers
 *
 * - **Domain**: the attribute contract, the telemetry-bearing message
 *   shape and instrumentation exceptions. No tracing dependency.
 * - **Infrastructure**: the tracer port and its OpenTelemetry adapter,
 *   the interception engine, enrichment, link building, configuration
 *   and logging.
 *
 * @packageDocumentation
 * @module @spanlink/core
 * @version 1.0.0
 */

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

export * from './domain';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS
// ============================================================================

export * from './infrastructure';

// ==================== Version ====================
export const VERSION = '1.0.0';
