/**
 * @fileoverview Infrastructure Layer Exports
 * @description
 * Adapters and cross-cutting concerns:
 *
 * - **Tracing**: interception engine, decorators, enrichment, span links
 *   and the OpenTelemetry adapter
 * - **Config**: tracing options, from code or environment variables
 * - **Logging**: the logger port used for telemetry warnings
 *
 * @packageDocumentation
 * @module @spanlink/core/infrastructure
 */

// Tracing
export * from './tracing';

// Configuration
export * from './config';

// Logging
export * from './logging';
