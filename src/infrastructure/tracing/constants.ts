/**
 * @fileoverview Attribute and span name constants
 *
 * Naming convention for span names: `namespace.operation.detail` (dots and
 * snake_case). Span names must stay low-cardinality: identifiers go into
 * attributes, never into names.
 */

/**
 * Attribute keys written by the instrumentation itself.
 */
export const AttributeNames = {
  /** Name of the intercepted function or method */
  CODE_FUNCTION: 'code.function',
  /** Declaring type (or explicit namespace) of the intercepted function */
  CODE_NAMESPACE: 'code.namespace',
} as const;

/**
 * Separator between key and value in static `"key:value"` attributes.
 */
export const STATIC_ATTRIBUTE_SEPARATOR = ':';
