/**
 * @fileoverview Attribute Contract
 *
 * @packageDocumentation
 * @module @spanlink/core/domain/contracts
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Domain objects expose the fields that matter for telemetry by
 * implementing {@link IAttributeSource}. The domain stays free of any
 * tracing dependency: it only projects its own state into a flat
 * `string → string` map, and the instrumentation layer decides what to do
 * with it.
 */

/**
 * Flat attribute map. Entries whose value is `null` or `undefined` mean
 * "not applicable to this instance" and are skipped when applied to a span.
 */
export type AttributeRecord = Readonly<Record<string, string | null | undefined>>;

/**
 * Marks domain objects that can provide span attributes.
 *
 * @remarks
 * Keys are stable, dot-namespaced identifiers (`order.id`,
 * `customer.id`). Implementations must be pure projections of the
 * object's current state, with no side effects.
 *
 * @example
 * ```typescript
 * class Order implements IAttributeSource {
 *   constructor(readonly id: string, readonly status: OrderStatus) {}
 *
 *   attributes(): AttributeRecord {
 *     return { 'order.id': this.id, 'order.status': this.status };
 *   }
 * }
 *
 * addSpanAttributes(order);
 * ```
 */
export interface IAttributeSource {
  attributes(): AttributeRecord;
}

/**
 * Anything the enrichment utility accepts as a set of attributes.
 */
export type AttributeInput =
  | AttributeRecord
  | ReadonlyMap<string, string | null | undefined>
  | IAttributeSource;

/**
 * Type guard for {@link IAttributeSource}.
 */
export function isAttributeSource(value: unknown): value is IAttributeSource {
  return (
    typeof value === 'object' &&
    value !== null &&
    'attributes' in value &&
    typeof value.attributes === 'function'
  );
}

function isAttributeMap(
  input: AttributeInput,
): input is ReadonlyMap<string, string | null | undefined> {
  return input instanceof Map;
}

/**
 * True for strings that contain something other than whitespace.
 */
export function isNonBlank(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Flatten any {@link AttributeInput} into ordered `[key, value]` pairs,
 * dropping entries whose key or value is missing or blank.
 *
 * Insertion order is preserved; a key that appears twice keeps the last
 * value.
 */
export function collectAttributes(
  input: AttributeInput,
): Array<[string, string]> {
  let entries: Iterable<[string, string | null | undefined]>;
  if (isAttributeSource(input)) {
    entries = Object.entries(input.attributes());
  } else if (isAttributeMap(input)) {
    entries = input.entries();
  } else {
    entries = Object.entries(input);
  }

  const collected = new Map<string, string>();
  for (const [key, value] of entries) {
    if (!isNonBlank(key) || !isNonBlank(value)) {
      continue;
    }
    collected.set(key, value);
  }
  return [...collected.entries()];
}
