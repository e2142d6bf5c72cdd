/**
 * @fileoverview Operation Descriptor
 * @description
 * Everything the interception engine needs to know about one traced
 * operation, computed once when the operation is decorated or wrapped and
 * reused for every call:
 *
 * - the span name (explicit, or `<DeclaringType>.<method>`)
 * - the span kind
 * - static `"key:value"` attributes
 * - which arguments become attributes, and under which key
 *
 * @remarks
 * **Span name cardinality.** The derived name is built from the
 * declaring type and the method name only, never from arguments. A method
 * whose *name* is itself generated per call (a dynamically built
 * accessor, say) would still produce many distinct span names; such
 * operations must be given an explicit low-cardinality `name`. This is a
 * caller obligation; nothing here can detect it.
 *
 * @module infrastructure/tracing/OperationDescriptor
 */

import { isNonBlank } from '../../domain/contracts/IAttributeSource';
import type { ILogger } from '../logging/ILogger';
import { STATIC_ATTRIBUTE_SEPARATOR } from './constants';
import { SpanKind } from './ITracer';

/**
 * Options accepted by `@TraceSpan` and `TracingInterceptor.wrap`.
 *
 * @example
 * ```typescript
 * const options: TraceSpanOptions = {
 *   name: 'order.create',
 *   kind: SpanKind.Internal,
 *   attributes: ['operation:create', 'entity:order'],
 * };
 * ```
 */
export interface TraceSpanOptions {
  /** Explicit span name. Blank means "derive it". */
  name?: string;

  /** @defaultValue SpanKind.Internal */
  kind?: SpanKind;

  /** Static attributes as `"key:value"` strings */
  attributes?: readonly string[];

  /**
   * Link the span to the producer span whose coordinates an argument
   * carries. Overrides the interceptor-wide setting when given.
   */
  link?: boolean;
}

/**
 * Binds the argument at `index` to the attribute `key`.
 */
export interface ParameterBinding {
  readonly index: number;
  readonly key: string;
}

/**
 * Cached capability record of one traced operation.
 */
export interface OperationDescriptor {
  readonly name: string;
  readonly kind: SpanKind;
  readonly staticAttributes: ReadonlyArray<readonly [string, string]>;
  readonly parameterBindings: readonly ParameterBinding[];
  /** Method or function name, reported as `code.function` */
  readonly functionName: string;
  /** Declaring type, reported as `code.namespace` */
  readonly namespace?: string;
  /** `undefined` defers to the interceptor-wide setting */
  readonly linkMessages?: boolean;
}

/**
 * Static facts about the operation being described.
 */
export interface OperationSite {
  functionName: string;
  namespace?: string;
  parameterBindings?: readonly ParameterBinding[];
}

/**
 * Resolve the span name of an operation.
 *
 * @example
 * ```typescript
 * resolveSpanName('order.create', 'OrderService', 'createOrder'); // 'order.create'
 * resolveSpanName(undefined, 'OrderService', 'createOrder');      // 'OrderService.createOrder'
 * resolveSpanName(undefined, undefined, 'createOrder');           // 'createOrder'
 * ```
 */
export function resolveSpanName(
  explicitName: string | undefined,
  namespace: string | undefined,
  functionName: string,
): string {
  if (isNonBlank(explicitName)) {
    return explicitName;
  }
  return namespace ? `${namespace}.${functionName}` : functionName;
}

/**
 * Parse `"key:value"` entries.
 *
 * Each entry is split at its first separator and both halves are trimmed,
 * so values may themselves contain `:`. Entries without a separator or
 * with a blank key are skipped.
 */
export function parseStaticAttributes(
  entries: readonly string[],
  logger?: ILogger,
): Array<readonly [string, string]> {
  const parsed: Array<readonly [string, string]> = [];

  for (const entry of entries) {
    const separatorIndex = entry.indexOf(STATIC_ATTRIBUTE_SEPARATOR);
    const key = separatorIndex >= 0 ? entry.slice(0, separatorIndex).trim() : '';

    if (!key) {
      logger?.debug(`Ignoring malformed static span attribute "${entry}"`);
      continue;
    }

    parsed.push([key, entry.slice(separatorIndex + 1).trim()]);
  }

  return parsed;
}

/**
 * Build the descriptor of an operation.
 */
export function describeOperation(
  site: OperationSite,
  options: TraceSpanOptions = {},
  logger?: ILogger,
): OperationDescriptor {
  return {
    name: resolveSpanName(options.name, site.namespace, site.functionName),
    kind: options.kind ?? SpanKind.Internal,
    staticAttributes: parseStaticAttributes(options.attributes ?? [], logger),
    parameterBindings: [...(site.parameterBindings ?? [])].sort(
      (a, b) => a.index - b.index,
    ),
    functionName: site.functionName,
    namespace: site.namespace,
    linkMessages: options.link,
  };
}
