/**
 * @fileoverview Parameter-to-attribute conversion
 *
 * Every argument bound with `@SpanAttribute` is classified into one of a
 * closed set of variants before it touches the span. The span then only
 * ever receives strings, numbers and booleans.
 */

import {
  collectAttributes,
  isAttributeSource,
} from '../../domain/contracts/IAttributeSource';
import type { ISpan } from './ITracer';

/**
 * Classified argument value.
 *
 * - `string`: set as is
 * - `integer`: whole numbers and safe bigints
 * - `float`: any other number (including NaN and infinities)
 * - `boolean`: set as is
 * - `source`: an attribute source; its own map replaces the binding key
 * - `text`: everything else, rendered with `String(value)`
 */
export type BoundAttribute =
  | { readonly type: 'string'; readonly value: string }
  | { readonly type: 'integer'; readonly value: number }
  | { readonly type: 'float'; readonly value: number }
  | { readonly type: 'boolean'; readonly value: boolean }
  | { readonly type: 'source'; readonly entries: ReadonlyArray<[string, string]> }
  | { readonly type: 'text'; readonly value: string };

function isSafeBigInt(value: bigint): boolean {
  return (
    value <= BigInt(Number.MAX_SAFE_INTEGER) &&
    value >= BigInt(Number.MIN_SAFE_INTEGER)
  );
}

/**
 * Classify an argument.
 *
 * @returns The variant, or `undefined` for `null` and `undefined`, which
 *   are never written to the span
 */
export function bindAttribute(value: unknown): BoundAttribute | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }

  switch (typeof value) {
    case 'string':
      return { type: 'string', value };
    case 'number':
      return Number.isInteger(value)
        ? { type: 'integer', value }
        : { type: 'float', value };
    case 'bigint':
      return isSafeBigInt(value)
        ? { type: 'integer', value: Number(value) }
        : { type: 'text', value: value.toString() };
    case 'boolean':
      return { type: 'boolean', value };
    default:
      break;
  }

  if (isAttributeSource(value)) {
    return { type: 'source', entries: collectAttributes(value) };
  }
  return { type: 'text', value: String(value) };
}

/**
 * Write a classified argument to the span under `key`.
 */
export function applyBoundAttribute(
  span: ISpan,
  key: string,
  bound: BoundAttribute,
): void {
  switch (bound.type) {
    case 'source':
      for (const [entryKey, entryValue] of bound.entries) {
        span.setAttribute(entryKey, entryValue);
      }
      return;
    case 'string':
    case 'integer':
    case 'float':
    case 'boolean':
    case 'text':
      span.setAttribute(key, bound.value);
      return;
  }
}
