/**
 * @fileoverview Span Enrichment Utility
 * @description
 * Appends attributes and events to whatever span is currently active.
 * Enrichment is advisory: every operation here is best-effort, and none
 * of them can make the calling business logic fail.
 *
 * @module infrastructure/tracing/SpanEnricher
 *
 * @example
 * ```typescript
 * const order = await repository.save(draft);
 * enricher.addAttributes(order);
 * enricher.addEvent('order.persisted', { 'order.status': order.status });
 * ```
 */

import {
  collectAttributes,
  isNonBlank,
  type AttributeInput,
} from '../../domain/contracts/IAttributeSource';
import { consoleLogger, type ILogger } from '../logging/ILogger';
import type { ISpan, ITracer, SpanAttributes } from './ITracer';
import { isValidTraceContext } from './SpanContextCodec';

function toSpanAttributes(entries: Array<[string, string]>): SpanAttributes {
  const attributes: SpanAttributes = {};
  for (const [key, value] of entries) {
    attributes[key] = value;
  }
  return attributes;
}

export class SpanEnricher {
  constructor(
    private readonly tracer: ITracer,
    private readonly logger: ILogger = consoleLogger,
  ) {}

  /**
   * Set attributes on the active span.
   *
   * Entries with a missing or blank key or value are skipped; the rest are
   * applied in insertion order.
   */
  addAttributes(input: AttributeInput | null | undefined): void {
    if (!input) {
      return;
    }

    try {
      const entries = collectAttributes(input);
      if (entries.length === 0) {
        return;
      }

      const span = this.activeSpan();
      if (!span) {
        this.logger.debug('No valid span context available to add attributes');
        return;
      }

      for (const [key, value] of entries) {
        span.setAttribute(key, value);
      }
    } catch (error) {
      this.logger.error('Error adding attributes to span', error);
    }
  }

  /**
   * Record a named event on the active span, optionally with attributes.
   */
  addEvent(
    name: string | null | undefined,
    input?: AttributeInput | null,
  ): void {
    if (!isNonBlank(name)) {
      this.logger.debug('Ignoring span event without a name');
      return;
    }

    try {
      const span = this.activeSpan();
      if (!span) {
        this.logger.debug(`No valid span context available to add event '${name}'`);
        return;
      }

      if (!input) {
        span.addEvent(name);
        return;
      }
      span.addEvent(name, toSpanAttributes(collectAttributes(input)));
    } catch (error) {
      this.logger.error(`Error adding event '${name}' to span`, error);
    }
  }

  /**
   * Trace id of the active span, if one is active and valid.
   */
  currentTraceId(): string | undefined {
    try {
      return this.activeSpan()?.getContext().traceId;
    } catch (error) {
      this.logger.error('Error reading the current trace id', error);
      return undefined;
    }
  }

  private activeSpan(): ISpan | undefined {
    const span = this.tracer.getCurrentSpan();
    if (!span || !isValidTraceContext(span.getContext())) {
      return undefined;
    }
    return span;
  }
}
