/**
 * @fileoverview Unit tests for @TraceSpan and @SpanAttribute
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { SpanKind as OtelSpanKind, SpanStatusCode } from '@opentelemetry/api';
import {
  InstrumentationException,
  InvalidDecoratorTargetException,
  SpanAttribute,
  SpanKind,
  TraceSpan,
  addSpanAttributes,
  configureTracing,
  getParameterBindings,
  resetTracing,
  type AttributeRecord,
  type IAttributeSource,
  type ITelemetryMessage,
} from '../../../src';
import {
  createMockLogger,
  createTracingHarness,
  type TracingHarness,
} from '../../helpers/tracing-harness';

// ============================================================================
// Test Domain
// ============================================================================

class Cart implements IAttributeSource {
  constructor(readonly id: string, readonly items: number) {}

  attributes(): AttributeRecord {
    return { 'cart.id': this.id, 'cart.items': String(this.items) };
  }
}

interface ReturnRequested extends ITelemetryMessage {
  orderId: string;
}

class OrderService {
  constructor(private readonly prefix: string) {}

  @TraceSpan({ name: 'order.create', attributes: ['operation:create'] })
  createOrder(@SpanAttribute('customer.id') customerId: string): string {
    addSpanAttributes({ 'order.total_amount': '30.00' });
    return `${this.prefix}-${customerId}`;
  }

  @TraceSpan('order.get')
  async getOrder(@SpanAttribute('order.id') orderId: string): Promise<string> {
    await Promise.resolve();
    throw new Error(`Order not found: ${orderId}`);
  }

  @TraceSpan()
  listOrders(): string[] {
    return [];
  }

  @TraceSpan()
  checkout(@SpanAttribute('cart') cart: Cart, @SpanAttribute('express') express: boolean): number {
    return express ? cart.items * 2 : cart.items;
  }

  @TraceSpan({ name: 'order.return.consume', kind: SpanKind.Consumer })
  handleReturn(@SpanAttribute('order.id') orderId: string, message: ReturnRequested): string {
    return `${orderId}:${message.orderId}`;
  }

  @TraceSpan()
  static fromSnapshot(prefix: string): OrderService {
    return new OrderService(prefix);
  }
}

describe('Tracing decorators', () => {
  let harness: TracingHarness;

  beforeEach(() => {
    harness = createTracingHarness();
    configureTracing({ tracer: harness.tracer, logger: createMockLogger() });
  });

  afterEach(() => {
    resetTracing();
  });

  // ============================================================================
  // TEST GROUP 1: @TraceSpan
  // ============================================================================

  describe('@TraceSpan', () => {
    it('should trace a call with static, bound and metadata attributes', () => {
      const service = new OrderService('ord');

      expect(service.createOrder('C1')).toBe('ord-C1');

      const span = harness.span('order.create');
      expect(span.kind).toBe(OtelSpanKind.INTERNAL);
      expect(span.status.code).toBe(SpanStatusCode.OK);
      expect(span.attributes).toEqual({
        operation: 'create',
        'customer.id': 'C1',
        'code.function': 'createOrder',
        'code.namespace': 'OrderService',
        'order.total_amount': '30.00',
      });
    });

    it('should mirror a failure and pass the same error to the caller', async () => {
      const service = new OrderService('ord');

      await expect(service.getOrder('missing')).rejects.toThrow('Order not found: missing');

      const span = harness.span('order.get');
      expect(span.status.code).toBe(SpanStatusCode.ERROR);
      expect(span.status.message).toBe('Order not found: missing');
      expect(span.events[0].attributes?.['exception.message']).toBe('Order not found: missing');
      expect(span.attributes['order.id']).toBe('missing');
    });

    it('should derive the span name from class and method', () => {
      new OrderService('ord').listOrders();

      expect(harness.spans().map((span) => span.name)).toEqual(['OrderService.listOrders']);
    });

    it('should name static methods after their class', () => {
      const service = OrderService.fromSnapshot('snap');

      expect(service.createOrder('C2')).toBe('snap-C2');
      expect(harness.span('OrderService.fromSnapshot').attributes['code.namespace']).toBe(
        'OrderService',
      );
    });

    it('should merge attribute sources and keep scalar types', () => {
      const result = new OrderService('ord').checkout(new Cart('cart-9', 3), true);

      expect(result).toBe(6);
      expect(harness.span('OrderService.checkout').attributes).toEqual({
        'cart.id': 'cart-9',
        'cart.items': '3',
        express: true,
        'code.function': 'checkout',
        'code.namespace': 'OrderService',
      });
    });

    it('should link consumer spans to the coordinates of a message argument', () => {
      const message: ReturnRequested = {
        orderId: 'ord-4',
        traceId: '4bf92f3577b34da6a3ce929d0e0e4736',
        spanId: '00f067aa0ba902b7',
        traceFlags: '01',
      };

      new OrderService('ord').handleReturn('ord-4', message);

      const span = harness.span('order.return.consume');
      expect(span.kind).toBe(OtelSpanKind.CONSUMER);
      expect(span.links).toHaveLength(1);
      expect(span.links[0].context.spanId).toBe('00f067aa0ba902b7');
    });

    it('should pick up a tracer configured after decoration', () => {
      const replacement = createTracingHarness();
      configureTracing({ tracer: replacement.tracer, logger: createMockLogger() });

      new OrderService('ord').listOrders();

      expect(harness.spans()).toHaveLength(0);
      expect(replacement.spans().map((span) => span.name)).toEqual(['OrderService.listOrders']);
    });

    it('should run undecorated behaviour when tracing is disabled', () => {
      configureTracing({ tracer: harness.tracer, enabled: false, logger: createMockLogger() });

      expect(new OrderService('ord').createOrder('C1')).toBe('ord-C1');
      expect(harness.spans()).toHaveLength(0);
    });

    it('should reject accessors when the class is defined', () => {
      const define = () => {
        class Invoice {
          @TraceSpan()
          get total(): number {
            return 1;
          }
        }
        return Invoice;
      };

      expect(define).toThrow(InvalidDecoratorTargetException);
      expect(define).toThrow('@TraceSpan cannot be applied to Invoice.total: only methods can be traced');
    });
  });

  // ============================================================================
  // TEST GROUP 2: @SpanAttribute
  // ============================================================================

  describe('@SpanAttribute', () => {
    it('should record bindings per method', () => {
      expect(getParameterBindings(OrderService.prototype, 'checkout')).toEqual(
        expect.arrayContaining([
          { index: 0, key: 'cart' },
          { index: 1, key: 'express' },
        ]),
      );
      expect(getParameterBindings(OrderService.prototype, 'listOrders')).toEqual([]);
    });

    it('should reject a blank key', () => {
      const define = () => {
        class Refunds {
          @TraceSpan()
          refund(@SpanAttribute('  ') orderId: string): string {
            return orderId;
          }
        }
        return Refunds;
      };

      expect(define).toThrow(InstrumentationException);
      expect(define).toThrow('@SpanAttribute on Refunds.refund parameter 0 needs a non-blank key');
    });

    it('should reject constructor parameters', () => {
      const define = () => {
        class Ledger {
          constructor(@SpanAttribute('ledger.id') readonly id: string) {}
        }
        return Ledger;
      };

      expect(define).toThrow(
        '@SpanAttribute cannot be applied to Ledger constructor parameter 0: only method parameters can be recorded',
      );
    });
  });
});
