/**
 * @fileoverview Method Interception Engine
 * @description
 * Wraps one call of a traced operation in a span. Per invocation:
 *
 * 1. take the operation's cached {@link OperationDescriptor}
 * 2. start the span, linked to a producer span when an argument carries
 *    trace coordinates, else as a child of the active span (or a root)
 * 3. apply static attributes, then argument-bound attributes, then
 *    `code.*` metadata
 * 4. make the span current
 * 5. run the body
 * 6. mark the span Ok, or record the error and mark it Error, then rethrow
 *    the very same error
 * 7. end the span, exactly once
 *
 * ## Sync and async bodies
 *
 * A body that returns a native promise keeps its span open until the
 * promise settles. The span stays current across the body's `await`s
 * because the tracer's context follows async continuations. The caller
 * gets back the promise the body returned, untouched.
 *
 * Other thenables (lazy query builders and the like) are plain return
 * values: their `then` is never called here, since calling it may run
 * the work it stands for.
 *
 * ## Tracer failures
 *
 * If the span cannot be started, or cannot be made current, the failure
 * is logged and the body runs without it.
 *
 * ```typescript
 * const getOrder = interceptor.wrap(
 *   async (orderId: string) => repository.findById(orderId),
 *   { name: 'order.get' },
 * );
 * await getOrder('ord-1'); // span 'order.get', ended after the lookup resolves
 * ```
 *
 * @module infrastructure/tracing/TracingInterceptor
 */

import {
  resolveTracingOptions,
  type ResolvedTracingOptions,
  type TracingOptions,
} from '../config/TracingOptions';
import type { ILogger } from '../logging/ILogger';
import { applyBoundAttribute, bindAttribute } from './BoundAttribute';
import { AttributeNames } from './constants';
import { SpanStatus, type ISpan, type ITracer } from './ITracer';
import {
  describeOperation,
  type OperationDescriptor,
  type OperationSite,
  type TraceSpanOptions,
} from './OperationDescriptor';
import { SpanLinkBuilder } from './SpanLinkBuilder';

/**
 * What happened inside the activation callback, kept outside of it so a
 * tracer failure around the callback can be told apart from the body's.
 */
interface Activation<TResult> {
  entered: boolean;
  completed?: { readonly value: TResult };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class TracingInterceptor {
  readonly links: SpanLinkBuilder;
  private readonly logger: ILogger;
  private readonly options: ResolvedTracingOptions;

  constructor(
    private readonly tracer: ITracer,
    options: TracingOptions = {},
  ) {
    this.options = resolveTracingOptions({ ...options, tracer });
    this.logger = this.options.logger;
    this.links = new SpanLinkBuilder(tracer, this.logger);
  }

  /**
   * Whether calls are currently being traced.
   */
  get enabled(): boolean {
    return this.options.enabled;
  }

  /**
   * Build the descriptor of an operation, with this interceptor's logger.
   */
  describe(site: OperationSite, options?: TraceSpanOptions): OperationDescriptor {
    return describeOperation(site, options, this.logger);
  }

  /**
   * Run `call` inside a span described by `descriptor`.
   *
   * @param descriptor - Cached descriptor of the operation
   * @param args - Arguments of the call, used for attribute binding and
   *   link detection only
   * @param call - The operation body, already bound to its arguments
   * @returns Whatever `call` returns, unchanged
   */
  invoke<TResult>(
    descriptor: OperationDescriptor,
    args: readonly unknown[],
    call: () => TResult,
  ): TResult {
    if (!this.options.enabled) {
      return call();
    }

    const span = this.tryStartSpan(descriptor, args);
    if (!span) {
      return call();
    }
    this.applyAttributes(span, descriptor, args);

    const activation: Activation<TResult> = { entered: false };
    try {
      return this.tracer.withActiveSpan(span, () => {
        activation.entered = true;
        const value = this.runInSpan(span, call);
        activation.completed = { value };
        return value;
      });
    } catch (error) {
      if (activation.completed) {
        this.logger.warn(`Failed to deactivate span '${descriptor.name}'`, error);
        return activation.completed.value;
      }
      if (activation.entered) {
        throw error;
      }
      this.logger.warn(`Failed to activate span '${descriptor.name}'`, error);
      return this.runInSpan(span, call);
    }
  }

  /**
   * Wrap a function so that every call runs in a span.
   *
   * @param fn - Function to trace
   * @param options - Span options; `bindings` maps argument positions to
   *   attribute keys
   *
   * @example
   * ```typescript
   * const createOrder = interceptor.wrap(
   *   (customerId: string, request: CreateOrderRequest) => service.create(customerId, request),
   *   { name: 'order.create', attributes: ['operation:create'], bindings: { 0: 'customer.id' } },
   * );
   * ```
   */
  wrap<TArgs extends unknown[], TResult>(
    fn: (...args: TArgs) => TResult,
    options: TraceSpanOptions & {
      namespace?: string;
      bindings?: Readonly<Record<number, string>>;
    } = {},
  ): (...args: TArgs) => TResult {
    const descriptor = this.describe(
      {
        functionName: fn.name || 'anonymous',
        namespace: options.namespace,
        parameterBindings: Object.entries(options.bindings ?? {}).map(
          ([index, key]) => ({ index: Number(index), key }),
        ),
      },
      options,
    );

    const interceptor = this;
    return function traced(this: unknown, ...args: TArgs): TResult {
      return interceptor.invoke(descriptor, args, () => fn.apply(this, args));
    };
  }

  /**
   * Run a block of code in its own span.
   *
   * @example
   * ```typescript
   * await interceptor.run({ name: 'inventory.reserve' }, () => reserve(items));
   * ```
   */
  run<TResult>(
    options: TraceSpanOptions & { name: string },
    call: () => TResult,
  ): TResult {
    return this.invoke(
      this.describe({ functionName: options.name }, options),
      [],
      call,
    );
  }

  // ==================== Span lifecycle ====================

  private tryStartSpan(
    descriptor: OperationDescriptor,
    args: readonly unknown[],
  ): ISpan | undefined {
    try {
      const linkMessages = descriptor.linkMessages ?? this.options.linkMessages;
      const coordinates = linkMessages ? this.links.findCoordinates(args) : undefined;
      return this.links.startSpan(descriptor.name, descriptor.kind, coordinates);
    } catch (error) {
      this.logger.warn(`Failed to start span '${descriptor.name}'`, error);
      return undefined;
    }
  }

  private applyAttributes(
    span: ISpan,
    descriptor: OperationDescriptor,
    args: readonly unknown[],
  ): void {
    try {
      for (const [key, value] of descriptor.staticAttributes) {
        span.setAttribute(key, value);
      }
    } catch (error) {
      this.logger.warn(`Failed to add static attributes to span '${descriptor.name}'`, error);
    }

    for (const binding of descriptor.parameterBindings) {
      try {
        const bound = bindAttribute(args[binding.index]);
        if (bound) {
          applyBoundAttribute(span, binding.key, bound);
        }
      } catch (error) {
        this.logger.warn(
          `Failed to add parameter attribute '${binding.key}' to span '${descriptor.name}'`,
          error,
        );
      }
    }

    if (!this.options.recordCodeMetadata) {
      return;
    }
    try {
      span.setAttribute(AttributeNames.CODE_FUNCTION, descriptor.functionName);
      if (descriptor.namespace) {
        span.setAttribute(AttributeNames.CODE_NAMESPACE, descriptor.namespace);
      }
    } catch (error) {
      this.logger.warn(`Failed to add code metadata to span '${descriptor.name}'`, error);
    }
  }

  /**
   * Steps 5 to 7: run the body and settle the span, now or when the
   * body's promise settles.
   */
  private runInSpan<TResult>(span: ISpan, call: () => TResult): TResult {
    let settlesLater = false;
    try {
      const result = call();
      if (result instanceof Promise && this.settleWhenDone(span, result)) {
        settlesLater = true;
        return result;
      }
      this.markSucceeded(span);
      return result;
    } catch (error) {
      this.markFailed(span, error);
      throw error;
    } finally {
      if (!settlesLater) {
        this.endSpan(span);
      }
    }
  }

  /**
   * @returns Whether the handlers were attached; when not, the caller
   *   settles the span itself
   */
  private settleWhenDone(span: ISpan, pending: Promise<unknown>): boolean {
    try {
      pending.then(
        () => {
          try {
            this.markSucceeded(span);
          } finally {
            this.endSpan(span);
          }
        },
        (error: unknown) => {
          try {
            this.markFailed(span, error);
          } finally {
            this.endSpan(span);
          }
        },
      );
      return true;
    } catch (error) {
      this.logger.warn('Failed to observe the settlement of a traced promise', error);
      return false;
    }
  }

  private markSucceeded(span: ISpan): void {
    try {
      span.setStatus(SpanStatus.Ok);
    } catch (error) {
      this.logger.warn('Failed to set span status', error);
    }
  }

  private markFailed(span: ISpan, failure: unknown): void {
    try {
      span.recordException(failure);
      span.setStatus(SpanStatus.Error, errorMessage(failure));
    } catch (error) {
      this.logger.warn('Failed to record exception on span', error);
    }
  }

  private endSpan(span: ISpan): void {
    try {
      span.end();
    } catch (error) {
      this.logger.warn('Failed to end span', error);
    }
  }
}
