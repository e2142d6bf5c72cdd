/**
 * @fileoverview Tracing decorators
 * @description
 * `@TraceSpan` turns a method into a traced operation; `@SpanAttribute`
 * marks which of its parameters become span attributes.
 *
 * Both are legacy (`experimentalDecorators`) decorators. Misuse is
 * reported with an {@link InstrumentationException} when the class is
 * defined, never during a call.
 *
 * @module infrastructure/tracing/decorators
 *
 * @example
 * ```typescript
 * class OrderService {
 *   @TraceSpan({ name: 'order.create', attributes: ['operation:create', 'entity:order'] })
 *   async createOrder(
 *     @SpanAttribute('customer.id') customerId: string,
 *     request: CreateOrderRequest,
 *   ): Promise<Order> {
 *     // ...
 *   }
 *
 *   // span 'OrderService.listOrders'
 *   @TraceSpan()
 *   async listOrders(): Promise<Order[]> {
 *     // ...
 *   }
 * }
 * ```
 */

import {
  InstrumentationException,
  InvalidDecoratorTargetException,
} from '../../domain/exceptions/exceptions';
import { getTracingInterceptor } from './GlobalTracing';
import type { OperationDescriptor, ParameterBinding, TraceSpanOptions } from './OperationDescriptor';

type MemberKey = string | symbol;

const parameterBindings = new WeakMap<object, Map<MemberKey, ParameterBinding[]>>();

function memberName(key: MemberKey): string {
  return typeof key === 'symbol' ? key.description ?? 'symbol' : key;
}

/**
 * Name of the class a decorator was applied to. `target` is the
 * prototype for instance members and the constructor for static ones.
 */
function declaringTypeName(target: object): string {
  return typeof target === 'function' ? target.name : target.constructor.name;
}

/**
 * Parameter bindings recorded by `@SpanAttribute` for one method.
 */
export function getParameterBindings(
  target: object,
  propertyKey: MemberKey,
): readonly ParameterBinding[] {
  return parameterBindings.get(target)?.get(propertyKey) ?? [];
}

/**
 * Trace every call of the decorated method.
 *
 * @param nameOrOptions - Explicit span name, or full options. Without a
 *   name the span is called `<ClassName>.<methodName>`.
 * @throws {InvalidDecoratorTargetException} When applied to an accessor or
 *   a field
 */
export function TraceSpan(nameOrOptions?: string | TraceSpanOptions) {
  const options: TraceSpanOptions =
    typeof nameOrOptions === 'string' ? { name: nameOrOptions } : nameOrOptions ?? {};

  return function (
    target: object,
    propertyKey: MemberKey,
    descriptor: PropertyDescriptor,
  ): PropertyDescriptor {
    const original: unknown = descriptor.value;
    const namespace = declaringTypeName(target);
    const functionName = memberName(propertyKey);

    if (typeof original !== 'function') {
      throw new InvalidDecoratorTargetException(
        'TraceSpan',
        `${namespace}.${functionName}`,
        'only methods can be traced',
      );
    }

    let operation: OperationDescriptor | undefined;

    descriptor.value = function (this: unknown, ...args: unknown[]): unknown {
      const interceptor = getTracingInterceptor();
      const described = (operation ??= interceptor.describe(
        {
          functionName,
          namespace,
          parameterBindings: getParameterBindings(target, propertyKey),
        },
        options,
      ));
      return interceptor.invoke(described, args, () => Reflect.apply(original, this, args));
    };

    return descriptor;
  };
}

/**
 * Record the decorated parameter as a span attribute named `key`.
 *
 * Strings, numbers and booleans are recorded as is, attribute sources
 * contribute their own attributes instead of `key`, and other values are
 * stringified. `null` and `undefined` are skipped.
 *
 * @throws {InstrumentationException} For a blank key or a constructor
 *   parameter
 */
export function SpanAttribute(key: string) {
  return (target: object, propertyKey: MemberKey | undefined, parameterIndex: number): void => {
    const typeName = declaringTypeName(target);

    if (propertyKey === undefined) {
      throw new InvalidDecoratorTargetException(
        'SpanAttribute',
        `${typeName} constructor parameter ${parameterIndex}`,
        'only method parameters can be recorded',
      );
    }
    if (!key || !key.trim()) {
      throw new InstrumentationException(
        `@SpanAttribute on ${typeName}.${memberName(propertyKey)} parameter ${parameterIndex} needs a non-blank key`,
        `${typeName}.${memberName(propertyKey)}`,
      );
    }

    let members = parameterBindings.get(target);
    if (!members) {
      members = new Map();
      parameterBindings.set(target, members);
    }
    const bindings = members.get(propertyKey) ?? [];
    bindings.push({ index: parameterIndex, key: key.trim() });
    members.set(propertyKey, bindings);
  };
}
