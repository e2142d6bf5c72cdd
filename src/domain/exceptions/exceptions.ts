/**
 * @spanlink/core - Instrumentation Exceptions
 *
 * Telemetry problems at call time are never thrown; they are logged and
 * absorbed. The only exceptions this package raises are programming
 * errors found while a class is being decorated, so they surface when the
 * module loads rather than in the middle of a traced call.
 */

/**
 * Base exception for misuse of the instrumentation API
 */
export class InstrumentationException extends Error {
  constructor(
    message: string,
    public readonly target?: string,
  ) {
    super(message);
    this.name = 'InstrumentationException';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Raised when a decorator is applied to something it cannot instrument
 */
export class InvalidDecoratorTargetException extends InstrumentationException {
  constructor(decorator: string, target: string, reason: string) {
    super(`@${decorator} cannot be applied to ${target}: ${reason}`, target);
    this.name = 'InvalidDecoratorTargetException';
  }
}
