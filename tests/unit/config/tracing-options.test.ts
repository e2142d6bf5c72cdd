/**
 * @fileoverview Unit tests for tracing configuration
 */

import { describe, it, expect } from '@jest/globals';
import {
  DEFAULT_TRACER_NAME,
  loadTracingOptionsFromEnv,
  parseBooleanFlag,
  resolveTracingOptions,
} from '../../../src';
import { FakeTracer, createMockLogger } from '../../helpers/tracing-harness';

describe('TracingOptions', () => {
  describe('resolveTracingOptions', () => {
    it('should apply defaults', () => {
      const resolved = resolveTracingOptions();

      expect(resolved.tracerName).toBe(DEFAULT_TRACER_NAME);
      expect(resolved.tracerVersion).toBeUndefined();
      expect(resolved.enabled).toBe(true);
      expect(resolved.recordCodeMetadata).toBe(true);
      expect(resolved.linkMessages).toBe(true);
      expect(resolved.logger).toBeDefined();
    });

    it('should take the tracer name from an injected tracer', () => {
      const resolved = resolveTracingOptions({ tracer: new FakeTracer() });

      expect(resolved.tracerName).toBe('fake');
    });

    it('should keep explicit values', () => {
      const logger = createMockLogger();
      const resolved = resolveTracingOptions({
        tracerName: 'billing',
        tracerVersion: '2.1.0',
        logger,
        enabled: false,
        recordCodeMetadata: false,
        linkMessages: false,
      });

      expect(resolved).toEqual({
        tracer: undefined,
        tracerName: 'billing',
        tracerVersion: '2.1.0',
        logger,
        enabled: false,
        recordCodeMetadata: false,
        linkMessages: false,
      });
    });
  });

  describe('parseBooleanFlag', () => {
    it.each([
      { raw: 'true', expected: true },
      { raw: 'YES', expected: true },
      { raw: ' 1 ', expected: true },
      { raw: 'false', expected: false },
      { raw: 'No', expected: false },
      { raw: '0', expected: false },
    ])('should parse "$raw" as $expected', ({ raw, expected }) => {
      expect(parseBooleanFlag(raw)).toBe(expected);
    });

    it('should yield undefined for missing or unknown values', () => {
      expect(parseBooleanFlag(undefined)).toBeUndefined();
      expect(parseBooleanFlag('maybe')).toBeUndefined();
      expect(parseBooleanFlag('')).toBeUndefined();
    });
  });

  describe('loadTracingOptionsFromEnv', () => {
    it('should read every variable', () => {
      const options = loadTracingOptionsFromEnv({
        SPANLINK_TRACER_NAME: 'orders',
        SPANLINK_TRACER_VERSION: '1.4.0',
        SPANLINK_ENABLED: 'false',
        SPANLINK_RECORD_CODE_METADATA: 'no',
        SPANLINK_LINK_MESSAGES: '0',
      });

      expect(options.tracerName).toBe('orders');
      expect(options.tracerVersion).toBe('1.4.0');
      expect(options.enabled).toBe(false);
      expect(options.recordCodeMetadata).toBe(false);
      expect(options.linkMessages).toBe(false);
    });

    it('should fall back to OTEL_SERVICE_NAME for the tracer name', () => {
      expect(loadTracingOptionsFromEnv({ OTEL_SERVICE_NAME: 'checkout' }).tracerName).toBe(
        'checkout',
      );
      expect(
        loadTracingOptionsFromEnv({ SPANLINK_TRACER_NAME: ' ', OTEL_SERVICE_NAME: 'checkout' })
          .tracerName,
      ).toBe('checkout');
    });

    it('should leave unset and unrecognised values to the defaults', () => {
      const options = loadTracingOptionsFromEnv({ SPANLINK_ENABLED: 'sometimes' });

      expect(options.enabled).toBeUndefined();
      expect(options.tracerName).toBeUndefined();
      expect('linkMessages' in options).toBe(false);
    });

    it('should filter the base logger by SPANLINK_LOG_LEVEL', () => {
      const base = createMockLogger();
      const options = loadTracingOptionsFromEnv({ SPANLINK_LOG_LEVEL: 'DEBUG' }, base);

      options.logger?.debug('visible');

      expect(base.debug).toHaveBeenCalledWith('visible');
    });

    it('should default to warn for a missing or unknown level', () => {
      const base = createMockLogger();
      const options = loadTracingOptionsFromEnv({ SPANLINK_LOG_LEVEL: 'loud' }, base);

      options.logger?.info('hidden');
      options.logger?.warn('shown');

      expect(base.info).not.toHaveBeenCalled();
      expect(base.warn).toHaveBeenCalledWith('shown');
    });
  });
});
