/**
 * Tests for withSpan and childTrace
 */

import { describe, it, expect, vi } from 'vitest';
import { childTrace, withSpan, type Tracer } from '@tracing/Tracer.js';
import { RecordingTracer } from '../../__tests__/helpers.js';

describe('Tracer', () => {
  it('should derive child linkage from an observation', () => {
    expect(childTrace({ id: 'span-1', traceId: 'trace-1' }, 'lookup')).toEqual({
      traceId: 'trace-1',
      parentObservationId: 'span-1',
      observationName: 'lookup',
    });
  });

  describe('withSpan', () => {
    it('should pass the parent through without a tracer', async () => {
      const parent = { traceId: 'trace-1', parentObservationId: 'span-1' };
      const fn = vi.fn(async () => 42);

      expect(await withSpan(undefined, parent, { name: 'work' }, fn, () => {})).toBe(42);
      expect(fn).toHaveBeenCalledWith(parent);
    });

    it('should start a trace when the parent has none and end it with the output', async () => {
      const tracer = new RecordingTracer();

      const result = await withSpan(tracer, {}, { name: 'work', input: { n: 1 } }, async trace => trace, () => {});

      expect(result).toEqual({ traceId: 'trace-1', parentObservationId: 'trace-1', observationName: undefined });
      expect(tracer.events).toEqual([
        { type: 'trace', id: 'trace-1', name: 'work' },
        { type: 'end', id: 'trace-1', result: { output: result } },
      ]);
    });

    it('should end the span with the error and rethrow it', async () => {
      const tracer = new RecordingTracer();
      const failure = new Error('handler failed');

      await expect(
        withSpan(tracer, { traceId: 'trace-0' }, { name: 'work' }, async () => {
          throw failure;
        }, () => {})
      ).rejects.toBe(failure);
      expect(tracer.ofType('end').map(event => event.result)).toEqual([{ error: 'handler failed' }]);
    });

    it('should run the work when the tracer cannot start a span', async () => {
      const tracerError = new Error('tracer down');
      const tracer: Tracer = {
        startTrace: () => {
          throw tracerError;
        },
        startSpan: () => {
          throw tracerError;
        },
        startGeneration: () => {
          throw tracerError;
        },
        end: () => {},
      };
      const onTracerError = vi.fn();

      expect(await withSpan(tracer, {}, { name: 'work' }, async () => 'done', onTracerError)).toBe('done');
      expect(onTracerError).toHaveBeenCalledWith(tracerError);
    });
  });
});
