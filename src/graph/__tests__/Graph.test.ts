/**
 * Tests for Graph
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Graph, defineNode } from '@graph/Graph.js';
import { Transition } from '@graph/Transition.js';
import { GraphConstructionError, GraphNodeError, GraphNodeNotFoundError } from '../../errors.js';
import { RecordingTracer, ScriptedModelClient, testClient } from '../../__tests__/helpers.js';

interface Counter {
  count: number;
  visited: string[];
}

const start = (): Counter => ({ count: 0, visited: [] });

describe('Graph', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  describe('Construction', () => {
    it('should use the first node as entry point', () => {
      const graph = Graph.create<Counter>('pipeline', [
        defineNode<Counter>('load', ({ context }) => ({ context, next: Transition.exit })),
        defineNode<Counter>('save', ({ context }) => ({ context, next: Transition.exit })),
      ]);

      expect(graph.entrypoint).toBe('load');
      expect(graph.nodeNames).toEqual(['load', 'save']);
    });

    it('should reject an empty node list', () => {
      expect(() => Graph.create<Counter>('empty', [])).toThrow(
        new GraphConstructionError("graph 'empty' must have at least one node")
      );
    });

    it('should reject duplicate node names', () => {
      const node = defineNode<Counter>('step', ({ context }) => ({ context, next: Transition.exit }));

      expect(() => Graph.create('dupes', [node, node])).toThrow("duplicate node name 'step' in graph 'dupes'");
    });
  });

  describe('Transitions', () => {
    it('should rerun a node on retry with the context it returned', async () => {
      const graph = Graph.create<Counter>('counter', [
        defineNode<Counter>('increment', ({ context }) => {
          const count = context.count + 1;
          return { context: { ...context, count }, next: count < 3 ? Transition.retry : Transition.exit };
        }),
      ]);

      expect(await graph.run(start())).toEqual({ count: 3, visited: [] });
    });

    it('should follow named transitions and return the exiting context', async () => {
      const visit =
        (name: string, next: Transition) =>
        ({ context }: { context: Counter }) => ({
          context: { ...context, visited: [...context.visited, name] },
          next,
        });
      const graph = Graph.create<Counter>('route', [
        defineNode<Counter>('a', visit('a', Transition.to('c'))),
        defineNode<Counter>('b', visit('b', Transition.exit)),
        defineNode<Counter>('c', visit('c', Transition.to('b'))),
      ]);

      expect(await graph.run(start())).toEqual({ count: 0, visited: ['a', 'c', 'b'] });
    });

    it('should treat "exit" as an ordinary node name', async () => {
      const graph = Graph.create<Counter>('named-exit', [
        defineNode<Counter>('begin', ({ context }) => ({ context, next: Transition.to('exit') })),
        defineNode<Counter>('exit', ({ context }) => ({ context: { ...context, count: 99 }, next: Transition.exit })),
      ]);

      expect((await graph.run(start())).count).toBe(99);
    });

    it('should fail on a transition to an unknown node', async () => {
      const graph = Graph.create<Counter>('lost', [
        defineNode<Counter>('only', ({ context }) => ({ context, next: Transition.to('missing') })),
      ]);

      try {
        await graph.run(start());
        expect.unreachable();
      } catch (error) {
        if (!(error instanceof GraphNodeNotFoundError)) throw error;
        expect(error.message).toBe("node 'missing' not found in graph 'lost'");
        expect(error.nodeName).toBe('missing');
      }
    });
  });

  describe('Failures', () => {
    it('should wrap node errors with the graph and node names', async () => {
      const cause = new Error('disk full');
      const graph = Graph.create<Counter>('writer', [
        defineNode<Counter>('save', () => {
          throw cause;
        }),
      ]);

      try {
        await graph.run(start());
        expect.unreachable();
      } catch (error) {
        if (!(error instanceof GraphNodeError)) throw error;
        expect(error.message).toBe("failed to run node 'save' in graph 'writer': disk full");
        expect(error.graphName).toBe('writer');
        expect(error.nodeName).toBe('save');
        expect(error.cause).toBe(cause);
      }
    });

    it('should stop before the next node once the signal aborts', async () => {
      const controller = new AbortController();
      const second = vi.fn(({ context }: { context: Counter }) => ({ context, next: Transition.exit }));
      const graph = Graph.create<Counter>('cancellable', [
        defineNode<Counter>('first', ({ context }) => {
          controller.abort(new Error('stop'));
          return { context, next: Transition.to('second') };
        }),
        defineNode<Counter>('second', second),
      ]);

      await expect(graph.run(start(), { signal: controller.signal })).rejects.toThrow(
        "failed to run node 'second' in graph 'cancellable': stop"
      );
      expect(second).not.toHaveBeenCalled();
    });
  });

  describe('Context isolation', () => {
    it('should hand each node its own copy', async () => {
      const initial = start();
      const graph = Graph.create<Counter>('isolated', [
        defineNode<Counter>('mutate', ({ context }) => {
          context.visited.push('mutated');
          return { context: { count: 1, visited: [] }, next: Transition.exit };
        }),
      ]);

      const result = await graph.run(initial);

      expect(initial.visited).toEqual([]);
      expect(result).toEqual({ count: 1, visited: [] });
    });

    it('should use a custom clone function', async () => {
      const clone = vi.fn((context: Counter) => ({ ...context, visited: [...context.visited] }));
      const graph = Graph.create<Counter>(
        'custom-clone',
        [defineNode<Counter>('noop', ({ context }) => ({ context, next: Transition.exit }))],
        { clone }
      );

      await graph.run(start());

      expect(clone).toHaveBeenCalledTimes(1);
    });

    it('should give every execution fresh metadata', async () => {
      const seen: number[] = [];
      const graph = Graph.create<Counter>('scratch', [
        defineNode<Counter>('tick', ({ context, metadata }) => {
          seen.push(Object.keys(metadata).length);
          metadata.touched = true;
          const count = context.count + 1;
          return { context: { ...context, count }, next: count < 2 ? Transition.retry : Transition.exit };
        }),
      ]);

      await graph.run(start());

      expect(seen).toEqual([0, 0]);
    });
  });

  describe('Tracing', () => {
    it('should open a trace named after the graph when none exists', async () => {
      const tracer = new RecordingTracer();
      const client = testClient(new ScriptedModelClient([]), { tracer });
      const traces: Array<{ traceId?: string; observationName?: string }> = [];
      const graph = Graph.create<Counter>('traced', [
        defineNode<Counter>('only', ({ context, trace }) => {
          traces.push(trace);
          return { context, next: Transition.exit };
        }),
      ]);

      await graph.run(start(), { client });

      expect(tracer.ofType('trace').map(event => event.name)).toEqual(['graph_traced']);
      expect(traces).toEqual([{ traceId: 'trace-1', parentObservationId: 'trace-1', observationName: 'only' }]);
      expect(tracer.ofType('end')).toHaveLength(1);
    });

    it('should nest a span under an existing trace', async () => {
      const tracer = new RecordingTracer();
      const client = testClient(new ScriptedModelClient([]), { tracer });
      const graph = Graph.create<Counter>('nested', [
        defineNode<Counter>('only', ({ context }) => ({ context, next: Transition.exit })),
      ]);

      await graph.run(start(), { client, trace: { traceId: 'outer', parentObservationId: 'outer-span' } });

      expect(tracer.ofType('trace')).toEqual([]);
      expect(tracer.ofType('span')).toEqual([
        { type: 'span', id: 'span-1', name: 'graph_nested', traceId: 'outer', parentObservationId: 'outer-span' },
      ]);
    });
  });
});
