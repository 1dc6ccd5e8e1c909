/**
 * Graph - Sequential node-graph execution engine
 *
 * A graph is a named set of nodes with the first registered node as entry.
 * Running it threads a caller-defined context through the nodes: each node
 * receives its own copy of the current context and returns the next
 * context plus a Transition. The engine keeps only the most recently
 * returned context. There is no cycle detection; a graph that never exits
 * runs until a node fails or the signal aborts.
 *
 * @example
 * ```typescript
 * const graph = Graph.create('counter', [
 *   defineNode<{ count: number }>('increment', ({ context }) => ({
 *     context: { count: context.count + 1 },
 *     next: context.count + 1 < 3 ? Transition.retry : Transition.exit,
 *   })),
 * ]);
 * const result = await graph.run({ count: 0 }); // { count: 3 }
 * ```
 */

import type { Client } from '@client/Client.js';
import type { Transition } from './Transition.js';
import { withSpan, type TraceContext } from '@tracing/Tracer.js';
import { logger as defaultLogger, type Logger } from '@services/Logger.js';
import { GraphConstructionError, GraphNodeError, GraphNodeNotFoundError } from '../errors.js';
import { formatError } from '@utils/errorUtils.js';
import { TRACING } from '@config/constants.js';

/**
 * Input handed to a node
 */
export interface NodeArg<C> {
  /** This node's own copy of the current context */
  context: C;
  client?: Client;
  signal?: AbortSignal;
  /** Linkage of the graph run's trace */
  trace: TraceContext;
  /** Scratch space for this node execution only */
  metadata: Record<string, unknown>;
}

export interface NodeResult<C> {
  context: C;
  next: Transition;
}

export interface GraphNode<C> {
  readonly name: string;
  run(arg: NodeArg<C>): NodeResult<C> | Promise<NodeResult<C>>;
}

export function defineNode<C>(name: string, run: (arg: NodeArg<C>) => NodeResult<C> | Promise<NodeResult<C>>): GraphNode<C> {
  return { name, run };
}

export interface GraphOptions<C> {
  /** Copies the context handed to each node (structuredClone by default) */
  clone?: (context: C) => C;
}

export interface GraphRunOptions {
  /** Client for AI nodes; its tracer and logger are used when present */
  client?: Client;
  /** Checked before every node */
  signal?: AbortSignal;
  /** Linkage of an enclosing trace */
  trace?: TraceContext;
}

export class Graph<C> {
  private constructor(
    readonly name: string,
    private readonly nodes: ReadonlyMap<string, GraphNode<C>>,
    readonly entrypoint: string,
    private readonly clone: (context: C) => C
  ) {}

  /**
   * Build a graph; the first node is the entry point
   *
   * @throws GraphConstructionError on an empty node list or duplicate names
   */
  static create<C>(name: string, nodes: readonly GraphNode<C>[], options: GraphOptions<C> = {}): Graph<C> {
    const entry = nodes[0];
    if (!entry) {
      throw new GraphConstructionError(`graph '${name}' must have at least one node`);
    }

    const nodeMap = new Map<string, GraphNode<C>>();
    for (const node of nodes) {
      if (nodeMap.has(node.name)) {
        throw new GraphConstructionError(`duplicate node name '${node.name}' in graph '${name}'`);
      }
      nodeMap.set(node.name, node);
    }

    return new Graph(name, nodeMap, entry.name, options.clone ?? (context => structuredClone(context)));
  }

  get nodeNames(): string[] {
    return [...this.nodes.keys()];
  }

  /**
   * Run the graph from the entry node until a node exits
   *
   * @returns The context returned by the exiting node
   * @throws GraphNodeNotFoundError when a transition names an unknown node
   * @throws GraphNodeError when a node throws or the signal aborts
   */
  async run(initialContext: C, options: GraphRunOptions = {}): Promise<C> {
    const logger = options.client?.logger ?? defaultLogger;
    return withSpan(
      options.client?.tracer,
      options.trace ?? {},
      { name: `${TRACING.GRAPH_TRACE_PREFIX}${this.name}`, input: initialContext },
      trace => this.execute(initialContext, options, trace, logger),
      error => logger.warn(`[GRAPH] Tracer failed for graph '${this.name}':`, formatError(error))
    );
  }

  private async execute(initialContext: C, options: GraphRunOptions, trace: TraceContext, logger: Logger): Promise<C> {
    let current = initialContext;
    let nodeName = this.entrypoint;
    let executions = 0;

    for (;;) {
      const node = this.nodes.get(nodeName);
      if (!node) {
        logger.error(`[GRAPH] ${this.name}: transition to unknown node '${nodeName}'`);
        throw new GraphNodeNotFoundError(this.name, nodeName);
      }

      if (options.signal?.aborted) {
        throw new GraphNodeError(this.name, node.name, options.signal.reason ?? new Error('graph run aborted'));
      }

      executions++;
      logger.debug(`[GRAPH] ${this.name}: running node '${node.name}' (execution ${executions})`);

      let result: NodeResult<C>;
      try {
        result = await node.run({
          context: this.clone(current),
          client: options.client,
          signal: options.signal,
          trace: { ...trace, observationName: node.name },
          metadata: {},
        });
      } catch (error) {
        logger.error(`[GRAPH] ${this.name}: node '${node.name}' failed:`, formatError(error));
        throw new GraphNodeError(this.name, node.name, error);
      }

      current = result.context;
      const next = result.next;
      switch (next.kind) {
        case 'exit':
          logger.debug(`[GRAPH] ${this.name}: exited after ${executions} node execution(s)`);
          return current;
        case 'retry':
          break;
        case 'continue':
          nodeName = next.node;
          break;
        default:
          throw new GraphNodeError(this.name, node.name, new Error(`invalid transition ${JSON.stringify(next)}`));
      }
    }
  }
}
