/**
 * AICallNode - Graph node backed by a structured ask
 *
 * Builds a prompt from the node's context, asks the model for a value of
 * the declared shape, and hands the decoded value to a callback that
 * returns the next context and transition. Any failure (prompt builder,
 * ask, callback) propagates and the graph wraps it as GraphNodeError.
 */

import type { z } from 'zod';
import { ask, type AskBaseOptions } from '@agent/Ask.js';
import type { GraphNode, NodeArg, NodeResult } from './Graph.js';
import { ConfigurationError } from '../errors.js';

export interface AICallNodeOptions<C, S extends z.ZodTypeAny>
  extends Omit<AskBaseOptions, 'prompt' | 'signal' | 'trace'> {
  /** Node name; also the generation name unless one is given */
  name: string;
  /** Builds the prompt from this node's context */
  prompt: (context: C) => string | Promise<string>;
  output: S;
  callback: (result: z.infer<S>, arg: NodeArg<C>) => NodeResult<C> | Promise<NodeResult<C>>;
}

export function aiCallNode<C, S extends z.ZodTypeAny>(options: AICallNodeOptions<C, S>): GraphNode<C> {
  const { name, prompt, output, callback, ...askOptions } = options;

  return {
    name,
    async run(arg: NodeArg<C>): Promise<NodeResult<C>> {
      if (!arg.client) {
        throw new ConfigurationError(`AI node '${name}' needs a client; pass one to graph.run()`);
      }

      const text = await prompt(arg.context);
      const result = await ask(arg.client, {
        ...askOptions,
        prompt: text,
        output,
        signal: arg.signal,
        trace: { ...arg.trace, observationName: name },
      });
      return callback(result, arg);
    },
  };
}
