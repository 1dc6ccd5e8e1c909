/**
 * Transition - What a graph node asks the engine to do next
 *
 * A tagged value rather than a reserved node name, so any string is a
 * valid node name (including "exit" and "retry").
 */

export type Transition =
  | { readonly kind: 'continue'; readonly node: string }
  | { readonly kind: 'retry' }
  | { readonly kind: 'exit' };

export const Transition = {
  /** Run the named node next */
  to(node: string): Transition {
    return { kind: 'continue', node };
  },

  /** Run the same node again with the context it just returned */
  retry: { kind: 'retry' } satisfies Transition,

  /** Stop and return the context */
  exit: { kind: 'exit' } satisfies Transition,
} as const;
