import type { GraphNode } from '..'
import type { Step } from '../node'

/**
 * Walks `previous` links back from `step` and returns the nodes from `start`
 * to `step.node`, both included. A null step gives `[start]`.
 */
export function reconstructPath<N extends GraphNode<N>> (start: N, step: Step<N> | null): N[] {
  const path: N[] = []
  let cursor = step
  while (cursor != null) {
    path.push(cursor.node)
    cursor = cursor.previous
  }
  path.push(start)
  return path.reverse()
}
