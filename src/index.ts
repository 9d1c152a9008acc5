import type { GraphNode, Path } from './abstract'
import { AStar } from './abstract/algorithms/astar'
import type { SearchOptions } from './types'

/**
 * Runs a full search and returns the result record, including the partial
 * path to the closest node reached when the goal was not found.
 */
export function search<N extends GraphNode<N>> (start: N, goal: N, options?: Partial<SearchOptions>): Path<N> {
  return new AStar(start, goal, options).compute()
}

/**
 * Finds the cheapest path from `start` to `goal`, both included.
 * Returns an empty array when the goal cannot be reached.
 */
export function findPathTo<N extends GraphNode<N>> (start: N, goal: N, options?: Partial<SearchOptions>): N[] {
  const result = search(start, goal, options)
  return result.status === 'success' ? result.path : []
}

/**
 * Same as {@link findPathTo}, with `goal` as the node asking.
 */
export function findPathFrom<N extends GraphNode<N>> (goal: N, start: N, options?: Partial<SearchOptions>): N[] {
  return findPathTo(start, goal, options)
}

export type { GraphNode, Path } from './abstract'
export { Step, SortedOpenSet } from './abstract'
export { AStar } from './abstract/algorithms/astar'
export { reconstructPath } from './abstract/algorithms'
export { SearchOptionsError } from './exceptions'
export { DEFAULT_SEARCH_OPTS } from './types'
export type { PathStatus, SearchOptions } from './types'
