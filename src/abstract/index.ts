import type { PathStatus } from '../types'

/**
 * What a caller's node type must provide for the search to run over it.
 *
 * Nodes are the same node when their `hash` is equal.
 */
export interface GraphNode<Self extends GraphNode<Self>> {
  hash: string
  connectedNodes: Iterable<Self>
  /** Actual cost of the edge to a connected node. Must not be negative. */
  cost: (to: Self) => number
  /** Heuristic estimate of the cost to reach `to`. Should never overestimate. */
  estimatedCost: (to: Self) => number
}

export interface Path<N extends GraphNode<N>> {
  status: PathStatus
  cost: number
  calcTime: number
  visitedNodes: number
  generatedNodes: number
  path: N[]
}

export { Step } from './node'
export { SortedOpenSet } from './openSet'
