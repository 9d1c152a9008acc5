import type { GraphNode } from '.'

/**
 * One node as reached by a candidate path.
 *
 * `previous` is null for steps taken directly from the start node; the start
 * itself never gets a step.
 */
export class Step<N extends GraphNode<N>> {
  readonly node: N
  previous: Step<N> | null
  stepCost: number
  readonly goalCost: number

  /** Insertion sequence, set by the open set. Breaks ties in `totalCost`. */
  order = 0

  constructor (node: N, previous: Step<N> | null, stepCost: number, goalCost: number) {
    this.node = node
    this.previous = previous
    this.stepCost = stepCost
    this.goalCost = goalCost
  }

  static first<N extends GraphNode<N>> (start: N, node: N, goal: N): Step<N> {
    return new Step(node, null, start.cost(node), node.estimatedCost(goal))
  }

  static extend<N extends GraphNode<N>> (previous: Step<N>, node: N, goal: N): Step<N> {
    return new Step(node, previous, previous.stepCost + previous.node.cost(node), node.estimatedCost(goal))
  }

  totalCost (): number {
    return this.stepCost + this.goalCost
  }

  relax (previous: Step<N>, stepCost: number): this {
    this.previous = previous
    this.stepCost = stepCost
    return this
  }
}
