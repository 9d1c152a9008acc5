import type { GraphNode, Path } from '../'
import { reconstructPath } from '.'
import { Step } from '../node'
import { SortedOpenSet } from '../openSet'
import { SearchOptionsError } from '../../exceptions'
import { DEFAULT_SEARCH_OPTS, PathStatus, SearchOptions } from '../../types'

function compareHash<N extends GraphNode<N>> (a: N, b: N): number {
  return a.hash < b.hash ? -1 : a.hash > b.hash ? 1 : 0
}

function checkOption (name: keyof SearchOptions, value: number): void {
  if (!Number.isFinite(value) || value < -1) throw new SearchOptionsError(name, value)
}

/**
 * A single A* search from `start` to `goal`.
 *
 * The start node is closed before anything else and never gets a step of its
 * own; its neighbours are seeded as first steps on construction.
 */
export class AStar<N extends GraphNode<N>> {
  startTime: number
  start: N
  goal: N
  options: SearchOptions

  closedDataSet: Set<string>
  openSet: SortedOpenSet<N>

  bestStep: Step<N> | null = null
  maxCost: number

  checkInterval = (1 << 5) - 1
  checkCounter = 0

  constructor (start: N, goal: N, options: Partial<SearchOptions> = {}) {
    this.options = { ...DEFAULT_SEARCH_OPTS, ...options }
    checkOption('timeout', this.options.timeout)
    checkOption('searchRadius', this.options.searchRadius)

    this.startTime = performance.now()
    this.start = start
    this.goal = goal

    this.closedDataSet = new Set([start.hash])
    this.openSet = new SortedOpenSet<N>()

    this.maxCost = this.options.searchRadius < 0 ? -1 : start.estimatedCost(goal) + this.options.searchRadius

    if (start.hash === goal.hash) return
    for (const node of this.neighbors(start)) {
      this.addStep(Step.first(start, node, goal))
    }
  }

  /**
   * Connected nodes that are not closed yet, deduplicated and in hash order
   * so that equal-cost searches always resolve the same way.
   */
  protected neighbors (node: N): N[] {
    const open = new Map<string, N>()
    for (const neighbor of node.connectedNodes) {
      if (this.closedDataSet.has(neighbor.hash) || open.has(neighbor.hash)) continue
      open.set(neighbor.hash, neighbor)
    }
    return Array.from(open.values()).sort(compareHash)
  }

  private addStep (step: Step<N>): void {
    if (this.maxCost >= 0 && step.totalCost() > this.maxCost) return
    this.openSet.push(step)
    if (this.bestStep == null || step.goalCost < this.bestStep.goalCost) this.bestStep = step
  }

  makeResult (status: PathStatus, step: Step<N> | null): Path<N> {
    const calcTime = performance.now() - this.startTime
    const result: Path<N> = {
      status,
      cost: step?.stepCost ?? 0,
      calcTime,
      visitedNodes: this.closedDataSet.size,
      generatedNodes: this.closedDataSet.size + this.openSet.size(),
      path: reconstructPath(this.start, step)
    }

    if (this.options.debug) {
      console.log(
        status,
        calcTime,
        result.cost,
        result.visitedNodes,
        result.generatedNodes,
        result.path.length
      )
    }

    return result
  }

  compute (): Path<N> {
    if (this.start.hash === this.goal.hash) {
      return this.makeResult('success', null)
    }

    while (!this.openSet.isEmpty()) {
      if ((++this.checkCounter & this.checkInterval) === 0) {
        if (this.options.timeout >= 0 && performance.now() - this.startTime > this.options.timeout) {
          return this.makeResult('timeout', this.bestStep)
        }
      }

      const step = this.openSet.pop()
      if (step.node.hash === this.goal.hash) {
        return this.makeResult('success', step)
      }
      this.closedDataSet.add(step.node.hash)

      for (const node of this.neighbors(step.node)) {
        const pastStep = this.openSet.get(node)
        if (pastStep === undefined) {
          this.addStep(Step.extend(step, node, this.goal))
          continue
        }
        const stepCost = step.stepCost + step.node.cost(node)
        if (stepCost < pastStep.stepCost) {
          this.openSet.update(pastStep, step, stepCost)
        }
      }
    }
    // every reachable node has been closed
    return this.makeResult('noPath', this.bestStep)
  }
}
