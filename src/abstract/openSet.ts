import type { GraphNode } from '.'
import type { Step } from './node'

function precedes<N extends GraphNode<N>> (a: Step<N>, b: Step<N>): boolean {
  const fa = a.totalCost()
  const fb = b.totalCost()
  return fa < fb || (fa === fb && a.order < b.order)
}

/**
 * Open list kept as a sorted array plus a hash lookup.
 *
 * The array is stored in reverse extraction order so the cheapest step
 * is always at the end and `pop` never shifts.
 */
export class SortedOpenSet<N extends GraphNode<N>> {
  private readonly steps: Array<Step<N>> = []
  private readonly byHash = new Map<string, Step<N>>()
  private counter = 0

  size (): number {
    return this.steps.length
  }

  isEmpty (): boolean {
    return this.steps.length === 0
  }

  has (node: N): boolean {
    return this.byHash.has(node.hash)
  }

  get (node: N): Step<N> | undefined {
    return this.byHash.get(node.hash)
  }

  push (step: Step<N>): void {
    if (this.byHash.has(step.node.hash)) {
      throw new Error(`Open set already holds a step for ${step.node.hash}`)
    }
    step.order = this.counter++
    this.insert(step)
    this.byHash.set(step.node.hash, step)
  }

  pop (): Step<N> {
    const step = this.steps.pop()
    if (step === undefined) throw new Error('Open set is empty')
    this.byHash.delete(step.node.hash)
    return step
  }

  /**
   * Points a step at a cheaper predecessor and moves it to its new place.
   * The step is ordered as if it had just been inserted.
   */
  update (step: Step<N>, previous: Step<N>, stepCost: number): void {
    const index = this.indexOf(step)
    if (index < 0) throw new Error(`Step for ${step.node.hash} is not in the open set`)
    this.steps.splice(index, 1)
    step.relax(previous, stepCost)
    step.order = this.counter++
    this.insert(step)
  }

  /** Steps in extraction order. */
  toArray (): Array<Step<N>> {
    return this.steps.slice().reverse()
  }

  // first index whose step is extracted before `step`.
  private search (step: Step<N>): number {
    let lo = 0
    let hi = this.steps.length
    while (lo < hi) {
      const mid = (lo + hi) >>> 1
      if (precedes(this.steps[mid], step)) hi = mid
      else lo = mid + 1
    }
    return lo
  }

  private insert (step: Step<N>): void {
    this.steps.splice(this.search(step), 0, step)
  }

  private indexOf (step: Step<N>): number {
    const index = this.search(step) - 1
    return index >= 0 && this.steps[index] === step ? index : -1
  }
}
