import { describe, it, expect } from 'vitest'
import { SortedOpenSet, Step } from '../src'
import { TestGraph, TestNode } from './helpers/testGraph'

function step (node: TestNode, stepCost: number, goalCost = 0): Step<TestNode> {
  return new Step(node, null, stepCost, goalCost)
}

describe('SortedOpenSet', () => {
  const graph = new TestGraph()
  const a = graph.node('a')
  const b = graph.node('b')
  const c = graph.node('c')

  it('pops steps cheapest total cost first', () => {
    const open = new SortedOpenSet<TestNode>()
    open.push(step(a, 4, 1))
    open.push(step(b, 1, 1))
    open.push(step(c, 3, 6))

    expect(open.pop().node).toBe(b)
    expect(open.pop().node).toBe(a)
    expect(open.pop().node).toBe(c)
    expect(open.isEmpty()).toBe(true)
  })

  it('breaks cost ties by insertion order', () => {
    const open = new SortedOpenSet<TestNode>()
    open.push(step(c, 3))
    open.push(step(a, 3))
    open.push(step(b, 3))

    expect(open.toArray().map(s => s.node.hash)).toEqual(['c', 'a', 'b'])
  })

  it('looks steps up by node hash', () => {
    const open = new SortedOpenSet<TestNode>()
    const stepA = step(a, 2)
    open.push(stepA)

    const sameId = new TestGraph().node('a')
    expect(open.has(sameId)).toBe(true)
    expect(open.get(sameId)).toBe(stepA)
    expect(open.get(b)).toBeUndefined()
  })

  it('drops popped steps from the lookup', () => {
    const open = new SortedOpenSet<TestNode>()
    open.push(step(a, 2))
    open.pop()

    expect(open.has(a)).toBe(false)
    expect(open.size()).toBe(0)
  })

  it('refuses a second step for the same node', () => {
    const open = new SortedOpenSet<TestNode>()
    open.push(step(a, 2))

    expect(() => open.push(step(a, 1))).toThrow('Open set already holds a step for a')
    expect(open.size()).toBe(1)
  })

  it('throws when popping an empty set', () => {
    expect(() => new SortedOpenSet<TestNode>().pop()).toThrow('Open set is empty')
  })

  it('moves a relaxed step to its new position', () => {
    const open = new SortedOpenSet<TestNode>()
    const previous = step(c, 0)
    const stepA = step(a, 5, 1)
    open.push(stepA)
    open.push(step(b, 3, 1))
    open.push(step(c, 4, 1))

    open.update(stepA, previous, 1)

    expect(stepA.stepCost).toBe(1)
    expect(stepA.previous).toBe(previous)
    expect(open.toArray().map(s => s.node.hash)).toEqual(['a', 'b', 'c'])
  })

  it('orders a relaxed step after older steps of equal cost', () => {
    const open = new SortedOpenSet<TestNode>()
    const stepB = step(b, 6)
    open.push(step(a, 4))
    open.push(stepB)

    open.update(stepB, step(c, 0), 4)

    expect(open.pop().node).toBe(a)
    expect(open.pop().node).toBe(b)
  })

  it('rejects updates for steps it does not hold', () => {
    const open = new SortedOpenSet<TestNode>()
    open.push(step(a, 1))

    expect(() => open.update(step(b, 3), step(c, 0), 2)).toThrow('Step for b is not in the open set')
  })
})
