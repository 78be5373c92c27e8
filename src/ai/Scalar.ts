import type { GradientResult, Operation } from '../types'

const LEAF: Operation = { kind: 'leaf' }

/**
 * Differentiable scalar. Records the operation that produced it so the
 * adjoint of every operand can be computed by `reverseTrace`.
 */
export class D {
  public readonly value: number
  public readonly op: Operation
  public adjoint = 0

  constructor(value: number, op: Operation = LEAF) {
    this.value = value
    this.op = op
  }
}

export function constant(value: number): D {
  return new D(value)
}

export function add(a: D, b: D): D {
  return new D(a.value + b.value, { kind: 'add', a, b })
}

export function sub(a: D, b: D): D {
  return new D(a.value - b.value, { kind: 'sub', a, b })
}

export function mul(a: D, b: D): D {
  return new D(a.value * b.value, { kind: 'mul', a, b })
}

export function div(a: D, b: D): D {
  return new D(a.value / b.value, { kind: 'div', a, b })
}

export function neg(a: D): D {
  return new D(-a.value, { kind: 'neg', a })
}

export function exp(a: D): D {
  return new D(Math.exp(a.value), { kind: 'exp', a })
}

export function log(a: D): D {
  return new D(Math.log(a.value), { kind: 'log', a })
}

export function operands(node: D): D[] {
  const op = node.op
  switch (op.kind) {
    case 'leaf':
      return []
    case 'add':
    case 'sub':
    case 'mul':
    case 'div':
      return [op.a, op.b]
    case 'neg':
    case 'exp':
    case 'log':
      return [op.a]
  }
}

// every node reachable from root, operands before their consumers
export function topologicalOrder(root: D): D[] {
  const order: D[] = []
  const visited = new Set<D>()
  const stack: Array<{ node: D; expanded: boolean }> = [
    { node: root, expanded: false },
  ]

  while (stack.length > 0) {
    const entry = stack.pop()
    if (!entry) break

    if (entry.expanded) {
      order.push(entry.node)
      continue
    }
    if (visited.has(entry.node)) continue

    visited.add(entry.node)
    stack.push({ node: entry.node, expanded: true })
    const children = operands(entry.node)
    for (let i = children.length - 1; i >= 0; i--) {
      if (!visited.has(children[i])) {
        stack.push({ node: children[i], expanded: false })
      }
    }
  }

  return order
}

// zero the adjoint of every node reachable from root, once per node
export function resetTrace(root: D): void {
  const visited = new Set<D>([root])
  const pending: D[] = [root]

  while (pending.length > 0) {
    const node = pending.pop()
    if (!node) break

    node.adjoint = 0
    for (const operand of operands(node)) {
      if (!visited.has(operand)) {
        visited.add(operand)
        pending.push(operand)
      }
    }
  }
}

// add node.adjoint * local derivative into each operand
function propagate(node: D): void {
  const g = node.adjoint
  const op = node.op

  switch (op.kind) {
    case 'leaf':
      return
    case 'add':
      op.a.adjoint += g
      op.b.adjoint += g
      return
    case 'sub':
      op.a.adjoint += g
      op.b.adjoint -= g
      return
    case 'mul':
      op.a.adjoint += g * op.b.value
      op.b.adjoint += g * op.a.value
      return
    case 'div':
      op.a.adjoint += g / op.b.value
      op.b.adjoint -= (g * op.a.value) / (op.b.value * op.b.value)
      return
    case 'neg':
      op.a.adjoint -= g
      return
    case 'exp':
      op.a.adjoint += g * node.value
      return
    case 'log':
      op.a.adjoint += g / op.a.value
      return
  }
}

/**
 * Seeds `root.adjoint` and pushes adjoints back to every node it depends on.
 * Nodes are visited in reverse topological order, so each one has received
 * all of its consumers' contributions before it propagates further.
 *
 * Adjoints of the other nodes are added to, not overwritten: call
 * `resetTrace` first when the graph has been traversed before.
 */
export function reverseTrace(root: D, seed = 1): void {
  const order = topologicalOrder(root)
  root.adjoint = seed

  for (let i = order.length - 1; i >= 0; i--) {
    propagate(order[i])
  }
}

// value and gradient of f at point
export function gradient(
  f: (xs: D[]) => D,
  point: readonly number[]
): GradientResult {
  const xs = point.map(constant)
  const y = f(xs)

  resetTrace(y)
  reverseTrace(y, 1)

  return { value: y.value, gradient: xs.map(x => x.adjoint) }
}
