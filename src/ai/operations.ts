import { DimensionMismatchError, EmptyTrainingSetError } from './errors'
import { D, add, constant, div, exp, mul, neg, sub } from './Scalar'

// composites built only from primitives, so they need no derivative rules

export function sum(xs: readonly D[]): D {
  if (xs.length === 0) return constant(0)

  let total = xs[0]
  for (let i = 1; i < xs.length; i++) {
    total = add(total, xs[i])
  }
  return total
}

export function dot(xs: readonly D[], ys: readonly D[]): D {
  if (xs.length !== ys.length) {
    throw new DimensionMismatchError('vector elements', xs.length, ys.length)
  }
  return sum(xs.map((x, i) => mul(x, ys[i])))
}

export function sigmoid(x: D): D {
  return div(constant(1), add(constant(1), exp(neg(x))))
}

// 2 * sigmoid(2x) - 1
export function tanh(x: D): D {
  return sub(mul(constant(2), sigmoid(mul(constant(2), x))), constant(1))
}

export function subVectors(a: readonly D[], b: readonly D[]): D[] {
  if (a.length !== b.length) {
    throw new DimensionMismatchError('vector elements', a.length, b.length)
  }
  return a.map((x, i) => sub(x, b[i]))
}

export function normSq(v: readonly D[]): D {
  return sum(v.map(x => mul(x, x)))
}

export function mean(xs: readonly D[]): D {
  if (xs.length === 0) throw new EmptyTrainingSetError()
  return mul(constant(1 / xs.length), sum(xs))
}
