import type { D } from '../ai/Scalar'

// how a scalar was produced, with references to its operands
export type Operation =
  | { kind: 'leaf' }
  | { kind: 'add'; a: D; b: D }
  | { kind: 'sub'; a: D; b: D }
  | { kind: 'mul'; a: D; b: D }
  | { kind: 'div'; a: D; b: D }
  | { kind: 'neg'; a: D }
  | { kind: 'exp'; a: D }
  | { kind: 'log'; a: D }

export type OperationKind = Operation['kind']

// scalar function applied to a neuron's weighted sum
export type Activation = (x: D) => D

export interface GradientResult {
  value: number
  gradient: number[]
}
