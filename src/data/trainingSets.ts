import type { TrainingExample } from '../types'

// two-input truth tables

export const TRAIN_OR: readonly TrainingExample[] = [
  { input: [0, 0], target: [0] },
  { input: [0, 1], target: [1] },
  { input: [1, 0], target: [1] },
  { input: [1, 1], target: [1] },
]

export const TRAIN_AND: readonly TrainingExample[] = [
  { input: [0, 0], target: [0] },
  { input: [0, 1], target: [0] },
  { input: [1, 0], target: [0] },
  { input: [1, 1], target: [1] },
]

// not linearly separable, needs a hidden layer
export const TRAIN_XOR: readonly TrainingExample[] = [
  { input: [0, 0], target: [0] },
  { input: [0, 1], target: [1] },
  { input: [1, 0], target: [1] },
  { input: [1, 1], target: [0] },
]
