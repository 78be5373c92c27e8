import { randomLcg, randomUniform } from 'd3-random'

// uniform doubles in [0, 1)
export type RandomSource = () => number

export const defaultRandomSource: RandomSource = Math.random

export function createRandomSource(seed: number): RandomSource {
  return randomLcg(seed)
}

// generator of initial weights and biases in [-0.5, 0.5)
export function weightInitializer(random: RandomSource): () => number {
  return randomUniform.source(random)(-0.5, 0.5)
}
