import type {
  Activation,
  Layer,
  Network,
  NetworkState,
  Neuron,
} from '../types'
import { DimensionMismatchError } from './errors'
import { dot, sigmoid } from './operations'
import {
  type RandomSource,
  defaultRandomSource,
  weightInitializer,
} from './random'
import { D, add, constant } from './Scalar'

export const DEFAULT_ACTIVATION: Activation = sigmoid

// init a fully connected network, weights and biases in [-0.5, 0.5)
export function createNetwork(
  inputCount: number,
  layerSizes: readonly number[],
  random: RandomSource = defaultRandomSource
): Network {
  assertCount('input count', inputCount)
  if (layerSizes.length === 0) {
    throw new RangeError('network needs at least one layer')
  }
  layerSizes.forEach(size => assertCount('layer size', size))

  const randomWeight = weightInitializer(random)
  const layers: Layer[] = layerSizes.map((size, i) => {
    const arity = i === 0 ? inputCount : layerSizes[i - 1]
    const neurons: Neuron[] = []
    for (let j = 0; j < size; j++) {
      const weights: D[] = []
      for (let k = 0; k < arity; k++) {
        weights.push(constant(randomWeight()))
      }
      neurons.push({ weights, bias: constant(randomWeight()) })
    }
    return { neurons }
  })

  return { inputCount, layers }
}

function assertCount(what: string, n: number): void {
  if (!Number.isInteger(n) || n < 1) {
    throw new RangeError(`${what} must be a positive integer, got ${n}`)
  }
}

export function runNeuron(
  input: readonly D[],
  neuron: Neuron,
  activation: Activation = DEFAULT_ACTIVATION
): D {
  if (input.length !== neuron.weights.length) {
    throw new DimensionMismatchError(
      'inputs',
      neuron.weights.length,
      input.length
    )
  }
  return activation(add(dot(input, neuron.weights), neuron.bias))
}

export function runLayer(
  input: readonly D[],
  layer: Layer,
  activation: Activation = DEFAULT_ACTIVATION
): D[] {
  return layer.neurons.map(neuron => runNeuron(input, neuron, activation))
}

// forward pass, output keeps the trace back to every weight
export function forward(
  input: readonly D[],
  network: Network,
  activation: Activation = DEFAULT_ACTIVATION
): D[] {
  let output: D[] = [...input]
  for (const layer of network.layers) {
    output = runLayer(output, layer, activation)
  }
  return output
}

export function runNetwork(
  input: readonly number[],
  network: Network,
  activation: Activation = DEFAULT_ACTIVATION
): number[] {
  if (input.length !== network.inputCount) {
    throw new DimensionMismatchError(
      'inputs',
      network.inputCount,
      input.length
    )
  }
  return forward(input.map(constant), network, activation).map(o => o.value)
}

export function outputSize(network: Network): number {
  const last = network.layers[network.layers.length - 1]
  return last ? last.neurons.length : network.inputCount
}

// flatten weights and biases, neuron by neuron
export function getWeights(network: Network): number[] {
  const weights: number[] = []

  for (const layer of network.layers) {
    for (const neuron of layer.neurons) {
      weights.push(...neuron.weights.map(w => w.value))
      weights.push(neuron.bias.value)
    }
  }

  return weights
}

// set from flattened weights, same order as getWeights
export function setWeights(network: Network, weights: readonly number[]): void {
  const total = getTotalWeights(network)
  if (weights.length !== total) {
    throw new DimensionMismatchError('weights', total, weights.length)
  }

  let index = 0
  for (const layer of network.layers) {
    for (const neuron of layer.neurons) {
      neuron.weights = neuron.weights.map(() => constant(weights[index++]))
      neuron.bias = constant(weights[index++])
    }
  }
}

// total weights and biases count
export function getTotalWeights(network: Network): number {
  return network.layers.reduce(
    (count, layer) =>
      count +
      layer.neurons.reduce((n, neuron) => n + neuron.weights.length + 1, 0),
    0
  )
}

export function cloneNetwork(network: Network): Network {
  return {
    inputCount: network.inputCount,
    layers: network.layers.map(layer => ({
      neurons: layer.neurons.map(neuron => ({
        weights: neuron.weights.map(w => constant(w.value)),
        bias: constant(neuron.bias.value),
      })),
    })),
  }
}

export function getNetworkState(network: Network): NetworkState {
  return {
    inputCount: network.inputCount,
    layers: network.layers.map(layer =>
      layer.neurons.map(neuron => ({
        weights: neuron.weights.map(w => w.value),
        bias: neuron.bias.value,
      }))
    ),
  }
}

export function describeArchitecture(network: Network): string {
  return [
    network.inputCount,
    ...network.layers.map(layer => layer.neurons.length),
  ].join(' → ')
}
