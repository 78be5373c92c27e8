import type { D } from '../ai/Scalar'

export interface Neuron {
  weights: D[]
  bias: D
}

export interface Layer {
  neurons: Neuron[]
}

// fully connected feedforward network
export interface Network {
  inputCount: number
  layers: Layer[]
}

// snapshot of network parameters as plain numbers
export interface NeuronState {
  weights: number[]
  bias: number
}

export interface NetworkState {
  inputCount: number
  layers: NeuronState[][]
}
