import { initialStatus, nextStatus } from '../managers/TrainingState'
import type {
  Activation,
  FinishedStatus,
  Network,
  TrainingConfig,
  TrainingExample,
  TrainingLogger,
  TrainingOptions,
  TrainingRun,
  TrainingSummary,
} from '../types'
import { DimensionMismatchError, EmptyTrainingSetError } from './errors'
import { DEFAULT_ACTIVATION, forward, outputSize } from './NeuralNetwork'
import { mean, normSq, subVectors } from './operations'
import { D, constant, resetTrace, reverseTrace } from './Scalar'

export const DEFAULT_TRAINING_CONFIG: TrainingConfig = {
  eta: 0.9,
  epsilon: 0.005,
  timeout: 10000,
}

interface TracedExample {
  input: D[]
  target: D[]
}

/**
 * Batch gradient descent on the mean squared error over `examples`.
 *
 * Returns a lazy sequence with one error value per iteration; each value is
 * computed only when requested, after the weights have been updated. The run
 * stops after the first error below `epsilon`, or after iteration `timeout`
 * (iterations are numbered from 0, so at most `timeout + 1` values).
 * The generator's return value tells which of the two happened.
 *
 * Examples are checked before anything is returned; `eta` and `epsilon` are
 * used as given.
 */
export function train(
  network: Network,
  eta: number,
  epsilon: number,
  timeout: number,
  examples: readonly TrainingExample[],
  options: TrainingOptions = {}
): TrainingRun {
  if (!Number.isInteger(timeout) || timeout < 0) {
    throw new RangeError(
      `timeout must be a non-negative integer, got ${timeout}`
    )
  }
  const traced = traceExamples(network, examples)

  return iterate(
    network,
    eta,
    epsilon,
    timeout,
    traced,
    options.logger ?? console,
    options.activation ?? DEFAULT_ACTIVATION
  )
}

export function trainWithConfig(
  network: Network,
  examples: readonly TrainingExample[],
  config: Partial<TrainingConfig> = {},
  options: TrainingOptions = {}
): TrainingRun {
  const { eta, epsilon, timeout } = { ...DEFAULT_TRAINING_CONFIG, ...config }
  return train(network, eta, epsilon, timeout, examples, options)
}

function* iterate(
  network: Network,
  eta: number,
  epsilon: number,
  timeout: number,
  examples: TracedExample[],
  logger: TrainingLogger,
  activation: Activation
): TrainingRun {
  let status = initialStatus()

  for (;;) {
    const error = meanSquaredError(network, examples, activation)
    resetTrace(error)
    reverseTrace(error, 1)
    updateNetwork(network, eta)

    yield error.value

    const next = nextStatus(status, error.value, epsilon, timeout)
    if (next.kind === 'running') {
      status = next
      continue
    }
    if (next.kind === 'timedOut') {
      logger.warn(`failed to converge within ${timeout} steps`)
    }
    return next
  }
}

function traceExamples(
  network: Network,
  examples: readonly TrainingExample[]
): TracedExample[] {
  if (examples.length === 0) throw new EmptyTrainingSetError()

  const outputs = outputSize(network)
  return examples.map(({ input, target }) => {
    if (input.length !== network.inputCount) {
      throw new DimensionMismatchError(
        'inputs',
        network.inputCount,
        input.length
      )
    }
    if (target.length !== outputs) {
      throw new DimensionMismatchError('target values', outputs, target.length)
    }
    return { input: input.map(constant), target: target.map(constant) }
  })
}

function meanSquaredError(
  network: Network,
  examples: readonly TracedExample[],
  activation: Activation
): D {
  return mean(
    examples.map(({ input, target }) =>
      normSq(subVectors(target, forward(input, network, activation)))
    )
  )
}

// traced error the training loop differentiates, for inspection
export function trainingError(
  network: Network,
  examples: readonly TrainingExample[],
  activation: Activation = DEFAULT_ACTIVATION
): D {
  return meanSquaredError(
    network,
    traceExamples(network, examples),
    activation
  )
}

// replace every weight and bias with a fresh leaf one step downhill
function updateNetwork(network: Network, eta: number): void {
  for (const layer of network.layers) {
    for (const neuron of layer.neurons) {
      neuron.bias = constant(neuron.bias.value - eta * neuron.bias.adjoint)
      neuron.weights = neuron.weights.map(w =>
        constant(w.value - eta * w.adjoint)
      )
    }
  }
}

export function collectErrors(run: TrainingRun): TrainingSummary {
  const errors: number[] = []
  let result = run.next()

  while (!result.done) {
    errors.push(result.value)
    result = run.next()
  }

  const outcome: FinishedStatus = result.value
  return { errors, outcome }
}
