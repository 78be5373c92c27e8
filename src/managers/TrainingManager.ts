import {
  DEFAULT_TRAINING_CONFIG,
  collectErrors,
  trainWithConfig,
} from '../ai/backprop'
import {
  describeArchitecture,
  getNetworkState,
  runNetwork,
} from '../ai/NeuralNetwork'
import type {
  Activation,
  FinishedStatus,
  Network,
  NetworkState,
  ProgressCallback,
  TrainingConfig,
  TrainingExample,
  TrainingLogger,
  TrainingOptions,
  TrainingProgress,
  TrainingRun,
  TrainingStatus,
} from '../types'
import { initialStatus, nextStatus } from './TrainingState'

// owns one network and its training run, notifies listeners per iteration
export class TrainingManager {
  private network: Network
  private config: TrainingConfig
  private logger: TrainingLogger
  private activation: Activation | undefined
  private run: TrainingRun
  private status: TrainingStatus = initialStatus()
  private errors: number[] = []
  private updateCallbacks: ProgressCallback[] = []

  constructor(
    network: Network,
    examples: readonly TrainingExample[],
    config: Partial<TrainingConfig> = {},
    options: TrainingOptions = {}
  ) {
    this.network = network
    this.config = { ...DEFAULT_TRAINING_CONFIG, ...config }
    this.logger = options.logger ?? console
    this.activation = options.activation
    this.run = trainWithConfig(network, examples, this.config, {
      logger: this.logger,
      activation: this.activation,
    })
  }

  public onUpdate(callback: ProgressCallback): void {
    this.updateCallbacks.push(callback)
  }

  public removeCallback(callback: ProgressCallback): void {
    const index = this.updateCallbacks.indexOf(callback)

    if (index > -1) {
      this.updateCallbacks.splice(index, 1)
    }
  }

  // run one iteration, undefined once training has finished
  public step(): number | undefined {
    const current = this.status
    if (current.kind !== 'running') return undefined

    const result = this.run.next()
    if (result.done) {
      this.status = result.value
      return undefined
    }

    const error = result.value
    this.errors.push(error)
    const next = nextStatus(
      current,
      error,
      this.config.epsilon,
      this.config.timeout
    )
    this.status = next.kind === 'running' ? next : this.finish()

    const progress: TrainingProgress = {
      iteration: this.errors.length,
      error,
      status: this.status,
      architecture: describeArchitecture(this.network),
    }
    this.updateCallbacks.forEach(callback => callback(progress))

    return error
  }

  // run until converged or timed out
  public runToEnd(): FinishedStatus {
    let status = this.status
    while (status.kind === 'running') {
      this.step()
      status = this.status
    }
    return status
  }

  public predict(input: readonly number[]): number[] {
    return runNetwork(input, this.network, this.activation)
  }

  public getStatus(): TrainingStatus {
    return this.status
  }

  public getErrors(): number[] {
    return [...this.errors]
  }

  public getNetworkState(): NetworkState {
    return getNetworkState(this.network)
  }

  // let the run finish so it reports its own outcome
  private finish(): FinishedStatus {
    const { outcome } = collectErrors(this.run)
    if (outcome.kind === 'converged') {
      this.logger.log(
        `converged after ${outcome.iterations} iterations, error ${outcome.error}`
      )
    }
    return outcome
  }
}
