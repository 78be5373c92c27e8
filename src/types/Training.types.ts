import type { Activation } from './Scalar.types'

export interface TrainingExample {
  input: readonly number[]
  target: readonly number[]
}

export interface TrainingConfig {
  eta: number
  epsilon: number
  timeout: number
}

export type TrainingLogger = Pick<Console, 'log' | 'warn'>

export interface TrainingOptions {
  logger?: TrainingLogger
  activation?: Activation
}

// training loop states
export interface RunningStatus {
  kind: 'running'
  iteration: number
}

export interface ConvergedStatus {
  kind: 'converged'
  iterations: number
  error: number
}

export interface TimedOutStatus {
  kind: 'timedOut'
  iterations: number
  error: number
}

export type FinishedStatus = ConvergedStatus | TimedOutStatus

export type TrainingStatus = RunningStatus | FinishedStatus

export type TrainingRun = Generator<number, FinishedStatus, undefined>

export interface TrainingSummary {
  errors: number[]
  outcome: FinishedStatus
}
