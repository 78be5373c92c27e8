import type { RunningStatus, TrainingStatus } from '../types'

export function initialStatus(): RunningStatus {
  return { kind: 'running', iteration: 0 }
}

// transition after the error of the current iteration has been emitted
export function nextStatus(
  status: RunningStatus,
  error: number,
  epsilon: number,
  timeout: number
): TrainingStatus {
  const iterations = status.iteration + 1

  if (error < epsilon) {
    return { kind: 'converged', iterations, error }
  }
  if (status.iteration >= timeout) {
    return { kind: 'timedOut', iterations, error }
  }
  return { kind: 'running', iteration: iterations }
}

export function isFinished(status: TrainingStatus): boolean {
  return status.kind !== 'running'
}
