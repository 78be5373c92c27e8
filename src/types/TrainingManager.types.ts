import type { TrainingStatus } from './Training.types'

// data passed to training listeners after every iteration
export interface TrainingProgress {
  iteration: number
  error: number
  status: TrainingStatus
  architecture: string
}

export type ProgressCallback = (progress: TrainingProgress) => void
