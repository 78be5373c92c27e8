export {
  D,
  add,
  constant,
  div,
  exp,
  gradient,
  log,
  mul,
  neg,
  operands,
  resetTrace,
  reverseTrace,
  sub,
  topologicalOrder,
} from './ai/Scalar'
export {
  dot,
  mean,
  normSq,
  sigmoid,
  subVectors,
  sum,
  tanh,
} from './ai/operations'
export { DimensionMismatchError, EmptyTrainingSetError } from './ai/errors'
export {
  type RandomSource,
  createRandomSource,
  defaultRandomSource,
  weightInitializer,
} from './ai/random'
export {
  DEFAULT_ACTIVATION,
  cloneNetwork,
  createNetwork,
  describeArchitecture,
  forward,
  getNetworkState,
  getTotalWeights,
  getWeights,
  outputSize,
  runLayer,
  runNetwork,
  runNeuron,
  setWeights,
} from './ai/NeuralNetwork'
export {
  DEFAULT_TRAINING_CONFIG,
  collectErrors,
  train,
  trainWithConfig,
  trainingError,
} from './ai/backprop'
export { initialStatus, isFinished, nextStatus } from './managers/TrainingState'
export { TrainingManager } from './managers/TrainingManager'
export { TRAIN_AND, TRAIN_OR, TRAIN_XOR } from './data/trainingSets'
export type * from './types'
