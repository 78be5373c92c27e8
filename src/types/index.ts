export * from './Scalar.types'
export * from './NeuralNetwork.types'
export * from './Training.types'
export * from './TrainingManager.types'
