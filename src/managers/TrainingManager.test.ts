import { describe, it, expect, vi } from 'vitest'
import { EmptyTrainingSetError } from '../ai/errors'
import { createNetwork } from '../ai/NeuralNetwork'
import { createRandomSource } from '../ai/random'
import { TRAIN_OR, TRAIN_XOR } from '../data/trainingSets'
import type { TrainingProgress } from '../types'
import { TrainingManager } from './TrainingManager'

function silentLogger() {
  return { log: vi.fn(), warn: vi.fn() }
}

describe('managers/TrainingManager', () => {
  it('trains to convergence and notifies every iteration', () => {
    const logger = silentLogger()
    const manager = new TrainingManager(
      createNetwork(2, [1], createRandomSource(42)),
      TRAIN_OR,
      {},
      { logger }
    )
    const updates: TrainingProgress[] = []
    manager.onUpdate(progress => updates.push(progress))

    const outcome = manager.runToEnd()

    expect(outcome.kind).toBe('converged')
    expect(manager.getStatus()).toEqual(outcome)
    expect(manager.getErrors()).toHaveLength(outcome.iterations)
    expect(updates).toHaveLength(outcome.iterations)
    expect(updates[0]).toMatchObject({
      iteration: 1,
      status: { kind: 'running', iteration: 1 },
      architecture: '2 → 1',
    })
    expect(updates[updates.length - 1].status).toEqual(outcome)
    expect(logger.log).toHaveBeenCalledWith(
      `converged after ${outcome.iterations} iterations, error ${outcome.error}`
    )
    expect(logger.warn).not.toHaveBeenCalled()

    expect(manager.predict([0, 0])[0]).toBeLessThan(0.5)
    expect(manager.predict([1, 0])[0]).toBeGreaterThan(0.5)
  })

  it('steps one iteration at a time', () => {
    const manager = new TrainingManager(
      createNetwork(2, [1], createRandomSource(42)),
      TRAIN_XOR,
      { epsilon: 0, timeout: 2 },
      { logger: silentLogger() }
    )

    const first = manager.step()
    expect(typeof first).toBe('number')
    expect(manager.getStatus()).toEqual({ kind: 'running', iteration: 1 })

    manager.step()
    const last = manager.step()

    expect(manager.getStatus()).toEqual({
      kind: 'timedOut',
      iterations: 3,
      error: last,
    })
    expect(manager.step()).toBeUndefined()
    expect(manager.getErrors()).toHaveLength(3)
  })

  it('reports a timeout through the logger', () => {
    const logger = silentLogger()
    const manager = new TrainingManager(
      createNetwork(2, [1], createRandomSource(42)),
      TRAIN_XOR,
      { epsilon: 0, timeout: 3 },
      { logger }
    )

    expect(manager.runToEnd()).toMatchObject({
      kind: 'timedOut',
      iterations: 4,
    })
    expect(logger.warn).toHaveBeenCalledWith('failed to converge within 3 steps')
    expect(logger.log).not.toHaveBeenCalled()
  })

  it('stops notifying removed callbacks', () => {
    const manager = new TrainingManager(
      createNetwork(2, [1], createRandomSource(1)),
      TRAIN_OR,
      { timeout: 5 },
      { logger: silentLogger() }
    )
    const callback = vi.fn()
    manager.onUpdate(callback)

    manager.step()
    manager.removeCallback(callback)
    manager.step()

    expect(callback).toHaveBeenCalledTimes(1)
  })

  it('exposes the trained parameters', () => {
    const manager = new TrainingManager(
      createNetwork(3, [4, 2], createRandomSource(2)),
      [{ input: [1, 0, 1], target: [1, 0] }],
      { timeout: 1 },
      { logger: silentLogger() }
    )

    const state = manager.getNetworkState()
    expect(state.inputCount).toBe(3)
    expect(state.layers.map(layer => layer.length)).toEqual([4, 2])
  })

  it('validates the training set on construction', () => {
    expect(
      () => new TrainingManager(createNetwork(2, [1]), [], {}, {})
    ).toThrow(EmptyTrainingSetError)
  })
})
