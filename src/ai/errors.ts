// vector length disagrees with what a layer or the output expects
export class DimensionMismatchError extends Error {
  public readonly expected: number
  public readonly actual: number

  constructor(what: string, expected: number, actual: number) {
    super(`expected ${expected} ${what}, got ${actual}`)
    this.name = 'DimensionMismatchError'
    this.expected = expected
    this.actual = actual
  }
}

export class EmptyTrainingSetError extends Error {
  constructor() {
    super('training set is empty')
    this.name = 'EmptyTrainingSetError'
  }
}
