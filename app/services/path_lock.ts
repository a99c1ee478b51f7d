/**
 * Keyed mutex. Work submitted for the same path id runs one task
 * at a time, in submission order. Different ids do not wait on
 * each other.
 */
export default class PathLock {
  private tails = new Map<number, Promise<void>>()

  async run<T>(pathId: number, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(pathId) ?? Promise.resolve()
    const result = previous.then(() => work())

    // The next task only waits for this one to settle. Its outcome
    // reaches the caller through `result`.
    const tail = result.then(
      () => undefined,
      () => undefined
    )
    this.tails.set(pathId, tail)

    try {
      return await result
    } finally {
      if (this.tails.get(pathId) === tail) {
        this.tails.delete(pathId)
      }
    }
  }

  /**
   * Number of paths with queued or running work
   */
  get pending() {
    return this.tails.size
  }
}
