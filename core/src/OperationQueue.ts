/**
 * Runs async operations one at a time, in submission order.
 *
 * A rejected operation rejects only its own promise; the queue keeps going.
 */
export class OperationQueue {
  private tail: Promise<void> = Promise.resolve()
  private pending = 0

  run<T>(operation: () => Promise<T>): Promise<T> {
    this.pending++
    const result = this.tail.then(operation)
    this.tail = result.then(
      () => { this.pending-- },
      () => { this.pending-- }
    )
    return result
  }

  /** Operations queued or running */
  get size(): number {
    return this.pending
  }
}
