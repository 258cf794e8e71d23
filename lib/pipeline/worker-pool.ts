/**
 * Bounded pool for stage runs. Tasks beyond `concurrency` wait in
 * submission order; a finishing task hands its slot to the next waiter.
 */
export class WorkerPool {
  private readonly waiting: Array<() => void> = []
  private active = 0

  constructor(private readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`Worker pool concurrency must be a positive integer, got ${concurrency}`)
    }
  }

  get running(): number {
    return this.active
  }

  get pending(): number {
    return this.waiting.length
  }

  /**
   * Run `task` once a slot is free. When `holdUntil` returns a promise after
   * the task settles, the slot stays taken until that promise resolves.
   */
  async run<T>(task: () => Promise<T>, holdUntil?: () => Promise<void> | undefined): Promise<T> {
    await this.acquire()
    try {
      return await task()
    } finally {
      const hold = holdUntil?.()
      if (hold) {
        hold.then(() => this.release(), () => this.release())
      } else {
        this.release()
      }
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.concurrency) {
      this.active++
      return Promise.resolve()
    }
    return new Promise(resolve => {
      this.waiting.push(resolve)
    })
  }

  private release(): void {
    const next = this.waiting.shift()
    if (next) {
      next()
    } else {
      this.active--
    }
  }
}
