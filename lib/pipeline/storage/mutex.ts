/** FIFO async mutex guarding the in-memory store state and its files. */
export class Mutex {
  private queue: Array<() => void> = []
  private locked = false

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire()
    try {
      return await fn()
    } finally {
      this.release()
    }
  }

  private acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true
      return Promise.resolve()
    }

    return new Promise(resolve => {
      this.queue.push(resolve)
    })
  }

  private release(): void {
    const resolve = this.queue.shift()
    if (resolve) {
      resolve()
    } else {
      this.locked = false
    }
  }
}
