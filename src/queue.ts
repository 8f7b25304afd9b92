import { ClientStopped } from './errors.js'

type QueuedTask = {
  execute: () => Promise<void>
  reject: (reason: unknown) => void
}

/**
 * Runs device exchanges strictly one at a time, in submission order.
 * The thermostat answers a single request at a time, so every read, write
 * and the decode-and-swap that follows a poll run as one queued task.
 */
export class SerialQueue {
  private busy = false
  private closed = false
  private queue: QueuedTask[] = []

  get pending(): number {
    return this.queue.length
  }

  get isBusy(): boolean {
    return this.busy
  }

  enqueue<T>(run: () => Promise<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(new ClientStopped())
    }
    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        execute: async () => {
          try {
            resolve(await run())
          } catch (error) {
            reject(error)
          }
        },
        reject,
      })
      void this.processQueue()
    })
  }

  /** Reject everything still waiting; a running task finishes on its own */
  close(reason: Error = new ClientStopped()): void {
    this.closed = true
    const waiting = this.queue
    this.queue = []
    for (const task of waiting) {
      task.reject(reason)
    }
  }

  reopen(): void {
    this.closed = false
  }

  private async processQueue(): Promise<void> {
    if (this.busy) return
    const item = this.queue.shift()
    if (!item) return

    this.busy = true
    try {
      await item.execute()
    } finally {
      this.busy = false
      void this.processQueue()
    }
  }
}
