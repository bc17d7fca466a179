import { setTimeout as delay } from "node:timers/promises"

export class QueueOverflowError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "QueueOverflowError"
  }
}

interface QueueItem {
  run: () => Promise<void>
}

export interface RateLimiterOptions {
  requestsPerSecond: number
  maxQueued: number
  /** Used in overflow messages. */
  label?: string
  now?: () => number
  sleep?: (ms: number) => Promise<void>
}

export class RateLimiterQueue {
  private readonly minIntervalMs: number
  private readonly maxQueued: number
  private readonly label: string
  private readonly now: () => number
  private readonly sleep: (ms: number) => Promise<void>
  private readonly queue: QueueItem[] = []

  private isRunning = false
  private nextAvailableAt = 0

  constructor(options: RateLimiterOptions) {
    this.minIntervalMs = 1000 / Math.max(1, options.requestsPerSecond)
    this.maxQueued = Math.max(1, options.maxQueued)
    this.label = options.label ?? "request"
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? ((ms) => delay(ms))
  }

  schedule<T>(task: () => Promise<T>): Promise<T> {
    if (this.queue.length >= this.maxQueued) {
      return Promise.reject(
        new QueueOverflowError(`${this.label} queue is full (max=${this.maxQueued})`),
      )
    }

    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        run: async () => {
          try {
            resolve(await task())
          } catch (error) {
            reject(error)
          }
        },
      })
      void this.pump()
    })
  }

  get pendingCount(): number {
    return this.queue.length
  }

  private async pump(): Promise<void> {
    if (this.isRunning) {
      return
    }
    this.isRunning = true

    try {
      while (this.queue.length > 0) {
        const waitMs = this.nextAvailableAt - this.now()
        if (waitMs > 0) {
          await this.sleep(waitMs)
        }

        const next = this.queue.shift()
        if (!next) {
          continue
        }

        const startedAt = this.now()
        this.nextAvailableAt = Math.max(this.nextAvailableAt, startedAt) + this.minIntervalMs
        await next.run()
      }
    } finally {
      this.isRunning = false
      if (this.queue.length > 0) {
        void this.pump()
      }
    }
  }
}

/**
 * Caps the number of tasks in flight. Unlike {@link RateLimiterQueue} it does
 * not space calls out in time and never rejects for being busy.
 */
export class ConcurrencyGate {
  private readonly waiters: Array<() => void> = []
  private active = 0

  constructor(private readonly maxConcurrent: number) {}

  get activeCount(): number {
    return this.active
  }

  get waitingCount(): number {
    return this.waiters.length
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire()
    try {
      return await task()
    } finally {
      this.release()
    }
  }

  private acquire(): Promise<void> {
    if (this.active < Math.max(1, this.maxConcurrent)) {
      this.active += 1
      return Promise.resolve()
    }

    return new Promise<void>((resolve) => {
      this.waiters.push(() => {
        this.active += 1
        resolve()
      })
    })
  }

  private release(): void {
    this.active -= 1
    const next = this.waiters.shift()
    if (next) {
      next()
    }
  }
}
