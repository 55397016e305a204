/**
 * Work shared by concurrent callers within one process.
 *
 * Each keyed task runs under its own AbortController instead of the signal
 * of whichever caller started it. A caller that gives up only stops waiting;
 * the task is aborted once no caller is left. Results are kept for the life
 * of the instance, failures are forgotten so the next caller retries.
 */

interface Task<T> {
  promise: Promise<T>
  controller: AbortController
  waiters: number
  settled: boolean
}

/** Settle with `promise`, or reject with the signal's reason once it aborts */
export function raceSignal<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (signal === undefined) {
    return promise
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason)
    if (signal.aborted) {
      onAbort()
      return
    }
    signal.addEventListener('abort', onAbort, { once: true })
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(err)
      }
    )
  })
}

export class SharedWork<T> {
  private readonly tasks = new Map<string, Task<T>>()

  /**
   * Join the task for `key`, starting it with `start` if none is running or
   * cached. `signal` only bounds this caller's wait.
   */
  run(key: string, signal: AbortSignal | undefined, start: (signal: AbortSignal) => Promise<T>): Promise<T> {
    let task = this.tasks.get(key)
    if (task === undefined) {
      const controller = new AbortController()
      const created: Task<T> = { controller, waiters: 0, settled: false, promise: start(controller.signal) }
      created.promise.then(
        () => {
          created.settled = true
        },
        () => {
          created.settled = true
          this.evict(key, created)
        }
      )
      this.tasks.set(key, created)
      task = created
    }
    return this.wait(key, task, signal)
  }

  /** Number of tasks currently kept */
  get size(): number {
    return this.tasks.size
  }

  private async wait(key: string, task: Task<T>, signal: AbortSignal | undefined): Promise<T> {
    task.waiters += 1
    try {
      return await raceSignal(task.promise, signal)
    } finally {
      task.waiters -= 1
      if (signal?.aborted && task.waiters === 0 && !task.settled) {
        this.evict(key, task)
        task.controller.abort(signal.reason)
      }
    }
  }

  private evict(key: string, task: Task<T>): void {
    if (this.tasks.get(key) === task) this.tasks.delete(key)
  }
}
