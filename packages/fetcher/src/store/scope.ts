/**
 * Per-call abort scope combining a caller's signal with an optional deadline.
 */

import { FetchCancelledError, FetchTimeoutError, FetcherError } from '../core/errors.js'

export interface ScopeOptions {
  /** Caller cancellation */
  signal?: AbortSignal | undefined
  /** Deadline in milliseconds */
  timeout?: number | undefined
}

export class FetchScope {
  private readonly controller = new AbortController()
  private readonly parent: AbortSignal | undefined
  private readonly timer: ReturnType<typeof setTimeout> | undefined
  private readonly onParentAbort = (): void => {
    this.controller.abort(new FetchCancelledError())
  }

  /**
   * @param label - Names the work in timeout errors
   */
  constructor(label: string, options: ScopeOptions = {}) {
    const { signal, timeout } = options
    this.parent = signal
    if (signal?.aborted) {
      this.onParentAbort()
    } else {
      signal?.addEventListener('abort', this.onParentAbort, { once: true })
    }
    if (timeout !== undefined && !this.controller.signal.aborted) {
      this.timer = setTimeout(() => {
        this.controller.abort(new FetchTimeoutError(label, timeout))
      }, timeout)
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal
  }

  get aborted(): boolean {
    return this.controller.signal.aborted
  }

  /** Why the scope was aborted */
  reason(): FetcherError {
    const reason: unknown = this.controller.signal.reason
    return reason instanceof FetcherError ? reason : new FetchCancelledError()
  }

  /**
   * Settle with `promise`, or reject with the abort reason as soon as the
   * scope is aborted. The promise itself keeps running.
   */
  race<T>(promise: Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => reject(this.reason())
      if (this.aborted) {
        onAbort()
      } else {
        this.signal.addEventListener('abort', onAbort, { once: true })
      }
      promise.then(
        (value) => {
          this.signal.removeEventListener('abort', onAbort)
          resolve(value)
        },
        (err: unknown) => {
          this.signal.removeEventListener('abort', onAbort)
          reject(err)
        }
      )
    })
  }

  dispose(): void {
    if (this.timer !== undefined) clearTimeout(this.timer)
    this.parent?.removeEventListener('abort', this.onParentAbort)
  }
}
