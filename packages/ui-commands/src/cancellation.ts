export type CancelListener = () => void

/**
 * CancellationToken - One-way shutdown signal shared by the pipeline stages
 *
 * Starts live, is cancelled at most once, and never resets. Each pipeline gets
 * its own token, so tests can drive shutdown independently.
 *
 * @example
 * ```typescript
 * const token = new CancellationToken()
 * const dispose = token.onCancel(() => channel.close())
 *
 * token.cancel() // true
 * token.cancel() // false, already cancelled
 * ```
 */
export class CancellationToken {
  #cancelled = false
  readonly #listeners = new Set<CancelListener>()

  get isCancelled(): boolean {
    return this.#cancelled
  }

  /**
   * Cancel the token and notify listeners.
   *
   * @returns true if this call performed the transition
   */
  cancel(): boolean {
    if (this.#cancelled) return false

    this.#cancelled = true
    const listeners = [...this.#listeners]
    this.#listeners.clear()
    for (const listener of listeners) {
      listener()
    }
    return true
  }

  /**
   * Register a listener invoked once on cancellation. If the token is already
   * cancelled the listener runs immediately.
   *
   * @returns a disposer that removes the listener
   */
  onCancel(listener: CancelListener): () => void {
    if (this.#cancelled) {
      listener()
      return () => {}
    }
    this.#listeners.add(listener)
    return () => {
      this.#listeners.delete(listener)
    }
  }
}
