import type { CancellationToken } from "../cancellation.js"
import { ChannelClosedError } from "../errors.js"

export type RecvResult<T> =
  | { status: "value"; value: T }
  | { status: "closed" }
  | { status: "cancelled" }

export type TryRecvResult<T> =
  | { status: "value"; value: T }
  | { status: "empty" }
  | { status: "closed" }

type Waiter<T> = (result: RecvResult<T>) => void

/**
 * UnboundedChannel - FIFO queue with a non-blocking sender and an async receiver
 *
 * `send` never waits: capacity is unbounded, and dropping is left to the
 * consumer's policy. After `close`, buffered values are still delivered; only
 * once the buffer is drained does `recv` report `closed`.
 *
 * @example
 * ```typescript
 * const channel = new UnboundedChannel<UiCommand>("inbound")
 * channel.send(UiCommands.quit())
 *
 * const result = await channel.recv()
 * if (result.status === "value") handle(result.value)
 * ```
 */
export class UnboundedChannel<T> {
  readonly name: string
  // Boxed so a buffered `undefined` is distinct from an empty queue
  readonly #buffer: { value: T }[] = []
  readonly #waiters: Waiter<T>[] = []
  #closed = false

  constructor(name = "channel") {
    this.name = name
  }

  /**
   * Enqueue a value, handing it straight to a waiting receiver if there is one.
   *
   * @throws ChannelClosedError if the channel has been closed
   */
  send(value: T): void {
    if (this.#closed) {
      throw new ChannelClosedError(this.name)
    }

    const waiter = this.#waiters.shift()
    if (waiter) {
      waiter({ status: "value", value })
      return
    }
    this.#buffer.push({ value })
  }

  /**
   * Wait for the next value.
   *
   * When `token` is cancelled during the wait, the waiter is withdrawn and the
   * result is `cancelled`; no value is consumed.
   */
  recv(token?: CancellationToken): Promise<RecvResult<T>> {
    const immediate = this.#takeBuffered()
    if (immediate) return Promise.resolve(immediate)
    if (token?.isCancelled) return Promise.resolve({ status: "cancelled" })

    return new Promise<RecvResult<T>>(resolve => {
      let disposeCancel: () => void = () => {}

      const waiter: Waiter<T> = result => {
        disposeCancel()
        resolve(result)
      }
      this.#waiters.push(waiter)

      if (token) {
        disposeCancel = token.onCancel(() => {
          const index = this.#waiters.indexOf(waiter)
          if (index !== -1) {
            this.#waiters.splice(index, 1)
            resolve({ status: "cancelled" })
          }
        })
      }
    })
  }

  /**
   * Take the next buffered value without waiting.
   */
  tryRecv(): TryRecvResult<T> {
    return this.#takeBuffered() ?? { status: "empty" }
  }

  /**
   * Close the sending side. Waiting receivers are released with `closed`.
   * Closing twice is a no-op.
   */
  close(): void {
    if (this.#closed) return

    this.#closed = true
    const waiters = this.#waiters.splice(0)
    for (const waiter of waiters) {
      waiter({ status: "closed" })
    }
  }

  get isClosed(): boolean {
    return this.#closed
  }

  /**
   * Number of values buffered and not yet received.
   */
  get size(): number {
    return this.#buffer.length
  }

  #takeBuffered():
    | { status: "value"; value: T }
    | { status: "closed" }
    | undefined {
    const entry = this.#buffer.shift()
    if (entry) return { status: "value", value: entry.value }
    if (this.#closed) return { status: "closed" }
    return undefined
  }
}
