import type { CancellationToken } from "../cancellation.js"
import type { UnboundedChannel } from "../channel/unbounded-channel.js"

export type NextResult<T> =
  | { status: "value"; value: T }
  | { status: "closed" }
  | { status: "drained" }

/**
 * Take the next value for a dispatch loop.
 *
 * While the token is live this waits on the channel. Once it is cancelled no
 * new wait starts: values already buffered are still handed out, then the
 * result is `drained`.
 */
export async function receiveNext<T>(
  channel: UnboundedChannel<T>,
  token: CancellationToken,
): Promise<NextResult<T>> {
  for (;;) {
    if (token.isCancelled) {
      const buffered = channel.tryRecv()
      return buffered.status === "value" ? buffered : { status: "drained" }
    }

    const result = await channel.recv(token)
    if (result.status !== "cancelled") return result
  }
}
