import type { Logger } from "@logtape/logtape"
import type Emittery from "emittery"
import type { CancellationToken } from "../cancellation.js"
import type { UnboundedChannel } from "../channel/unbounded-channel.js"
import type { PipelineEvents } from "../events.js"
import type { CommandExecutor } from "../executor/command-executor.js"
import type { UiCommand } from "../ui-command.js"
import { receiveNext } from "./receive-next.js"

export type SequentialDispatcherParams = {
  channel: UnboundedChannel<UiCommand>
  token: CancellationToken
  executor: CommandExecutor
  logger: Logger
  emitter?: Emittery<PipelineEvents>
}

/**
 * Execute guaranteed commands one at a time, in arrival order, each to
 * completion before the next is taken. Nothing is reordered, merged or
 * dropped, including commands still buffered when shutdown begins.
 */
export async function runSequentialDispatcher({
  channel,
  token,
  executor,
  logger,
  emitter,
}: SequentialDispatcherParams): Promise<void> {
  for (;;) {
    const next = await receiveNext(channel, token)

    if (next.status === "drained") return

    if (next.status === "closed") {
      logger.debug("guaranteed channel closed; shutting down")
      if (token.cancel()) {
        void emitter?.emit("shutdown", { reason: "guaranteed-closed" })
      }
      return
    }

    await executor.execute(next.value)
  }
}
