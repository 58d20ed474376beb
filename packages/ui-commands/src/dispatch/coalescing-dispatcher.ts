import { setImmediate as yieldToEventLoop } from "node:timers/promises"
import type { Logger } from "@logtape/logtape"
import type Emittery from "emittery"
import type { CancellationToken } from "../cancellation.js"
import type { UnboundedChannel } from "../channel/unbounded-channel.js"
import type { PipelineEvents } from "../events.js"
import type {
  CommandExecutor,
  ExecutionOutcome,
} from "../executor/command-executor.js"
import type { UiCommand } from "../ui-command.js"
import { receiveNext } from "./receive-next.js"

export type CoalescingDispatcherParams = {
  channel: UnboundedChannel<UiCommand>
  token: CancellationToken
  executor: CommandExecutor
  logger: Logger
  emitter?: Emittery<PipelineEvents>
  /** Observe each spawned execution; the dispatcher itself never awaits it */
  onSpawn?: (execution: Promise<ExecutionOutcome>) => void
}

/**
 * Deliver only the most recent droppable command of each burst.
 *
 * After the first command of a burst arrives, the dispatcher lets the current
 * event-loop turn finish so that everything routed in the same turn lands in
 * the channel, then keeps the last buffered command and discards the rest.
 * The survivor runs concurrently: a slow remote call never stalls intake, and
 * two spawned executions may complete in either order.
 */
export async function runCoalescingDispatcher({
  channel,
  token,
  executor,
  logger,
  emitter,
  onSpawn,
}: CoalescingDispatcherParams): Promise<void> {
  for (;;) {
    const next = await receiveNext(channel, token)
    if (next.status !== "value") return

    if (!token.isCancelled) {
      await yieldToEventLoop()
    }

    let latest = next.value
    let discarded = 0
    for (
      let buffered = channel.tryRecv();
      buffered.status === "value";
      buffered = channel.tryRecv()
    ) {
      latest = buffered.value
      discarded++
    }

    if (discarded > 0) {
      logger.trace("coalesced {discarded} commands into {commandType}", {
        discarded,
        commandType: latest.type,
      })
      void emitter?.emit("command-coalesced", { kept: latest, discarded })
    }

    const execution = executor.execute(latest)
    onSpawn?.(execution)
  }
}
