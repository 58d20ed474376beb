import type { Logger } from "@logtape/logtape"
import type Emittery from "emittery"
import type { CancellationToken } from "../cancellation.js"
import type { UnboundedChannel } from "../channel/unbounded-channel.js"
import { classify } from "../delivery-class.js"
import type { PipelineEvents } from "../events.js"
import type { UiCommand } from "../ui-command.js"

export type RouterParams = {
  inbound: UnboundedChannel<UiCommand>
  droppable: UnboundedChannel<UiCommand>
  guaranteed: UnboundedChannel<UiCommand>
  token: CancellationToken
  logger: Logger
  emitter?: Emittery<PipelineEvents>
}

/**
 * Route every inbound command to exactly one of the two delivery channels.
 *
 * Closing the inbound channel cancels the token: this is the pipeline's
 * shutdown trigger. However the loop ends, both delivery channels are closed
 * so their dispatchers drain and stop.
 *
 * @throws ChannelClosedError if a delivery channel was closed while routing
 */
export async function runRouter({
  inbound,
  droppable,
  guaranteed,
  token,
  logger,
  emitter,
}: RouterParams): Promise<void> {
  try {
    while (!token.isCancelled) {
      const result = await inbound.recv(token)

      if (result.status === "cancelled") break

      if (result.status === "closed") {
        logger.debug("inbound channel closed; shutting down")
        if (token.cancel()) {
          void emitter?.emit("shutdown", { reason: "inbound-closed" })
        }
        break
      }

      const command = result.value
      const deliveryClass = classify(command)
      const target = deliveryClass === "droppable" ? droppable : guaranteed

      try {
        target.send(command)
      } catch (error) {
        logger.fatal("could not route {commandType}: {error}", {
          commandType: command.type,
          error,
        })
        throw error
      }

      logger.trace("routed {commandType} as {deliveryClass}", {
        commandType: command.type,
        deliveryClass,
      })
      void emitter?.emit("command-routed", { command, deliveryClass })
    }
  } finally {
    droppable.close()
    guaranteed.close()
  }
}
