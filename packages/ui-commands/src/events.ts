import type { ExecutionFailedError } from "./errors.js"
import type { DeliveryClass } from "./types.js"
import type { UiCommand } from "./ui-command.js"

export type ShutdownReason = "inbound-closed" | "guaranteed-closed" | "cancelled"

/**
 * Events the pipeline emits for observers. Emission is never awaited by the
 * dispatch loops.
 */
export type PipelineEvents = {
  "command-routed": {
    command: UiCommand
    deliveryClass: DeliveryClass
  }
  "command-coalesced": {
    kept: UiCommand
    discarded: number
  }
  "command-executed": {
    command: UiCommand
  }
  "execution-failed": {
    command: UiCommand
    error: ExecutionFailedError
  }
  shutdown: {
    reason: ShutdownReason
  }
}
