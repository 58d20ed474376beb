import Emittery from "emittery"
import type { CancellationToken } from "./cancellation.js"
import { UnboundedChannel } from "./channel/unbounded-channel.js"
import { runCoalescingDispatcher } from "./dispatch/coalescing-dispatcher.js"
import { runRouter } from "./dispatch/router.js"
import { runSequentialDispatcher } from "./dispatch/sequential-dispatcher.js"
import type { EditorSession } from "./editor-session.js"
import type { PipelineEvents } from "./events.js"
import {
  CommandExecutor,
  type ExecutionOutcome,
} from "./executor/command-executor.js"
import { type PipelineOptions, resolvePipelineOptions } from "./options.js"
import type { UiCommand } from "./ui-command.js"

export type CommandPipeline = {
  readonly token: CancellationToken
  readonly events: Emittery<PipelineEvents>
  /**
   * Resolves once the router and both dispatchers have returned. Droppable
   * executions still in flight are not waited for. Rejects only if routing
   * hit a closed delivery channel.
   */
  readonly done: Promise<void>
  /** Droppable executions spawned and not yet settled */
  readonly pendingExecutions: number
  /** Wait for the droppable executions in flight right now */
  settleExecutions(): Promise<void>
  /** Stop accepting inbound commands; buffered delivery still completes */
  shutdown(): void
}

/**
 * Start the router, the coalescing dispatcher and the sequential dispatcher.
 *
 * The producer owns `inbound`; closing it shuts the pipeline down.
 *
 * @example
 * ```typescript
 * const inbound = new UnboundedChannel<UiCommand>("inbound")
 * const pipeline = startCommandProcessors(inbound, session)
 *
 * inbound.send(UiCommands.keyboard("i"))
 * inbound.send(UiCommands.resize(120, 40))
 *
 * inbound.close()
 * await pipeline.done
 * ```
 */
export function startCommandProcessors(
  inbound: UnboundedChannel<UiCommand>,
  session: EditorSession,
  options?: PipelineOptions,
): CommandPipeline {
  const { minimumSize, logger, shellIntegration, token } =
    resolvePipelineOptions(options)

  const events = new Emittery<PipelineEvents>()
  const droppable = new UnboundedChannel<UiCommand>("droppable")
  const guaranteed = new UnboundedChannel<UiCommand>("guaranteed")

  const executor = new CommandExecutor(
    {
      session,
      logger: logger.getChild("executor"),
      minimumSize,
      shellIntegration,
    },
    events,
  )

  const inFlight = new Set<Promise<ExecutionOutcome>>()

  logger.debug("starting command processors")

  const router = runRouter({
    inbound,
    droppable,
    guaranteed,
    token,
    logger: logger.getChild("router"),
    emitter: events,
  })

  const coalescing = runCoalescingDispatcher({
    channel: droppable,
    token,
    executor,
    logger: logger.getChild("coalescing"),
    emitter: events,
    onSpawn: execution => {
      inFlight.add(execution)
      void execution.finally(() => inFlight.delete(execution))
    },
  })

  const sequential = runSequentialDispatcher({
    channel: guaranteed,
    token,
    executor,
    logger: logger.getChild("sequential"),
    emitter: events,
  })

  const done = Promise.all([router, coalescing, sequential]).then(() => {
    logger.debug("command processors stopped")
  })

  return {
    token,
    events,
    done,
    get pendingExecutions() {
      return inFlight.size
    },
    async settleExecutions() {
      await Promise.all([...inFlight])
    },
    shutdown() {
      if (token.cancel()) {
        void events.emit("shutdown", { reason: "cancelled" })
      }
    },
  }
}
