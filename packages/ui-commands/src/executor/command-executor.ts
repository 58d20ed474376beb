import type { Logger } from "@logtape/logtape"
import type Emittery from "emittery"
import type { EditorSession, ShellIntegration } from "../editor-session.js"
import { ExecutionFailedError } from "../errors.js"
import type { PipelineEvents } from "../events.js"
import type { Size } from "../types.js"
import type { UiCommand, UiCommandType } from "../ui-command.js"
import { runCommandHandler } from "./command-handlers/index.js"

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// TYPES
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

/**
 * Context provided to command handlers.
 *
 * Everything a handler needs to perform its remote call. The same context is
 * shared by every execution, concurrent or not.
 */
export type ExecutionContext = {
  readonly session: EditorSession
  readonly logger: Logger
  readonly minimumSize: Size
  readonly shellIntegration: ShellIntegration | undefined
}

/**
 * A command handler: performs exactly one remote call (or, for shell
 * integration, one collaborator sequence) for its command.
 */
export type CommandHandler<T extends UiCommand = UiCommand> = (
  command: T,
  ctx: ExecutionContext,
) => Promise<void>

/**
 * What happens when a command's execution fails:
 * - `fatal`: the session is assumed broken; the execution is aborted and reported
 * - `best-effort`: the failure is swallowed
 * - `logged`: handlers report partial failures themselves and do not throw
 */
export type FailurePolicy = "fatal" | "best-effort" | "logged"

export const FAILURE_POLICIES: Readonly<Record<UiCommandType, FailurePolicy>> =
  Object.freeze({
    quit: "best-effort",
    resize: "fatal",
    keyboard: "fatal",
    "mouse-button": "fatal",
    scroll: "fatal",
    drag: "fatal",
    "focus-lost": "fatal",
    "focus-gained": "fatal",
    "file-drop": "best-effort",
    "register-right-click": "logged",
    "unregister-right-click": "logged",
  })

export type ExecutionOutcome =
  | { status: "completed" }
  | { status: "failure-ignored"; error: unknown }
  | { status: "failed"; error: ExecutionFailedError }

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// COMMAND EXECUTOR
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

/**
 * CommandExecutor - Runs one command against the session and applies its
 * failure policy.
 *
 * `execute` never rejects: a failure is contained in the returned outcome,
 * so it cannot end the dispatcher loop that started the execution.
 *
 * @example
 * ```typescript
 * const executor = new CommandExecutor(context, emitter)
 *
 * const outcome = await executor.execute(UiCommands.resize(5, 1))
 * // session.uiTryResize(10, 3) was called
 * ```
 */
export class CommandExecutor {
  readonly #context: ExecutionContext
  readonly #emitter: Emittery<PipelineEvents> | undefined

  constructor(context: ExecutionContext, emitter?: Emittery<PipelineEvents>) {
    this.#context = context
    this.#emitter = emitter
  }

  async execute(command: UiCommand): Promise<ExecutionOutcome> {
    try {
      await runCommandHandler(command, this.#context)
    } catch (error) {
      return this.#handleFailure(command, error)
    }

    void this.#emitter?.emit("command-executed", { command })
    return { status: "completed" }
  }

  #handleFailure(command: UiCommand, error: unknown): ExecutionOutcome {
    const logger = this.#context.logger

    if (FAILURE_POLICIES[command.type] === "best-effort") {
      logger.debug("ignoring failed {commandType}: {error}", {
        commandType: command.type,
        error,
      })
      return { status: "failure-ignored", error }
    }

    const failure = new ExecutionFailedError(command, error)
    logger.fatal("{commandType} failed against a live session: {error}", {
      commandType: command.type,
      error: failure,
    })
    void this.#emitter?.emit("execution-failed", { command, error: failure })
    return { status: "failed", error: failure }
  }
}
