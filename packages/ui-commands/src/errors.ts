import type { UiCommand } from "./ui-command.js"

/**
 * Error thrown when sending on a channel whose sending side has been closed.
 */
export class ChannelClosedError extends Error {
  constructor(public readonly channelName: string) {
    super(`Cannot send on closed channel '${channelName}'.`)
    this.name = "ChannelClosedError"
  }
}

/**
 * A remote call that must always succeed against a live session failed.
 *
 * This aborts the single execution of `command`; it never reaches a
 * dispatcher loop.
 */
export class ExecutionFailedError extends Error {
  constructor(
    public readonly command: UiCommand,
    cause: unknown,
  ) {
    super(
      `Execution of '${command.type}' failed: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause },
    )
    this.name = "ExecutionFailedError"
  }
}

/**
 * A shell-integration command ran without a shell-integration collaborator,
 * which is the case on every platform but Windows.
 */
export class MissingShellIntegrationError extends Error {
  constructor(public readonly commandType: UiCommand["type"]) {
    super(
      `'${commandType}' requires shell integration, which is not available on this platform.`,
    )
    this.name = "MissingShellIntegrationError"
  }
}
