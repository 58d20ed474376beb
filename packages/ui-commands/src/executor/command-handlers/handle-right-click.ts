import type { ShellIntegration } from "../../editor-session.js"
import { MissingShellIntegrationError } from "../../errors.js"
import type { UiCommandOf } from "../../ui-command.js"
import type { CommandHandler, ExecutionContext } from "../command-executor.js"

export const RIGHT_CLICK_MESSAGES = {
  unregisterPrevious:
    "Could not unregister the previous context menu items. They may not exist, or the process is not running as Administrator.",
  registerDirectory:
    "Could not register the directory context menu item. It may already be registered, or the process is not running as Administrator.",
  registerFile:
    "Could not register the file context menu item. It may already be registered, or the process is not running as Administrator.",
  unregister:
    "Could not remove the context menu items. They may already be removed, or the process is not running as Administrator.",
} as const

/**
 * Log an integration failure and mirror it to the session's error channel.
 * Neither step aborts the command.
 */
async function reportIntegrationFailure(
  message: string,
  ctx: ExecutionContext,
): Promise<void> {
  ctx.logger.warn(message)
  try {
    await ctx.session.errWriteln(message)
  } catch (error) {
    ctx.logger.debug("could not mirror diagnostic to session: {error}", {
      error,
    })
  }
}

async function withShellIntegration(
  commandType: "register-right-click" | "unregister-right-click",
  ctx: ExecutionContext,
  run: (shell: ShellIntegration) => Promise<void>,
): Promise<void> {
  if (!ctx.shellIntegration) {
    await reportIntegrationFailure(
      new MissingShellIntegrationError(commandType).message,
      ctx,
    )
    return
  }
  await run(ctx.shellIntegration)
}

/**
 * Replace the explorer context menu entries: remove old ones, then register
 * the directory and file entries. Every step runs even if an earlier one fails.
 */
export const handleRegisterRightClick: CommandHandler<
  UiCommandOf<"register-right-click">
> = async (command, ctx) => {
  await withShellIntegration(command.type, ctx, async shell => {
    if (!shell.unregisterRightClick()) {
      await reportIntegrationFailure(
        RIGHT_CLICK_MESSAGES.unregisterPrevious,
        ctx,
      )
    }
    if (!shell.registerRightClickDirectory()) {
      await reportIntegrationFailure(RIGHT_CLICK_MESSAGES.registerDirectory, ctx)
    }
    if (!shell.registerRightClickFile()) {
      await reportIntegrationFailure(RIGHT_CLICK_MESSAGES.registerFile, ctx)
    }
  })
}

export const handleUnregisterRightClick: CommandHandler<
  UiCommandOf<"unregister-right-click">
> = async (command, ctx) => {
  await withShellIntegration(command.type, ctx, async shell => {
    if (!shell.unregisterRightClick()) {
      await reportIntegrationFailure(RIGHT_CLICK_MESSAGES.unregister, ctx)
    }
  })
}
