import type { UiCommandOf } from "../../ui-command.js"
import type { CommandHandler } from "../command-executor.js"

type FocusEvent = "FocusLost" | "FocusGained"

/**
 * Build the Ex command that fires a focus autocommand only when the user has
 * defined one, so the editor does not report a missing event.
 */
export function focusAutocommand(event: FocusEvent): string {
  return `if exists('#${event}') | doautocmd <nomodeline> ${event} | endif`
}

export const handleFocus: CommandHandler<
  UiCommandOf<"focus-lost" | "focus-gained">
> = async (command, ctx) => {
  const event: FocusEvent =
    command.type === "focus-lost" ? "FocusLost" : "FocusGained"
  await ctx.session.command(focusAutocommand(event))
}
