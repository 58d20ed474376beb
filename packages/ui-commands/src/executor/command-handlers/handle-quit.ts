import type { UiCommandOf } from "../../ui-command.js"
import type { CommandHandler } from "../command-executor.js"

/**
 * Ask the session to quit all windows, discarding unsaved changes.
 */
export const handleQuit: CommandHandler<UiCommandOf<"quit">> = async (
  _command,
  ctx,
) => {
  await ctx.session.command("qa!")
}
