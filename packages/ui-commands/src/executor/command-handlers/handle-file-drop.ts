import type { UiCommandOf } from "../../ui-command.js"
import type { CommandHandler } from "../command-executor.js"

/**
 * Open a dropped file. The path is passed through verbatim.
 */
export const handleFileDrop: CommandHandler<UiCommandOf<"file-drop">> = async (
  command,
  ctx,
) => {
  await ctx.session.command(`e ${command.path}`)
}
