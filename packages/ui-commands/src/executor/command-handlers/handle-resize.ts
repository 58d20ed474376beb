import type { UiCommandOf } from "../../ui-command.js"
import type { CommandHandler } from "../command-executor.js"

/**
 * Resize the remote UI, flooring each dimension to the configured minimum.
 */
export const handleResize: CommandHandler<UiCommandOf<"resize">> = async (
  command,
  ctx,
) => {
  const width = Math.max(command.width, ctx.minimumSize.width)
  const height = Math.max(command.height, ctx.minimumSize.height)
  await ctx.session.uiTryResize(width, height)
}
