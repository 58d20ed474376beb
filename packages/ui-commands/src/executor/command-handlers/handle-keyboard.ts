import type { UiCommandOf } from "../../ui-command.js"
import type { CommandHandler } from "../command-executor.js"

export const handleKeyboard: CommandHandler<UiCommandOf<"keyboard">> = async (
  command,
  ctx,
) => {
  ctx.logger.trace("keyboard input sent: {input}", { input: command.input })
  await ctx.session.input(command.input)
}
