import type { UiCommandOf } from "../../ui-command.js"
import type { CommandHandler } from "../command-executor.js"

// Modifiers are already encoded by the front-end; the session takes none here
const NO_MODIFIER = ""

export const handleMouseButton: CommandHandler<
  UiCommandOf<"mouse-button">
> = async (command, ctx) => {
  const { column, row } = command.position
  await ctx.session.inputMouse(
    "left",
    command.action,
    NO_MODIFIER,
    command.gridId,
    row,
    column,
  )
}

export const handleScroll: CommandHandler<UiCommandOf<"scroll">> = async (
  command,
  ctx,
) => {
  const { column, row } = command.position
  await ctx.session.inputMouse(
    "wheel",
    command.direction,
    NO_MODIFIER,
    command.gridId,
    row,
    column,
  )
}

export const handleDrag: CommandHandler<UiCommandOf<"drag">> = async (
  command,
  ctx,
) => {
  const { column, row } = command.position
  await ctx.session.inputMouse(
    "left",
    "drag",
    NO_MODIFIER,
    command.gridId,
    row,
    column,
  )
}
