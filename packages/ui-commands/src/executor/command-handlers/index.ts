/**
 * Command Handlers
 *
 * One handler per UiCommand variant. `runCommandHandler` is an exhaustive
 * switch, so adding a variant without a handler fails to compile.
 */

import type { CommandHandler } from "../command-executor.js"
import { handleFileDrop } from "./handle-file-drop.js"
import { handleFocus } from "./handle-focus.js"
import { handleKeyboard } from "./handle-keyboard.js"
import { handleDrag, handleMouseButton, handleScroll } from "./handle-mouse.js"
import { handleQuit } from "./handle-quit.js"
import { handleResize } from "./handle-resize.js"
import {
  handleRegisterRightClick,
  handleUnregisterRightClick,
} from "./handle-right-click.js"

export const runCommandHandler: CommandHandler = (command, ctx) => {
  switch (command.type) {
    case "quit":
      return handleQuit(command, ctx)
    case "resize":
      return handleResize(command, ctx)
    case "keyboard":
      return handleKeyboard(command, ctx)
    case "mouse-button":
      return handleMouseButton(command, ctx)
    case "scroll":
      return handleScroll(command, ctx)
    case "drag":
      return handleDrag(command, ctx)
    case "focus-lost":
    case "focus-gained":
      return handleFocus(command, ctx)
    case "file-drop":
      return handleFileDrop(command, ctx)
    case "register-right-click":
      return handleRegisterRightClick(command, ctx)
    case "unregister-right-click":
      return handleUnregisterRightClick(command, ctx)
    default: {
      const unhandled: never = command
      throw new Error(`Unknown command type: ${JSON.stringify(unhandled)}`)
    }
  }
}

export { focusAutocommand } from "./handle-focus.js"
export { RIGHT_CLICK_MESSAGES } from "./handle-right-click.js"
