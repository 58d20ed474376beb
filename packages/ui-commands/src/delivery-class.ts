import type { DeliveryClass } from "./types.js"
import type { UiCommand, UiCommandType } from "./ui-command.js"

/**
 * Delivery class of every command type.
 *
 * Droppable commands carry pure state (a size, a scroll or drag position):
 * only the latest value of a burst matters. Everything else must be executed
 * exactly once, in submission order.
 */
export const DELIVERY_CLASSES: Readonly<Record<UiCommandType, DeliveryClass>> =
  Object.freeze({
    quit: "guaranteed",
    resize: "droppable",
    keyboard: "guaranteed",
    "mouse-button": "guaranteed",
    scroll: "droppable",
    drag: "droppable",
    "file-drop": "guaranteed",
    "focus-lost": "guaranteed",
    "focus-gained": "guaranteed",
    "register-right-click": "guaranteed",
    "unregister-right-click": "guaranteed",
  })

/**
 * Classify a command by its tag alone. Payload values never matter.
 */
export function classify(command: UiCommand): DeliveryClass {
  return DELIVERY_CLASSES[command.type]
}

export function isDroppable(command: UiCommand): boolean {
  return classify(command) === "droppable"
}
