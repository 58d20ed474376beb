import type {
  GridId,
  GridPosition,
  MouseAction,
  ScrollDirection,
} from "./types.js"

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// COMMANDS
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

/**
 * One user-intent action produced by the front-end.
 *
 * Each variant carries only what its remote call needs. Values are never
 * mutated after construction; ownership moves along the pipeline.
 */
export type UiCommand =
  | { readonly type: "quit" }
  | { readonly type: "resize"; readonly width: number; readonly height: number }
  | { readonly type: "keyboard"; readonly input: string }
  | {
      readonly type: "mouse-button"
      readonly action: MouseAction
      readonly gridId: GridId
      readonly position: GridPosition
    }
  | {
      readonly type: "scroll"
      readonly direction: ScrollDirection
      readonly gridId: GridId
      readonly position: GridPosition
    }
  | {
      readonly type: "drag"
      readonly gridId: GridId
      readonly position: GridPosition
    }
  | { readonly type: "file-drop"; readonly path: string }
  | { readonly type: "focus-lost" }
  | { readonly type: "focus-gained" }
  // Shell integration (Windows explorer context menu)
  | { readonly type: "register-right-click" }
  | { readonly type: "unregister-right-click" }

export type UiCommandType = UiCommand["type"]

export type UiCommandOf<T extends UiCommandType> = Extract<
  UiCommand,
  { type: T }
>

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// FACTORIES
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

function assertUnsigned(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(
      `${name} must be a non-negative integer, received ${value}`,
    )
  }
}

function position(column: number, row: number): GridPosition {
  assertUnsigned("column", column)
  assertUnsigned("row", row)
  return Object.freeze({ column, row })
}

/**
 * Frozen constructors for every UiCommand variant.
 *
 * @example
 * ```typescript
 * inbound.send(UiCommands.resize(120, 40))
 * inbound.send(UiCommands.keyboard("<C-w>"))
 * ```
 */
export const UiCommands = {
  quit: (): UiCommandOf<"quit"> => Object.freeze({ type: "quit" }),

  resize: (width: number, height: number): UiCommandOf<"resize"> => {
    assertUnsigned("width", width)
    assertUnsigned("height", height)
    return Object.freeze({ type: "resize", width, height })
  },

  keyboard: (input: string): UiCommandOf<"keyboard"> =>
    Object.freeze({ type: "keyboard", input }),

  mouseButton: (
    action: MouseAction,
    gridId: GridId,
    column: number,
    row: number,
  ): UiCommandOf<"mouse-button"> => {
    assertUnsigned("gridId", gridId)
    return Object.freeze({
      type: "mouse-button",
      action,
      gridId,
      position: position(column, row),
    })
  },

  scroll: (
    direction: ScrollDirection,
    gridId: GridId,
    column: number,
    row: number,
  ): UiCommandOf<"scroll"> => {
    assertUnsigned("gridId", gridId)
    return Object.freeze({
      type: "scroll",
      direction,
      gridId,
      position: position(column, row),
    })
  },

  drag: (gridId: GridId, column: number, row: number): UiCommandOf<"drag"> => {
    assertUnsigned("gridId", gridId)
    return Object.freeze({
      type: "drag",
      gridId,
      position: position(column, row),
    })
  },

  fileDrop: (path: string): UiCommandOf<"file-drop"> =>
    Object.freeze({ type: "file-drop", path }),

  focusLost: (): UiCommandOf<"focus-lost"> =>
    Object.freeze({ type: "focus-lost" }),

  focusGained: (): UiCommandOf<"focus-gained"> =>
    Object.freeze({ type: "focus-gained" }),

  registerRightClick: (): UiCommandOf<"register-right-click"> =>
    Object.freeze({ type: "register-right-click" }),

  unregisterRightClick: (): UiCommandOf<"unregister-right-click"> =>
    Object.freeze({ type: "unregister-right-click" }),
} as const
