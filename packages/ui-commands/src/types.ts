export type GridId = number

/**
 * A cell on a grid, zero-based. Columns run left to right, rows top to bottom.
 */
export type GridPosition = {
  readonly column: number
  readonly row: number
}

export type MouseAction = "press" | "release"

export type ScrollDirection = "up" | "down" | "left" | "right"

export type DeliveryClass = "droppable" | "guaranteed"

export type Size = {
  readonly width: number
  readonly height: number
}
