/**
 * The remote editor session the pipeline drives.
 *
 * Wire encoding and connection management live behind this interface. The
 * handle is shared by every execution, so implementations must tolerate
 * concurrent calls without mixing up request/response correlation.
 */
export interface EditorSession {
  /** Run an Ex command. */
  command(command: string): Promise<void>

  /** Ask every attached UI surface to resize. */
  uiTryResize(width: number, height: number): Promise<void>

  /** Queue raw input, in key notation, for the editor to process. */
  input(keys: string): Promise<unknown>

  /**
   * Send a mouse event. `button` is one of "left", "right", "middle",
   * "wheel"; `action` is "press", "release", "drag" or a wheel direction.
   */
  inputMouse(
    button: string,
    action: string,
    modifier: string,
    grid: number,
    row: number,
    col: number,
  ): Promise<void>

  /** Write a line to the session's error channel. */
  errWriteln(message: string): Promise<void>
}

/**
 * OS shell integration (the Windows explorer "open with" context menu).
 *
 * Each request reports success as a boolean; the pipeline turns `false` into
 * a diagnostic rather than an abort.
 */
export interface ShellIntegration {
  registerRightClickDirectory(): boolean
  registerRightClickFile(): boolean
  unregisterRightClick(): boolean
}
