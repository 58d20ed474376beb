import { getLogger, type Logger } from "@logtape/logtape"
import { CancellationToken } from "./cancellation.js"
import type { ShellIntegration } from "./editor-session.js"
import type { Size } from "./types.js"

/**
 * Smallest surface the editor is asked to resize to. Smaller requests are
 * floored to these dimensions.
 */
export const DEFAULT_MINIMUM_SIZE: Size = Object.freeze({ width: 10, height: 3 })

export const LOGGER_CATEGORY = ["editor-bridge", "ui-commands"] as const

export type PipelineOptions = {
  minimumSize?: Size
  logger?: Logger
  /** Only present on Windows; shell-integration commands are reported otherwise */
  shellIntegration?: ShellIntegration
  /** Shared shutdown signal; a fresh token is created when omitted */
  token?: CancellationToken
}

export type ResolvedPipelineOptions = {
  minimumSize: Size
  logger: Logger
  shellIntegration: ShellIntegration | undefined
  token: CancellationToken
}

export function resolvePipelineOptions(
  options: PipelineOptions = {},
): ResolvedPipelineOptions {
  const minimumSize = options.minimumSize ?? DEFAULT_MINIMUM_SIZE

  for (const [dimension, value] of Object.entries(minimumSize)) {
    if (!Number.isInteger(value) || value < 1) {
      throw new RangeError(
        `minimumSize.${dimension} must be a positive integer, received ${value}`,
      )
    }
  }

  return {
    minimumSize,
    logger: options.logger ?? getLogger([...LOGGER_CATEGORY]),
    shellIntegration: options.shellIntegration,
    token: options.token ?? new CancellationToken(),
  }
}
