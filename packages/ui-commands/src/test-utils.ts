import {
  configure,
  getConsoleSink,
  getLogger,
  type LogRecord,
} from "@logtape/logtape"
import { type Mock, vi } from "vitest"
import type { EditorSession, ShellIntegration } from "./editor-session.js"
import type { ExecutionContext } from "./executor/command-executor.js"
import { DEFAULT_MINIMUM_SIZE } from "./options.js"

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// MICROTASK AND PROMISE UTILITIES
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

export async function flushMicrotasks(): Promise<void> {
  await new Promise<void>(resolve => queueMicrotask(() => resolve()))
}

/**
 * Wait for a full event-loop turn, which lets the coalescing dispatcher pick
 * up everything routed so far.
 */
export async function nextTurn(): Promise<void> {
  await new Promise<void>(resolve => setImmediate(resolve))
}

export type Deferred<T> = {
  promise: Promise<T>
  resolve: (value: T) => void
  reject: (error: unknown) => void
}

export function createDeferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {}
  let reject: (error: unknown) => void = () => {}
  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })
  return { promise, resolve, reject }
}

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// MOCK COLLABORATORS
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

export type MockEditorSession = {
  [K in keyof EditorSession]: Mock<EditorSession[K]>
}

/**
 * An in-process session whose calls all succeed. Override a method with
 * `mockRejectedValueOnce` or `mockImplementation` to simulate failures.
 */
export function createMockSession(): MockEditorSession {
  return {
    command: vi.fn<EditorSession["command"]>(async () => {}),
    uiTryResize: vi.fn<EditorSession["uiTryResize"]>(async () => {}),
    input: vi.fn<EditorSession["input"]>(async () => 1),
    inputMouse: vi.fn<EditorSession["inputMouse"]>(async () => {}),
    errWriteln: vi.fn<EditorSession["errWriteln"]>(async () => {}),
  }
}

export type MockShellIntegration = {
  [K in keyof ShellIntegration]: Mock<ShellIntegration[K]>
}

export function createMockShellIntegration(
  results: Partial<Record<keyof ShellIntegration, boolean>> = {},
): MockShellIntegration {
  return {
    registerRightClickDirectory: vi.fn<
      ShellIntegration["registerRightClickDirectory"]
    >(() => results.registerRightClickDirectory ?? true),
    registerRightClickFile: vi.fn<ShellIntegration["registerRightClickFile"]>(
      () => results.registerRightClickFile ?? true,
    ),
    unregisterRightClick: vi.fn<ShellIntegration["unregisterRightClick"]>(
      () => results.unregisterRightClick ?? true,
    ),
  }
}

export function createExecutionContext(
  overrides: Partial<ExecutionContext> = {},
): ExecutionContext {
  return {
    session: createMockSession(),
    logger: getLogger(["editor-bridge", "test"]),
    minimumSize: DEFAULT_MINIMUM_SIZE,
    shellIntegration: undefined,
    ...overrides,
  }
}

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// LOG CAPTURE
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

/**
 * Re-configure LogTape to collect every `editor-bridge` record in memory.
 * Pair with `reset()` from LogTape in `afterEach`.
 */
export async function captureLogs(): Promise<LogRecord[]> {
  const records: LogRecord[] = []
  await configure({
    reset: true,
    sinks: {
      memory: record => {
        records.push(record)
      },
      console: getConsoleSink(),
    },
    loggers: [
      { category: ["editor-bridge"], lowestLevel: "trace", sinks: ["memory"] },
      { category: ["logtape", "meta"], lowestLevel: "warning", sinks: ["console"] },
    ],
  })
  return records
}

/**
 * The template of a record's message, with placeholders left unfilled.
 */
export function messageTemplate(record: LogRecord): string {
  return typeof record.rawMessage === "string"
    ? record.rawMessage
    : record.rawMessage.join("")
}
