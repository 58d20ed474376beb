import { describe, expect, it, vi } from "vitest"
import { CancellationToken } from "./cancellation.js"
import { UnboundedChannel } from "./channel/unbounded-channel.js"
import { startCommandProcessors } from "./pipeline.js"
import {
  createDeferred,
  createMockSession,
  createMockShellIntegration,
} from "./test-utils.js"
import { type UiCommand, UiCommands } from "./ui-command.js"

function createInbound() {
  return new UnboundedChannel<UiCommand>("inbound")
}

describe("startCommandProcessors", () => {
  it("floors a resize to the minimum size", async () => {
    const session = createMockSession()
    const inbound = createInbound()
    const pipeline = startCommandProcessors(inbound, session)

    inbound.send(UiCommands.resize(5, 1))
    inbound.close()
    await pipeline.done
    await pipeline.settleExecutions()

    expect(session.uiTryResize.mock.calls).toEqual([[10, 3]])
  })

  it("coalesces back-to-back resizes into the newest", async () => {
    const session = createMockSession()
    const inbound = createInbound()
    const pipeline = startCommandProcessors(inbound, session)

    inbound.send(UiCommands.resize(100, 50))
    inbound.send(UiCommands.resize(120, 60))
    inbound.close()
    await pipeline.done
    await pipeline.settleExecutions()

    expect(session.uiTryResize.mock.calls).toEqual([[120, 60]])
  })

  it("delivers guaranteed commands in submission order", async () => {
    const session = createMockSession()
    const calls: string[] = []
    session.input.mockImplementation(async keys => {
      calls.push(`input ${keys}`)
    })
    session.command.mockImplementation(async command => {
      calls.push(`command ${command}`)
    })
    const inbound = createInbound()
    const pipeline = startCommandProcessors(inbound, session)

    inbound.send(UiCommands.keyboard("a"))
    inbound.send(UiCommands.keyboard("b"))
    inbound.send(UiCommands.quit())
    inbound.close()
    await pipeline.done

    expect(calls).toEqual(["input a", "input b", "command qa!"])
  })

  it("propagates shutdown from the inbound channel", async () => {
    const inbound = createInbound()
    const pipeline = startCommandProcessors(inbound, createMockSession())
    const onShutdown = vi.fn()
    pipeline.events.on("shutdown", onShutdown)

    inbound.close()
    await pipeline.done

    expect(pipeline.token.isCancelled).toBe(true)
    await vi.waitFor(() => expect(onShutdown).toHaveBeenCalledTimes(1))
    expect(onShutdown).toHaveBeenCalledWith({ reason: "inbound-closed" })
  })

  it("contains a failed focus autocommand to its own execution", async () => {
    const session = createMockSession()
    session.command.mockRejectedValueOnce(new Error("session gone"))
    const inbound = createInbound()
    const pipeline = startCommandProcessors(inbound, session)
    const onFailed = vi.fn()
    pipeline.events.on("execution-failed", onFailed)

    inbound.send(UiCommands.focusLost())
    inbound.send(UiCommands.keyboard("k"))
    inbound.close()
    await pipeline.done

    expect(session.command).toHaveBeenCalledWith(
      "if exists('#FocusLost') | doautocmd <nomodeline> FocusLost | endif",
    )
    expect(session.input).toHaveBeenCalledWith("k")
    await vi.waitFor(() => expect(onFailed).toHaveBeenCalledTimes(1))
    expect(onFailed.mock.calls[0]?.[0].command).toEqual({ type: "focus-lost" })
  })

  it("keeps going silently after a failed file drop", async () => {
    const session = createMockSession()
    session.command.mockRejectedValueOnce(new Error("E37: No write since last change"))
    const inbound = createInbound()
    const pipeline = startCommandProcessors(inbound, session)
    const onFailed = vi.fn()
    pipeline.events.on("execution-failed", onFailed)

    inbound.send(UiCommands.fileDrop("/tmp/x.txt"))
    inbound.send(UiCommands.keyboard(":w<CR>"))
    inbound.close()
    await expect(pipeline.done).resolves.toBeUndefined()

    expect(session.command).toHaveBeenCalledWith("e /tmp/x.txt")
    expect(session.input).toHaveBeenCalledWith(":w<CR>")
    expect(onFailed).not.toHaveBeenCalled()
  })

  it("does not let a slow droppable execution hold back guaranteed delivery", async () => {
    const stalled = createDeferred()
    const session = createMockSession()
    session.uiTryResize.mockImplementation(() => stalled.promise)
    const inbound = createInbound()
    const pipeline = startCommandProcessors(inbound, session)

    inbound.send(UiCommands.resize(90, 30))
    await vi.waitFor(() => expect(session.uiTryResize).toHaveBeenCalledTimes(1))
    inbound.send(UiCommands.keyboard("q"))
    inbound.close()
    await pipeline.done

    expect(session.input).toHaveBeenCalledWith("q")
    expect(pipeline.pendingExecutions).toBe(1)

    stalled.resolve()
    await pipeline.settleExecutions()
    expect(pipeline.pendingExecutions).toBe(0)
  })

  it("stops accepting commands after an explicit shutdown", async () => {
    const session = createMockSession()
    const inbound = createInbound()
    const pipeline = startCommandProcessors(inbound, session)
    const onShutdown = vi.fn()
    pipeline.events.on("shutdown", onShutdown)

    pipeline.shutdown()
    await pipeline.done
    inbound.send(UiCommands.keyboard("ignored"))

    expect(session.input).not.toHaveBeenCalled()
    expect(inbound.size).toBe(1)
    await vi.waitFor(() =>
      expect(onShutdown).toHaveBeenCalledWith({ reason: "cancelled" }),
    )
  })

  it("shares an injected token", async () => {
    const token = new CancellationToken()
    const pipeline = startCommandProcessors(createInbound(), createMockSession(), {
      token,
    })

    token.cancel()
    await pipeline.done

    expect(pipeline.token).toBe(token)
  })

  it("routes shell-integration commands to the collaborator", async () => {
    const session = createMockSession()
    const shellIntegration = createMockShellIntegration()
    const inbound = createInbound()
    const pipeline = startCommandProcessors(inbound, session, {
      shellIntegration,
    })

    inbound.send(UiCommands.unregisterRightClick())
    inbound.close()
    await pipeline.done

    expect(shellIntegration.unregisterRightClick).toHaveBeenCalledTimes(1)
    expect(session.errWriteln).not.toHaveBeenCalled()
  })

  it("rejects an invalid minimum size", () => {
    expect(() =>
      startCommandProcessors(createInbound(), createMockSession(), {
        minimumSize: { width: 0, height: 3 },
      }),
    ).toThrow("minimumSize.width must be a positive integer, received 0")
  })
})
