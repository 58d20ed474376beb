export * from "./cancellation.js"
export * from "./channel/unbounded-channel.js"
export * from "./delivery-class.js"
export * from "./dispatch/coalescing-dispatcher.js"
export * from "./dispatch/receive-next.js"
export * from "./dispatch/router.js"
export * from "./dispatch/sequential-dispatcher.js"
export * from "./editor-session.js"
export * from "./errors.js"
export * from "./events.js"
export {
  type CommandHandler,
  CommandExecutor,
  type ExecutionContext,
  type ExecutionOutcome,
  FAILURE_POLICIES,
  type FailurePolicy,
} from "./executor/command-executor.js"
export {
  focusAutocommand,
  RIGHT_CLICK_MESSAGES,
  runCommandHandler,
} from "./executor/command-handlers/index.js"
export * from "./options.js"
export * from "./pipeline.js"
export * from "./types.js"
export * from "./ui-command.js"
