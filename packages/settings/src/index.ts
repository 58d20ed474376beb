export * from "./errors.js"
export * from "./setting-group.js"
export * from "./settings-registry.js"
export * from "./types.js"
