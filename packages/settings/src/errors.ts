/**
 * Error thrown when a setting group cannot be registered.
 */
export class SettingsRegistrationError extends Error {
  constructor(
    public readonly groupId: string,
    reason: string,
  ) {
    super(`Cannot register setting group '${groupId}': ${reason}`)
    this.name = "SettingsRegistrationError"
  }
}
