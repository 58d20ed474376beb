import { getLogger, type Logger } from "@logtape/logtape"
import Emittery from "emittery"
import { SettingsRegistrationError } from "./errors.js"
import { resolveRemoteName } from "./setting-group.js"
import type {
  RemoteChangeResult,
  SettingGroupDefinition,
  SettingHandler,
  SettingKind,
  SettingRecord,
  SettingsEvents,
  SettingsSource,
  SettingValue,
  UpdateResult,
} from "./types.js"

/**
 * Typed access to one registered group's current value.
 */
export type SettingGroup<T extends SettingRecord> = {
  readonly id: string
  get(): Readonly<T>
  /**
   * Replace the whole value. Every field is checked against its schema first.
   *
   * @throws ZodError if a field is invalid
   */
  set(value: T): void
}

type SettingsRegistryParams = {
  logger?: Logger
}

function withField<T, K extends keyof T>(value: T, key: K, fieldValue: T[K]): T {
  const next = { ...value }
  next[key] = fieldValue
  return next
}

/**
 * SettingsRegistry - Maps remote setting names to typed getter/setter pairs
 *
 * Groups are registered explicitly at startup. Each field of a group becomes
 * a handler keyed by its remote name; remote updates are validated with the
 * field's schema before they replace the group's value.
 *
 * @example
 * ```typescript
 * const registry = new SettingsRegistry()
 * const cursor = registry.registerGroup(CursorSettings)
 *
 * registry.handleRemoteChange("bridge_cursor_trail_size", 0.5)
 * cursor.get().trailSize // 0.5
 * ```
 */
export class SettingsRegistry {
  readonly events = new Emittery<SettingsEvents>()
  readonly logger: Logger

  readonly #groupIds = new Set<string>()
  readonly #handlers = new Map<string, SettingHandler>()

  constructor({ logger }: SettingsRegistryParams = {}) {
    this.logger = (logger ?? getLogger(["editor-bridge"])).getChild("settings")
  }

  registerGroup<T extends SettingRecord>(
    definition: SettingGroupDefinition<T>,
  ): SettingGroup<T> {
    const { id, prefix, fields } = definition

    if (this.#groupIds.has(id)) {
      throw new SettingsRegistrationError(id, "a group with this id exists")
    }

    let current: Readonly<T> = Object.freeze({ ...definition.defaults })
    const handlers: SettingHandler[] = []

    for (const field in fields) {
      const { schema, binding } = fields[field]
      const { kind, name } = resolveRemoteName(id, prefix, field, binding)

      if (name.length === 0) {
        throw new SettingsRegistrationError(id, `field '${field}' has an empty name`)
      }
      if (
        this.#handlers.has(name) ||
        handlers.some(handler => handler.name === name)
      ) {
        throw new SettingsRegistrationError(
          id,
          `remote name '${name}' is already registered`,
        )
      }

      handlers.push({
        groupId: id,
        field,
        kind,
        name,
        read: () => current[field],
        update: (value: unknown): UpdateResult => {
          const parsed = schema.safeParse(value)
          if (!parsed.success) {
            return { status: "invalid", error: parsed.error }
          }
          current = Object.freeze(withField(current, field, parsed.data))
          return { status: "applied", value: current[field] }
        },
      })
    }

    this.#groupIds.add(id)
    for (const handler of handlers) {
      this.#handlers.set(handler.name, handler)
    }

    this.logger.debug("registered setting group {id} with {count} settings", {
      id,
      count: handlers.length,
    })

    return {
      id,
      get: () => current,
      set: value => {
        let next: T = { ...value }
        for (const field in fields) {
          next = withField(next, field, fields[field].schema.parse(value[field]))
        }
        current = Object.freeze(next)
      },
    }
  }

  /**
   * Apply a value received from the remote session.
   *
   * An invalid value is logged and ignored; the setting keeps its value.
   */
  handleRemoteChange(name: string, value: unknown): RemoteChangeResult {
    const handler = this.#handlers.get(name)
    if (!handler) {
      this.logger.trace("ignoring change to unregistered setting {name}", {
        name,
      })
      return "unknown"
    }

    const result = handler.update(value)
    if (result.status === "invalid") {
      this.logger.warn("invalid value for setting {name}: {issues}", {
        name,
        issues: result.error.issues.map(issue => issue.message),
      })
      return "invalid"
    }

    void this.events.emit("changed", {
      groupId: handler.groupId,
      name,
      value: result.value,
    })
    return "applied"
  }

  readRemoteValue(name: string): SettingValue | undefined {
    return this.#handlers.get(name)?.read()
  }

  handler(name: string): SettingHandler | undefined {
    return this.#handlers.get(name)
  }

  names(kind?: SettingKind): string[] {
    const names: string[] = []
    for (const handler of this.#handlers.values()) {
      if (kind === undefined || handler.kind === kind) {
        names.push(handler.name)
      }
    }
    return names
  }

  /**
   * Read every registered setting from the remote side and apply it.
   *
   * @returns the number of settings applied
   */
  async loadInitialValues(source: SettingsSource): Promise<number> {
    let applied = 0

    for (const handler of this.#handlers.values()) {
      let value: unknown
      try {
        value =
          handler.kind === "global"
            ? await source.getVar(handler.name)
            : await source.getOption(handler.name)
      } catch (error) {
        this.logger.debug("keeping default for {name}: {error}", {
          name: handler.name,
          error,
        })
        continue
      }

      if (this.handleRemoteChange(handler.name, value) === "applied") {
        applied++
      }
    }

    return applied
  }
}
