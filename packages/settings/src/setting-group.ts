import { SettingsRegistrationError } from "./errors.js"
import type {
  FieldBinding,
  SettingGroupDefinition,
  SettingKind,
  SettingRecord,
} from "./types.js"

/**
 * Identity helper that infers the group's value type from its defaults.
 *
 * @example
 * ```typescript
 * const CursorSettings = defineSettingGroup({
 *   id: "cursor",
 *   prefix: "bridge_cursor",
 *   defaults: { animationLength: 0.13, trailSize: 0.7 },
 *   fields: {
 *     animationLength: { schema: z.number().nonnegative() },
 *     trailSize: { schema: z.number().min(0).max(1) },
 *   },
 * })
 * // registers g:bridge_cursor_animation_length and g:bridge_cursor_trail_size
 * ```
 */
export function defineSettingGroup<T extends SettingRecord>(
  definition: SettingGroupDefinition<T>,
): SettingGroupDefinition<T> {
  return definition
}

export function toSnakeCase(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
    .toLowerCase()
}

/**
 * Resolve the remote kind and name of a field.
 */
export function resolveRemoteName(
  groupId: string,
  prefix: string | undefined,
  field: string,
  binding: FieldBinding | undefined,
): { kind: SettingKind; name: string } {
  if (binding === undefined) {
    const base = toSnakeCase(field)
    return { kind: "global", name: prefix ? `${prefix}_${base}` : base }
  }

  if ("global" in binding && "option" in binding) {
    throw new SettingsRegistrationError(
      groupId,
      `field '${field}' binds both a global and an option`,
    )
  }

  if ("global" in binding) {
    return { kind: "global", name: binding.global }
  }
  return { kind: "option", name: binding.option }
}
