import type { z } from "zod"

/**
 * A value as it travels over the remote session: plain data only.
 */
export type SettingValue =
  | string
  | number
  | boolean
  | null
  | readonly SettingValue[]
  | { readonly [key: string]: SettingValue }

export type SettingRecord = Record<string, SettingValue>

/**
 * Where a setting lives on the remote side: a global variable (`g:name`) or
 * an editor option (`&name`).
 */
export type SettingKind = "global" | "option"

/**
 * Overrides the default remote name of a field. Without one a field is a
 * global variable named `<prefix>_<field_in_snake_case>`.
 */
export type FieldBinding = { global: string } | { option: string }

export type SettingField<V> = {
  schema: z.ZodType<V>
  binding?: FieldBinding
}

export type SettingGroupDefinition<T extends SettingRecord> = {
  id: string
  prefix?: string
  defaults: T
  fields: { [K in keyof T]: SettingField<T[K]> }
}

/**
 * Getter/setter pair registered for one remote name.
 */
export type SettingHandler = {
  readonly groupId: string
  readonly field: string
  readonly kind: SettingKind
  readonly name: string
  read(): SettingValue
  update(value: unknown): UpdateResult
}

export type UpdateResult =
  | { status: "applied"; value: SettingValue }
  | { status: "invalid"; error: z.ZodError }

export type RemoteChangeResult = "applied" | "invalid" | "unknown"

/**
 * Reads the initial remote values. A rejected read means the remote side has
 * no such variable or option.
 */
export interface SettingsSource {
  getVar(name: string): Promise<unknown>
  getOption(name: string): Promise<unknown>
}

export type SettingsEvents = {
  changed: {
    groupId: string
    name: string
    value: SettingValue
  }
}
