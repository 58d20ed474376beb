import { describe, expect, it, vi } from "vitest"
import { z } from "zod"
import { SettingsRegistrationError } from "./errors.js"
import { defineSettingGroup } from "./setting-group.js"
import { SettingsRegistry } from "./settings-registry.js"
import type { SettingsSource } from "./types.js"

type CursorSettings = {
  animationLength: number
  trailSize: number
  vfxMode: string
}

const CursorSettings = defineSettingGroup<CursorSettings>({
  id: "cursor",
  prefix: "bridge_cursor",
  defaults: { animationLength: 0.13, trailSize: 0.7, vfxMode: "" },
  fields: {
    animationLength: { schema: z.number().nonnegative() },
    trailSize: { schema: z.number().min(0).max(1) },
    vfxMode: { schema: z.string() },
  },
})

type WindowSettings = {
  fullscreen: boolean
  font: string
}

const WindowSettings = defineSettingGroup<WindowSettings>({
  id: "window",
  prefix: "bridge",
  defaults: { fullscreen: false, font: "monospace:h12" },
  fields: {
    fullscreen: { schema: z.boolean() },
    font: { schema: z.string().min(1), binding: { option: "guifont" } },
  },
})

function createSource(
  vars: Record<string, unknown>,
  options: Record<string, unknown> = {},
): SettingsSource {
  const lookup = (table: Record<string, unknown>, name: string) =>
    name in table
      ? Promise.resolve(table[name])
      : Promise.reject(new Error(`E121: Undefined variable: ${name}`))
  return {
    getVar: vi.fn((name: string) => lookup(vars, name)),
    getOption: vi.fn((name: string) => lookup(options, name)),
  }
}

describe("SettingsRegistry", () => {
  describe("registerGroup", () => {
    it("starts from the group defaults", () => {
      const registry = new SettingsRegistry()

      const cursor = registry.registerGroup(CursorSettings)

      expect(cursor.get()).toEqual({
        animationLength: 0.13,
        trailSize: 0.7,
        vfxMode: "",
      })
      expect(Object.isFrozen(cursor.get())).toBe(true)
    })

    it("registers a handler per field under its remote name", () => {
      const registry = new SettingsRegistry()

      registry.registerGroup(CursorSettings)
      registry.registerGroup(WindowSettings)

      expect(registry.names()).toEqual([
        "bridge_cursor_animation_length",
        "bridge_cursor_trail_size",
        "bridge_cursor_vfx_mode",
        "bridge_fullscreen",
        "guifont",
      ])
      expect(registry.names("option")).toEqual(["guifont"])
      expect(registry.handler("guifont")?.field).toBe("font")
    })

    it("rejects a second group with the same id", () => {
      const registry = new SettingsRegistry()
      registry.registerGroup(CursorSettings)

      expect(() => registry.registerGroup(CursorSettings)).toThrow(
        SettingsRegistrationError,
      )
    })

    it("rejects a remote name used by another group", () => {
      const registry = new SettingsRegistry()
      registry.registerGroup(WindowSettings)
      const clash = defineSettingGroup<{ font: string }>({
        id: "font",
        defaults: { font: "Iosevka" },
        fields: { font: { schema: z.string(), binding: { option: "guifont" } } },
      })

      expect(() => registry.registerGroup(clash)).toThrow(
        "Cannot register setting group 'font': remote name 'guifont' is already registered",
      )
      expect(registry.names()).toEqual(["bridge_fullscreen", "guifont"])
    })
  })

  describe("handleRemoteChange", () => {
    it("applies a valid value", () => {
      const registry = new SettingsRegistry()
      const cursor = registry.registerGroup(CursorSettings)

      const result = registry.handleRemoteChange("bridge_cursor_trail_size", 0.5)

      expect(result).toBe("applied")
      expect(cursor.get().trailSize).toBe(0.5)
      expect(registry.readRemoteValue("bridge_cursor_trail_size")).toBe(0.5)
    })

    it("keeps the current value when the remote value is invalid", () => {
      const registry = new SettingsRegistry()
      const cursor = registry.registerGroup(CursorSettings)

      const result = registry.handleRemoteChange("bridge_cursor_trail_size", 3)

      expect(result).toBe("invalid")
      expect(cursor.get().trailSize).toBe(0.7)
    })

    it("reports unknown names", () => {
      const registry = new SettingsRegistry()

      expect(registry.handleRemoteChange("bridge_nope", 1)).toBe("unknown")
      expect(registry.readRemoteValue("bridge_nope")).toBeUndefined()
    })

    it("emits changed after an update", async () => {
      const registry = new SettingsRegistry()
      registry.registerGroup(WindowSettings)
      const onChanged = vi.fn()
      registry.events.on("changed", onChanged)

      registry.handleRemoteChange("guifont", "Iosevka:h14")

      await vi.waitFor(() =>
        expect(onChanged).toHaveBeenCalledWith({
          groupId: "window",
          name: "guifont",
          value: "Iosevka:h14",
        }),
      )
    })

    it("leaves other fields of the group untouched", () => {
      const registry = new SettingsRegistry()
      const window = registry.registerGroup(WindowSettings)

      registry.handleRemoteChange("bridge_fullscreen", true)

      expect(window.get()).toEqual({ fullscreen: true, font: "monospace:h12" })
    })
  })

  describe("set", () => {
    it("replaces the whole value", () => {
      const registry = new SettingsRegistry()
      const window = registry.registerGroup(WindowSettings)

      window.set({ fullscreen: true, font: "Hack:h10" })

      expect(registry.readRemoteValue("guifont")).toBe("Hack:h10")
      expect(Object.isFrozen(window.get())).toBe(true)
    })

    it("validates every field", () => {
      const registry = new SettingsRegistry()
      const window = registry.registerGroup(WindowSettings)

      expect(() => window.set({ fullscreen: false, font: "" })).toThrow(z.ZodError)
      expect(window.get().font).toBe("monospace:h12")
    })
  })

  describe("loadInitialValues", () => {
    it("reads globals and options from the source", async () => {
      const registry = new SettingsRegistry()
      const window = registry.registerGroup(WindowSettings)
      const source = createSource({ bridge_fullscreen: true }, { guifont: "Hack:h9" })

      const applied = await registry.loadInitialValues(source)

      expect(applied).toBe(2)
      expect(source.getVar).toHaveBeenCalledWith("bridge_fullscreen")
      expect(source.getOption).toHaveBeenCalledWith("guifont")
      expect(window.get()).toEqual({ fullscreen: true, font: "Hack:h9" })
    })

    it("keeps defaults for variables the remote side lacks", async () => {
      const registry = new SettingsRegistry()
      const cursor = registry.registerGroup(CursorSettings)
      const source = createSource({ bridge_cursor_vfx_mode: "railgun" })

      const applied = await registry.loadInitialValues(source)

      expect(applied).toBe(1)
      expect(cursor.get()).toEqual({
        animationLength: 0.13,
        trailSize: 0.7,
        vfxMode: "railgun",
      })
    })

    it("does not count invalid remote values", async () => {
      const registry = new SettingsRegistry()
      registry.registerGroup(CursorSettings)
      const source = createSource({ bridge_cursor_animation_length: -1 })

      expect(await registry.loadInitialValues(source)).toBe(0)
    })
  })
})
