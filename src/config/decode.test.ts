import { describe, expect, it } from "vitest"
import { indexed, parseColor, rgb } from "../ansi/style.js"
import { decodeConfig } from "./decode.js"
import { mergeWithDefaults, parseWsErrorHighlight } from "./defaults.js"

describe("decodeConfig", () => {
	it("accepts a complete config without warnings", () => {
		const raw = {
			options: { autoExpandFiles: true, lookahead: 2, wsErrorHighlight: "old,new", shell: "bash" },
			colors: { heading: "bright-yellow", addition: "#00ff00" },
			keymap: { stage: ["s", "a"], quit: "Q" },
		}
		expect(decodeConfig(raw)).toEqual({ config: raw, warnings: [] })
	})

	it("drops unknown keys and keeps the rest", () => {
		const { config, warnings } = decodeConfig({ options: { lookhead: 3, truncateLines: false } })
		expect(config).toEqual({ options: { truncateLines: false } })
		expect(warnings.map((w) => [w.path, w.message])).toEqual([
			["options.lookhead", 'Unknown config key "options.lookhead"'],
		])
	})

	it("drops invalid values with the reason", () => {
		const { config, warnings } = decodeConfig({
			options: { lookahead: -1, autoExpandHunks: true },
			colors: { heading: "chartreuse-ish", key: "cyan" },
		})
		expect(config).toEqual({ options: { autoExpandHunks: true }, colors: { key: "cyan" } })
		expect(warnings.map((w) => w.path)).toEqual(["options.lookahead", "colors.heading"])
		expect(warnings[1]?.message).toBe(
			'Invalid value for "colors.heading": expected a color name, a number 0-255 or #rrggbb',
		)
	})

	it("falls back to defaults for a non-object", () => {
		const { config, warnings } = decodeConfig(42)
		expect(config).toEqual({})
		expect(warnings.map((w) => w.message)).toEqual(["Config must be a JSON object; using defaults"])
	})
})

describe("mergeWithDefaults", () => {
	it("fills every option", () => {
		const resolved = mergeWithDefaults({ options: { shell: "zsh" } })
		expect(resolved.options).toEqual({
			autoExpandFiles: false,
			autoExpandHunks: false,
			lookahead: 5,
			truncateLines: true,
			wsErrorHighlight: new Set(["new"]),
			sortBranches: "refname",
			shell: "zsh",
		})
		expect(resolved.colors.heading).toEqual(indexed(3))
		expect(resolved.keymap).toEqual({})
	})

	it("applies colors and keymap overrides", () => {
		const resolved = mergeWithDefaults({
			colors: { heading: "#ff0000" },
			keymap: { stage: "a", quit: ["Q", "C-q"] },
		})
		expect(resolved.colors.heading).toEqual(rgb(255, 0, 0))
		expect(resolved.keymap).toEqual({ stage: ["a"], quit: ["Q", "C-q"] })
	})
})

describe("parseWsErrorHighlight", () => {
	it("reads git's list syntax", () => {
		expect(parseWsErrorHighlight("all")).toEqual(new Set(["context", "old", "new"]))
		expect(parseWsErrorHighlight("old, none, new")).toEqual(new Set(["new"]))
		expect(parseWsErrorHighlight("none")).toEqual(new Set())
	})
})

describe("parseColor", () => {
	it("reads names, indexes and hex", () => {
		expect(parseColor("bright-red")).toEqual(indexed(9))
		expect(parseColor("Grey")).toEqual(indexed(8))
		expect(parseColor("208")).toEqual(indexed(208))
		expect(parseColor("#0A0b0c")).toEqual(rgb(10, 11, 12))
		expect(parseColor("default")).toEqual({ _tag: "Default" })
	})

	it("rejects anything else", () => {
		expect(parseColor("300")).toBeUndefined()
		expect(parseColor("purple")).toBeUndefined()
	})
})
