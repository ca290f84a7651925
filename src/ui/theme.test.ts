import { describe, expect, it } from "vitest"
import { DEFAULT_COLOR, indexed, rgb, run } from "../ansi/style.js"
import { colorName, escapeTags, rowToTags, runToTags } from "./theme.js"

describe("colorName", () => {
	it("names the sixteen base colors", () => {
		expect(colorName(indexed(1))).toBe("red")
		expect(colorName(indexed(9))).toBe("light-red")
		expect(colorName(indexed(15))).toBe("light-white")
	})

	it("writes other colors as hex", () => {
		expect(colorName(indexed(208))).toBe("#ff8700")
		expect(colorName(indexed(244))).toBe("#808080")
		expect(colorName(rgb(1, 2, 3))).toBe("#010203")
	})

	it("leaves the default color unset", () => {
		expect(colorName(DEFAULT_COLOR)).toBeUndefined()
	})
})

describe("tags", () => {
	it("escapes braces in text", () => {
		expect(escapeTags("fn() {}")).toBe("fn() {open}{close}")
	})

	it("wraps styled runs and leaves plain ones bare", () => {
		expect(runToTags(run("hi", { fg: indexed(2), bold: true }))).toBe("{green-fg}{bold}hi{/}")
		expect(runToTags(run("x", { bg: rgb(1, 2, 3), inverse: true }))).toBe("{#010203-bg}{inverse}x{/}")
		expect(runToTags(run("plain"))).toBe("plain")
	})

	it("greys out dim text without a color", () => {
		expect(runToTags(run("d", { dim: true }))).toBe("{light-black-fg}d{/}")
	})

	it("joins a row", () => {
		expect(rowToTags([run("a"), run("{b}", { underline: true })])).toBe("a{underline}{open}b{close}{/}")
	})
})
