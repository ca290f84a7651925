import { describe, expect, it } from "vitest"
import { normalizeKey } from "./keys.js"

describe("normalizeKey", () => {
	it("passes printable characters through", () => {
		expect(normalizeKey("j", { name: "j" })).toBe("j")
		expect(normalizeKey("G", { name: "g", shift: true })).toBe("G")
		expect(normalizeKey(" ", { name: "space" })).toBe(" ")
		expect(normalizeKey(":", undefined)).toBe(":")
	})

	it("names special keys", () => {
		expect(normalizeKey("\r", { name: "enter" })).toBe("return")
		expect(normalizeKey("\r", { name: "return" })).toBe("return")
		expect(normalizeKey("\x1b", { name: "escape" })).toBe("escape")
		expect(normalizeKey(undefined, { name: "down" })).toBe("down")
		expect(normalizeKey(undefined, { name: "tab", shift: true })).toBe("S-tab")
	})

	it("prefixes modifiers", () => {
		expect(normalizeKey(undefined, { name: "c", ctrl: true })).toBe("C-c")
		expect(normalizeKey(undefined, { name: "f", meta: true })).toBe("M-f")
		expect(normalizeKey(undefined, { name: "left", meta: true })).toBe("M-left")
	})

	it("drops unknown control input", () => {
		expect(normalizeKey("\x01", undefined)).toBeUndefined()
		expect(normalizeKey(undefined, { name: "undefined" })).toBeUndefined()
	})
})
