import { describe, expect, it } from "vitest"
import { applySgr, createAnsiInterpreter, interpretAnsi, plainText, splitRunsIntoRows } from "./ansiInterpreter.js"
import { DEFAULT_STYLE, indexed, rgb, run } from "./style.js"

const nonEmpty = <A extends { readonly text: string }>(runs: ReadonlyArray<A>) => runs.filter((r) => r.text !== "")

describe("interpretAnsi", () => {
	it("splits text into runs at SGR sequences", () => {
		expect(interpretAnsi("plain \x1b[31mred\x1b[0m back")).toEqual([
			run("plain "),
			run("red", { fg: indexed(1) }),
			run(" back"),
		])
	})

	it("opens a run at every SGR sequence, even an empty one", () => {
		expect(interpretAnsi("\x1b[31mred\x1b[0mplain\x1b[5Amore")).toEqual([
			run(""),
			run("red", { fg: indexed(1) }),
			run("plainmore"),
		])
	})

	it("drops cursor and erase sequences without closing a run", () => {
		expect(interpretAnsi("a\x1b[2Kb\x1b[1;1Hc")).toEqual([run("abc")])
	})

	it("drops OSC strings ended by BEL or ST", () => {
		expect(plainText(interpretAnsi("\x1b]0;title\x07one "))).toBe("one ")
		expect(plainText(interpretAnsi("\x1b]8;;https://example.test\x1b\\link\x1b]8;;\x1b\\"))).toBe("link")
	})

	it("ignores private-mode sequences even when they end in m", () => {
		expect(interpretAnsi("\x1b[?25lx\x1b[>4my")).toEqual([run("xy")])
	})

	it("keeps newlines and tabs but drops other controls", () => {
		expect(plainText(interpretAnsi("a\rb\x07c\td\n"))).toBe("abc\td\n")
	})

	it("handles sequences split across chunks", () => {
		const interpreter = createAnsiInterpreter()
		const runs = [...interpreter.feed("\x1b[3"), ...interpreter.feed("2mgreen"), ...interpreter.end()]
		expect(nonEmpty(runs)).toEqual([run("green", { fg: indexed(2) })])
	})

	it("decodes UTF-8 split across byte chunks", () => {
		const interpreter = createAnsiInterpreter()
		const runs = [
			...interpreter.feed(new Uint8Array([0x61, 0xc3])),
			...interpreter.feed(new Uint8Array([0xa9])),
			...interpreter.end(),
		]
		expect(plainText(runs)).toBe("aé")
	})

	it("replaces malformed bytes", () => {
		expect(plainText(interpretAnsi(new Uint8Array([0x61, 0xff, 0x62])))).toBe("a�b")
	})
})

describe("applySgr", () => {
	it("resets on an empty parameter list", () => {
		expect(applySgr({ ...DEFAULT_STYLE, bold: true }, "")).toEqual(DEFAULT_STYLE)
	})

	it("applies attributes and clears them", () => {
		const bold = applySgr(DEFAULT_STYLE, "1;4;31")
		expect(bold).toEqual({ ...DEFAULT_STYLE, bold: true, underline: true, fg: indexed(1) })
		expect(applySgr(bold, "22;24;39")).toEqual(DEFAULT_STYLE)
	})

	it("maps bright colors above the base eight", () => {
		expect(applySgr(DEFAULT_STYLE, "92;104")).toEqual({ ...DEFAULT_STYLE, fg: indexed(10), bg: indexed(12) })
	})

	it("reads 256-color and truecolor forms", () => {
		expect(applySgr(DEFAULT_STYLE, "38;5;208").fg).toEqual(indexed(208))
		expect(applySgr(DEFAULT_STYLE, "48;2;10;20;30").bg).toEqual(rgb(10, 20, 30))
		expect(applySgr(DEFAULT_STYLE, "38:2::1:2:3").fg).toEqual(rgb(1, 2, 3))
		expect(applySgr(DEFAULT_STYLE, "38:5:17").fg).toEqual(indexed(17))
	})

	it("keeps reading codes after an extended color", () => {
		expect(applySgr(DEFAULT_STYLE, "38;5;1;1")).toEqual({ ...DEFAULT_STYLE, fg: indexed(1), bold: true })
	})
})

describe("splitRunsIntoRows", () => {
	it("breaks runs at newlines and drops the trailing empty row", () => {
		const red = { fg: indexed(1) }
		expect(splitRunsIntoRows([run("one\ntw", red), run("o\n")])).toEqual([
			[run("one", red)],
			[run("tw", red), run("o")],
		])
	})

	it("keeps blank rows in the middle", () => {
		expect(splitRunsIntoRows([run("a\n\nb")])).toEqual([[run("a")], [], [run("b")]])
	})
})
