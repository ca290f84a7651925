import { describe, expect, it } from "vitest"
import type { StyledRow } from "../ansi/style.js"
import { indexed, run } from "../ansi/style.js"
import { DEFAULT_RESOLVED_CONFIG } from "../config/defaults.js"
import type { RepoStatus } from "../diff/model.js"
import { DEFAULT_BINDINGS } from "../services/keyboard/bindings.js"
import { editorWith } from "./lineEditor.js"
import { makeNotice, type Notice } from "./noticeQueue.js"
import {
	expandTabs,
	formatRange,
	lineRow,
	promptRow,
	renderFrame,
	rowWidth,
	showsNotice,
	wrapRow,
} from "./render.js"
import { applyRefresh, initialSessionState, type SessionState } from "./sessionFSM.js"

const config = DEFAULT_RESOLVED_CONFIG

const text = (row: StyledRow): string => row.map((r) => r.text).join("")

const status: RepoStatus = {
	branch: { _tag: "Branch", name: "main", upstream: "origin/main", ahead: 1, behind: 0, upstreamGone: false },
	head: { hash: "abc1234", title: "Fix" },
	unstaged: [{ path: "a.ts", kind: "Modified", binary: false, hunks: [], expanded: false }],
	staged: [],
	clean: false,
}

const loaded = (): SessionState => applyRefresh(initialSessionState({ rows: 8, lookahead: 0 }), status)

const frame = (state: SessionState, rows: number, columns: number, notice?: Notice) =>
	renderFrame({ state, rows, columns, config, bindings: DEFAULT_BINDINGS, ...(notice ? { notice } : {}) })

describe("row helpers", () => {
	it("expands tabs to the next stop", () => {
		expect(expandTabs("a\tb")).toBe(`a${" ".repeat(7)}b`)
		expect(expandTabs("\tx", 1)).toBe(`${" ".repeat(7)}x`)
	})

	it("omits a count of one from ranges", () => {
		expect(formatRange(4, 1)).toBe("4")
		expect(formatRange(4, 0)).toBe("4,0")
	})

	it("wraps across run boundaries", () => {
		const bold = { bold: true }
		expect(wrapRow([run("ab"), run("cd", bold)], 3)).toEqual([[run("ab"), run("c", bold)], [run("d", bold)]])
		expect(wrapRow([run("abcde")], 2).map(text)).toEqual(["ab", "cd", "e"])
	})

	it("marks trailing whitespace on highlighted line kinds", () => {
		expect(lineRow({ kind: "Addition", text: "x  " }, config)).toEqual([
			run("  +x", { fg: config.colors.addition }),
			run("  ", { bg: config.colors.error }),
		])
		expect(lineRow({ kind: "Deletion", text: "y " }, config)).toEqual([run("  -y ", { fg: config.colors.deletion })])
		expect(lineRow({ kind: "NoNewlineMarker", text: " No newline at end of file" }, config)).toEqual([
			run("  \\ No newline at end of file", { dim: true }),
		])
	})

	it("shows the cursor of a prompt inverted", () => {
		expect(promptRow(":git ", editorWith("log"))).toEqual([run(":git "), run("log"), run(" ", { inverse: true })])
		expect(promptRow("!", { ...editorWith("log"), cursor: 1 }).map((r) => [r.text, r.style.inverse])).toEqual([
			["!", false],
			["l", false],
			["o", true],
			["g", false],
		])
	})
})

describe("renderFrame", () => {
	it("shows a placeholder before the first status", () => {
		const rows = frame(initialSessionState({ rows: 4, lookahead: 0 }), 4, 40)
		expect(rows.map(text)).toEqual(["Reading repository status...", "", "", ""])
	})

	it("draws the status tree with the cursor row inverted", () => {
		const rows = frame(loaded(), 8, 60)
		expect(rows).toHaveLength(8)
		expect(rows.map(text)).toEqual([
			" Head:     main [origin/main: ahead 1] abc1234 Fix",
			" ",
			" Unstaged changes (1)",
			` modified   a.ts${" ".repeat(44)}`,
			" ",
			"",
			"",
			"",
		])
		expect(rows[3]?.every((r) => r.style.inverse)).toBe(true)
		expect(rows[2]?.[1]?.style).toMatchObject({ fg: indexed(3), bold: true })
	})

	it("flags marked items in the gutter", () => {
		const state = { ...loaded(), selection: [{ section: "unstaged" as const, path: "a.ts" }] }
		const gutter = frame(state, 8, 60)[3]?.[0]
		expect(gutter?.text).toBe("*")
		expect(gutter?.style.fg).toEqual(config.colors.key)
	})

	it("never exceeds the terminal width", () => {
		const rows = frame(loaded(), 8, 10)
		expect(rows.every((row) => rowWidth(row) <= 10)).toBe(true)
		expect(text(rows[0] ?? [])).toBe(" Head:    ")
	})

	it("returns a single row for a zero-height terminal", () => {
		expect(frame(loaded(), 0, 20)).toHaveLength(1)
	})

	it("tints error notices", () => {
		const notice = makeNotice("error", "bad")
		const rows = frame(loaded(), 8, 60, notice)
		expect(rows[7]).toEqual([run("bad", { fg: config.colors.error })])
	})

	it("caps a long notice at half the screen", () => {
		const rows = frame(loaded(), 6, 60, makeNotice("note", "1\n2\n3\n4\n5"))
		expect(rows.slice(3).map(text)).toEqual(["1", "2", "... 3 more lines"])
	})

	it("puts menus above the minibuffer", () => {
		const state: SessionState = { ...loaded(), mode: { _tag: "CommitMenu" } }
		const rows = frame(state, 8, 60)
		expect(rows.slice(5).map(text)).toEqual(["Commit", "c commit   a amend   e extend", ""])
	})

	it("shows the confirmation question", () => {
		const state: SessionState = {
			...loaded(),
			mode: { _tag: "ConfirmDestructive", prompt: "Discard changes? (y/n)", requests: [] },
		}
		expect(text(frame(state, 8, 60)[7] ?? [])).toBe("Discard changes? (y/n)")
	})

	it("lists branches with the cursor inverted", () => {
		const state: SessionState = {
			...loaded(),
			mode: {
				_tag: "BranchList",
				branches: [
					{ name: "dev", current: false },
					{ name: "main", current: true, upstream: "origin/main" },
				],
				cursor: 0,
			},
		}
		const rows = frame(state, 5, 30)
		expect(rows.map(text)).toEqual(["Branches", `  dev${" ".repeat(25)}`, "* main  origin/main", "", ""])
		expect(rows[1]?.every((r) => r.style.inverse)).toBe(true)
	})
})

describe("showsNotice", () => {
	it("keeps the minibuffer for prompts", () => {
		expect(showsNotice({ _tag: "Status" })).toBe(true)
		expect(showsNotice({ _tag: "CommitMenu" })).toBe(true)
		expect(showsNotice({ _tag: "SubprocessPrompt", input: editorWith("ls") })).toBe(false)
		expect(showsNotice({ _tag: "ConfirmDestructive", prompt: "Discard changes? (y/n)", requests: [] })).toBe(false)
	})
})
