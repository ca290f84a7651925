import { describe, expect, it } from "vitest"
import type { FileEntry, Hunk, RepoStatus } from "../diff/model.js"
import {
	buildRows,
	carryExpansion,
	makeViewport,
	moveCursor,
	reconcileCursor,
	rowIndexOf,
	scrollTo,
	targetOf,
	toggleExpansion,
} from "./statusTree.js"

const hunk = (oldStart: number, text: string, expanded = true): Hunk => ({
	oldStart,
	oldCount: 1,
	newStart: oldStart,
	newCount: 2,
	caption: "",
	lines: [
		{ kind: "Context", text },
		{ kind: "Addition", text: `${text}+` },
		{ kind: "NoNewlineMarker", text: " No newline at end of file" },
	],
	expanded,
})

const entry = (path: string, extra: Partial<FileEntry> = {}): FileEntry => ({
	path,
	kind: "Modified",
	binary: false,
	hunks: [],
	expanded: false,
	...extra,
})

const repo = (unstaged: ReadonlyArray<FileEntry>, staged: ReadonlyArray<FileEntry>): RepoStatus => ({
	branch: { _tag: "Branch", name: "main", ahead: 0, behind: 0, upstreamGone: false },
	unstaged,
	staged,
	clean: unstaged.length === 0 && staged.length === 0,
})

const status = repo(
	[entry("a.ts", { hunks: [hunk(1, "one")], expanded: true }), entry("b.txt", { kind: "Untracked" })],
	[entry("c.ts", { hunks: [hunk(4, "four")] })],
)

const rows = buildRows(status)

describe("buildRows", () => {
	it("lists sections, files, hunks and lines in order", () => {
		expect(rows.map((row) => row._tag)).toEqual([
			"Head",
			"Blank",
			"Section",
			"File",
			"Hunk",
			"Line",
			"Line",
			"Line",
			"File",
			"Blank",
			"Section",
			"File",
			"Blank",
		])
		expect(rows[10]).toEqual({ _tag: "Section", section: "staged", count: 1 })
	})

	it("shows a clean tree as a single row", () => {
		expect(buildRows(repo([], [])).map((row) => row._tag)).toEqual(["Head", "Blank", "Clean"])
	})

	it("adds a note under an expanded file without hunks", () => {
		const expanded = buildRows(repo([entry("b.txt", { kind: "Untracked", expanded: true })], []))
		expect(expanded.map((row) => row._tag)).toEqual(["Head", "Blank", "Section", "File", "Note", "Blank"])
	})
})

describe("targetOf", () => {
	it("skips structural rows and no-newline markers", () => {
		expect(rows.map(targetOf).filter((target) => target !== undefined)).toEqual([
			{ section: "unstaged", path: "a.ts" },
			{ section: "unstaged", path: "a.ts", hunk: 0 },
			{ section: "unstaged", path: "a.ts", hunk: 0, line: 0 },
			{ section: "unstaged", path: "a.ts", hunk: 0, line: 1 },
			{ section: "unstaged", path: "b.txt" },
			{ section: "staged", path: "c.ts" },
		])
	})
})

describe("moveCursor", () => {
	it("starts from the first item without a cursor", () => {
		expect(moveCursor(rows, undefined, { _tag: "By", delta: 1 })).toEqual({ section: "unstaged", path: "a.ts" })
	})

	it("steps over markers and section rows", () => {
		const line = { section: "unstaged" as const, path: "a.ts", hunk: 0, line: 1 }
		expect(moveCursor(rows, line, { _tag: "By", delta: 1 })).toEqual({ section: "unstaged", path: "b.txt" })
		expect(moveCursor(rows, { section: "unstaged", path: "b.txt" }, { _tag: "By", delta: 1 })).toEqual({
			section: "staged",
			path: "c.ts",
		})
	})

	it("clamps at both ends", () => {
		const last = moveCursor(rows, undefined, { _tag: "Last" })
		expect(last).toEqual({ section: "staged", path: "c.ts" })
		expect(moveCursor(rows, last, { _tag: "By", delta: 5 })).toEqual(last)
		expect(moveCursor(rows, last, { _tag: "By", delta: -10 })).toEqual({ section: "unstaged", path: "a.ts" })
	})

	it("returns nothing when no row is focusable", () => {
		expect(moveCursor(buildRows(repo([], [])), undefined, { _tag: "First" })).toBeUndefined()
	})
})

describe("scrollTo", () => {
	it("keeps the lookahead margin below the cursor", () => {
		expect(scrollTo(makeViewport(5, 1), 6, 13)).toEqual({ offset: 3, height: 5, lookahead: 1 })
	})

	it("scrolls back up and clamps to the content", () => {
		const scrolled = { offset: 3, height: 5, lookahead: 1 }
		expect(scrollTo(scrolled, 0, 13).offset).toBe(0)
		expect(scrollTo({ ...scrolled, offset: 20 }, 12, 13).offset).toBe(8)
	})

	it("returns the same viewport when nothing moves", () => {
		const viewport = makeViewport(10, 2)
		expect(scrollTo(viewport, 3, 13)).toBe(viewport)
	})
})

describe("toggleExpansion", () => {
	it("expands a collapsed file", () => {
		const result = toggleExpansion(status, { section: "staged", path: "c.ts" })
		expect(result.status.staged[0]?.expanded).toBe(true)
		expect(result.cursor).toEqual({ section: "staged", path: "c.ts" })
	})

	it("folds the hunk and moves up from a line", () => {
		const result = toggleExpansion(status, { section: "unstaged", path: "a.ts", hunk: 0, line: 1 })
		expect(result.status.unstaged[0]?.hunks[0]?.expanded).toBe(false)
		expect(result.cursor).toEqual({ section: "unstaged", path: "a.ts", hunk: 0 })
		expect(rowIndexOf(buildRows(result.status), result.cursor)).toBe(4)
	})
})

describe("refresh", () => {
	const fresh = repo(
		[entry("a.ts", { hunks: [hunk(1, "zero", false), hunk(9, "one", false)] })],
		[entry("c.ts", { hunks: [hunk(4, "four", false)] })],
	)

	it("carries expansion onto matching files and hunks", () => {
		const carried = carryExpansion(status, fresh)
		expect(carried.unstaged[0]?.expanded).toBe(true)
		expect(carried.unstaged[0]?.hunks.map((h) => h.expanded)).toEqual([false, true])
		expect(carried.staged[0]?.hunks[0]?.expanded).toBe(true)
	})

	it("follows a hunk that moved", () => {
		const next = carryExpansion(status, fresh)
		expect(reconcileCursor(status, next, { section: "unstaged", path: "a.ts", hunk: 0, line: 1 })).toEqual({
			section: "unstaged",
			path: "a.ts",
			hunk: 1,
			line: 1,
		})
	})

	it("falls back to the file when hunks are folded", () => {
		expect(reconcileCursor(status, fresh, { section: "unstaged", path: "a.ts", hunk: 0 })).toEqual({
			section: "unstaged",
			path: "a.ts",
		})
	})

	it("goes to the first item when the file vanished", () => {
		expect(reconcileCursor(status, fresh, { section: "unstaged", path: "b.txt" })).toEqual({
			section: "unstaged",
			path: "a.ts",
		})
	})
})
