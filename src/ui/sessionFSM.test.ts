import { describe, expect, it } from "vitest"
import { plainText } from "../ansi/ansiInterpreter.js"
import type { FileEntry, RepoStatus } from "../diff/model.js"
import { DEFAULT_BINDINGS } from "../services/keyboard/bindings.js"
import type { Notice } from "./noticeQueue.js"
import {
	applyRefresh,
	initialSessionState,
	isMutating,
	type Request,
	type SessionContext,
	type SessionState,
	update,
} from "./sessionFSM.js"

// ============================================================================
// Fixtures
// ============================================================================

const ctx: SessionContext = { bindings: DEFAULT_BINDINGS }

const modified: FileEntry = {
	path: "a.ts",
	kind: "Modified",
	binary: false,
	hunks: [
		{
			oldStart: 1,
			oldCount: 1,
			newStart: 1,
			newCount: 1,
			caption: "",
			lines: [
				{ kind: "Deletion", text: "a" },
				{ kind: "Addition", text: "b" },
			],
			expanded: false,
		},
	],
	expanded: false,
}

const untracked: FileEntry = { path: "b.txt", kind: "Untracked", binary: false, hunks: [], expanded: false }

const repo = (unstaged: ReadonlyArray<FileEntry>, staged: ReadonlyArray<FileEntry> = []): RepoStatus => ({
	branch: { _tag: "Branch", name: "main", ahead: 0, behind: 0, upstreamGone: false },
	unstaged,
	staged,
	clean: unstaged.length === 0 && staged.length === 0,
})

const loaded = (status: RepoStatus = repo([modified, untracked])): SessionState =>
	applyRefresh(initialSessionState({ rows: 24, lookahead: 5 }), status)

const press = (state: SessionState, ...keys: ReadonlyArray<string>) => {
	let current = state
	const requests: Request[] = []
	const notices: Notice[] = []
	for (const key of keys) {
		const transition = update(current, { _tag: "Key", key }, ctx)
		current = transition.state
		requests.push(...transition.requests)
		notices.push(...transition.notices)
	}
	return { state: current, requests, notices }
}

const patchHeader = "diff --git a/a.ts b/a.ts\n--- a/a.ts\n+++ b/a.ts\n"

// ============================================================================
// Tests
// ============================================================================

describe("applyRefresh", () => {
	it("places the cursor on the first item of the first status", () => {
		const state = loaded()
		expect(state.cursor).toEqual({ section: "unstaged", path: "a.ts" })
		expect(state.viewport).toEqual({ offset: 0, height: 23, lookahead: 5 })
	})

	it("drops marks and the cursor for files that went away", () => {
		const marked = press(loaded(), " ").state
		expect(marked.selection).toEqual([{ section: "unstaged", path: "a.ts" }])
		const next = applyRefresh(marked, repo([untracked]))
		expect(next.selection).toEqual([])
		expect(next.cursor).toEqual({ section: "unstaged", path: "b.txt" })
	})
})

describe("status keys", () => {
	it("moves between files", () => {
		expect(press(loaded(), "j").state.cursor).toEqual({ section: "unstaged", path: "b.txt" })
		expect(press(loaded(), "j", "j", "k").state.cursor).toEqual({ section: "unstaged", path: "a.ts" })
	})

	it("ignores unbound keys", () => {
		const state = loaded()
		const result = update(state, { _tag: "Key", key: "F12" }, ctx)
		expect(result.state).toBe(state)
		expect(result.requests).toEqual([])
	})

	it("stages the file under the cursor as a patch", () => {
		expect(press(loaded(), "s").requests).toEqual([
			{ _tag: "ApplyPatch", patch: `${patchHeader}@@ -1 +1 @@\n-a\n+b\n`, target: "index", action: "Stage" },
		])
	})

	it("stages untracked files by path", () => {
		expect(press(loaded(), "j", "s").requests).toEqual([{ _tag: "StagePaths", paths: ["b.txt"] }])
	})

	it("stages a single line after expanding", () => {
		const result = press(loaded(), "tab", "j", "tab", "j", "j", "s")
		expect(result.requests).toEqual([
			{ _tag: "ApplyPatch", patch: `${patchHeader}@@ -1 +1,2 @@\n a\n+b\n`, target: "index", action: "Stage" },
		])
	})

	it("reports an empty unstage as an error notice", () => {
		const result = press(loaded(), "u")
		expect(result.requests).toEqual([])
		expect(result.notices.map((notice) => [notice.kind, plainText(notice.runs)])).toEqual([
			["error", "Nothing to unstage"],
		])
	})

	it("unstages by path on an unborn branch", () => {
		const added: FileEntry = { path: "new.ts", kind: "Added", binary: false, hunks: [], expanded: false }
		const status: RepoStatus = { ...repo([], [added]), branch: { _tag: "Unborn", name: "main" } }
		expect(press(loaded(status), "u").requests).toEqual([{ _tag: "UnstagePaths", paths: ["new.ts"], unborn: true }])
		expect(press(loaded(status), "U").requests).toEqual([{ _tag: "UnstageAll", unborn: true }])
	})

	it("issues simple requests", () => {
		expect(press(loaded(), "S", "r", "F", "b", "q").requests).toEqual([
			{ _tag: "StageAll" },
			{ _tag: "Refresh" },
			{ _tag: "Pull" },
			{ _tag: "LoadBranches" },
			{ _tag: "Quit" },
		])
	})

	it("clears marks with escape", () => {
		const marked = press(loaded(), " ", "j", " ").state
		expect(marked.selection).toHaveLength(2)
		expect(press(marked, "escape").state.selection).toEqual([])
	})
})

describe("discard confirmation", () => {
	const confirming = press(loaded(), " ", "j", " ", "x").state

	it("asks before discarding marked items and keeps the marks while asking", () => {
		expect(confirming.mode).toMatchObject({
			_tag: "ConfirmDestructive",
			prompt: "Discard changes in 2 selected items? (y/n)",
		})
		expect(confirming.selection).toHaveLength(2)
	})

	it("runs the discard on y", () => {
		const result = press(confirming, "y")
		expect(result.state.mode).toEqual({ _tag: "Status" })
		expect(result.state.selection).toEqual([])
		expect(result.requests).toEqual([
			{ _tag: "ApplyPatch", patch: `${patchHeader}@@ -1 +1 @@\n-b\n+a\n`, target: "worktree", action: "Discard" },
			{ _tag: "DiscardPaths", tracked: [], untracked: ["b.txt"] },
		])
	})

	it("cancels on n and ignores other keys", () => {
		expect(press(confirming, "j").state).toBe(confirming)
		const result = press(confirming, "n")
		expect(result.state.mode).toEqual({ _tag: "Status" })
		expect(result.requests).toEqual([])
	})

	it("leaves the marks in place when the discard is declined", () => {
		for (const key of ["n", "N", "escape"]) {
			const result = press(confirming, key)
			expect(result.state.selection).toEqual(confirming.selection)
			expect(result.state.selection).toHaveLength(2)
		}
	})

	it("uses a short prompt for a single item", () => {
		expect(press(loaded(), "x").state.mode).toMatchObject({ prompt: "Discard changes? (y/n)" })
	})
})

describe("menus", () => {
	it("maps menu keys to requests and returns to the status view", () => {
		const commit = press(loaded(), "c", "a")
		expect(commit.requests).toEqual([{ _tag: "Commit", variant: "amend" }])
		expect(commit.state.mode).toEqual({ _tag: "Status" })
		expect(press(loaded(), "p", "f").requests).toEqual([{ _tag: "Push", force: true }])
		expect(press(loaded(), "z", "p").requests).toEqual([{ _tag: "Stash", pop: true }])
	})

	it("closes on escape and ignores unknown keys", () => {
		const menu = press(loaded(), "c").state
		expect(menu.mode).toEqual({ _tag: "CommitMenu" })
		expect(press(menu, "x").state).toBe(menu)
		expect(press(menu, "escape").state.mode).toEqual({ _tag: "Status" })
	})
})

describe("text input", () => {
	it("runs a git command and remembers it", () => {
		const result = press(loaded(), ":", "l", "o", "g", "return")
		expect(result.requests).toEqual([{ _tag: "RunGit", command: "log" }])
		expect(result.state.history.git).toEqual(["log"])
		const recalled = press(result.state, ":", "up").state.mode
		expect(recalled._tag === "MinibufferCommand" && recalled.input.text).toBe("log")
	})

	it("runs a shell command", () => {
		const result = press(loaded(), "!", "l", "s", "return")
		expect(result.requests).toEqual([{ _tag: "RunShell", command: "ls" }])
		expect(result.state.history.shell).toEqual(["ls"])
	})

	it("treats bound keys as text while typing", () => {
		const result = press(loaded(), ":", "q", "s")
		expect(result.requests).toEqual([])
		expect(result.state.mode).toMatchObject({ _tag: "MinibufferCommand", input: { text: "qs" } })
	})

	it("cancels without a request and submits nothing when blank", () => {
		expect(press(loaded(), ":", "x", "C-g").requests).toEqual([])
		const blank = press(loaded(), "!", " ", "return")
		expect(blank.requests).toEqual([])
		expect(blank.state.mode).toEqual({ _tag: "Status" })
	})
})

describe("branch list", () => {
	const branches = [
		{ name: "dev", current: false },
		{ name: "main", current: true, upstream: "origin/main" },
	]
	const listing = update(loaded(), { _tag: "BranchesLoaded", branches }, ctx).state

	it("opens on the current branch", () => {
		expect(listing.mode).toEqual({ _tag: "BranchList", branches, cursor: 1 })
	})

	it("moves within bounds and checks out", () => {
		expect(press(listing, "j").state.mode).toMatchObject({ cursor: 1 })
		const result = press(listing, "k", "return")
		expect(result.requests).toEqual([{ _tag: "Checkout", branch: "dev" }])
		expect(result.state.mode).toEqual({ _tag: "Status" })
	})

	it("creates a branch from the minibuffer", () => {
		const result = press(listing, "n", "f", "i", "x", "return")
		expect(result.requests).toEqual([{ _tag: "CreateBranch", name: "fix" }])
	})

	it("reports a repository without branches", () => {
		const result = update(loaded(), { _tag: "BranchesLoaded", branches: [] }, ctx)
		expect(result.notices.map((notice) => plainText(notice.runs))).toEqual(["No branches yet"])
		expect(result.state.mode).toEqual({ _tag: "Status" })
	})
})

describe("resize", () => {
	it("keeps one row for the minibuffer", () => {
		const result = update(loaded(), { _tag: "Resize", rows: 10 }, ctx)
		expect(result.state.viewport.height).toBe(9)
	})
})

describe("isMutating", () => {
	it("separates reads from writes", () => {
		expect(isMutating({ _tag: "Refresh" })).toBe(false)
		expect(isMutating({ _tag: "LoadBranches" })).toBe(false)
		expect(isMutating({ _tag: "StageAll" })).toBe(true)
		expect(isMutating({ _tag: "RunShell", command: "make" })).toBe(true)
	})
})
