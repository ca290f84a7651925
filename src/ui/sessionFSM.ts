/**
 * Session State Machine
 *
 * Pure reducer for the interactive session. Each event yields the next
 * state, the requests the runtime must carry out (git commands, refreshes,
 * quitting) and notices to queue. Nothing here performs I/O.
 *
 * Modes:
 * - Status: the status tree (default)
 * - BranchList: pick a branch to check out
 * - CommitMenu / PushMenu / StashMenu: one-key menus
 * - MinibufferCommand: git command or new branch name input
 * - SubprocessPrompt: shell command input
 * - ConfirmDestructive: y/n before a discard
 */

import { Either } from "effect"
import type { CommitVariant } from "../core/GitService.js"
import type { Branch, RepoStatus } from "../diff/model.js"
import type { PatchAction, PatchPlan, PatchTarget } from "../diff/patchSynthesis.js"
import { synthesizePatch } from "../diff/patchSynthesis.js"
import type { Selection } from "../diff/selection.js"
import { refForTarget, remapSelection, toggleMark } from "../diff/selection.js"
import { findAction } from "../services/keyboard/bindings.js"
import type { ActionName, KeyMode, Keybinding } from "../services/keyboard/types.js"
import type { LineEditorState } from "./lineEditor.js"
import { emptyEditor, handleEditorKey, pushHistory } from "./lineEditor.js"
import type { Notice } from "./noticeQueue.js"
import { makeNotice } from "./noticeQueue.js"
import type { Cursor, Motion, Viewport } from "./statusTree.js"
import {
	buildRows,
	carryExpansion,
	makeViewport,
	moveCursor,
	reconcileCursor,
	rowIndexOf,
	scrollTo,
	toggleExpansion,
} from "./statusTree.js"

// ============================================================================
// Types
// ============================================================================

export type Request =
	| { readonly _tag: "Refresh" }
	| {
			readonly _tag: "ApplyPatch"
			readonly patch: string
			readonly target: PatchTarget
			readonly action: PatchAction
	  }
	| { readonly _tag: "StagePaths"; readonly paths: ReadonlyArray<string> }
	| { readonly _tag: "UnstagePaths"; readonly paths: ReadonlyArray<string>; readonly unborn: boolean }
	| {
			readonly _tag: "DiscardPaths"
			readonly tracked: ReadonlyArray<string>
			readonly untracked: ReadonlyArray<string>
	  }
	| { readonly _tag: "StageAll" }
	| { readonly _tag: "UnstageAll"; readonly unborn: boolean }
	| { readonly _tag: "LoadBranches" }
	| { readonly _tag: "Checkout"; readonly branch: string }
	| { readonly _tag: "CreateBranch"; readonly name: string }
	| { readonly _tag: "Commit"; readonly variant: CommitVariant }
	| { readonly _tag: "Push"; readonly force: boolean }
	| { readonly _tag: "Pull" }
	| { readonly _tag: "Stash"; readonly pop: boolean }
	| { readonly _tag: "RunGit"; readonly command: string }
	| { readonly _tag: "RunShell"; readonly command: string }
	| { readonly _tag: "Quit" }

export type MinibufferPurpose = "git" | "newBranch"

export type Mode =
	| { readonly _tag: "Status" }
	| { readonly _tag: "BranchList"; readonly branches: ReadonlyArray<Branch>; readonly cursor: number }
	| { readonly _tag: "CommitMenu" }
	| { readonly _tag: "PushMenu" }
	| { readonly _tag: "StashMenu" }
	| { readonly _tag: "MinibufferCommand"; readonly purpose: MinibufferPurpose; readonly input: LineEditorState }
	| { readonly _tag: "SubprocessPrompt"; readonly input: LineEditorState }
	| { readonly _tag: "ConfirmDestructive"; readonly prompt: string; readonly requests: ReadonlyArray<Request> }

export interface CommandHistory {
	readonly git: ReadonlyArray<string>
	readonly shell: ReadonlyArray<string>
}

export interface SessionState {
	/** Absent until the first successful refresh */
	readonly status?: RepoStatus
	readonly cursor?: Cursor
	readonly viewport: Viewport
	readonly selection: Selection
	readonly mode: Mode
	readonly history: CommandHistory
}

export type SessionEvent =
	| { readonly _tag: "Key"; readonly key: string }
	| { readonly _tag: "Resize"; readonly rows: number }
	| { readonly _tag: "BranchesLoaded"; readonly branches: ReadonlyArray<Branch> }

export interface SessionContext {
	readonly bindings: ReadonlyArray<Keybinding>
}

export interface Transition {
	readonly state: SessionState
	readonly requests: ReadonlyArray<Request>
	readonly notices: ReadonlyArray<Notice>
}

/**
 * Rows below the tree reserved for the minibuffer
 */
export const RESERVED_ROWS = 1

const STATUS_MODE: Mode = { _tag: "Status" }

const NON_MUTATING: ReadonlySet<Request["_tag"]> = new Set(["Refresh", "LoadBranches", "Quit"])

/**
 * Whether the repository may have changed after the request ran
 */
export const isMutating = (request: Request): boolean => !NON_MUTATING.has(request._tag)

// ============================================================================
// Construction
// ============================================================================

export const initialSessionState = (options: {
	readonly rows: number
	readonly lookahead: number
	readonly history?: CommandHistory
}): SessionState => ({
	viewport: makeViewport(options.rows - RESERVED_ROWS, options.lookahead),
	selection: [],
	mode: STATUS_MODE,
	history: options.history ?? { git: [], shell: [] },
})

const stay = (state: SessionState): Transition => ({ state, requests: [], notices: [] })

const withRequests = (state: SessionState, ...requests: ReadonlyArray<Request>): Transition => ({
	state,
	requests,
	notices: [],
})

const withNotice = (state: SessionState, kind: Notice["kind"], text: string): Transition => {
	const notice = makeNotice(kind, text)
	return { state, requests: [], notices: notice ? [notice] : [] }
}

/**
 * Keep the cursor on screen after it or the rows moved
 */
const rescroll = (state: SessionState): SessionState => {
	if (!state.status) return state
	const rows = buildRows(state.status)
	return { ...state, viewport: scrollTo(state.viewport, rowIndexOf(rows, state.cursor), rows.length) }
}

// ============================================================================
// Refresh
// ============================================================================

/**
 * Install a freshly parsed status: expansion carries over, the cursor and
 * the selection are re-resolved, anything unresolvable is dropped
 */
export const applyRefresh = (state: SessionState, next: RepoStatus): SessionState => {
	const prev = state.status
	if (!prev) {
		const rows = buildRows(next)
		const cursor = moveCursor(rows, undefined, { _tag: "First" })
		return rescroll({ ...state, status: next, ...(cursor ? { cursor } : {}), selection: [] })
	}
	const status = carryExpansion(prev, next)
	const cursor = reconcileCursor(prev, status, state.cursor)
	const { cursor: _dropped, ...rest } = state
	return rescroll({
		...rest,
		status,
		...(cursor ? { cursor } : {}),
		selection: remapSelection(prev, status, state.selection),
	})
}

// ============================================================================
// Status mode
// ============================================================================

const planRequests = (plan: PatchPlan, unborn: boolean): ReadonlyArray<Request> => {
	const requests: Request[] = []
	if (plan.patch !== undefined) {
		requests.push({ _tag: "ApplyPatch", patch: plan.patch, target: plan.target, action: plan.action })
	}
	if (plan.paths.length > 0) {
		const all = plan.paths.flatMap((p) =>
			p.previousPath !== undefined ? [p.previousPath, p.path] : [p.path],
		)
		if (plan.action === "Stage") requests.push({ _tag: "StagePaths", paths: all })
		else if (plan.action === "Unstage") requests.push({ _tag: "UnstagePaths", paths: all, unborn })
		else {
			requests.push({
				_tag: "DiscardPaths",
				tracked: plan.paths.filter((p) => p.kind !== "Untracked").map((p) => p.path),
				untracked: plan.paths.filter((p) => p.kind === "Untracked").map((p) => p.path),
			})
		}
	}
	return requests
}

const isUnborn = (status: RepoStatus): boolean => status.branch._tag === "Unborn"

const patchAction = (state: SessionState, action: PatchAction): Transition => {
	const { status, cursor } = state
	if (!status) return stay(state)
	const selection: Selection =
		state.selection.length > 0 ? state.selection : cursor ? [refForTarget(cursor)] : []

	const result = synthesizePatch(status, selection, action)
	if (Either.isLeft(result)) return withNotice(state, "error", result.left.message)

	const requests = planRequests(result.right, isUnborn(status))
	if (action !== "Discard") return withRequests({ ...state, selection: [] }, ...requests)

	// marks survive a declined discard
	const count = selection.length
	const prompt =
		count === 1 ? "Discard changes? (y/n)" : `Discard changes in ${count} selected items? (y/n)`
	return stay({ ...state, mode: { _tag: "ConfirmDestructive", prompt, requests } })
}

const motionFor = (action: ActionName, height: number): Motion | undefined => {
	const half = Math.max(1, Math.floor(height / 2))
	switch (action) {
		case "moveDown":
			return { _tag: "By", delta: 1 }
		case "moveUp":
			return { _tag: "By", delta: -1 }
		case "pageDown":
			return { _tag: "By", delta: half }
		case "pageUp":
			return { _tag: "By", delta: -half }
		case "moveFirst":
			return { _tag: "First" }
		case "moveLast":
			return { _tag: "Last" }
		default:
			return undefined
	}
}

const handleStatusKey = (state: SessionState, key: string, ctx: SessionContext): Transition => {
	const action = findAction(ctx.bindings, "status", key)
	if (action === undefined) return stay(state)

	const motion = motionFor(action, state.viewport.height)
	if (motion) {
		if (!state.status) return stay(state)
		const cursor = moveCursor(buildRows(state.status), state.cursor, motion)
		return stay(rescroll({ ...state, ...(cursor ? { cursor } : {}) }))
	}

	switch (action) {
		case "toggleExpand": {
			if (!state.status || !state.cursor) return stay(state)
			const toggled = toggleExpansion(state.status, state.cursor)
			return stay(rescroll({ ...state, status: toggled.status, cursor: toggled.cursor }))
		}
		case "mark":
			return state.cursor
				? stay({ ...state, selection: toggleMark(state.selection, state.cursor) })
				: stay(state)
		case "clearMarks":
		case "back":
			return stay({ ...state, selection: [] })
		case "stage":
			return patchAction(state, "Stage")
		case "unstage":
			return patchAction(state, "Unstage")
		case "discard":
			return patchAction(state, "Discard")
		case "stageAll":
			return withRequests({ ...state, selection: [] }, { _tag: "StageAll" })
		case "unstageAll":
			return withRequests(
				{ ...state, selection: [] },
				{ _tag: "UnstageAll", unborn: state.status ? isUnborn(state.status) : false },
			)
		case "refresh":
			return withRequests(state, { _tag: "Refresh" })
		case "pull":
			return withRequests(state, { _tag: "Pull" })
		case "branchList":
			return withRequests(state, { _tag: "LoadBranches" })
		case "commitMenu":
			return stay({ ...state, mode: { _tag: "CommitMenu" } })
		case "pushMenu":
			return stay({ ...state, mode: { _tag: "PushMenu" } })
		case "stashMenu":
			return stay({ ...state, mode: { _tag: "StashMenu" } })
		case "gitCommand":
			return stay({ ...state, mode: { _tag: "MinibufferCommand", purpose: "git", input: emptyEditor } })
		case "shellCommand":
			return stay({ ...state, mode: { _tag: "SubprocessPrompt", input: emptyEditor } })
		case "quit":
			return withRequests(state, { _tag: "Quit" })
		default:
			return stay(state)
	}
}

// ============================================================================
// Branch list
// ============================================================================

const handleBranchKey = (
	state: SessionState,
	mode: Extract<Mode, { _tag: "BranchList" }>,
	key: string,
	ctx: SessionContext,
): Transition => {
	const action = findAction(ctx.bindings, "branches", key)
	if (action === undefined) return stay(state)
	const last = Math.max(0, mode.branches.length - 1)
	const motion = motionFor(action, state.viewport.height)
	if (motion) {
		const cursor =
			motion._tag === "First"
				? 0
				: motion._tag === "Last"
					? last
					: Math.max(0, Math.min(last, mode.cursor + motion.delta))
		return stay({ ...state, mode: { ...mode, cursor } })
	}

	switch (action) {
		case "checkout": {
			const branch = mode.branches[mode.cursor]
			const next: SessionState = { ...state, mode: STATUS_MODE }
			return branch ? withRequests(next, { _tag: "Checkout", branch: branch.name }) : stay(next)
		}
		case "newBranch":
			return stay({
				...state,
				mode: { _tag: "MinibufferCommand", purpose: "newBranch", input: emptyEditor },
			})
		case "back":
			return stay({ ...state, mode: STATUS_MODE })
		case "quit":
			return withRequests(state, { _tag: "Quit" })
		default:
			return stay(state)
	}
}

// ============================================================================
// Menus
// ============================================================================

const MENU_MODES = {
	CommitMenu: "commit",
	PushMenu: "push",
	StashMenu: "stash",
} as const satisfies Record<string, KeyMode>

const MENU_REQUESTS: Partial<Record<ActionName, Request>> = {
	commit: { _tag: "Commit", variant: "commit" },
	amend: { _tag: "Commit", variant: "amend" },
	extend: { _tag: "Commit", variant: "extend" },
	push: { _tag: "Push", force: false },
	forcePush: { _tag: "Push", force: true },
	stash: { _tag: "Stash", pop: false },
	stashPop: { _tag: "Stash", pop: true },
}

const handleMenuKey = (
	state: SessionState,
	menu: keyof typeof MENU_MODES,
	key: string,
	ctx: SessionContext,
): Transition => {
	const action = findAction(ctx.bindings, MENU_MODES[menu], key)
	if (action === undefined) return stay(state)
	if (action === "back") return stay({ ...state, mode: STATUS_MODE })
	if (action === "quit") return withRequests(state, { _tag: "Quit" })
	const request = MENU_REQUESTS[action]
	return request ? withRequests({ ...state, mode: STATUS_MODE }, request) : stay(state)
}

// ============================================================================
// Text input
// ============================================================================

const CANCEL_KEYS = new Set(["escape", "C-c", "C-g"])

const handleMinibufferKey = (
	state: SessionState,
	mode: Extract<Mode, { _tag: "MinibufferCommand" }>,
	key: string,
): Transition => {
	if (CANCEL_KEYS.has(key)) return stay({ ...state, mode: STATUS_MODE })
	if (key === "return") {
		const text = mode.input.text.trim()
		const next: SessionState = { ...state, mode: STATUS_MODE }
		if (text === "") return stay(next)
		if (mode.purpose === "newBranch") return withRequests(next, { _tag: "CreateBranch", name: text })
		return withRequests(
			{ ...next, history: { ...state.history, git: pushHistory(state.history.git, text) } },
			{ _tag: "RunGit", command: text },
		)
	}
	const history = mode.purpose === "git" ? state.history.git : []
	const input = handleEditorKey(mode.input, key, history)
	return input ? stay({ ...state, mode: { ...mode, input } }) : stay(state)
}

const handlePromptKey = (
	state: SessionState,
	mode: Extract<Mode, { _tag: "SubprocessPrompt" }>,
	key: string,
): Transition => {
	if (CANCEL_KEYS.has(key)) return stay({ ...state, mode: STATUS_MODE })
	if (key === "return") {
		const text = mode.input.text.trim()
		const next: SessionState = { ...state, mode: STATUS_MODE }
		if (text === "") return stay(next)
		return withRequests(
			{ ...next, history: { ...state.history, shell: pushHistory(state.history.shell, text) } },
			{ _tag: "RunShell", command: text },
		)
	}
	const input = handleEditorKey(mode.input, key, state.history.shell)
	return input ? stay({ ...state, mode: { ...mode, input } }) : stay(state)
}

const handleConfirmKey = (
	state: SessionState,
	mode: Extract<Mode, { _tag: "ConfirmDestructive" }>,
	key: string,
): Transition => {
	if (key === "y" || key === "Y") {
		return withRequests({ ...state, mode: STATUS_MODE, selection: [] }, ...mode.requests)
	}
	if (key === "n" || key === "N" || key === "escape") return stay({ ...state, mode: STATUS_MODE })
	return stay(state)
}

// ============================================================================
// Reducer
// ============================================================================

const handleKey = (state: SessionState, key: string, ctx: SessionContext): Transition => {
	const { mode } = state
	switch (mode._tag) {
		case "Status":
			return handleStatusKey(state, key, ctx)
		case "BranchList":
			return handleBranchKey(state, mode, key, ctx)
		case "CommitMenu":
		case "PushMenu":
		case "StashMenu":
			return handleMenuKey(state, mode._tag, key, ctx)
		case "MinibufferCommand":
			return handleMinibufferKey(state, mode, key)
		case "SubprocessPrompt":
			return handlePromptKey(state, mode, key)
		case "ConfirmDestructive":
			return handleConfirmKey(state, mode, key)
	}
}

export const update = (state: SessionState, event: SessionEvent, ctx: SessionContext): Transition => {
	switch (event._tag) {
		case "Key":
			return handleKey(state, event.key, ctx)
		case "Resize":
			return stay(
				rescroll({
					...state,
					viewport: { ...state.viewport, height: Math.max(1, event.rows - RESERVED_ROWS) },
				}),
			)
		case "BranchesLoaded": {
			if (state.mode._tag !== "Status") return stay(state)
			if (event.branches.length === 0) return withNotice(state, "error", "No branches yet")
			const current = event.branches.findIndex((branch) => branch.current)
			return stay({
				...state,
				mode: { _tag: "BranchList", branches: event.branches, cursor: Math.max(0, current) },
			})
		}
	}
}
