/**
 * Frame rendering
 *
 * Pure: session state, the notice for this frame and the terminal size in,
 * styled rows out. The bottom rows form the minibuffer (prompts, confirmation
 * questions and notices); menus sit right above it.
 */

import { splitRunsIntoRows } from "../ansi/ansiInterpreter.js"
import type { Color, Style, StyledRow, StyledRun } from "../ansi/style.js"
import { DEFAULT_STYLE, run } from "../ansi/style.js"
import type { ResolvedConfig, WsHighlightKind } from "../config/defaults.js"
import type { BranchInfo, FileEntry, FileKind, HeadCommit, Hunk, Line, LineKind, RepoStatus } from "../diff/model.js"
import { isMarked } from "../diff/selection.js"
import { menuEntries } from "../services/keyboard/bindings.js"
import type { KeyMode, Keybinding } from "../services/keyboard/types.js"
import type { LineEditorState } from "./lineEditor.js"
import type { Notice } from "./noticeQueue.js"
import type { Mode, SessionState } from "./sessionFSM.js"
import { buildRows, rowIndexOf, targetOf, type ViewRow } from "./statusTree.js"

// ============================================================================
// Types
// ============================================================================

export interface FrameInput {
	readonly state: SessionState
	readonly notice?: Notice
	readonly rows: number
	readonly columns: number
	readonly config: ResolvedConfig
	readonly bindings: ReadonlyArray<Keybinding>
}

const TAB_WIDTH = 8

const FILE_LABELS: Record<FileKind, string> = {
	Modified: "modified",
	Added: "new file",
	Deleted: "deleted",
	Renamed: "renamed",
	TypeChanged: "typechange",
	Untracked: "untracked",
	Conflicted: "unmerged",
}

const LABEL_WIDTH = 11

const SECTION_TITLES = {
	unstaged: "Unstaged changes",
	staged: "Staged changes",
} as const

const WS_KINDS: Partial<Record<LineKind, WsHighlightKind>> = {
	Context: "context",
	Deletion: "old",
	Addition: "new",
}

const MENU_TITLES = {
	CommitMenu: ["Commit", "commit"],
	PushMenu: ["Push", "push"],
	StashMenu: ["Stash", "stash"],
} as const satisfies Record<string, readonly [string, KeyMode]>

// ============================================================================
// Row helpers
// ============================================================================

const chars = (text: string): ReadonlyArray<string> => [...text]

export const rowWidth = (row: StyledRow): number => row.reduce((n, r) => n + chars(r.text).length, 0)

/**
 * Cut a row into pieces of at most `width` columns
 */
export const wrapRow = (row: StyledRow, columns: number): ReadonlyArray<StyledRow> => {
	const width = Math.max(1, columns)
	const out: StyledRun[][] = [[]]
	let used = 0
	for (const piece of row) {
		let rest = chars(piece.text)
		while (rest.length > 0) {
			if (used === width) {
				out.push([])
				used = 0
			}
			const take = rest.slice(0, width - used)
			out[out.length - 1]?.push({ text: take.join(""), style: piece.style })
			used += take.length
			rest = rest.slice(take.length)
		}
	}
	return out
}

export const clipRow = (row: StyledRow, width: number): StyledRow => wrapRow(row, width)[0] ?? []

const padRow = (row: StyledRow, width: number, style: Partial<Style>): StyledRow => {
	const missing = width - rowWidth(row)
	return missing > 0 ? [...row, run(" ".repeat(missing), style)] : row
}

const invert = (row: StyledRow): StyledRow =>
	row.map((r) => ({ text: r.text, style: { ...r.style, inverse: !r.style.inverse } }))

/**
 * Give runs without a color of their own the given foreground
 */
const tint = (runs: ReadonlyArray<StyledRun>, fg: Color): StyledRow =>
	runs.map((r) => (r.style.fg._tag === "Default" ? { text: r.text, style: { ...r.style, fg } } : r))

export const expandTabs = (text: string, column = 0): string => {
	let out = ""
	let col = column
	for (const ch of chars(text)) {
		if (ch === "\t") {
			const spaces = TAB_WIDTH - (col % TAB_WIDTH)
			out += " ".repeat(spaces)
			col += spaces
		} else {
			out += ch
			col += 1
		}
	}
	return out
}

// ============================================================================
// Status tree
// ============================================================================

const upstreamText = (branch: Extract<BranchInfo, { _tag: "Branch" }>): string => {
	if (branch.upstream === undefined) return ""
	if (branch.upstreamGone) return ` [${branch.upstream}: gone]`
	const parts = [
		...(branch.ahead > 0 ? [`ahead ${branch.ahead}`] : []),
		...(branch.behind > 0 ? [`behind ${branch.behind}`] : []),
	]
	return parts.length > 0 ? ` [${branch.upstream}: ${parts.join(", ")}]` : ` [${branch.upstream}]`
}

const headRow = (status: RepoStatus, config: ResolvedConfig): StyledRow => {
	const { colors } = config
	const commit = (head: HeadCommit | undefined): StyledRow =>
		head ? [run(" "), run(head.hash, { fg: colors.hunkHead }), run(` ${head.title}`)] : []
	const label = run("Head:     ", { bold: true })
	switch (status.branch._tag) {
		case "Branch":
			return [
				label,
				run(status.branch.name, { fg: colors.key, bold: true }),
				run(upstreamText(status.branch)),
				...commit(status.head),
			]
		case "Detached":
			return [label, run("(detached)", { fg: colors.error }), ...commit(status.head)]
		case "Unborn":
			return [label, run(status.branch.name, { fg: colors.key, bold: true }), run(" (no commits yet)", { dim: true })]
	}
}

const fileRow = (file: FileEntry): StyledRow => {
	const label = FILE_LABELS[file.kind].padEnd(LABEL_WIDTH)
	const path = file.previousPath !== undefined ? `${file.previousPath} -> ${file.path}` : file.path
	return [run(label), run(path, { bold: true })]
}

export const formatRange = (start: number, count: number): string =>
	count === 1 ? `${start}` : `${start},${count}`

const hunkRow = (hunk: Hunk, config: ResolvedConfig): StyledRow => [
	run(
		`  @@ -${formatRange(hunk.oldStart, hunk.oldCount)} +${formatRange(hunk.newStart, hunk.newCount)} @@${hunk.caption}`,
		{ fg: config.colors.hunkHead },
	),
]

const noteText = (file: FileEntry): string => {
	if (file.binary) return "Binary file"
	if (file.kind === "Untracked") return "Untracked file"
	if (file.kind === "Conflicted") return "Unmerged, resolve and stage to continue"
	if (file.oldMode !== undefined && file.newMode !== undefined && file.oldMode !== file.newMode) {
		return `Mode changed ${file.oldMode} -> ${file.newMode}`
	}
	return "No textual changes"
}

const LINE_MARKERS: Record<LineKind, string> = {
	Context: " ",
	Addition: "+",
	Deletion: "-",
	NoNewlineMarker: "\\",
}

export const lineRow = (line: Line, config: ResolvedConfig): StyledRow => {
	const { colors } = config
	const indent = "  "
	if (line.kind === "NoNewlineMarker") return [run(`${indent}\\${line.text}`, { dim: true })]

	const fg =
		line.kind === "Addition" ? colors.addition : line.kind === "Deletion" ? colors.deletion : colors.foreground
	const prefix = `${indent}${LINE_MARKERS[line.kind]}`
	const text = expandTabs(line.text, 1)
	const wsKind = WS_KINDS[line.kind]
	const highlight = wsKind !== undefined && config.options.wsErrorHighlight.has(wsKind)
	const trailing = highlight ? (/\s+$/u.exec(text)?.[0] ?? "") : ""
	const body = text.slice(0, text.length - trailing.length)
	return [
		run(prefix + body, { fg }),
		...(trailing !== "" ? [run(trailing, { bg: colors.error })] : []),
	]
}

const viewRow = (row: ViewRow, status: RepoStatus, config: ResolvedConfig): StyledRow => {
	switch (row._tag) {
		case "Head":
			return headRow(status, config)
		case "Blank":
			return []
		case "Clean":
			return [run("Nothing to commit, working tree clean", { dim: true })]
		case "Section":
			return [run(`${SECTION_TITLES[row.section]} (${row.count})`, { fg: config.colors.heading, bold: true })]
		case "File":
			return fileRow(row.file)
		case "Hunk":
			return hunkRow(row.hunk, config)
		case "Line":
			return lineRow(row.line, config)
		case "Note":
			return [run(`  ${noteText(row.file)}`, { dim: true })]
	}
}

/**
 * The visible part of the status tree, one gutter column for marks
 */
const statusRows = (input: FrameInput, status: RepoStatus, height: number): ReadonlyArray<StyledRow> => {
	const { state, config, columns } = input
	const rows = buildRows(status)
	const cursorIndex = rowIndexOf(rows, state.cursor)
	// rows may be taken by menus or notices; keep the cursor in view anyway
	const base = Math.min(state.viewport.offset, rows.length - 1)
	const offset = Math.max(0, cursorIndex >= 0 && cursorIndex < base ? cursorIndex : base, cursorIndex - height + 1)

	const out: StyledRow[] = []
	for (let i = offset; i < rows.length && out.length < height; i++) {
		const row = rows[i]
		if (row === undefined) break
		const target = targetOf(row)
		const marked = target !== undefined && isMarked(state.selection, target)
		const gutter = marked ? run("*", { fg: config.colors.key, bold: true }) : run(" ")
		const content: StyledRow = [gutter, ...viewRow(row, status, config)]
		const pieces = config.options.truncateLines ? [clipRow(content, columns)] : wrapRow(content, columns)
		for (const piece of pieces) {
			if (out.length >= height) break
			out.push(i === cursorIndex ? invert(padRow(piece, columns, DEFAULT_STYLE)) : piece)
		}
	}
	return out
}

// ============================================================================
// Branch list
// ============================================================================

const branchRows = (
	input: FrameInput,
	mode: Extract<Mode, { _tag: "BranchList" }>,
	height: number,
): ReadonlyArray<StyledRow> => {
	const { config, columns } = input
	const title: StyledRow = [run("Branches", { fg: config.colors.heading, bold: true })]
	const listHeight = Math.max(0, height - 1)
	const offset = Math.max(0, mode.cursor - listHeight + 1)
	const list = mode.branches.slice(offset, offset + listHeight).map((branch, i): StyledRow => {
		const row: StyledRow = clipRow(
			[
				run(branch.current ? "* " : "  ", { fg: config.colors.key, bold: true }),
				run(branch.name, branch.current ? { fg: config.colors.key, bold: true } : {}),
				...(branch.upstream !== undefined ? [run(`  ${branch.upstream}`, { dim: true })] : []),
			],
			columns,
		)
		return offset + i === mode.cursor ? invert(padRow(row, columns, DEFAULT_STYLE)) : row
	})
	return [title, ...list]
}

// ============================================================================
// Menus and minibuffer
// ============================================================================

const menuRows = (input: FrameInput): ReadonlyArray<StyledRow> => {
	const { mode } = input.state
	if (mode._tag !== "CommitMenu" && mode._tag !== "PushMenu" && mode._tag !== "StashMenu") return []
	const [title, keyMode] = MENU_TITLES[mode._tag]
	const entries = menuEntries(input.bindings, keyMode).flatMap((binding, i): StyledRow => [
		...(i > 0 ? [run("   ")] : []),
		run(binding.key, { fg: input.config.colors.key, bold: true }),
		run(` ${binding.description}`),
	])
	return [[run(title, { fg: input.config.colors.heading, bold: true })], entries]
}

/**
 * Prompt text followed by the input, with the character under the cursor
 * shown inverted
 */
export const promptRow = (prompt: string, editor: LineEditorState, promptStyle: Partial<Style> = {}): StyledRow => {
	const text = chars(editor.text)
	const before = text.slice(0, editor.cursor).join("")
	const at = text[editor.cursor] ?? " "
	const after = text.slice(editor.cursor + 1).join("")
	return [
		run(prompt, promptStyle),
		run(before),
		run(at, { inverse: true }),
		...(after !== "" ? [run(after)] : []),
	]
}

const PROMPT_MODES: ReadonlySet<Mode["_tag"]> = new Set([
	"MinibufferCommand",
	"SubprocessPrompt",
	"ConfirmDestructive",
])

/**
 * Whether the minibuffer is free for a notice. While a prompt holds it,
 * notices stay queued.
 */
export const showsNotice = (mode: Mode): boolean => !PROMPT_MODES.has(mode._tag)

const footerRows = (input: FrameInput): ReadonlyArray<StyledRow> => {
	const { mode } = input.state
	const { colors } = input.config
	switch (mode._tag) {
		case "MinibufferCommand":
			return [promptRow(mode.purpose === "git" ? ":git " : "New branch: ", mode.input, { fg: colors.key })]
		case "SubprocessPrompt":
			return [promptRow("!", mode.input, { fg: colors.key })]
		case "ConfirmDestructive":
			return [[run(mode.prompt, { fg: colors.error, bold: true })]]
		default:
			break
	}
	if (input.notice === undefined) return [[]]
	const runs = input.notice.kind === "error" ? tint(input.notice.runs, colors.error) : input.notice.runs
	const lines = splitRunsIntoRows(runs).map((row) => row.map((r) => ({ ...r, text: expandTabs(r.text) })))
	// the minibuffer grows for multi-line output, up to half the screen
	const limit = Math.max(1, Math.floor(input.rows / 2))
	const shown =
		lines.length > limit
			? [...lines.slice(0, limit - 1), [run(`... ${lines.length - limit + 1} more lines`, { dim: true })]]
			: lines
	return shown.length > 0 ? shown : [[]]
}

// ============================================================================
// Frame
// ============================================================================

/**
 * Exactly `rows` rows, none wider than `columns`
 */
export const renderFrame = (input: FrameInput): ReadonlyArray<StyledRow> => {
	const columns = Math.max(1, input.columns)
	const total = Math.max(1, input.rows)
	const fitted: FrameInput = { ...input, columns, rows: total }
	const footer = footerRows(fitted)
	const menu = menuRows(fitted)
	const bodyHeight = Math.max(0, total - footer.length - menu.length)

	const { mode, status } = input.state
	const body =
		mode._tag === "BranchList"
			? branchRows(fitted, mode, bodyHeight)
			: status
				? statusRows(fitted, status, bodyHeight)
				: [[run("Reading repository status...", { dim: true })]]

	const padded = [...body.slice(0, bodyHeight)]
	while (padded.length < bodyHeight) padded.push([])
	return [...padded, ...menu, ...footer].slice(-total).map((row) => clipRow(row, columns))
}
