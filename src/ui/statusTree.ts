/**
 * Status tree navigation
 *
 * Flattens a RepoStatus into the rows the status view shows, and moves a
 * path-based cursor over the focusable ones (files, hunks, lines). The
 * cursor is a path rather than a row index so it survives refreshes and
 * expansion changes; it is re-validated against the rows on every use.
 */

import type { FileEntry, Hunk, Line, RepoStatus, Section } from "../diff/model.js"
import { findFile, SECTIONS, filesIn, hunkSignature, updateFile, updateHunk } from "../diff/model.js"
import type { TreeTarget } from "../diff/selection.js"
import { matchHunk } from "../diff/selection.js"

// ============================================================================
// Types
// ============================================================================

export type ViewRow =
	| { readonly _tag: "Head" }
	| { readonly _tag: "Blank" }
	| { readonly _tag: "Clean" }
	| { readonly _tag: "Section"; readonly section: Section; readonly count: number }
	| { readonly _tag: "File"; readonly section: Section; readonly file: FileEntry }
	| {
			readonly _tag: "Hunk"
			readonly section: Section
			readonly file: FileEntry
			readonly hunkIndex: number
			readonly hunk: Hunk
	  }
	| {
			readonly _tag: "Line"
			readonly section: Section
			readonly file: FileEntry
			readonly hunkIndex: number
			readonly lineIndex: number
			readonly line: Line
	  }
	| { readonly _tag: "Note"; readonly section: Section; readonly file: FileEntry }

export type Cursor = TreeTarget

export interface Viewport {
	readonly offset: number
	readonly height: number
	/** Rows kept visible beyond the cursor when scrolling */
	readonly lookahead: number
}

// ============================================================================
// Rows
// ============================================================================

export const buildRows = (status: RepoStatus): ReadonlyArray<ViewRow> => {
	const rows: ViewRow[] = [{ _tag: "Head" }, { _tag: "Blank" }]
	if (status.clean) {
		rows.push({ _tag: "Clean" })
		return rows
	}
	for (const section of SECTIONS) {
		const files = filesIn(status, section)
		if (files.length === 0) continue
		rows.push({ _tag: "Section", section, count: files.length })
		for (const file of files) {
			rows.push({ _tag: "File", section, file })
			if (!file.expanded) continue
			if (file.hunks.length === 0) rows.push({ _tag: "Note", section, file })
			file.hunks.forEach((hunk, hunkIndex) => {
				rows.push({ _tag: "Hunk", section, file, hunkIndex, hunk })
				if (!hunk.expanded) return
				hunk.lines.forEach((line, lineIndex) => {
					rows.push({ _tag: "Line", section, file, hunkIndex, lineIndex, line })
				})
			})
		}
		rows.push({ _tag: "Blank" })
	}
	return rows
}

/**
 * The tree item a row stands for, if the cursor may rest on it
 */
export const targetOf = (row: ViewRow): Cursor | undefined => {
	switch (row._tag) {
		case "File":
			return { section: row.section, path: row.file.path }
		case "Hunk":
			return { section: row.section, path: row.file.path, hunk: row.hunkIndex }
		case "Line":
			return row.line.kind === "NoNewlineMarker"
				? undefined
				: { section: row.section, path: row.file.path, hunk: row.hunkIndex, line: row.lineIndex }
		default:
			return undefined
	}
}

export const sameTarget = (a: Cursor, b: Cursor): boolean =>
	a.section === b.section && a.path === b.path && a.hunk === b.hunk && a.line === b.line

export const rowIndexOf = (rows: ReadonlyArray<ViewRow>, cursor: Cursor | undefined): number => {
	if (!cursor) return -1
	return rows.findIndex((row) => {
		const target = targetOf(row)
		return target !== undefined && sameTarget(target, cursor)
	})
}

const focusableIndexes = (rows: ReadonlyArray<ViewRow>): ReadonlyArray<number> =>
	rows.flatMap((row, i) => (targetOf(row) ? [i] : []))

export const firstTarget = (rows: ReadonlyArray<ViewRow>): Cursor | undefined => {
	for (const row of rows) {
		const target = targetOf(row)
		if (target) return target
	}
	return undefined
}

// ============================================================================
// Movement
// ============================================================================

export type Motion =
	| { readonly _tag: "By"; readonly delta: number }
	| { readonly _tag: "First" }
	| { readonly _tag: "Last" }

/**
 * Move the cursor over focusable rows. A cursor that no longer resolves
 * starts again from the first item.
 */
export const moveCursor = (
	rows: ReadonlyArray<ViewRow>,
	cursor: Cursor | undefined,
	motion: Motion,
): Cursor | undefined => {
	const focusable = focusableIndexes(rows)
	if (focusable.length === 0) return undefined
	const current = focusable.indexOf(rowIndexOf(rows, cursor))
	let position: number
	if (motion._tag === "First") position = 0
	else if (motion._tag === "Last") position = focusable.length - 1
	else if (current < 0) position = 0
	else position = Math.max(0, Math.min(focusable.length - 1, current + motion.delta))
	const row = rows[focusable[position] ?? 0]
	return row ? targetOf(row) : undefined
}

// ============================================================================
// Viewport
// ============================================================================

export const makeViewport = (height: number, lookahead: number): Viewport => ({
	offset: 0,
	height: Math.max(1, height),
	lookahead,
})

/**
 * Scroll so that `row` has `lookahead` rows of margin where the content allows
 */
export const scrollTo = (viewport: Viewport, row: number, total: number): Viewport => {
	const margin = Math.max(0, Math.min(viewport.lookahead, Math.floor((viewport.height - 1) / 2)))
	let offset = viewport.offset
	if (row >= 0) {
		if (row - margin < offset) offset = row - margin
		if (row + margin > offset + viewport.height - 1) offset = row + margin - viewport.height + 1
	}
	const maxOffset = Math.max(0, total - viewport.height)
	offset = Math.max(0, Math.min(offset, maxOffset))
	return offset === viewport.offset ? viewport : { ...viewport, offset }
}

// ============================================================================
// Expansion
// ============================================================================

/**
 * Expand or collapse the item under the cursor. Collapsing from a line
 * folds its hunk and moves the cursor onto the hunk.
 */
export const toggleExpansion = (
	status: RepoStatus,
	cursor: Cursor,
): { readonly status: RepoStatus; readonly cursor: Cursor } => {
	const { section, path, hunk } = cursor
	if (hunk === undefined) {
		return {
			status: updateFile(status, section, path, (file) => ({ ...file, expanded: !file.expanded })),
			cursor,
		}
	}
	if (cursor.line !== undefined) {
		return {
			status: updateHunk(status, section, path, hunk, (h) => ({ ...h, expanded: false })),
			cursor: { section, path, hunk },
		}
	}
	return {
		status: updateHunk(status, section, path, hunk, (h) => ({ ...h, expanded: !h.expanded })),
		cursor,
	}
}

// ============================================================================
// Refresh
// ============================================================================

/**
 * Carry expansion flags from the previous status onto a freshly parsed one.
 * Files match by section and path, hunks by content.
 */
export const carryExpansion = (prev: RepoStatus, next: RepoStatus): RepoStatus => {
	let result = next
	for (const section of SECTIONS) {
		for (const file of filesIn(next, section)) {
			const before = findFile(prev, section, file.path)
			if (!before) continue
			const expandedBySignature = new Map(
				before.hunks.map((hunk) => [hunkSignature(hunk), hunk.expanded] as const),
			)
			result = updateFile(result, section, file.path, (entry) => ({
				...entry,
				expanded: before.expanded,
				hunks: entry.hunks.map((hunk) => {
					const expanded = expandedBySignature.get(hunkSignature(hunk))
					return expanded === undefined || expanded === hunk.expanded ? hunk : { ...hunk, expanded }
				}),
			}))
		}
	}
	return result
}

/**
 * Re-point the cursor into a freshly parsed status. The same file keeps the
 * cursor (on the matching hunk and line where they still exist); a vanished
 * file sends it to the first item.
 */
export const reconcileCursor = (
	prev: RepoStatus,
	next: RepoStatus,
	cursor: Cursor | undefined,
): Cursor | undefined => {
	const rows = buildRows(next)
	if (!cursor) return firstTarget(rows)
	const file = findFile(next, cursor.section, cursor.path)
	if (!file) return firstTarget(rows)

	const fileCursor: Cursor = { section: cursor.section, path: cursor.path }
	if (cursor.hunk === undefined || !file.expanded || file.hunks.length === 0) return fileCursor

	const before = findFile(prev, cursor.section, cursor.path)
	const matched = before ? matchHunk(before, file, cursor.hunk) : undefined
	const hunk = matched ?? Math.min(cursor.hunk, file.hunks.length - 1)
	const hunkCursor: Cursor = { ...fileCursor, hunk }

	const line = cursor.line
	const target = file.hunks[hunk]
	if (line === undefined || matched === undefined || !target?.expanded) return hunkCursor
	const kind = target.lines[line]?.kind
	return kind === undefined || kind === "NoNewlineMarker" ? hunkCursor : { ...hunkCursor, line }
}
