/**
 * Selections over the status tree
 *
 * A selection is an ordered list of references to whole files, whole hunks
 * or individual lines. References point into a specific RepoStatus by path
 * and index and are re-resolved (or dropped) after every refresh.
 */

import type { FileEntry, Hunk, RepoStatus, Section } from "./model.js"
import { filesIn, findFile, hunkSignature } from "./model.js"

// ============================================================================
// Types
// ============================================================================

export interface SelectionRef {
	readonly section: Section
	readonly path: string
	/** Absent: the whole file */
	readonly hunk?: number
	/** Positions in `Hunk.lines`. Absent: the whole hunk */
	readonly lines?: ReadonlyArray<number>
}

export type Selection = ReadonlyArray<SelectionRef>

/**
 * An item of the tree: file, hunk within file, or line within hunk
 */
export interface TreeTarget {
	readonly section: Section
	readonly path: string
	readonly hunk?: number
	readonly line?: number
}

export type HunkPick = "all" | ReadonlySet<number>

export interface ResolvedFile {
	readonly file: FileEntry
	readonly whole: boolean
	/** Picked hunks in ascending index order */
	readonly hunks: ReadonlyArray<{ readonly index: number; readonly pick: HunkPick }>
}

// ============================================================================
// Marking
// ============================================================================

const sameFile = (a: { section: Section; path: string }, b: { section: Section; path: string }) =>
	a.section === b.section && a.path === b.path

/**
 * Add the target to the selection, or remove it when already marked
 */
export const toggleMark = (selection: Selection, target: TreeTarget): Selection => {
	if (target.hunk === undefined) {
		const marked = selection.some((ref) => sameFile(ref, target) && ref.hunk === undefined)
		const rest = selection.filter((ref) => !sameFile(ref, target))
		return marked ? rest : [...rest, { section: target.section, path: target.path }]
	}

	const { hunk } = target
	const inHunk = (ref: SelectionRef) => sameFile(ref, target) && ref.hunk === hunk
	const rest = selection.filter((ref) => !inHunk(ref))

	if (target.line === undefined) {
		const marked = selection.some((ref) => inHunk(ref) && ref.lines === undefined)
		return marked ? rest : [...rest, { section: target.section, path: target.path, hunk }]
	}

	const { line } = target
	const existing = selection.find((ref) => inHunk(ref) && ref.lines !== undefined)
	const lines = existing?.lines ?? []
	const nextLines = lines.includes(line)
		? lines.filter((l) => l !== line)
		: [...lines, line].sort((a, b) => a - b)
	return nextLines.length === 0
		? rest
		: [...rest, { section: target.section, path: target.path, hunk, lines: nextLines }]
}

/**
 * Whether the target is covered by the selection, directly or via its file or hunk
 */
export const isMarked = (selection: Selection, target: TreeTarget): boolean =>
	selection.some((ref) => {
		if (!sameFile(ref, target)) return false
		if (ref.hunk === undefined) return true
		if (target.hunk === undefined || ref.hunk !== target.hunk) return false
		if (ref.lines === undefined) return true
		return target.line !== undefined && ref.lines.includes(target.line)
	})

export const refForTarget = (target: TreeTarget): SelectionRef => ({
	section: target.section,
	path: target.path,
	...(target.hunk !== undefined ? { hunk: target.hunk } : {}),
	...(target.hunk !== undefined && target.line !== undefined ? { lines: [target.line] } : {}),
})

// ============================================================================
// Resolution
// ============================================================================

const selectableLines = (hunk: Hunk, lines: ReadonlyArray<number>): ReadonlySet<number> =>
	new Set(lines.filter((i) => {
		const line = hunk.lines[i]
		return line !== undefined && line.kind !== "NoNewlineMarker"
	}))

/**
 * Resolve references against one section of a status. Stale references are
 * dropped; overlapping ones merge (file covers hunk covers lines). Files come
 * back in listing order.
 */
export const resolveSelection = (
	status: RepoStatus,
	selection: Selection,
	section: Section,
): ReadonlyArray<ResolvedFile> => {
	const picks = new Map<string, { whole: boolean; hunks: Map<number, "all" | Set<number>> }>()

	for (const ref of selection) {
		if (ref.section !== section) continue
		const file = findFile(status, section, ref.path)
		if (!file) continue
		const entry = picks.get(file.path) ?? { whole: false, hunks: new Map<number, "all" | Set<number>>() }
		picks.set(file.path, entry)

		if (ref.hunk === undefined) {
			entry.whole = true
			continue
		}
		const hunk = file.hunks[ref.hunk]
		if (!hunk) continue
		if (ref.lines === undefined) {
			entry.hunks.set(ref.hunk, "all")
			continue
		}
		const previous = entry.hunks.get(ref.hunk)
		if (previous === "all") continue
		const merged = new Set([...(previous ?? []), ...selectableLines(hunk, ref.lines)])
		if (merged.size > 0) entry.hunks.set(ref.hunk, merged)
	}

	const resolved: ResolvedFile[] = []
	for (const file of filesIn(status, section)) {
		const entry = picks.get(file.path)
		if (!entry) continue
		if (!entry.whole && entry.hunks.size === 0) continue
		const hunks = entry.whole
			? file.hunks.map((_, index) => ({ index, pick: "all" as const }))
			: [...entry.hunks.entries()]
					.sort(([a], [b]) => a - b)
					.map(([index, pick]) => ({ index, pick }))
		resolved.push({ file, whole: entry.whole, hunks })
	}
	return resolved
}

// ============================================================================
// Refresh
// ============================================================================

/**
 * Index of the hunk in `next` with the same content as hunk `index` of `prev`
 */
export const matchHunk = (prev: FileEntry, next: FileEntry, index: number): number | undefined => {
	const hunk = prev.hunks[index]
	if (!hunk) return undefined
	const signature = hunkSignature(hunk)
	const sameSpot = next.hunks[index]
	if (sameSpot && hunkSignature(sameSpot) === signature) return index
	const found = next.hunks.findIndex((candidate) => hunkSignature(candidate) === signature)
	return found < 0 ? undefined : found
}

/**
 * Carry references over to a freshly parsed status, dropping those whose
 * file or hunk is gone
 */
export const remapSelection = (
	prev: RepoStatus,
	next: RepoStatus,
	selection: Selection,
): Selection =>
	selection.flatMap((ref): ReadonlyArray<SelectionRef> => {
		const nextFile = findFile(next, ref.section, ref.path)
		if (!nextFile) return []
		if (ref.hunk === undefined) return [ref]
		const prevFile = findFile(prev, ref.section, ref.path)
		if (!prevFile) return []
		const hunk = matchHunk(prevFile, nextFile, ref.hunk)
		return hunk === undefined ? [] : [{ ...ref, hunk }]
	})
