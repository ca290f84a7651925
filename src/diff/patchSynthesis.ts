/**
 * Patch synthesis
 *
 * Builds the smallest patch `git apply` accepts for a selection of files,
 * hunks or lines. Unselected additions are dropped, unselected deletions
 * become context, and hunk ranges are recomputed so the patch applies
 * against the target it is fed to.
 *
 * Orientation:
 * - Stage: the working-tree diff as is, applied to the index
 * - Unstage: the inverse of the staged diff, applied to the index
 * - Discard: the inverse of the working-tree diff, applied to the working tree
 */

import { Either } from "effect"
import { EmptySelectionError, InvalidHunkStateError, type SynthesisError } from "./errors.js"
import type { FileEntry, FileKind, Hunk, Line, RepoStatus, Section } from "./model.js"
import { hunkIsConsistent, isOpaque } from "./model.js"
import { type HunkPick, resolveSelection, type Selection } from "./selection.js"

// ============================================================================
// Types
// ============================================================================

export type PatchAction = "Stage" | "Unstage" | "Discard"

export type PatchTarget = "index" | "worktree"

/**
 * Whole-file change handled by path instead of by patch text
 */
export interface OpaquePath {
	readonly path: string
	readonly previousPath?: string
	readonly kind: FileKind
}

export interface PatchPlan {
	readonly action: PatchAction
	readonly target: PatchTarget
	readonly patch?: string
	readonly paths: ReadonlyArray<OpaquePath>
}

/**
 * A line together with the no-newline marker that follows it, if any
 */
interface LineUnit {
	readonly kind: "Context" | "Addition" | "Deletion"
	readonly text: string
	/** Index of the line in the source hunk */
	readonly source: number
	readonly marker?: string
}

export const sectionFor = (action: PatchAction): Section =>
	action === "Unstage" ? "staged" : "unstaged"

export const targetFor = (action: PatchAction): PatchTarget =>
	action === "Discard" ? "worktree" : "index"

const isInverse = (action: PatchAction): boolean => action !== "Stage"

// ============================================================================
// Hunk Transformation
// ============================================================================

const toUnits = (lines: ReadonlyArray<Line>): ReadonlyArray<LineUnit> => {
	const units: LineUnit[] = []
	lines.forEach((line, source) => {
		if (line.kind === "NoNewlineMarker") {
			const last = units.at(-1)
			if (last && last.marker === undefined) units[units.length - 1] = { ...last, marker: line.text }
			return
		}
		units.push({ kind: line.kind, text: line.text, source })
	})
	return units
}

/**
 * Swap additions and deletions. Each run of changes is reordered so that
 * deletions precede additions, as git writes them.
 */
export const invertUnits = (units: ReadonlyArray<LineUnit>): ReadonlyArray<LineUnit> => {
	const result: LineUnit[] = []
	let deletions: LineUnit[] = []
	let additions: LineUnit[] = []
	const flushRun = () => {
		result.push(...deletions, ...additions)
		deletions = []
		additions = []
	}
	for (const unit of units) {
		if (unit.kind === "Context") {
			flushRun()
			result.push(unit)
		} else if (unit.kind === "Addition") {
			deletions.push({ ...unit, kind: "Deletion" })
		} else {
			additions.push({ ...unit, kind: "Addition" })
		}
	}
	flushRun()
	return result
}

/**
 * Keep selected changes; unselected additions vanish and unselected
 * deletions fall back to context
 */
export const applyPick = (units: ReadonlyArray<LineUnit>, pick: HunkPick): ReadonlyArray<LineUnit> => {
	if (pick === "all") return units
	return units.flatMap((unit): ReadonlyArray<LineUnit> => {
		if (unit.kind === "Context" || pick.has(unit.source)) return [unit]
		if (unit.kind === "Addition") return []
		return [{ ...unit, kind: "Context" }]
	})
}

/**
 * A context line carrying the no-newline marker ends the old side. When
 * new-side lines follow it, the new side needs that line terminated, so it
 * is written as its deletion (with the marker) and a terminated re-addition.
 */
const terminateMarkedContext = (units: ReadonlyArray<LineUnit>): ReadonlyArray<LineUnit> =>
	units.flatMap((unit, i): ReadonlyArray<LineUnit> => {
		if (unit.kind !== "Context" || unit.marker === undefined) return [unit]
		if (!units.slice(i + 1).some((later) => later.kind !== "Deletion")) return [unit]
		const { marker: _marker, ...terminated } = unit
		return [
			{ ...unit, kind: "Deletion" },
			{ ...terminated, kind: "Addition" },
		]
	})

const formatRange = (start: number, count: number): string =>
	count === 1 ? `${start}` : `${start},${count}`

/**
 * Start line on the new side, given the cumulative line delta of the hunks
 * emitted before this one. Zero-length ranges name the line before them.
 */
export const newStartFor = (oldStart: number, oldCount: number, newCount: number, delta: number) => {
	if (oldCount === 0) return oldStart + 1 + delta
	if (newCount === 0) return oldStart - 1 + delta
	return oldStart + delta
}

export const formatHunkHeader = (
	oldStart: number,
	oldCount: number,
	newStart: number,
	newCount: number,
	caption: string,
): string => `@@ -${formatRange(oldStart, oldCount)} +${formatRange(newStart, newCount)} @@${caption}`

const PREFIX: Record<LineUnit["kind"], string> = { Context: " ", Addition: "+", Deletion: "-" }

const formatUnits = (units: ReadonlyArray<LineUnit>): string =>
	units
		.map((unit) => {
			const line = `${PREFIX[unit.kind]}${unit.text}\n`
			return unit.marker !== undefined ? `${line}\\${unit.marker}\n` : line
		})
		.join("")

interface EmittedHunk {
	readonly text: string
	readonly delta: number
}

/**
 * Render one hunk of a patch, or nothing when the pick leaves no change
 */
const emitHunk = (
	hunk: Hunk,
	pick: HunkPick,
	inverse: boolean,
	delta: number,
): EmittedHunk | undefined => {
	const oriented = inverse ? invertUnits(toUnits(hunk.lines)) : toUnits(hunk.lines)
	const units = terminateMarkedContext(applyPick(oriented, pick))
	if (!units.some((unit) => unit.kind !== "Context")) return undefined

	const oldStart = inverse ? hunk.newStart : hunk.oldStart
	let oldCount = 0
	let newCount = 0
	for (const unit of units) {
		if (unit.kind !== "Addition") oldCount++
		if (unit.kind !== "Deletion") newCount++
	}
	const newStart = newStartFor(oldStart, oldCount, newCount, delta)
	const header = formatHunkHeader(oldStart, oldCount, newStart, newCount, hunk.caption)
	return { text: `${header}\n${formatUnits(units)}`, delta: newCount - oldCount }
}

// ============================================================================
// File Headers
// ============================================================================

const NEEDS_QUOTING = /["\\\x00-\x1f\x7f]/

const C_ESCAPES: Record<string, string> = {
	"\x07": "\\a",
	"\b": "\\b",
	"\t": "\\t",
	"\n": "\\n",
	"\v": "\\v",
	"\f": "\\f",
	"\r": "\\r",
	'"': '\\"',
	"\\": "\\\\",
}

export const quotePath = (path: string): string => {
	if (!NEEDS_QUOTING.test(path)) return path
	const body = [...path]
		.map((ch) => {
			const escape = C_ESCAPES[ch]
			if (escape !== undefined) return escape
			const code = ch.charCodeAt(0)
			return code < 0x20 || code === 0x7f ? `\\${code.toString(8).padStart(3, "0")}` : ch
		})
		.join("")
	return `"${body}"`
}

const sidePath = (prefix: "a/" | "b/", path: string): string => quotePath(`${prefix}${path}`)

/**
 * Header for one file. Creation and deletion are kept only for whole-file
 * patches; a partial patch of a new or removed file is a plain modification.
 */
const fileHeader = (file: FileEntry, whole: boolean, inverse: boolean): string => {
	const a = sidePath("a/", file.path)
	const b = sidePath("b/", file.path)
	const lines = [`diff --git ${a} ${b}`]
	const oldMode = inverse ? file.newMode : file.oldMode
	const newMode = inverse ? file.oldMode : file.newMode
	const creates = whole && (inverse ? file.kind === "Deleted" : file.kind === "Added")
	const deletes = whole && (inverse ? file.kind === "Added" : file.kind === "Deleted")

	if (creates) {
		lines.push(`new file mode ${newMode ?? "100644"}`, "--- /dev/null", `+++ ${b}`)
	} else if (deletes) {
		lines.push(`deleted file mode ${oldMode ?? "100644"}`, `--- ${a}`, "+++ /dev/null")
	} else {
		lines.push(`--- ${a}`, `+++ ${b}`)
	}
	return `${lines.join("\n")}\n`
}

// ============================================================================
// Synthesis
// ============================================================================

const NOTHING_TO: Record<PatchAction, string> = {
	Stage: "Nothing to stage",
	Unstage: "Nothing to unstage",
	Discard: "Nothing to discard",
}

/**
 * Build the patch (and path operations) that apply `selection` for `action`
 */
export const synthesizePatch = (
	status: RepoStatus,
	selection: Selection,
	action: PatchAction,
): Either.Either<PatchPlan, SynthesisError> => {
	const inverse = isInverse(action)
	const resolved = resolveSelection(status, selection, sectionFor(action))
	const paths: OpaquePath[] = []
	const sections: string[] = []

	for (const { file, whole, hunks } of resolved) {
		if (whole && isOpaque(file)) {
			paths.push({
				path: file.path,
				kind: file.kind,
				...(file.previousPath !== undefined ? { previousPath: file.previousPath } : {}),
			})
			continue
		}

		const emitted: string[] = []
		let delta = 0
		for (const { index, pick } of hunks) {
			const hunk = file.hunks[index]
			if (!hunk) continue
			if (!hunkIsConsistent(hunk)) {
				return Either.left(
					new InvalidHunkStateError({
						message: `Hunk ${index + 1} of ${file.path} does not match its header ranges`,
						path: file.path,
						hunk: index,
					}),
				)
			}
			const result = emitHunk(hunk, pick, inverse, delta)
			if (!result) continue
			emitted.push(result.text)
			delta += result.delta
		}
		if (emitted.length > 0) sections.push(fileHeader(file, whole, inverse) + emitted.join(""))
	}

	if (sections.length === 0 && paths.length === 0) {
		return Either.left(new EmptySelectionError({ message: NOTHING_TO[action] }))
	}

	return Either.right({
		action,
		target: targetFor(action),
		...(sections.length > 0 ? { patch: sections.join("") } : {}),
		paths,
	})
}
