/**
 * Status & diff parser
 *
 * Turns `git status --porcelain=v1 --branch` output and two unified diffs
 * (working tree vs index, index vs HEAD) into a RepoStatus. The grammar is
 * walked top-down by its structural markers; line counts in hunk headers are
 * recorded but not trusted for framing.
 */

import { Either } from "effect"
import { ParseError } from "./errors.js"
import type {
	BranchInfo,
	FileEntry,
	FileKind,
	HeadCommit,
	Hunk,
	Line,
	RawSnapshot,
	RepoStatus,
} from "./model.js"

// ============================================================================
// Types
// ============================================================================

export interface StatusListingEntry {
	readonly path: string
	readonly previousPath?: string
	readonly staged?: FileKind
	readonly unstaged?: FileKind
}

export interface StatusListing {
	readonly branch: BranchInfo
	readonly entries: ReadonlyArray<StatusListingEntry>
}

/**
 * One `diff --git` section of a unified diff
 */
export interface FileDiff {
	readonly path: string
	readonly oldPath?: string
	readonly newPath?: string
	readonly isNew: boolean
	readonly isDeleted: boolean
	readonly binary: boolean
	/** Combined (merge) diff, shown without hunks */
	readonly combined: boolean
	readonly oldMode?: string
	readonly newMode?: string
	readonly hunks: ReadonlyArray<Hunk>
}

export interface ParseOptions {
	readonly autoExpandFiles: boolean
	readonly autoExpandHunks: boolean
}

const DEFAULT_PARSE_OPTIONS: ParseOptions = { autoExpandFiles: false, autoExpandHunks: false }

// ============================================================================
// Path quoting
// ============================================================================

const ESCAPES: Record<string, number> = {
	a: 7,
	b: 8,
	t: 9,
	n: 10,
	v: 11,
	f: 12,
	r: 13,
	'"': 34,
	"\\": 92,
}

/**
 * Undo git's C-style path quoting (`"dir/caf\303\251.txt"`)
 */
export const unquotePath = (raw: string): string => {
	if (raw.length < 2 || !raw.startsWith('"') || !raw.endsWith('"')) return raw
	const body = raw.slice(1, -1)
	const bytes: number[] = []
	const encoder = new TextEncoder()
	for (let i = 0; i < body.length; i++) {
		const ch = body.charAt(i)
		if (ch !== "\\") {
			bytes.push(...encoder.encode(ch))
			continue
		}
		const next = body.charAt(i + 1)
		const octal = /^[0-7]{3}/.exec(body.slice(i + 1, i + 4))
		if (octal) {
			bytes.push(Number.parseInt(octal[0], 8))
			i += 3
		} else if (next in ESCAPES) {
			bytes.push(ESCAPES[next] ?? 0)
			i += 1
		} else {
			bytes.push(92)
		}
	}
	return new TextDecoder().decode(new Uint8Array(bytes))
}

// ============================================================================
// Status listing
// ============================================================================

const STATUS_CODES: Record<string, FileKind> = {
	M: "Modified",
	A: "Added",
	D: "Deleted",
	R: "Renamed",
	C: "Added",
	T: "TypeChanged",
}

const UNMERGED = new Set(["DD", "AU", "UD", "UA", "DU", "AA", "UU"])

const parseBranchHeader = (header: string): BranchInfo => {
	const unborn = /^(?:No commits yet on|Initial commit on) (.+)$/.exec(header)
	if (unborn?.[1] !== undefined) return { _tag: "Unborn", name: unborn[1] }
	if (header.startsWith("HEAD (no branch)")) return { _tag: "Detached" }

	const match = /^(.+?)(?:\.\.\.(\S+))?(?: \[(.*)\])?$/.exec(header)
	const name = match?.[1] ?? header
	const upstream = match?.[2]
	const tracking = match?.[3] ?? ""
	const ahead = /ahead (\d+)/.exec(tracking)
	const behind = /behind (\d+)/.exec(tracking)
	return {
		_tag: "Branch",
		name,
		...(upstream !== undefined ? { upstream } : {}),
		ahead: ahead?.[1] !== undefined ? Number(ahead[1]) : 0,
		behind: behind?.[1] !== undefined ? Number(behind[1]) : 0,
		upstreamGone: tracking === "gone",
	}
}

/**
 * Parse `git status --porcelain=v1 --branch` output
 */
export const parseStatusListing = (text: string): Either.Either<StatusListing, ParseError> => {
	let branch: BranchInfo = { _tag: "Detached" }
	const entries: StatusListingEntry[] = []
	const lines = text.split("\n")

	for (const [i, raw] of lines.entries()) {
		const line = raw.endsWith("\r") ? raw.slice(0, -1) : raw
		if (line === "") continue
		if (line.startsWith("## ")) {
			branch = parseBranchHeader(line.slice(3))
			continue
		}
		if (line.length < 4 || line.charAt(2) !== " ") {
			return Either.left(
				new ParseError({ message: `Malformed status line: ${line}`, line: i + 1, input: "status" }),
			)
		}

		const code = line.slice(0, 2)
		const rest = line.slice(3)
		if (code === "!!") continue

		const arrow = rest.indexOf(" -> ")
		const path = unquotePath(arrow >= 0 ? rest.slice(arrow + 4) : rest)
		const previousPath = arrow >= 0 ? unquotePath(rest.slice(0, arrow)) : undefined
		const base = previousPath !== undefined ? { path, previousPath } : { path }

		if (code === "??") {
			entries.push({ ...base, unstaged: "Untracked" })
		} else if (UNMERGED.has(code)) {
			entries.push({ ...base, unstaged: "Conflicted" })
		} else {
			const staged = STATUS_CODES[code.charAt(0)]
			const unstaged = STATUS_CODES[code.charAt(1)]
			if (staged === undefined && unstaged === undefined) {
				return Either.left(
					new ParseError({
						message: `Unknown status code "${code}" for ${path}`,
						line: i + 1,
						input: "status",
					}),
				)
			}
			entries.push({
				...base,
				...(staged !== undefined ? { staged } : {}),
				...(unstaged !== undefined ? { unstaged } : {}),
			})
		}
	}

	return Either.right({ branch, entries })
}

// ============================================================================
// Unified diff
// ============================================================================

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@(.*)$/

interface MutableFileDiff {
	oldPath?: string
	newPath?: string
	gitPaths?: { readonly a: string; readonly b: string }
	renameFrom?: string
	renameTo?: string
	isNew: boolean
	isDeleted: boolean
	binary: boolean
	combined: boolean
	oldMode?: string
	newMode?: string
	hunks: Hunk[]
	current?: { header: Omit<Hunk, "lines" | "expanded">; lines: Line[] }
}

/**
 * Split the `a/x b/y` tail of a `diff --git` line. Quoted names are
 * unambiguous; unquoted ones are split where both halves name the same path.
 */
const parseGitPaths = (tail: string): { readonly a: string; readonly b: string } | undefined => {
	const quoted = /^("(?:[^"\\]|\\.)*"|\S+) ("(?:[^"\\]|\\.)*"|\S+)$/.exec(tail)
	if (tail.startsWith('"') || tail.endsWith('"')) {
		if (quoted?.[1] === undefined || quoted[2] === undefined) return undefined
		return { a: stripPrefix(unquotePath(quoted[1])), b: stripPrefix(unquotePath(quoted[2])) }
	}
	if ((tail.length - 1) % 2 === 0) {
		const half = (tail.length - 1) / 2
		const a = tail.slice(0, half)
		const b = tail.slice(half + 1)
		if (tail.charAt(half) === " " && a.slice(2) === b.slice(2)) {
			return { a: stripPrefix(a), b: stripPrefix(b) }
		}
	}
	const space = tail.indexOf(" b/")
	if (space < 0) return undefined
	return { a: stripPrefix(tail.slice(0, space)), b: stripPrefix(tail.slice(space + 1)) }
}

const stripPrefix = (path: string): string =>
	path.startsWith("a/") || path.startsWith("b/") ? path.slice(2) : path

/**
 * Path field of a `---`/`+++` line; undefined for /dev/null
 */
const parseMarkerPath = (field: string): string | undefined => {
	const trimmed = field.endsWith("\t") ? field.slice(0, -1) : field
	if (trimmed === "/dev/null") return undefined
	return stripPrefix(unquotePath(trimmed))
}

const closeHunk = (file: MutableFileDiff, expanded: boolean): void => {
	if (file.current) {
		file.hunks.push({ ...file.current.header, lines: file.current.lines, expanded })
		file.current = undefined
	}
}

const finishFile = (
	file: MutableFileDiff,
	line: number,
	expanded: boolean,
): Either.Either<FileDiff, ParseError> => {
	closeHunk(file, expanded)
	const newPath = file.newPath ?? file.renameTo ?? (file.isDeleted ? undefined : file.gitPaths?.b)
	const oldPath = file.oldPath ?? file.renameFrom ?? (file.isNew ? undefined : file.gitPaths?.a)
	const path = newPath ?? oldPath
	if (path === undefined) {
		return Either.left(
			new ParseError({ message: "File header has no path", line, input: "diff" }),
		)
	}
	return Either.right({
		path,
		...(oldPath !== undefined ? { oldPath } : {}),
		...(newPath !== undefined ? { newPath } : {}),
		isNew: file.isNew,
		isDeleted: file.isDeleted,
		binary: file.binary,
		combined: file.combined,
		...(file.oldMode !== undefined ? { oldMode: file.oldMode } : {}),
		...(file.newMode !== undefined ? { newMode: file.newMode } : {}),
		hunks: file.hunks,
	})
}

const emptyFile = (): MutableFileDiff => ({
	isNew: false,
	isDeleted: false,
	binary: false,
	combined: false,
	hunks: [],
})

const applyHeaderLine = (file: MutableFileDiff, line: string): void => {
	const field = (prefix: string) => line.slice(prefix.length)
	if (line.startsWith("--- ")) file.oldPath = parseMarkerPath(field("--- "))
	else if (line.startsWith("+++ ")) file.newPath = parseMarkerPath(field("+++ "))
	else if (line.startsWith("old mode ")) file.oldMode = field("old mode ")
	else if (line.startsWith("new mode ")) file.newMode = field("new mode ")
	else if (line.startsWith("new file mode ")) {
		file.isNew = true
		file.newMode = field("new file mode ")
	} else if (line.startsWith("deleted file mode ")) {
		file.isDeleted = true
		file.oldMode = field("deleted file mode ")
	} else if (line.startsWith("rename from ")) file.renameFrom = unquotePath(field("rename from "))
	else if (line.startsWith("rename to ")) file.renameTo = unquotePath(field("rename to "))
	else if (line.startsWith("copy from ")) file.renameFrom = unquotePath(field("copy from "))
	else if (line.startsWith("copy to ")) file.renameTo = unquotePath(field("copy to "))
	else if (line.startsWith("index ")) {
		const mode = /^index \S+ (\d+)$/.exec(line)?.[1]
		if (mode !== undefined) {
			file.oldMode ??= mode
			file.newMode ??= mode
		}
	} else if (line.startsWith("Binary files ") || line === "GIT binary patch") {
		file.binary = true
	}
}

const LINE_KINDS: Record<string, Line["kind"]> = {
	" ": "Context",
	"+": "Addition",
	"-": "Deletion",
	"\\": "NoNewlineMarker",
}

/**
 * Parse the output of `git diff` (with or without `--cached`)
 */
export const parseUnifiedDiff = (
	text: string,
	options: ParseOptions = DEFAULT_PARSE_OPTIONS,
): Either.Either<ReadonlyArray<FileDiff>, ParseError> => {
	const files: FileDiff[] = []
	const lines = text.split("\n")
	if (lines.at(-1) === "") lines.pop()

	let file: MutableFileDiff | undefined
	let fileStart = 0

	const flush = (): ParseError | undefined => {
		if (!file) return undefined
		const result = finishFile(file, fileStart, options.autoExpandHunks)
		file = undefined
		if (Either.isLeft(result)) return result.left
		files.push(result.right)
		return undefined
	}

	for (const [i, line] of lines.entries()) {
		const lineNumber = i + 1

		if (line.startsWith("diff --git ")) {
			const error = flush()
			if (error) return Either.left(error)
			file = emptyFile()
			fileStart = lineNumber
			const gitPaths = parseGitPaths(line.slice("diff --git ".length))
			if (gitPaths) file.gitPaths = gitPaths
			continue
		}
		if (line.startsWith("diff --cc ") || line.startsWith("diff --combined ")) {
			const error = flush()
			if (error) return Either.left(error)
			const path = unquotePath(line.slice(line.indexOf(" ", 5) + 1))
			file = { ...emptyFile(), combined: true, gitPaths: { a: path, b: path } }
			fileStart = lineNumber
			continue
		}
		if (line.startsWith("* Unmerged path ")) {
			const error = flush()
			if (error) return Either.left(error)
			continue
		}
		if (!file) continue
		if (file.combined) continue

		if (line.startsWith("@@")) {
			const header = HUNK_HEADER.exec(line)
			if (!header) {
				return Either.left(
					new ParseError({ message: `Malformed hunk header: ${line}`, line: lineNumber, input: "diff" }),
				)
			}
			closeHunk(file, options.autoExpandHunks)
			file.current = {
				header: {
					oldStart: Number(header[1]),
					oldCount: header[2] !== undefined ? Number(header[2]) : 1,
					newStart: Number(header[3]),
					newCount: header[4] !== undefined ? Number(header[4]) : 1,
					caption: header[5] ?? "",
				},
				lines: [],
			}
			continue
		}

		if (!file.current) {
			applyHeaderLine(file, line)
			continue
		}

		if (line === "") {
			file.current.lines.push({ kind: "Context", text: "" })
			continue
		}
		const kind = LINE_KINDS[line.charAt(0)]
		if (kind === undefined) {
			return Either.left(
				new ParseError({
					message: `Unexpected line in hunk: ${line.slice(0, 40)}`,
					line: lineNumber,
					input: "diff",
				}),
			)
		}
		file.current.lines.push({ kind, text: line.slice(1) })
	}

	const error = flush()
	if (error) return Either.left(error)
	return Either.right(files)
}

// ============================================================================
// Head commit
// ============================================================================

/**
 * Parse `git log -1 --format=%h%x09%s`; empty output means no commits
 */
export const parseHeadCommit = (text: string | undefined): HeadCommit | undefined => {
	const line = text?.split("\n")[0]?.trim()
	if (!line) return undefined
	const tab = line.indexOf("\t")
	return tab < 0 ? { hash: line, title: "" } : { hash: line.slice(0, tab), title: line.slice(tab + 1) }
}

// ============================================================================
// Repository status
// ============================================================================

const toEntry = (
	entry: StatusListingEntry,
	kind: FileKind,
	diff: FileDiff | undefined,
	side: "staged" | "unstaged",
	options: ParseOptions,
): FileEntry => {
	const previousPath = side === "staged" ? entry.previousPath : undefined
	return {
		path: entry.path,
		...(previousPath !== undefined ? { previousPath } : {}),
		kind,
		binary: diff?.binary ?? false,
		...(diff?.oldMode !== undefined ? { oldMode: diff.oldMode } : {}),
		...(diff?.newMode !== undefined ? { newMode: diff.newMode } : {}),
		hunks: kind === "Untracked" || kind === "Conflicted" || diff?.combined ? [] : (diff?.hunks ?? []),
		expanded: options.autoExpandFiles,
	}
}

/**
 * Build a RepoStatus from one snapshot of raw command output
 */
export const parseRepoStatus = (
	snapshot: RawSnapshot,
	options: ParseOptions = DEFAULT_PARSE_OPTIONS,
): Either.Either<RepoStatus, ParseError> =>
	Either.gen(function* () {
		const listing = yield* parseStatusListing(snapshot.status)
		const unstagedDiffs = yield* parseUnifiedDiff(snapshot.unstagedDiff, options)
		const stagedDiffs = yield* parseUnifiedDiff(snapshot.stagedDiff, options)

		const byPath = (diffs: ReadonlyArray<FileDiff>) => {
			const map = new Map<string, FileDiff>()
			for (const diff of diffs) map.set(diff.path, diff)
			return map
		}
		const unstagedByPath = byPath(unstagedDiffs)
		const stagedByPath = byPath(stagedDiffs)

		const unstaged: FileEntry[] = []
		const staged: FileEntry[] = []
		for (const entry of listing.entries) {
			if (entry.unstaged !== undefined) {
				unstaged.push(
					toEntry(entry, entry.unstaged, unstagedByPath.get(entry.path), "unstaged", options),
				)
			}
			if (entry.staged !== undefined) {
				staged.push(toEntry(entry, entry.staged, stagedByPath.get(entry.path), "staged", options))
			}
		}

		const head = parseHeadCommit(snapshot.head)
		return {
			branch: listing.branch,
			...(head !== undefined ? { head } : {}),
			unstaged,
			staged,
			clean: unstaged.length === 0 && staged.length === 0,
		}
	})
