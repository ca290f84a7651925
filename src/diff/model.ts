/**
 * Repository status model
 *
 * Immutable snapshot of a repository's working state, rebuilt on every
 * refresh. Expansion flags are the only view state carried on the model;
 * toggling one produces a new value that shares untouched entries.
 */

// ============================================================================
// Lines & Hunks
// ============================================================================

export type LineKind = "Context" | "Addition" | "Deletion" | "NoNewlineMarker"

export interface Line {
	readonly kind: LineKind
	/** Line content without the leading marker character */
	readonly text: string
}

export interface Hunk {
	readonly oldStart: number
	readonly oldCount: number
	readonly newStart: number
	readonly newCount: number
	/** Text after the closing `@@`, kept verbatim (usually starts with a space) */
	readonly caption: string
	readonly lines: ReadonlyArray<Line>
	readonly expanded: boolean
}

// ============================================================================
// Files
// ============================================================================

export type FileKind =
	| "Modified"
	| "Added"
	| "Deleted"
	| "Renamed"
	| "TypeChanged"
	| "Untracked"
	| "Conflicted"

export type Section = "unstaged" | "staged"

export const SECTIONS: ReadonlyArray<Section> = ["unstaged", "staged"]

export interface FileEntry {
	readonly path: string
	/** Source path of a rename or copy */
	readonly previousPath?: string
	readonly kind: FileKind
	readonly binary: boolean
	readonly oldMode?: string
	readonly newMode?: string
	readonly hunks: ReadonlyArray<Hunk>
	readonly expanded: boolean
}

// ============================================================================
// Repository
// ============================================================================

export type BranchInfo =
	| {
			readonly _tag: "Branch"
			readonly name: string
			readonly upstream?: string
			readonly ahead: number
			readonly behind: number
			readonly upstreamGone: boolean
	  }
	| { readonly _tag: "Detached" }
	| { readonly _tag: "Unborn"; readonly name: string }

export interface HeadCommit {
	readonly hash: string
	readonly title: string
}

export interface RepoStatus {
	readonly branch: BranchInfo
	readonly head?: HeadCommit
	readonly unstaged: ReadonlyArray<FileEntry>
	readonly staged: ReadonlyArray<FileEntry>
	readonly clean: boolean
}

/**
 * Raw command output a status is parsed from
 */
export interface RawSnapshot {
	readonly status: string
	readonly unstagedDiff: string
	readonly stagedDiff: string
	readonly head?: string
}

export interface Branch {
	readonly name: string
	readonly current: boolean
	readonly upstream?: string
}

// ============================================================================
// Helpers
// ============================================================================

export const filesIn = (status: RepoStatus, section: Section): ReadonlyArray<FileEntry> =>
	section === "unstaged" ? status.unstaged : status.staged

export const findFile = (
	status: RepoStatus,
	section: Section,
	path: string,
): FileEntry | undefined => filesIn(status, section).find((file) => file.path === path)

/**
 * Lines that count toward a hunk's ranges (markers excluded)
 */
export const countLines = (
	lines: ReadonlyArray<Line>,
): { readonly context: number; readonly additions: number; readonly deletions: number } => {
	let context = 0
	let additions = 0
	let deletions = 0
	for (const line of lines) {
		if (line.kind === "Context") context++
		else if (line.kind === "Addition") additions++
		else if (line.kind === "Deletion") deletions++
	}
	return { context, additions, deletions }
}

export const hunkIsConsistent = (hunk: Hunk): boolean => {
	const { context, additions, deletions } = countLines(hunk.lines)
	return context + deletions === hunk.oldCount && context + additions === hunk.newCount
}

/**
 * Content identity of a hunk, stable when only its position in the file moves
 */
export const hunkSignature = (hunk: Hunk): string =>
	hunk.lines.map((line) => `${line.kind[0]}${line.text}`).join("\n")

export const hasMode = (file: FileEntry): boolean =>
	file.oldMode !== undefined && file.newMode !== undefined && file.oldMode !== file.newMode

/**
 * Entries that cannot be expressed as hunk patches and are handled by path
 */
export const isOpaque = (file: FileEntry): boolean =>
	file.hunks.length === 0 ||
	file.binary ||
	file.kind === "Untracked" ||
	file.kind === "Conflicted" ||
	file.kind === "Renamed" ||
	file.kind === "TypeChanged" ||
	file.previousPath !== undefined ||
	hasMode(file)

const replaceAt = <A>(items: ReadonlyArray<A>, index: number, f: (a: A) => A): ReadonlyArray<A> =>
	items.map((item, i) => (i === index ? f(item) : item))

export const updateFile = (
	status: RepoStatus,
	section: Section,
	path: string,
	f: (file: FileEntry) => FileEntry,
): RepoStatus => {
	const files = filesIn(status, section)
	const index = files.findIndex((file) => file.path === path)
	if (index < 0) return status
	const next = replaceAt(files, index, f)
	return section === "unstaged" ? { ...status, unstaged: next } : { ...status, staged: next }
}

export const updateHunk = (
	status: RepoStatus,
	section: Section,
	path: string,
	hunkIndex: number,
	f: (hunk: Hunk) => Hunk,
): RepoStatus =>
	updateFile(status, section, path, (file) =>
		hunkIndex < 0 || hunkIndex >= file.hunks.length
			? file
			: { ...file, hunks: replaceAt(file.hunks, hunkIndex, f) },
	)
