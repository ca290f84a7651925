/**
 * Single-line editor for the minibuffer
 *
 * Pure state transitions over a buffer and a cursor measured in code points,
 * with emacs-style movement and a per-prompt history.
 */

// ============================================================================
// Types
// ============================================================================

export interface LineEditorState {
	readonly text: string
	readonly cursor: number
	/** Position in the history while browsing it; absent while editing */
	readonly historyIndex?: number
	/** Input typed before history browsing started */
	readonly draft: string
}

export const emptyEditor: LineEditorState = { text: "", cursor: 0, draft: "" }

export const editorWith = (text: string): LineEditorState => ({
	text,
	cursor: [...text].length,
	draft: "",
})

// ============================================================================
// Editing
// ============================================================================

const chars = (text: string): ReadonlyArray<string> => [...text]

const edit = (state: LineEditorState, text: string, cursor: number): LineEditorState => ({
	text,
	cursor,
	draft: state.draft,
})

export const insert = (state: LineEditorState, input: string): LineEditorState => {
	const current = chars(state.text)
	const added = chars(input)
	const text = [...current.slice(0, state.cursor), ...added, ...current.slice(state.cursor)].join("")
	return edit(state, text, state.cursor + added.length)
}

export const deleteBackward = (state: LineEditorState): LineEditorState => {
	if (state.cursor === 0) return state
	const current = chars(state.text)
	const text = [...current.slice(0, state.cursor - 1), ...current.slice(state.cursor)].join("")
	return edit(state, text, state.cursor - 1)
}

export const deleteForward = (state: LineEditorState): LineEditorState => {
	const current = chars(state.text)
	if (state.cursor >= current.length) return state
	const text = [...current.slice(0, state.cursor), ...current.slice(state.cursor + 1)].join("")
	return edit(state, text, state.cursor)
}

export const killToEnd = (state: LineEditorState): LineEditorState =>
	edit(state, chars(state.text).slice(0, state.cursor).join(""), state.cursor)

export const killToStart = (state: LineEditorState): LineEditorState =>
	edit(state, chars(state.text).slice(state.cursor).join(""), 0)

// ============================================================================
// Movement
// ============================================================================

const moveTo = (state: LineEditorState, cursor: number): LineEditorState => ({
	...state,
	cursor: Math.max(0, Math.min(cursor, chars(state.text).length)),
})

export const moveLeft = (state: LineEditorState) => moveTo(state, state.cursor - 1)
export const moveRight = (state: LineEditorState) => moveTo(state, state.cursor + 1)
export const moveHome = (state: LineEditorState) => moveTo(state, 0)
export const moveEnd = (state: LineEditorState) => moveTo(state, chars(state.text).length)

const isWordChar = (ch: string | undefined): boolean =>
	ch !== undefined && /[\p{L}\p{N}]/u.test(ch)

/**
 * Move to the end of the next word
 */
export const wordForward = (state: LineEditorState): LineEditorState => {
	const current = chars(state.text)
	let i = state.cursor
	while (i < current.length && !isWordChar(current[i])) i++
	while (i < current.length && isWordChar(current[i])) i++
	return moveTo(state, i)
}

/**
 * Move to the start of the previous word
 */
export const wordBackward = (state: LineEditorState): LineEditorState => {
	const current = chars(state.text)
	let i = state.cursor
	while (i > 0 && !isWordChar(current[i - 1])) i--
	while (i > 0 && isWordChar(current[i - 1])) i--
	return moveTo(state, i)
}

// ============================================================================
// History
// ============================================================================

/**
 * Step to an older entry. `history` is ordered oldest first.
 */
export const historyPrevious = (
	state: LineEditorState,
	history: ReadonlyArray<string>,
): LineEditorState => {
	if (history.length === 0) return state
	const index = state.historyIndex === undefined ? history.length - 1 : state.historyIndex - 1
	const entry = history[index]
	if (entry === undefined) return state
	const draft = state.historyIndex === undefined ? state.text : state.draft
	return { ...editorWith(entry), historyIndex: index, draft }
}

/**
 * Step to a newer entry, returning to the draft after the newest
 */
export const historyNext = (
	state: LineEditorState,
	history: ReadonlyArray<string>,
): LineEditorState => {
	if (state.historyIndex === undefined) return state
	const index = state.historyIndex + 1
	const entry = history[index]
	if (entry === undefined) return { ...editorWith(state.draft), draft: "" }
	return { ...editorWith(entry), historyIndex: index, draft: state.draft }
}

/**
 * Append a submitted entry, skipping blanks and immediate repeats
 */
export const pushHistory = (history: ReadonlyArray<string>, entry: string): ReadonlyArray<string> => {
	const trimmed = entry.trim()
	if (trimmed === "" || history.at(-1) === trimmed) return history
	return [...history, trimmed]
}

// ============================================================================
// Key handling
// ============================================================================

const isPrintable = (key: string): boolean => {
	const points = chars(key)
	const first = points[0]
	return points.length === 1 && first !== undefined && (first.codePointAt(0) ?? 0) >= 0x20
}

/**
 * Apply an editing key. Returns undefined for keys the editor does not own
 * (submit, cancel and anything unbound).
 */
export const handleEditorKey = (
	state: LineEditorState,
	key: string,
	history: ReadonlyArray<string>,
): LineEditorState | undefined => {
	switch (key) {
		case "left":
		case "C-b":
			return moveLeft(state)
		case "right":
		case "C-f":
			return moveRight(state)
		case "home":
		case "C-a":
			return moveHome(state)
		case "end":
		case "C-e":
			return moveEnd(state)
		case "M-b":
		case "M-left":
			return wordBackward(state)
		case "M-f":
		case "M-right":
			return wordForward(state)
		case "backspace":
		case "C-h":
			return deleteBackward(state)
		case "delete":
		case "C-d":
			return deleteForward(state)
		case "C-k":
			return killToEnd(state)
		case "C-u":
			return killToStart(state)
		case "up":
		case "C-p":
			return historyPrevious(state, history)
		case "down":
		case "C-n":
			return historyNext(state, history)
		default:
			return isPrintable(key) ? insert(state, key) : undefined
	}
}
