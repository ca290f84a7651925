/**
 * Streaming ANSI escape-sequence interpreter
 *
 * Feeds raw subprocess output (bytes or text, in chunks of any size) through
 * a small VT-style state machine. SGR sequences change the current style and
 * close the run in progress; every other escape, control or OSC sequence is
 * consumed silently. Bytes are decoded as UTF-8 with U+FFFD for malformed input.
 */

import { DEFAULT_COLOR, DEFAULT_STYLE, indexed, rgb } from "./style.js"
import type { Color, Style, StyledRow, StyledRun } from "./style.js"

// ============================================================================
// Types
// ============================================================================

type ParserState =
	| { readonly _tag: "Ground" }
	| { readonly _tag: "Escape" }
	| { readonly _tag: "EscapeIntermediate" }
	| { readonly _tag: "Csi"; readonly params: string; readonly intermediate: boolean }
	| { readonly _tag: "Osc"; readonly sawEscape: boolean }
	| { readonly _tag: "String"; readonly sawEscape: boolean }

export interface AnsiInterpreter {
	/** Process a chunk; returns the runs closed by SGR sequences in it */
	readonly feed: (chunk: string | Uint8Array) => ReadonlyArray<StyledRun>
	/** Flush the decoder and return the trailing run */
	readonly end: () => ReadonlyArray<StyledRun>
}

const ESC = "\x1b"
const BEL = "\x07"
const MAX_PARAMS = 64

const GROUND: ParserState = { _tag: "Ground" }

// ============================================================================
// SGR
// ============================================================================

const toNumber = (param: string | undefined): number | undefined => {
	if (param === undefined || param === "") return undefined
	const value = Number(param)
	return Number.isInteger(value) ? value : undefined
}

const clampByte = (value: number | undefined): number =>
	Math.min(255, Math.max(0, value ?? 0))

/**
 * Extended color from the parameters after 38/48. Returns the color and how
 * many parameters it consumed.
 */
const extendedColor = (
	params: ReadonlyArray<string>,
	from: number,
): { readonly color?: Color; readonly used: number } => {
	const mode = toNumber(params[from])
	if (mode === 5) {
		const index = toNumber(params[from + 1])
		return index === undefined ? { used: 2 } : { color: indexed(clampByte(index)), used: 2 }
	}
	if (mode === 2) {
		return {
			color: rgb(
				clampByte(toNumber(params[from + 1])),
				clampByte(toNumber(params[from + 2])),
				clampByte(toNumber(params[from + 3])),
			),
			used: 4,
		}
	}
	return { used: params.length }
}

const applyCode = (style: Style, code: number): Style => {
	if (code === 0) return DEFAULT_STYLE
	if (code === 1) return { ...style, bold: true }
	if (code === 2) return { ...style, dim: true }
	if (code === 3) return { ...style, italic: true }
	if (code === 4) return { ...style, underline: true }
	if (code === 7) return { ...style, inverse: true }
	if (code === 22) return { ...style, bold: false, dim: false }
	if (code === 23) return { ...style, italic: false }
	if (code === 24) return { ...style, underline: false }
	if (code === 27) return { ...style, inverse: false }
	if (code >= 30 && code <= 37) return { ...style, fg: indexed(code - 30) }
	if (code === 39) return { ...style, fg: DEFAULT_COLOR }
	if (code >= 40 && code <= 47) return { ...style, bg: indexed(code - 40) }
	if (code === 49) return { ...style, bg: DEFAULT_COLOR }
	if (code >= 90 && code <= 97) return { ...style, fg: indexed(code - 90 + 8) }
	if (code >= 100 && code <= 107) return { ...style, bg: indexed(code - 100 + 8) }
	return style
}

/**
 * Apply the parameters of one `CSI ... m` sequence
 */
export const applySgr = (style: Style, params: string): Style => {
	if (params === "") return DEFAULT_STYLE
	const groups = params.split(";")
	let next = style

	for (let i = 0; i < groups.length; i++) {
		const group = groups[i] ?? ""
		const sub = group.split(":")
		const code = toNumber(sub[0]) ?? 0

		if (code === 38 || code === 48) {
			let color: Color | undefined
			if (sub.length > 1) {
				// colon form may carry a color-space id: 38:2::r:g:b
				const values = sub[1] === "2" && sub.length >= 6 ? ["2", ...sub.slice(3)] : sub.slice(1)
				color = extendedColor(values, 0).color
			} else {
				const extended = extendedColor(groups, i + 1)
				color = extended.color
				i += extended.used
			}
			if (color) next = code === 38 ? { ...next, fg: color } : { ...next, bg: color }
			continue
		}
		next = applyCode(next, code)
	}
	return next
}

// ============================================================================
// Interpreter
// ============================================================================

const isControl = (code: number) => code < 0x20 || code === 0x7f || (code >= 0x80 && code < 0xa0)

export const createAnsiInterpreter = (): AnsiInterpreter => {
	const decoder = new TextDecoder("utf-8")
	let state: ParserState = GROUND
	let style: Style = DEFAULT_STYLE
	let text = ""

	const processChar = (ch: string, closed: StyledRun[]): void => {
		const code = ch.charCodeAt(0)
		switch (state._tag) {
			case "Ground": {
				if (ch === ESC) state = { _tag: "Escape" }
				else if (code === 0x9b) state = { _tag: "Csi", params: "", intermediate: false }
				else if (ch === "\n" || ch === "\t" || !isControl(code)) text += ch
				return
			}
			case "Escape": {
				if (ch === "[") state = { _tag: "Csi", params: "", intermediate: false }
				else if (ch === "]") state = { _tag: "Osc", sawEscape: false }
				else if (ch === "P" || ch === "X" || ch === "^" || ch === "_")
					state = { _tag: "String", sawEscape: false }
				else if (code >= 0x20 && code <= 0x2f) state = { _tag: "EscapeIntermediate" }
				else if (ch !== ESC) state = GROUND
				return
			}
			case "EscapeIntermediate": {
				if (code < 0x20 || code > 0x2f) state = ch === ESC ? { _tag: "Escape" } : GROUND
				return
			}
			case "Csi": {
				if (code >= 0x30 && code <= 0x3f) {
					state = { ...state, params: state.params + ch }
				} else if (code >= 0x20 && code <= 0x2f) {
					state = { ...state, intermediate: true }
				} else if (code >= 0x40 && code <= 0x7e) {
					const { params, intermediate } = state
					state = GROUND
					const isSgr = ch === "m" && !intermediate && !/^[<=>?]/.test(params)
					if (isSgr && params.length <= MAX_PARAMS) {
						closed.push({ text, style })
						text = ""
						style = applySgr(style, params)
					}
				} else if (ch === ESC) {
					state = { _tag: "Escape" }
				} else if (code === 0x18 || code === 0x1a) {
					state = GROUND
				}
				return
			}
			case "Osc":
			case "String": {
				if (state.sawEscape) {
					if (ch === "\\") state = GROUND
					else {
						state = { _tag: "Escape" }
						processChar(ch, closed)
					}
				} else if (ch === ESC) {
					state = { ...state, sawEscape: true }
				} else if (ch === BEL || code === 0x9c) {
					state = GROUND
				}
				return
			}
		}
	}

	const process = (input: string): ReadonlyArray<StyledRun> => {
		const closed: StyledRun[] = []
		for (const ch of input) processChar(ch, closed)
		return closed
	}

	return {
		feed: (chunk) => process(typeof chunk === "string" ? chunk : decoder.decode(chunk, { stream: true })),
		end: () => {
			const closed = [...process(decoder.decode())]
			closed.push({ text, style })
			text = ""
			state = GROUND
			return closed
		},
	}
}

/**
 * Interpret a complete output in one go
 */
export const interpretAnsi = (input: string | Uint8Array): ReadonlyArray<StyledRun> => {
	const interpreter = createAnsiInterpreter()
	return [...interpreter.feed(input), ...interpreter.end()]
}

// ============================================================================
// Layout helpers
// ============================================================================

/**
 * Split runs at newlines into display rows, dropping empty runs. A trailing
 * newline does not produce an extra row.
 */
export const splitRunsIntoRows = (runs: ReadonlyArray<StyledRun>): ReadonlyArray<StyledRow> => {
	const rows: StyledRun[][] = [[]]
	for (const current of runs) {
		const parts = current.text.split("\n")
		parts.forEach((part, i) => {
			if (i > 0) rows.push([])
			if (part !== "") rows[rows.length - 1]?.push({ text: part, style: current.style })
		})
	}
	if (rows.length > 1 && rows[rows.length - 1]?.length === 0) rows.pop()
	return rows
}

export const plainText = (runs: ReadonlyArray<StyledRun>): string =>
	runs.map((current) => current.text).join("")
