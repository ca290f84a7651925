/**
 * Key normalization
 *
 * Turns a blessed keypress into the key names bindings are written in:
 * printable characters as themselves (`j`, `G`, `:`, " "), named keys by
 * name (`return`, `escape`, `tab`, `up`...), modifiers as `C-x` / `M-x`.
 */

/**
 * The parts of a blessed key event that matter here
 */
export interface RawKey {
	readonly name?: string
	readonly ctrl?: boolean
	readonly meta?: boolean
	readonly shift?: boolean
}

const NAMED_KEYS = new Set([
	"return",
	"escape",
	"tab",
	"backspace",
	"delete",
	"insert",
	"up",
	"down",
	"left",
	"right",
	"home",
	"end",
	"pageup",
	"pagedown",
	"f1",
	"f2",
	"f3",
	"f4",
	"f5",
	"f6",
	"f7",
	"f8",
	"f9",
	"f10",
	"f11",
	"f12",
])

const ALIASES: Record<string, string> = {
	enter: "return",
	linefeed: "return",
}

const PRINTABLE = /^[^\u0000-\u001f\u007f]$/u

export const normalizeKey = (ch: string | undefined, key: RawKey | undefined): string | undefined => {
	const rawName = key?.name
	const name = rawName !== undefined ? (ALIASES[rawName] ?? rawName) : undefined

	if (name !== undefined && key?.ctrl) return `C-${name}`
	if (name !== undefined && key?.meta) return `M-${name}`
	if (name !== undefined && NAMED_KEYS.has(name)) return key?.shift && name === "tab" ? "S-tab" : name
	if (ch !== undefined && PRINTABLE.test(ch)) return ch
	return undefined
}
