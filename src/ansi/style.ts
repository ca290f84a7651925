/**
 * Text styles shared by the escape-sequence interpreter and the renderer
 */

// ============================================================================
// Types
// ============================================================================

export type Color =
	| { readonly _tag: "Default" }
	| { readonly _tag: "Indexed"; readonly index: number }
	| { readonly _tag: "Rgb"; readonly r: number; readonly g: number; readonly b: number }

export interface Style {
	readonly fg: Color
	readonly bg: Color
	readonly bold: boolean
	readonly dim: boolean
	readonly italic: boolean
	readonly underline: boolean
	readonly inverse: boolean
}

export interface StyledRun {
	readonly text: string
	readonly style: Style
}

export type StyledRow = ReadonlyArray<StyledRun>

// ============================================================================
// Constructors
// ============================================================================

export const DEFAULT_COLOR: Color = { _tag: "Default" }

export const indexed = (index: number): Color => ({ _tag: "Indexed", index })

export const rgb = (r: number, g: number, b: number): Color => ({ _tag: "Rgb", r, g, b })

export const DEFAULT_STYLE: Style = {
	fg: DEFAULT_COLOR,
	bg: DEFAULT_COLOR,
	bold: false,
	dim: false,
	italic: false,
	underline: false,
	inverse: false,
}

export const run = (text: string, style: Partial<Style> = {}): StyledRun => ({
	text,
	style: { ...DEFAULT_STYLE, ...style },
})

export const colorEquals = (a: Color, b: Color): boolean => {
	switch (a._tag) {
		case "Default":
			return b._tag === "Default"
		case "Indexed":
			return b._tag === "Indexed" && a.index === b.index
		case "Rgb":
			return b._tag === "Rgb" && a.r === b.r && a.g === b.g && a.b === b.b
	}
}

export const styleEquals = (a: Style, b: Style): boolean =>
	colorEquals(a.fg, b.fg) &&
	colorEquals(a.bg, b.bg) &&
	a.bold === b.bold &&
	a.dim === b.dim &&
	a.italic === b.italic &&
	a.underline === b.underline &&
	a.inverse === b.inverse

// ============================================================================
// Color names
// ============================================================================

const BASE_NAMES = ["black", "red", "green", "yellow", "blue", "magenta", "cyan", "white"] as const

/**
 * Parse a configured color: `default`, an ANSI name (`red`, `bright-red`),
 * a palette index `0`-`255` or `#rrggbb`
 */
export const parseColor = (value: string): Color | undefined => {
	const name = value.trim().toLowerCase()
	if (name === "default" || name === "reset") return DEFAULT_COLOR

	const hex = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/.exec(name)
	if (hex?.[1] !== undefined && hex[2] !== undefined && hex[3] !== undefined) {
		return rgb(Number.parseInt(hex[1], 16), Number.parseInt(hex[2], 16), Number.parseInt(hex[3], 16))
	}

	if (/^\d{1,3}$/.test(name)) {
		const index = Number(name)
		return index <= 255 ? indexed(index) : undefined
	}

	const bright = /^(?:bright-?|light-?)(\w+)$/.exec(name)
	const base = bright?.[1] ?? (name === "grey" || name === "gray" ? "bright-black" : name)
	const index = BASE_NAMES.findIndex((candidate) => candidate === base)
	if (index >= 0) return indexed(bright ? index + 8 : index)
	if (base === "bright-black") return indexed(8)
	return undefined
}

// xterm defaults for the 16 base colors
const ANSI_16: ReadonlyArray<readonly [number, number, number]> = [
	[0, 0, 0],
	[205, 0, 0],
	[0, 205, 0],
	[205, 205, 0],
	[0, 0, 238],
	[205, 0, 205],
	[0, 205, 205],
	[229, 229, 229],
	[127, 127, 127],
	[255, 0, 0],
	[0, 255, 0],
	[255, 255, 0],
	[92, 92, 255],
	[255, 0, 255],
	[0, 255, 255],
	[255, 255, 255],
]

const CUBE_LEVELS = [0, 95, 135, 175, 215, 255]

/**
 * Resolve a color to RGB; undefined for the terminal default
 */
export const toRgb = (color: Color): readonly [number, number, number] | undefined => {
	switch (color._tag) {
		case "Default":
			return undefined
		case "Rgb":
			return [color.r, color.g, color.b]
		case "Indexed": {
			const { index } = color
			if (index < 16) return ANSI_16[index]
			if (index < 232) {
				const n = index - 16
				return [
					CUBE_LEVELS[Math.floor(n / 36)] ?? 0,
					CUBE_LEVELS[Math.floor(n / 6) % 6] ?? 0,
					CUBE_LEVELS[n % 6] ?? 0,
				]
			}
			const level = 8 + (index - 232) * 10
			return [level, level, level]
		}
	}
}

export const toHex = (color: Color): string | undefined => {
	const value = toRgb(color)
	if (!value) return undefined
	return `#${value.map((c) => c.toString(16).padStart(2, "0")).join("")}`
}
