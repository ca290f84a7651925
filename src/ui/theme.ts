/**
 * Styled rows to blessed markup
 *
 * The 16 base colors are written by name so they follow the terminal's own
 * palette; everything else as `#rrggbb`.
 */

import type { Color, StyledRow, StyledRun } from "../ansi/style.js"
import { toHex } from "../ansi/style.js"

const NAMES = ["black", "red", "green", "yellow", "blue", "magenta", "cyan", "white"] as const

/**
 * Color as blessed understands it; undefined for the terminal default
 */
export const colorName = (color: Color): string | undefined => {
	if (color._tag === "Indexed" && color.index < 16) {
		const base = NAMES[color.index % 8]
		return color.index < 8 ? base : `light-${base}`
	}
	return toHex(color)
}

export const escapeTags = (text: string): string =>
	text.replace(/[{}]/g, (ch) => (ch === "{" ? "{open}" : "{close}"))

export const runToTags = (styled: StyledRun): string => {
	const { style } = styled
	const fg = colorName(style.fg) ?? (style.dim ? "light-black" : undefined)
	const bg = colorName(style.bg)
	const open = [
		...(fg !== undefined ? [`{${fg}-fg}`] : []),
		...(bg !== undefined ? [`{${bg}-bg}`] : []),
		...(style.bold ? ["{bold}"] : []),
		...(style.underline ? ["{underline}"] : []),
		...(style.inverse ? ["{inverse}"] : []),
	]
	const text = escapeTags(styled.text)
	return open.length === 0 ? text : `${open.join("")}${text}{/}`
}

export const rowToTags = (row: StyledRow): string => row.map(runToTags).join("")
