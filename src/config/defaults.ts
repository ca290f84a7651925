/**
 * Default Configuration Values
 *
 * Merged with user-provided config so every field of ResolvedConfig is set.
 */

import type { Color } from "../ansi/style.js"
import { DEFAULT_COLOR, parseColor } from "../ansi/style.js"
import { ACTION_NAMES, type ActionName, type KeymapOverrides } from "../services/keyboard/types.js"
import type { ColorsConfig, OptionsConfig, SiftConfig } from "./schema.js"

// ============================================================================
// Types
// ============================================================================

export type WsHighlightKind = "context" | "old" | "new"

export interface Palette {
	readonly foreground: Color
	readonly background: Color
	readonly heading: Color
	readonly hunkHead: Color
	readonly addition: Color
	readonly deletion: Color
	readonly key: Color
	readonly error: Color
}

export interface ResolvedConfig {
	readonly options: {
		readonly autoExpandFiles: boolean
		readonly autoExpandHunks: boolean
		readonly lookahead: number
		readonly truncateLines: boolean
		readonly wsErrorHighlight: ReadonlySet<WsHighlightKind>
		readonly sortBranches: string
		readonly shell: string
	}
	readonly colors: Palette
	readonly keymap: KeymapOverrides
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_COLORS = {
	foreground: "default",
	background: "default",
	heading: "yellow",
	hunkHead: "blue",
	addition: "green",
	deletion: "red",
	key: "green",
	error: "red",
} as const satisfies Record<keyof Palette, string>

export const DEFAULT_CONFIG = {
	options: {
		autoExpandFiles: false,
		autoExpandHunks: false,
		lookahead: 5,
		truncateLines: true,
		wsErrorHighlight: "default",
		sortBranches: "refname",
	},
	colors: DEFAULT_COLORS,
} as const

const defaultShell = (): string => process.env.SHELL || "sh"

// ============================================================================
// Merging
// ============================================================================

/**
 * Parse a git-style `wsErrorHighlight` value
 */
export const parseWsErrorHighlight = (value: string): ReadonlySet<WsHighlightKind> => {
	const kinds = new Set<WsHighlightKind>()
	for (const raw of value.split(",")) {
		const part = raw.trim()
		if (part === "none") kinds.clear()
		else if (part === "default") kinds.add("new")
		else if (part === "all") {
			kinds.add("context")
			kinds.add("old")
			kinds.add("new")
		} else if (part === "context" || part === "old" || part === "new") kinds.add(part)
	}
	return kinds
}

const color = (value: string | undefined, fallback: string): Color =>
	(value !== undefined ? parseColor(value) : undefined) ?? parseColor(fallback) ?? DEFAULT_COLOR

const toKeymap = (keymap: SiftConfig["keymap"]): KeymapOverrides => {
	const result: Partial<Record<ActionName, ReadonlyArray<string>>> = {}
	if (!keymap) return result
	for (const action of ACTION_NAMES) {
		const keys = keymap[action]
		if (keys !== undefined) result[action] = typeof keys === "string" ? [keys] : keys
	}
	return result
}

/**
 * Fill in every field the config leaves out
 */
export const mergeWithDefaults = (config: SiftConfig): ResolvedConfig => {
	const options: OptionsConfig = config.options ?? {}
	const colors: ColorsConfig = config.colors ?? {}
	return {
		options: {
			autoExpandFiles: options.autoExpandFiles ?? DEFAULT_CONFIG.options.autoExpandFiles,
			autoExpandHunks: options.autoExpandHunks ?? DEFAULT_CONFIG.options.autoExpandHunks,
			lookahead: options.lookahead ?? DEFAULT_CONFIG.options.lookahead,
			truncateLines: options.truncateLines ?? DEFAULT_CONFIG.options.truncateLines,
			wsErrorHighlight: parseWsErrorHighlight(
				options.wsErrorHighlight ?? DEFAULT_CONFIG.options.wsErrorHighlight,
			),
			sortBranches: options.sortBranches ?? DEFAULT_CONFIG.options.sortBranches,
			shell: options.shell ?? defaultShell(),
		},
		colors: {
			foreground: color(colors.foreground, DEFAULT_COLORS.foreground),
			background: color(colors.background, DEFAULT_COLORS.background),
			heading: color(colors.heading, DEFAULT_COLORS.heading),
			hunkHead: color(colors.hunkHead, DEFAULT_COLORS.hunkHead),
			addition: color(colors.addition, DEFAULT_COLORS.addition),
			deletion: color(colors.deletion, DEFAULT_COLORS.deletion),
			key: color(colors.key, DEFAULT_COLORS.key),
			error: color(colors.error, DEFAULT_COLORS.error),
		},
		keymap: toKeymap(config.keymap),
	}
}

export const DEFAULT_RESOLVED_CONFIG: ResolvedConfig = mergeWithDefaults({})
