/**
 * Configuration Schema
 *
 * Effect Schema definitions for the JSON config file. Every field is
 * optional; defaults fill in the rest (see defaults.ts).
 */

import { Schema } from "effect"
import { parseColor } from "../ansi/style.js"
import { ACTION_NAMES } from "../services/keyboard/types.js"

// ============================================================================
// Field Schemas
// ============================================================================

/**
 * A color: `default`, an ANSI name, a palette index or `#rrggbb`
 */
export const ColorSchema = Schema.String.pipe(
	Schema.filter((value) => parseColor(value) !== undefined, {
		message: () => "expected a color name, a number 0-255 or #rrggbb",
	}),
)

const WS_HIGHLIGHT_PARTS = new Set(["none", "default", "all", "context", "old", "new"])

/**
 * Line kinds whose trailing whitespace is highlighted, git-style:
 * `none` or a comma list of `context`, `old`, `new`, `all`, `default`
 */
export const WsErrorHighlightSchema = Schema.String.pipe(
	Schema.filter(
		(value) => value.split(",").every((part) => WS_HIGHLIGHT_PARTS.has(part.trim())),
		{ message: () => "expected none, default, all or a comma list of context, old, new" },
	),
)

export const KeyListSchema = Schema.Union(
	Schema.NonEmptyString,
	Schema.Array(Schema.NonEmptyString).pipe(Schema.minItems(1)),
)

// ============================================================================
// Section Schemas
// ============================================================================

export const OptionsConfigSchema = Schema.Struct({
	/** Expand every file when the status is loaded */
	autoExpandFiles: Schema.optional(Schema.Boolean),

	/** Expand every hunk when the status is loaded */
	autoExpandHunks: Schema.optional(Schema.Boolean),

	/** Rows kept visible around the cursor when scrolling */
	lookahead: Schema.optional(Schema.Int.pipe(Schema.nonNegative())),

	/** Cut long lines at the terminal width instead of wrapping them */
	truncateLines: Schema.optional(Schema.Boolean),

	wsErrorHighlight: Schema.optional(WsErrorHighlightSchema),

	/** `git branch --sort` key for the branch list */
	sortBranches: Schema.optional(Schema.NonEmptyString),

	/** Shell used for `!` commands (default: $SHELL, then sh) */
	shell: Schema.optional(Schema.NonEmptyString),
})

export const ColorsConfigSchema = Schema.Struct({
	foreground: Schema.optional(ColorSchema),
	background: Schema.optional(ColorSchema),
	heading: Schema.optional(ColorSchema),
	hunkHead: Schema.optional(ColorSchema),
	addition: Schema.optional(ColorSchema),
	deletion: Schema.optional(ColorSchema),
	key: Schema.optional(ColorSchema),
	error: Schema.optional(ColorSchema),
})

/**
 * Keys per action name, e.g. `{ "stage": ["s", "a"] }`
 */
export const KeymapConfigSchema = Schema.partial(
	Schema.Record({ key: Schema.Literal(...ACTION_NAMES), value: KeyListSchema }),
)

// ============================================================================
// Root Schema
// ============================================================================

export const SiftConfigSchema = Schema.Struct({
	$schema: Schema.optional(Schema.String),
	options: Schema.optional(OptionsConfigSchema),
	colors: Schema.optional(ColorsConfigSchema),
	keymap: Schema.optional(KeymapConfigSchema),
})

export type SiftConfig = Schema.Schema.Type<typeof SiftConfigSchema>
export type OptionsConfig = Schema.Schema.Type<typeof OptionsConfigSchema>
export type ColorsConfig = Schema.Schema.Type<typeof ColorsConfigSchema>
export type KeymapConfig = Schema.Schema.Type<typeof KeymapConfigSchema>
