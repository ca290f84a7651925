/**
 * Keyboard Types
 *
 * Keybindings map a normalized key name to a named action within a mode.
 * Actions are plain names; the session state machine decides what they do.
 */

// ============================================================================
// Mode Types
// ============================================================================

/**
 * Keyboard mode for keybinding matching
 *
 * - status: the status tree
 * - branches: the branch list
 * - commit / push / stash: single-key menus
 * - *: Universal (matches any of the above)
 *
 * Text-input and confirmation modes handle their keys directly.
 */
export type KeyMode = "status" | "branches" | "commit" | "push" | "stash" | "*"

// ============================================================================
// Actions
// ============================================================================

export const ACTION_NAMES = [
	"moveDown",
	"moveUp",
	"moveFirst",
	"moveLast",
	"pageDown",
	"pageUp",
	"toggleExpand",
	"mark",
	"clearMarks",
	"stage",
	"stageAll",
	"unstage",
	"unstageAll",
	"discard",
	"refresh",
	"pull",
	"branchList",
	"commitMenu",
	"pushMenu",
	"stashMenu",
	"gitCommand",
	"shellCommand",
	"checkout",
	"newBranch",
	"commit",
	"amend",
	"extend",
	"push",
	"forcePush",
	"stash",
	"stashPop",
	"back",
	"quit",
] as const

export type ActionName = (typeof ACTION_NAMES)[number]

// ============================================================================
// Keybinding Types
// ============================================================================

export interface Keybinding {
	readonly key: string
	readonly mode: KeyMode | ReadonlyArray<KeyMode>
	readonly description: string
	readonly action: ActionName
}

/**
 * Per-action key overrides, as read from the config file
 */
export type KeymapOverrides = Partial<Record<ActionName, ReadonlyArray<string>>>
