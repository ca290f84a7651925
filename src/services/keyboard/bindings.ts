/**
 * Default Keybindings
 *
 * Central registry of all keyboard shortcuts organized by mode. The config
 * keymap replaces the keys of an action wholesale; descriptions and modes
 * stay as declared here.
 */

import type { ActionName, KeyMode, Keybinding, KeymapOverrides } from "./types.js"

/**
 * Modes that share cursor movement
 */
const LIST_MODES = ["status", "branches"] as const

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_BINDINGS: ReadonlyArray<Keybinding> = [
	// ========================================================================
	// Navigation (status tree and branch list)
	// ========================================================================
	{ key: "j", mode: LIST_MODES, description: "Move down", action: "moveDown" },
	{ key: "down", mode: LIST_MODES, description: "Move down", action: "moveDown" },
	{ key: "k", mode: LIST_MODES, description: "Move up", action: "moveUp" },
	{ key: "up", mode: LIST_MODES, description: "Move up", action: "moveUp" },
	{ key: "g", mode: LIST_MODES, description: "Go to first", action: "moveFirst" },
	{ key: "K", mode: LIST_MODES, description: "Go to first", action: "moveFirst" },
	{ key: "G", mode: LIST_MODES, description: "Go to last", action: "moveLast" },
	{ key: "J", mode: LIST_MODES, description: "Go to last", action: "moveLast" },
	{ key: "C-d", mode: LIST_MODES, description: "Half page down", action: "pageDown" },
	{ key: "C-u", mode: LIST_MODES, description: "Half page up", action: "pageUp" },

	// ========================================================================
	// Status tree
	// ========================================================================
	{ key: "tab", mode: "status", description: "Expand / collapse", action: "toggleExpand" },
	{ key: " ", mode: "status", description: "Mark item", action: "mark" },
	{ key: "v", mode: "status", description: "Mark item", action: "mark" },
	{ key: "V", mode: "status", description: "Clear marks", action: "clearMarks" },
	{ key: "s", mode: "status", description: "Stage", action: "stage" },
	{ key: "S", mode: "status", description: "Stage all", action: "stageAll" },
	{ key: "u", mode: "status", description: "Unstage", action: "unstage" },
	{ key: "U", mode: "status", description: "Unstage all", action: "unstageAll" },
	{ key: "x", mode: "status", description: "Discard", action: "discard" },
	{ key: "r", mode: "status", description: "Refresh", action: "refresh" },
	{ key: "F", mode: "status", description: "Pull", action: "pull" },
	{ key: "b", mode: "status", description: "Branches", action: "branchList" },
	{ key: "c", mode: "status", description: "Commit", action: "commitMenu" },
	{ key: "p", mode: "status", description: "Push", action: "pushMenu" },
	{ key: "z", mode: "status", description: "Stash", action: "stashMenu" },
	{ key: ":", mode: "status", description: "Run git command", action: "gitCommand" },
	{ key: "!", mode: "status", description: "Run shell command", action: "shellCommand" },

	// ========================================================================
	// Branch list
	// ========================================================================
	{ key: "return", mode: "branches", description: "Checkout", action: "checkout" },
	{ key: " ", mode: "branches", description: "Checkout", action: "checkout" },
	{ key: "n", mode: "branches", description: "New branch", action: "newBranch" },

	// ========================================================================
	// Menus
	// ========================================================================
	{ key: "c", mode: "commit", description: "commit", action: "commit" },
	{ key: "a", mode: "commit", description: "amend", action: "amend" },
	{ key: "e", mode: "commit", description: "extend", action: "extend" },
	{ key: "p", mode: "push", description: "push", action: "push" },
	{ key: "f", mode: "push", description: "force with lease", action: "forcePush" },
	{ key: "s", mode: "stash", description: "stash", action: "stash" },
	{ key: "p", mode: "stash", description: "pop", action: "stashPop" },

	// ========================================================================
	// Universal
	// ========================================================================
	{ key: "escape", mode: "*", description: "Back", action: "back" },
	{ key: "q", mode: "*", description: "Quit", action: "quit" },
	{ key: "C-c", mode: "*", description: "Quit", action: "quit" },
]

// ============================================================================
// Resolution
// ============================================================================

/**
 * Apply keymap overrides: an overridden action keeps its modes and
 * description but answers to the configured keys only
 */
export const resolveBindings = (
	overrides: KeymapOverrides,
	defaults: ReadonlyArray<Keybinding> = DEFAULT_BINDINGS,
): ReadonlyArray<Keybinding> => {
	const result: Keybinding[] = []
	const replaced = new Set<string>()
	for (const binding of defaults) {
		const keys = overrides[binding.action]
		if (keys === undefined) {
			result.push(binding)
			continue
		}
		// one entry per (action, mode) so shared movement keys stay shared
		const slot = `${binding.action}/${String(binding.mode)}`
		if (replaced.has(slot)) continue
		replaced.add(slot)
		for (const key of keys) result.push({ ...binding, key })
	}
	return result
}

const modeIncludes = (mode: Keybinding["mode"], target: KeyMode): boolean =>
	typeof mode === "string" ? false : mode.includes(target)

/**
 * Find the action bound to a key, preferring an exact mode match over an
 * array match over a wildcard
 */
export const findAction = (
	bindings: ReadonlyArray<Keybinding>,
	mode: KeyMode,
	key: string,
): ActionName | undefined =>
	(
		bindings.find((b) => b.key === key && b.mode === mode) ??
		bindings.find((b) => b.key === key && modeIncludes(b.mode, mode)) ??
		bindings.find((b) => b.key === key && b.mode === "*")
	)?.action

/**
 * Bindings listed in a menu, first key per action
 */
export const menuEntries = (
	bindings: ReadonlyArray<Keybinding>,
	mode: KeyMode,
): ReadonlyArray<Keybinding> => {
	const seen = new Set<ActionName>()
	return bindings.filter((b) => {
		if (b.mode !== mode || seen.has(b.action)) return false
		seen.add(b.action)
		return true
	})
}
