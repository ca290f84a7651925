/**
 * ErrorFormatter - turn tagged errors into notice text
 *
 * Each known error tag maps to a short message and, where there is an
 * obvious next step, a "Try:" suggestion. The original error is kept for
 * the log.
 */

import { Effect, Predicate } from "effect"

// ============================================================================
// Types
// ============================================================================

export interface FormattedError {
	readonly message: string
	/** Prefixed with "Try:" */
	readonly suggestion?: string
	readonly original: unknown
	readonly category: ErrorCategory
}

export type ErrorCategory = "git" | "diff" | "config" | "terminal" | "unknown"

type Formatter = (error: { readonly [key: string]: unknown }) => Omit<FormattedError, "original">

// ============================================================================
// Error Tag Registry
// ============================================================================

const text = (value: unknown): string => (typeof value === "string" ? value : "")

const excerpt = (stderr: string): string | undefined =>
	stderr ? `Error: ${stderr.slice(0, 100)}${stderr.length > 100 ? "..." : ""}` : undefined

const gitFailure: Formatter = (error) => {
	const stderr = text(error.stderr)
	const command = text(error.command) || "git"

	if (stderr.includes("CONFLICT") || stderr.includes("merge conflict")) {
		return {
			message: "Merge conflict detected",
			suggestion: "Try: Resolve the conflicts, then stage the files",
			category: "git",
		}
	}

	if (stderr.includes("index.lock")) {
		return {
			message: "Another git process holds the index lock",
			suggestion: "Try: Wait for it to finish, or remove .git/index.lock if none is running",
			category: "git",
		}
	}

	if (stderr.includes("patch does not apply") || stderr.includes("corrupt patch")) {
		return {
			message: "Patch did not apply",
			suggestion: "Try: Refresh with 'r' and select the change again",
			category: "git",
		}
	}

	if (
		stderr.includes("Permission denied") ||
		stderr.includes("Authentication failed") ||
		stderr.includes("could not read Username") ||
		stderr.includes("terminal prompts disabled")
	) {
		return {
			message: "Git authentication failed",
			suggestion: "Try: Set up an SSH key or a credential helper",
			category: "git",
		}
	}

	if (
		stderr.includes("Could not resolve host") ||
		stderr.includes("Connection refused") ||
		stderr.includes("Network is unreachable")
	) {
		return {
			message: "Network error during git operation",
			suggestion: "Try: Check your connection and try again",
			category: "git",
		}
	}

	if (stderr.includes("not a git repository")) {
		return {
			message: "Not a git repository",
			suggestion: "Try: Run sift from inside a work tree",
			category: "git",
		}
	}

	return {
		message: `Git command failed: ${command}`,
		...(excerpt(stderr) !== undefined ? { suggestion: excerpt(stderr) } : {}),
		category: "git",
	}
}

const ERROR_FORMATTERS: Record<string, Formatter> = {
	// ─────────────────────────────────────────────────────────────────────────
	// Git
	// ─────────────────────────────────────────────────────────────────────────
	GitCommandError: gitFailure,

	RepositoryNotFoundError: (error) => ({
		message: `Not inside a git repository: ${text(error.path)}`,
		suggestion: "Try: Run 'git init' or start sift from an existing work tree",
		category: "git",
	}),

	ShellSyntaxError: (error) => ({
		message: `Cannot parse command: ${text(error.message)}`,
		category: "git",
	}),

	// ─────────────────────────────────────────────────────────────────────────
	// Diff model
	// ─────────────────────────────────────────────────────────────────────────
	ParseError: (error) => ({
		message: `Could not read git ${text(error.input) || "output"}: ${text(error.message)}`,
		suggestion: "Try: Refresh with 'r'",
		category: "diff",
	}),

	EmptySelectionError: (error) => ({
		message: text(error.message) || "Nothing selected",
		category: "diff",
	}),

	InvalidHunkStateError: (error) => ({
		message: `Hunk in ${text(error.path)} is out of date`,
		suggestion: "Try: Refresh with 'r'",
		category: "diff",
	}),

	// ─────────────────────────────────────────────────────────────────────────
	// Config
	// ─────────────────────────────────────────────────────────────────────────
	ConfigWarning: (error) => ({
		message: text(error.message),
		category: "config",
	}),

	ConfigParseError: (error) => ({
		message: `${text(error.message)}: ${text(error.path)}`,
		category: "config",
	}),

	// ─────────────────────────────────────────────────────────────────────────
	// Terminal
	// ─────────────────────────────────────────────────────────────────────────
	TerminalHandoffError: (error) => ({
		message: `Could not run ${text(error.command)}: ${text(error.message)}`,
		category: "terminal",
	}),
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Format any error into a message with optional guidance
 */
export const format = (error: unknown): FormattedError => {
	const tag = Predicate.isRecord(error) ? error._tag : undefined
	if (Predicate.isRecord(error) && typeof tag === "string") {
		const formatter = ERROR_FORMATTERS[tag]
		if (formatter) return { ...formatter(error), original: error }

		const message = typeof error.message === "string" ? error.message : `Unknown error: ${tag}`
		return { message, original: error, category: "unknown" }
	}

	if (error instanceof Error) return { message: error.message, original: error, category: "unknown" }
	if (typeof error === "string") return { message: error, original: error, category: "unknown" }
	return { message: String(error), original: error, category: "unknown" }
}

/**
 * Message and suggestion as one notice text
 */
export const formatForNotice = (error: unknown): string => {
	const formatted = format(error)
	return formatted.suggestion ? `${formatted.message}\n${formatted.suggestion}` : formatted.message
}

/**
 * Format the error and log it
 */
export const logFormatted = (prefix: string, error: unknown): Effect.Effect<FormattedError> =>
	Effect.gen(function* () {
		const formatted = format(error)
		yield* Effect.logError(`${prefix}: ${formatted.message}`).pipe(
			Effect.annotateLogs({
				category: formatted.category,
				...(formatted.suggestion !== undefined ? { suggestion: formatted.suggestion } : {}),
			}),
		)
		return formatted
	})
