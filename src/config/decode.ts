/**
 * Lenient config decoding
 *
 * A config file with a typo must not stop the tool from starting. Decoding
 * reports every problem as a ConfigWarning, removes the offending entries
 * and decodes what is left.
 */

import { Data, Either, ParseResult, Predicate, Schema } from "effect"
import { type SiftConfig, SiftConfigSchema } from "./schema.js"

// ============================================================================
// Error Types
// ============================================================================

/**
 * A config entry that was ignored
 */
export class ConfigWarning extends Data.TaggedError("ConfigWarning")<{
	readonly message: string
	/** Dotted path of the entry, e.g. `options.lookahead` */
	readonly path?: string
}> {}

export interface DecodedConfig {
	readonly config: SiftConfig
	readonly warnings: ReadonlyArray<ConfigWarning>
}

// ============================================================================
// Decoding
// ============================================================================

const MAX_PASSES = 16

const decode = Schema.decodeUnknownEither(SiftConfigSchema, {
	errors: "all",
	onExcessProperty: "error",
})

/**
 * Remove the entry at `path`. Inside an array the whole array goes, since
 * its remaining items would shift.
 */
const omitPath = (value: unknown, path: ReadonlyArray<PropertyKey>): unknown => {
	const [head, ...tail] = path
	if (head === undefined || !Predicate.isRecord(value)) return value
	const key = String(head)
	if (!(key in value)) return value
	const child = value[key]
	if (tail.length === 0 || Array.isArray(child)) {
		const { [key]: _removed, ...rest } = value
		return rest
	}
	return { ...value, [key]: omitPath(child, tail) }
}

const describeIssue = (issue: ParseResult.ArrayFormatterIssue, where: string): string =>
	issue._tag === "Unexpected" ? `Unknown config key "${where}"` : `Invalid value for "${where}": ${issue.message}`

export const decodeConfig = (raw: unknown): DecodedConfig => {
	const warnings: ConfigWarning[] = []
	let current = raw

	for (let pass = 0; pass < MAX_PASSES; pass++) {
		const result = decode(current)
		if (Either.isRight(result)) return { config: result.right, warnings }

		const issues = ParseResult.ArrayFormatter.formatErrorSync(result.left)
		const seen = new Set<string>()
		let removedAny = false
		for (const issue of issues) {
			if (issue.path.length === 0) continue
			const where = issue.path.map(String).join(".")
			if (seen.has(where)) continue
			seen.add(where)
			warnings.push(new ConfigWarning({ message: describeIssue(issue, where), path: where }))
			current = omitPath(current, issue.path)
			removedAny = true
		}
		if (!removedAny) break
	}

	warnings.push(new ConfigWarning({ message: "Config must be a JSON object; using defaults" }))
	return { config: {}, warnings }
}
