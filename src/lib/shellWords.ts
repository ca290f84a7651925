/**
 * Shell-style word splitting for commands typed into the minibuffer
 *
 * Supports single quotes, double quotes (with backslash escapes for
 * `"`, `\`, `$` and backtick) and backslash escapes outside quotes. No
 * expansion of any kind happens.
 */

import { Data, Either } from "effect"

export class ShellSyntaxError extends Data.TaggedError("ShellSyntaxError")<{
	readonly message: string
	readonly input: string
}> {}

const DOUBLE_QUOTE_ESCAPES = new Set(['"', "\\", "$", "`"])

export const splitWords = (input: string): Either.Either<ReadonlyArray<string>, ShellSyntaxError> => {
	const words: string[] = []
	let word = ""
	let inWord = false
	let quote: "'" | '"' | undefined

	for (let i = 0; i < input.length; i++) {
		const ch = input.charAt(i)

		if (quote === "'") {
			if (ch === "'") quote = undefined
			else word += ch
			continue
		}
		if (quote === '"') {
			if (ch === '"') quote = undefined
			else if (ch === "\\" && DOUBLE_QUOTE_ESCAPES.has(input.charAt(i + 1))) {
				word += input.charAt(i + 1)
				i++
			} else word += ch
			continue
		}

		if (ch === "'" || ch === '"') {
			quote = ch
			inWord = true
		} else if (ch === "\\") {
			if (i + 1 >= input.length) {
				return Either.left(new ShellSyntaxError({ message: "Trailing backslash", input }))
			}
			word += input.charAt(i + 1)
			inWord = true
			i++
		} else if (/\s/.test(ch)) {
			if (inWord) words.push(word)
			word = ""
			inWord = false
		} else {
			word += ch
			inWord = true
		}
	}

	if (quote !== undefined) {
		return Either.left(new ShellSyntaxError({ message: `Unterminated ${quote} quote`, input }))
	}
	if (inWord) words.push(word)
	return Either.right(words)
}
