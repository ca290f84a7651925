import { Either } from "effect"
import { describe, expect, it } from "vitest"
import { splitWords } from "./shellWords.js"

describe("splitWords", () => {
	it("splits on any whitespace", () => {
		expect(splitWords("  log   --oneline\t-5 ")).toEqual(Either.right(["log", "--oneline", "-5"]))
		expect(splitWords("   ")).toEqual(Either.right([]))
	})

	it("keeps quoted text together", () => {
		expect(splitWords(`commit -m 'two words' --author="A \\"B\\" C"`)).toEqual(
			Either.right(["commit", "-m", "two words", '--author=A "B" C']),
		)
	})

	it("keeps empty quoted words", () => {
		expect(splitWords(`config user.name ""`)).toEqual(Either.right(["config", "user.name", ""]))
	})

	it("escapes outside quotes and leaves other backslashes in double quotes", () => {
		expect(splitWords("a\\ b")).toEqual(Either.right(["a b"]))
		expect(splitWords(`"c:\\dir"`)).toEqual(Either.right(["c:\\dir"]))
	})

	it("does not expand anything", () => {
		expect(splitWords("log $HOME *.ts ~")).toEqual(Either.right(["log", "$HOME", "*.ts", "~"]))
	})

	it("rejects unbalanced input", () => {
		const unterminated = splitWords("commit -m 'oops")
		expect(Either.isLeft(unterminated) && unterminated.left.message).toBe("Unterminated ' quote")
		const trailing = splitWords("log \\")
		expect(Either.isLeft(trailing) && trailing.left.message).toBe("Trailing backslash")
	})
})
