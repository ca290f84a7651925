import { describe, expect, it } from "vitest"
import { parseBranchList } from "./GitService.js"

describe("parseBranchList", () => {
	it("reads the current branch and upstreams", () => {
		const text = " \tfeature\t\n*\tmain\torigin/main\n"
		expect(parseBranchList(text)).toEqual([
			{ name: "feature", current: false },
			{ name: "main", current: true, upstream: "origin/main" },
		])
	})

	it("skips a detached HEAD entry and blank lines", () => {
		expect(parseBranchList("*\t(HEAD detached at abc1234)\t\n\n \tmain\t\n")).toEqual([
			{ name: "main", current: false },
		])
	})

	it("returns nothing for an empty listing", () => {
		expect(parseBranchList("")).toEqual([])
	})
})
