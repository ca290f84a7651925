import { Effect } from "effect"
import { describe, expect, it } from "vitest"
import { plainText } from "../ansi/ansiInterpreter.js"
import { output } from "../test/fakes.js"
import { NoticeService } from "./NoticeService.js"

const withNotices = <A>(f: (notices: NoticeService) => Effect.Effect<A>) =>
	Effect.runPromise(NoticeService.pipe(Effect.flatMap(f), Effect.provide(NoticeService.Default)))

const summary = (notices: NoticeService) =>
	Effect.gen(function* () {
		const taken: Array<string> = []
		for (;;) {
			const notice = yield* notices.next()
			if (notice === undefined) return taken
			taken.push(`${notice.kind}: ${plainText(notice.runs)}`)
		}
	})

describe("NoticeService", () => {
	it("hands out notices in order, one at a time", async () => {
		const result = await withNotices((notices) =>
			Effect.gen(function* () {
				yield* notices.push("note", "one")
				yield* notices.push("error", "two")
				const pending = yield* notices.pending()
				const first = yield* notices.next()
				return { pending, first: first && plainText(first.runs), left: yield* notices.pending() }
			}),
		)
		expect(result).toEqual({ pending: 2, first: "one", left: 1 })
	})

	it("drops blank text", async () => {
		const taken = await withNotices((notices) =>
			notices.push("note", "  \n").pipe(Effect.zipRight(summary(notices))),
		)
		expect(taken).toEqual([])
	})

	it("reports stderr as an error only when the command failed", async () => {
		const taken = await withNotices((notices) =>
			Effect.gen(function* () {
				yield* notices.pushOutput(output("git push", 0, "", "To origin\n"))
				yield* notices.pushOutput(output("git pull", 1, "partial\n", "fatal: no upstream\n"))
				return yield* summary(notices)
			}),
		)
		expect(taken).toEqual(["note: To origin", "note: partial", "error: fatal: no upstream"])
	})
})
