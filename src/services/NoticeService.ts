/**
 * NoticeService - queue of minibuffer messages
 *
 * Holds the notice queue in a SubscriptionRef. The render loop takes one
 * notice per frame with `next`; everything else only appends.
 */

import { Effect, SubscriptionRef } from "effect"
import type { CommandOutput } from "../core/GitService.js"
import {
	dequeue,
	emptyQueue,
	enqueue,
	makeNotice,
	type Notice,
	type NoticeKind,
	type NoticeQueue,
} from "../ui/noticeQueue.js"

export class NoticeService extends Effect.Service<NoticeService>()("NoticeService", {
	effect: Effect.gen(function* () {
		const queue = yield* SubscriptionRef.make<NoticeQueue>(emptyQueue)

		const pushAll = (notices: ReadonlyArray<Notice>) =>
			SubscriptionRef.update(queue, (q) => notices.reduce(enqueue, q))

		return {
			queue,

			/** Queue a message; blank text is dropped */
			push: (kind: NoticeKind, text: string | Uint8Array) =>
				SubscriptionRef.update(queue, (q) => enqueue(q, makeNotice(kind, text))),

			pushAll,

			/**
			 * Queue what a command printed: stdout as a note, stderr as an error
			 * when the command failed and as a note otherwise
			 */
			pushOutput: (output: CommandOutput) =>
				pushAll(
					[
						makeNotice("note", output.stdout),
						makeNotice(output.exitCode === 0 ? "note" : "error", output.stderr),
					].filter((notice): notice is Notice => notice !== undefined),
				),

			/** Take the notice for the next frame */
			next: () => SubscriptionRef.modify(queue, (q) => dequeue(q)),

			pending: () => SubscriptionRef.get(queue).pipe(Effect.map((q) => q.length)),
		}
	}),
}) {}
