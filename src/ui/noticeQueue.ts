/**
 * Notice queue
 *
 * FIFO of messages shown in the minibuffer. Every render takes at most one
 * notice from the front; blank notices never enter the queue.
 */

import { interpretAnsi, plainText } from "../ansi/ansiInterpreter.js"
import type { StyledRun } from "../ansi/style.js"

export type NoticeKind = "note" | "error"

export interface Notice {
	readonly kind: NoticeKind
	readonly runs: ReadonlyArray<StyledRun>
}

export type NoticeQueue = ReadonlyArray<Notice>

export const emptyQueue: NoticeQueue = []

const isBlank = (run: StyledRun | undefined): boolean => run !== undefined && run.text.trim() === ""

/**
 * Drop leading and trailing whitespace across run boundaries
 */
const trimRuns = (runs: ReadonlyArray<StyledRun>): ReadonlyArray<StyledRun> => {
	const kept = runs.filter((run) => run.text !== "")
	let start = 0
	let end = kept.length
	while (start < end && isBlank(kept[start])) start++
	while (end > start && isBlank(kept[end - 1])) end--
	const inner = kept.slice(start, end)
	return inner.map((run, i) => {
		let text = run.text
		if (i === 0) text = text.trimStart()
		if (i === inner.length - 1) text = text.trimEnd()
		return text === run.text ? run : { ...run, text }
	})
}

/**
 * Build a notice from possibly colored text; undefined when it is blank
 */
export const makeNotice = (kind: NoticeKind, text: string | Uint8Array): Notice | undefined => {
	const runs = trimRuns(interpretAnsi(text))
	return plainText(runs).trim() === "" ? undefined : { kind, runs }
}

export const enqueue = (queue: NoticeQueue, notice: Notice | undefined): NoticeQueue =>
	notice === undefined || plainText(notice.runs).trim() === "" ? queue : [...queue, notice]

export const dequeue = (queue: NoticeQueue): readonly [Notice | undefined, NoticeQueue] => {
	const [head, ...rest] = queue
	return head === undefined ? [undefined, queue] : [head, rest]
}
