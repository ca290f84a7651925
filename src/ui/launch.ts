/**
 * Session loop - render, wait for an event, dispatch, repeat
 *
 * Everything runs on one fiber: a frame is drawn, the loop blocks on the
 * terminal's event queue, and the event is handled to completion (including
 * any git commands and the refresh after them) before the next frame.
 */

import { Effect, Layer, SubscriptionRef } from "effect"
import { AppConfig } from "../config/AppConfig.js"
import { GitServiceLive } from "../core/GitService.js"
import { type TerminalEvent, TerminalLive, TerminalService } from "../core/TerminalService.js"
import { NoticeService } from "../services/NoticeService.js"
import { SessionService } from "../services/SessionService.js"
import { renderFrame, showsNotice } from "./render.js"
import type { SessionEvent } from "./sessionFSM.js"

const toSessionEvent = (event: TerminalEvent): SessionEvent =>
	event._tag === "Key" ? { _tag: "Key", key: event.key } : { _tag: "Resize", rows: event.size.rows }

/**
 * Draw the current state with the next queued notice, unless a prompt
 * holds the minibuffer
 */
export const drawFrame = Effect.gen(function* () {
	const terminal = yield* TerminalService
	const session = yield* SessionService
	const notices = yield* NoticeService
	const { config } = yield* AppConfig

	const state = yield* SubscriptionRef.get(session.state)
	const notice = showsNotice(state.mode) ? yield* notices.next() : undefined
	const size = yield* terminal.size()
	yield* terminal.draw(
		renderFrame({
			state,
			...(notice !== undefined ? { notice } : {}),
			rows: size.rows,
			columns: size.columns,
			config,
			bindings: session.bindings,
		}),
	)
})

export const sessionLoop = Effect.gen(function* () {
	const terminal = yield* TerminalService
	const session = yield* SessionService

	const size = yield* terminal.size()
	yield* session.dispatch({ _tag: "Resize", rows: size.rows })
	yield* session.start()

	let running = true
	while (running) {
		yield* drawFrame
		const event = yield* terminal.nextEvent()
		running = yield* session.dispatch(toSessionEvent(event))
	}
	yield* Effect.logInfo("Session ended")
})

/**
 * Run the interactive session on the repository at `root`
 */
export const launchSession = (root: string) =>
	Effect.gen(function* () {
		const { config } = yield* AppConfig
		yield* Effect.logInfo("Starting session").pipe(Effect.annotateLogs("root", root))

		const layer = SessionService.Default.pipe(
			Layer.provideMerge(Layer.mergeAll(GitServiceLive(root), NoticeService.Default, TerminalLive(config.colors))),
		)
		yield* sessionLoop.pipe(Effect.provide(layer))
	})
