/**
 * TerminalService - the blessed screen
 *
 * Owns the terminal for the lifetime of its scope: key presses and resizes
 * are pushed onto a queue the session loop takes from, frames are drawn as
 * styled rows. The screen is destroyed (terminal restored) when the scope
 * closes, however the session ends.
 *
 * Also provides TerminalHandoff: `screen.spawn` leaves the alternate buffer
 * and raw mode while the child runs and redraws once it exits.
 */

import blessed from "blessed"
import type { Widgets } from "blessed"
import { Context, Effect, Layer, Queue } from "effect"
import type { StyledRow } from "../ansi/style.js"
import type { Palette } from "../config/defaults.js"
import { TerminalHandoff, TerminalHandoffError, type TerminalHandoffI } from "../services/TerminalHandoff.js"
import { normalizeKey } from "../ui/keys.js"
import { colorName, rowToTags } from "../ui/theme.js"

// ============================================================================
// Types
// ============================================================================

export interface TerminalSize {
	readonly rows: number
	readonly columns: number
}

export type TerminalEvent =
	| { readonly _tag: "Key"; readonly key: string }
	| { readonly _tag: "Resize"; readonly size: TerminalSize }

export interface TerminalServiceI {
	/** Wait for the next key press or resize */
	readonly nextEvent: () => Effect.Effect<TerminalEvent>
	readonly size: () => Effect.Effect<TerminalSize>
	readonly draw: (rows: ReadonlyArray<StyledRow>) => Effect.Effect<void>
}

export class TerminalService extends Context.Tag("TerminalService")<TerminalService, TerminalServiceI>() {}

// ============================================================================
// Implementation
// ============================================================================

const currentSize = (): TerminalSize => ({
	rows: process.stdout.rows ?? 24,
	columns: process.stdout.columns ?? 80,
})

const acquireScreen = Effect.acquireRelease(
	Effect.sync(() =>
		blessed.screen({
			smartCSR: true,
			fullUnicode: true,
			title: "sift",
		}),
	),
	(screen) =>
		Effect.sync(() => {
			screen.destroy()
			// blessed leaves stdin flowing, which would keep the process alive
			process.stdin.pause()
		}).pipe(Effect.zipRight(Effect.logDebug("Terminal restored"))),
)

const makeHandoff = (screen: Widgets.Screen): TerminalHandoffI => ({
	runInteractive: (command) =>
		Effect.async<number, TerminalHandoffError>((resume) => {
			let settled = false
			const child = screen.spawn(command.file, [...command.args], { cwd: command.cwd })
			child.once("error", (error) => {
				if (settled) return
				settled = true
				resume(Effect.fail(new TerminalHandoffError({ message: error.message, command: command.file })))
			})
			child.once("exit", (code) => {
				if (settled) return
				settled = true
				resume(Effect.succeed(code ?? 1))
			})
		}).pipe(
			Effect.tap((exitCode) =>
				Effect.logDebug("Interactive command finished").pipe(
					Effect.annotateLogs({ command: [command.file, ...command.args].join(" "), exitCode }),
				),
			),
		),
})

/**
 * Screen plus handoff, both bound to the surrounding scope
 */
export const TerminalLive = (palette: Palette) =>
	Layer.scopedContext(
		Effect.gen(function* () {
			const screen = yield* acquireScreen
			const events = yield* Queue.unbounded<TerminalEvent>()

			const box = blessed.box({
				parent: screen,
				top: 0,
				left: 0,
				width: "100%",
				height: "100%",
				tags: true,
				style: {
					fg: colorName(palette.foreground) ?? "default",
					bg: colorName(palette.background) ?? "default",
				},
			})

			screen.on("keypress", (ch: string | undefined, key: Widgets.Events.IKeyEventArg | undefined) => {
				const name = normalizeKey(ch, key)
				if (name !== undefined) Queue.unsafeOffer(events, { _tag: "Key", key: name })
			})
			screen.on("resize", () => {
				Queue.unsafeOffer(events, { _tag: "Resize", size: currentSize() })
			})

			const terminal: TerminalServiceI = {
				nextEvent: () => Queue.take(events),
				size: () => Effect.sync(currentSize),
				draw: (rows) =>
					Effect.sync(() => {
						box.setContent(rows.map(rowToTags).join("\n"))
						screen.render()
					}),
			}

			return Context.make(TerminalService, terminal).pipe(Context.add(TerminalHandoff, makeHandoff(screen)))
		}),
	)
