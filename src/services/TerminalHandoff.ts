/**
 * TerminalHandoff - run a program that needs the terminal
 *
 * The UI owns the terminal (alternate buffer, raw mode). Programs such as
 * the commit message editor get it back for as long as they run; the live
 * implementation is provided by the blessed TerminalService.
 */

import { Context, Data, type Effect } from "effect"
import type { InteractiveCommand } from "../core/GitService.js"

export class TerminalHandoffError extends Data.TaggedError("TerminalHandoffError")<{
	readonly message: string
	readonly command: string
}> {}

export interface TerminalHandoffI {
	/** Resolves with the program's exit code once the UI is back */
	readonly runInteractive: (command: InteractiveCommand) => Effect.Effect<number, TerminalHandoffError>
}

export class TerminalHandoff extends Context.Tag("TerminalHandoff")<TerminalHandoff, TerminalHandoffI>() {}
