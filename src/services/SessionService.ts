/**
 * SessionService - runs the interactive session
 *
 * Owns the session state and drives the pure state machine: every event goes
 * through `update`, then the requests it produced are carried out in order
 * through GitService. When a request fails the rest are skipped. If any
 * request could have changed the repository the status is re-read before
 * `dispatch` returns, so the next frame never shows stale data.
 */

import { Cause, Effect, SubscriptionRef } from "effect"
import { type CommandOutput, GitService } from "../core/GitService.js"
import { AppConfig } from "../config/AppConfig.js"
import { parseRepoStatus } from "../diff/statusParser.js"
import { splitWords } from "../lib/shellWords.js"
import {
	applyRefresh,
	initialSessionState,
	isMutating,
	type Request,
	type SessionEvent,
	type SessionState,
	update,
} from "../ui/sessionFSM.js"
import { formatForNotice, logFormatted } from "./ErrorFormatter.js"
import { resolveBindings } from "./keyboard/bindings.js"
import { NoticeService } from "./NoticeService.js"
import { TerminalHandoff } from "./TerminalHandoff.js"

/**
 * Rows assumed until the terminal reports its size
 */
const DEFAULT_ROWS = 24

// ============================================================================
// Service Definition
// ============================================================================

export class SessionService extends Effect.Service<SessionService>()("SessionService", {
	effect: Effect.gen(function* () {
		const git = yield* GitService
		const { config, warnings } = yield* AppConfig
		const notices = yield* NoticeService
		const terminal = yield* TerminalHandoff

		const bindings = resolveBindings(config.keymap)
		const context = { bindings }
		const parseOptions = {
			autoExpandFiles: config.options.autoExpandFiles,
			autoExpandHunks: config.options.autoExpandHunks,
		}

		const state = yield* SubscriptionRef.make<SessionState>(
			initialSessionState({ rows: DEFAULT_ROWS, lookahead: config.options.lookahead }),
		)

		const reportFailure = (prefix: string) => (error: unknown) =>
			Effect.gen(function* () {
				yield* logFormatted(prefix, error)
				yield* notices.push("error", formatForNotice(error))
			})

		// ------------------------------------------------------------------
		// Refresh
		// ------------------------------------------------------------------

		/**
		 * Re-read the repository. On failure the previous model stays.
		 */
		const refresh = () =>
			Effect.gen(function* () {
				const snapshot = yield* git.readSnapshot()
				const status = yield* parseRepoStatus(snapshot, parseOptions)
				yield* SubscriptionRef.update(state, (s) => applyRefresh(s, status))
				yield* Effect.logDebug("Refreshed").pipe(
					Effect.annotateLogs({ unstaged: status.unstaged.length, staged: status.staged.length }),
				)
			}).pipe(Effect.catchAll(reportFailure("Refresh failed")))

		// ------------------------------------------------------------------
		// Requests
		// ------------------------------------------------------------------

		/**
		 * Show what a command printed; true when it succeeded
		 */
		const report = (output: CommandOutput) =>
			Effect.gen(function* () {
				yield* notices.pushOutput(output)
				if (output.exitCode === 0) return true
				yield* Effect.logWarning("Command failed").pipe(
					Effect.annotateLogs({ command: output.command, exitCode: output.exitCode }),
				)
				if (output.stderr.length === 0) {
					yield* notices.push("error", `${output.command} exited with ${output.exitCode}`)
				}
				return false
			})

		const applyEvent = (event: SessionEvent) =>
			Effect.gen(function* () {
				const current = yield* SubscriptionRef.get(state)
				const transition = update(current, event, context)
				yield* SubscriptionRef.set(state, transition.state)
				yield* notices.pushAll(transition.notices)
				return transition.requests
			})

		const runRequest = (request: Request) =>
			Effect.gen(function* () {
				switch (request._tag) {
					case "ApplyPatch":
						yield* Effect.logDebug("Applying patch").pipe(
							Effect.annotateLogs({ action: request.action, target: request.target, patch: request.patch }),
						)
						return yield* report(yield* git.applyPatch(request.patch, request.target))
					case "StagePaths":
						return yield* report(yield* git.stagePaths(request.paths))
					case "UnstagePaths":
						return yield* report(yield* git.unstagePaths(request.paths, request.unborn))
					case "DiscardPaths":
						return yield* report(yield* git.discardPaths(request.tracked, request.untracked))
					case "StageAll":
						return yield* report(yield* git.stageAll())
					case "UnstageAll":
						return yield* report(yield* git.unstageAll(request.unborn))
					case "LoadBranches": {
						const branches = yield* git.listBranches(config.options.sortBranches)
						yield* applyEvent({ _tag: "BranchesLoaded", branches })
						return true
					}
					case "Checkout":
						return yield* report(yield* git.checkout(request.branch))
					case "CreateBranch":
						return yield* report(yield* git.createBranch(request.name))
					case "Commit": {
						if (request.variant === "extend") return yield* report(yield* git.commit("extend"))
						const exitCode = yield* terminal.runInteractive(git.commitCommand(request.variant))
						if (exitCode !== 0) yield* notices.push("error", `git commit exited with ${exitCode}`)
						return exitCode === 0
					}
					case "Push":
						return yield* report(yield* git.push(request.force))
					case "Pull":
						return yield* report(yield* git.pull())
					case "Stash":
						return yield* report(yield* git.stash(request.pop))
					case "RunGit": {
						const args = yield* splitWords(request.command)
						return yield* report(yield* git.runGit(args))
					}
					case "RunShell":
						return yield* report(yield* git.runShell(config.options.shell, request.command))
					case "Refresh":
					case "Quit":
						return true
				}
			}).pipe(
				Effect.catchAll((error) => reportFailure(`${request._tag} failed`)(error).pipe(Effect.as(false))),
			)

		/**
		 * Carry out requests in order; false once the session should end
		 */
		const runRequests = (requests: ReadonlyArray<Request>) =>
			Effect.gen(function* () {
				let needsRefresh = false
				let keepRunning = true
				for (const request of requests) {
					if (request._tag === "Quit") {
						keepRunning = false
						break
					}
					if (request._tag === "Refresh" || isMutating(request)) needsRefresh = true
					const ok = yield* runRequest(request)
					if (!ok) break
				}
				if (needsRefresh && keepRunning) yield* refresh()
				return keepRunning
			})

		return {
			state,
			bindings,

			/**
			 * Show config warnings and load the first status
			 */
			start: () =>
				Effect.gen(function* () {
					for (const warning of warnings) yield* notices.push("error", formatForNotice(warning))
					yield* refresh()
				}),

			refresh,

			/**
			 * Feed one event through the state machine and run its requests.
			 * Never fails; resolves to false when the session should end.
			 */
			dispatch: (event: SessionEvent): Effect.Effect<boolean> =>
				applyEvent(event).pipe(
					Effect.flatMap(runRequests),
					Effect.catchAllCause((cause) =>
						Effect.gen(function* () {
							yield* Effect.logError("Event handling failed", cause)
							yield* notices.push("error", formatForNotice(Cause.squash(cause)))
							return true
						}),
					),
				),
		}
	}),
}) {}
