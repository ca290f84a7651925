/**
 * GitService - the git process collaborator
 *
 * Every repository operation the session performs goes through here as a
 * git subprocess run in the repository root. Output is captured as bytes so
 * colored output can be decoded by the escape-sequence interpreter.
 *
 * A non-zero exit is not an error at this level: callers get the exit code
 * with stdout and stderr and decide. Only failing to run git at all (or a
 * failed read of the status) is a GitCommandError.
 */

import { Command, CommandExecutor } from "@effect/platform"
import type { PlatformError } from "@effect/platform/Error"
import { Context, Data, Effect, Layer, Option, Stream } from "effect"
import type { Branch, RawSnapshot } from "../diff/model.js"
import type { PatchTarget } from "../diff/patchSynthesis.js"

// ============================================================================
// Types
// ============================================================================

export interface CommandOutput {
	/** Command line, for logs and messages */
	readonly command: string
	readonly exitCode: number
	readonly stdout: Uint8Array
	readonly stderr: Uint8Array
}

/**
 * A command that needs the terminal (an editor), run by TerminalHandoff
 */
export interface InteractiveCommand {
	readonly file: string
	readonly args: ReadonlyArray<string>
	readonly cwd: string
}

export type CommitVariant = "commit" | "amend" | "extend"

// ============================================================================
// Error Types
// ============================================================================

/**
 * Git could not be run, or a read the session depends on failed
 */
export class GitCommandError extends Data.TaggedError("GitCommandError")<{
	readonly message: string
	readonly command: string
	readonly stderr?: string
}> {}

/**
 * The starting directory is not inside a work tree
 */
export class RepositoryNotFoundError extends Data.TaggedError("RepositoryNotFoundError")<{
	readonly message: string
	readonly path: string
}> {}

// ============================================================================
// Service Definition
// ============================================================================

export interface GitServiceI {
	readonly root: string

	/** Raw status, both diffs and the latest commit */
	readonly readSnapshot: () => Effect.Effect<RawSnapshot, GitCommandError>

	/** Feed a patch to `git apply`, against the index or the working tree */
	readonly applyPatch: (patch: string, target: PatchTarget) => Effect.Effect<CommandOutput, GitCommandError>

	readonly stagePaths: (paths: ReadonlyArray<string>) => Effect.Effect<CommandOutput, GitCommandError>
	readonly unstagePaths: (
		paths: ReadonlyArray<string>,
		unborn: boolean,
	) => Effect.Effect<CommandOutput, GitCommandError>
	readonly discardPaths: (
		tracked: ReadonlyArray<string>,
		untracked: ReadonlyArray<string>,
	) => Effect.Effect<CommandOutput, GitCommandError>
	readonly stageAll: () => Effect.Effect<CommandOutput, GitCommandError>
	readonly unstageAll: (unborn: boolean) => Effect.Effect<CommandOutput, GitCommandError>

	readonly listBranches: (sortKey: string) => Effect.Effect<ReadonlyArray<Branch>, GitCommandError>
	readonly checkout: (branch: string) => Effect.Effect<CommandOutput, GitCommandError>
	readonly createBranch: (name: string) => Effect.Effect<CommandOutput, GitCommandError>

	/** Commit without an editor (`extend`) */
	readonly commit: (variant: CommitVariant) => Effect.Effect<CommandOutput, GitCommandError>
	/** The commit command to hand the terminal to, for variants that open an editor */
	readonly commitCommand: (variant: CommitVariant) => InteractiveCommand

	readonly push: (force: boolean) => Effect.Effect<CommandOutput, GitCommandError>
	readonly pull: () => Effect.Effect<CommandOutput, GitCommandError>
	readonly stash: (pop: boolean) => Effect.Effect<CommandOutput, GitCommandError>

	/** Arbitrary git command, colors forced on */
	readonly runGit: (args: ReadonlyArray<string>) => Effect.Effect<CommandOutput, GitCommandError>
	/** Arbitrary shell command via `<shell> -c` */
	readonly runShell: (shell: string, command: string) => Effect.Effect<CommandOutput, GitCommandError>
}

export class GitService extends Context.Tag("GitService")<GitService, GitServiceI>() {}

// ============================================================================
// Process helpers
// ============================================================================

const concatBytes = (a: Uint8Array, b: Uint8Array): Uint8Array => {
	const out = new Uint8Array(a.length + b.length)
	out.set(a, 0)
	out.set(b, a.length)
	return out
}

const collect = (stream: Stream.Stream<Uint8Array, PlatformError>) =>
	Stream.runFold(stream, new Uint8Array(0), concatBytes)

const decoder = new TextDecoder()

export const outputText = (bytes: Uint8Array): string => decoder.decode(bytes)

/**
 * Run a command to completion, capturing exit code and both streams
 */
export const execute = (
	command: Command.Command,
	label: string,
): Effect.Effect<CommandOutput, GitCommandError, CommandExecutor.CommandExecutor> =>
	Effect.scoped(
		Effect.gen(function* () {
			const process = yield* Command.start(command)
			const [stdout, stderr, exitCode] = yield* Effect.all(
				[collect(process.stdout), collect(process.stderr), process.exitCode],
				{ concurrency: "unbounded" },
			)
			return { command: label, exitCode: Number(exitCode), stdout, stderr }
		}),
	).pipe(
		Effect.tap((output) =>
			Effect.logDebug("Command finished").pipe(
				Effect.annotateLogs({ command: label, exitCode: output.exitCode }),
			),
		),
		Effect.mapError(
			(error) =>
				new GitCommandError({
					message: `Failed to run ${label}: ${error.message}`,
					command: label,
				}),
		),
	)

/**
 * Merge sequential outputs; the first failing exit code wins
 */
const combineOutputs = (outputs: ReadonlyArray<CommandOutput>): CommandOutput => ({
	command: outputs.map((o) => o.command).join(" && "),
	exitCode: outputs.find((o) => o.exitCode !== 0)?.exitCode ?? 0,
	stdout: outputs.reduce<Uint8Array>((acc, o) => concatBytes(acc, o.stdout), new Uint8Array(0)),
	stderr: outputs.reduce<Uint8Array>((acc, o) => concatBytes(acc, o.stderr), new Uint8Array(0)),
})

// ============================================================================
// Parsing helpers
// ============================================================================

export const BRANCH_FORMAT = "%(HEAD)%09%(refname:short)%09%(upstream:short)"

/**
 * Parse `git branch --list --format=<BRANCH_FORMAT>` output
 */
export const parseBranchList = (text: string): ReadonlyArray<Branch> =>
	text
		.split("\n")
		.filter((line) => line.trim() !== "")
		.flatMap((line): ReadonlyArray<Branch> => {
			const [head = "", name = "", upstream = ""] = line.split("\t")
			if (name === "" || name.startsWith("(")) return []
			return [{ name, current: head === "*", ...(upstream !== "" ? { upstream } : {}) }]
		})

// ============================================================================
// Implementation
// ============================================================================

const BASE_ARGS = ["-c", "core.quotepath=false"] as const

const COMMIT_ARGS: Record<CommitVariant, ReadonlyArray<string>> = {
	commit: ["commit"],
	amend: ["commit", "--amend"],
	extend: ["commit", "--amend", "--no-edit"],
}

export const GitServiceLive = (
	root: string,
): Layer.Layer<GitService, never, CommandExecutor.CommandExecutor> =>
	Layer.effect(
		GitService,
		Effect.gen(function* () {
			const executor = yield* CommandExecutor.CommandExecutor

			const gitCommand = (args: ReadonlyArray<string>) =>
				Command.make("git", ...BASE_ARGS, ...args).pipe(Command.workingDirectory(root))

			const run = (args: ReadonlyArray<string>, configure: (c: Command.Command) => Command.Command = (c) => c) =>
				execute(configure(gitCommand(args)), `git ${args.join(" ")}`).pipe(
					Effect.provideService(CommandExecutor.CommandExecutor, executor),
				)

			/** Run and fail on a non-zero exit */
			const read = (args: ReadonlyArray<string>) =>
				run(args).pipe(
					Effect.flatMap((output) =>
						output.exitCode === 0
							? Effect.succeed(outputText(output.stdout))
							: Effect.fail(
									new GitCommandError({
										message: `git ${args[0] ?? ""} exited with ${output.exitCode}`,
										command: output.command,
										stderr: outputText(output.stderr).trim(),
									}),
								),
					),
				)

			const remote = (c: Command.Command) => c.pipe(Command.env({ GIT_TERMINAL_PROMPT: "0" }))
			const noInput = (c: Command.Command) => c.pipe(Command.feed(""))

			const readSnapshot = () =>
				Effect.gen(function* () {
					const [status, unstagedDiff, stagedDiff, log] = yield* Effect.all(
						[
							read(["status", "--porcelain=v1", "--branch", "--untracked-files=all"]),
							read(["diff", "--no-color", "--no-ext-diff"]),
							read(["diff", "--cached", "--no-color", "--no-ext-diff"]),
							run(["log", "-1", "--format=%h%x09%s"]),
						],
						{ concurrency: "unbounded" },
					)
					const head = log.exitCode === 0 ? outputText(log.stdout) : undefined
					return { status, unstagedDiff, stagedDiff, ...(head !== undefined ? { head } : {}) }
				}).pipe(Effect.withLogSpan("readSnapshot"))

			return {
				root,

				readSnapshot,

				applyPatch: (patch, target) =>
					run(
						target === "index"
							? ["apply", "--cached", "--whitespace=nowarn", "-"]
							: ["apply", "--whitespace=nowarn", "-"],
						(c) => c.pipe(Command.feed(patch)),
					),

				stagePaths: (paths) => run(["add", "--", ...paths]),

				unstagePaths: (paths, unborn) =>
					unborn ? run(["rm", "--cached", "-q", "--", ...paths]) : run(["reset", "-q", "--", ...paths]),

				discardPaths: (tracked, untracked) =>
					Effect.gen(function* () {
						const outputs: CommandOutput[] = []
						if (tracked.length > 0) outputs.push(yield* run(["checkout", "-q", "--", ...tracked]))
						if (untracked.length > 0) outputs.push(yield* run(["clean", "-f", "-q", "--", ...untracked]))
						return combineOutputs(outputs)
					}),

				stageAll: () => run(["add", "-A"]),

				unstageAll: (unborn) => (unborn ? run(["rm", "--cached", "-r", "-q", "--", "."]) : run(["reset", "-q"])),

				listBranches: (sortKey) =>
					read(["branch", "--list", `--format=${BRANCH_FORMAT}`, `--sort=${sortKey}`]).pipe(
						Effect.map(parseBranchList),
					),

				checkout: (branch) => run(["checkout", branch]),

				createBranch: (name) => run(["checkout", "-b", name]),

				commit: (variant) => run(COMMIT_ARGS[variant], noInput),

				commitCommand: (variant) => ({ file: "git", args: [...COMMIT_ARGS[variant]], cwd: root }),

				push: (force) => run(force ? ["push", "--force-with-lease"] : ["push"], remote),

				pull: () => run(["pull"], remote),

				stash: (pop) => run(pop ? ["stash", "pop"] : ["stash"]),

				runGit: (args) => run(["-c", "color.ui=always", ...args], (c) => noInput(remote(c))),

				runShell: (shell, command) =>
					execute(
						Command.make(shell, "-c", command).pipe(Command.workingDirectory(root), Command.feed("")),
						command,
					).pipe(Effect.provideService(CommandExecutor.CommandExecutor, executor)),
			} satisfies GitServiceI
		}),
	)

// ============================================================================
// Startup helpers
// ============================================================================

/**
 * Top-level directory of the work tree containing `path`
 */
export const findRepositoryRoot = (
	path: string,
): Effect.Effect<Option.Option<string>, GitCommandError, CommandExecutor.CommandExecutor> =>
	execute(
		Command.make("git", "rev-parse", "--show-toplevel").pipe(Command.workingDirectory(path)),
		"git rev-parse --show-toplevel",
	).pipe(
		Effect.map((output) => {
			const root = outputText(output.stdout).trim()
			return output.exitCode === 0 && root !== "" ? Option.some(root) : Option.none()
		}),
	)

export const initRepository = (
	path: string,
): Effect.Effect<CommandOutput, GitCommandError, CommandExecutor.CommandExecutor> =>
	execute(Command.make("git", "init").pipe(Command.workingDirectory(path)), "git init")
