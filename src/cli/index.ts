/**
 * CLI Definition for sift
 *
 * Uses @effect/cli for argument parsing, help and version output. The
 * single command finds the repository, loads the config, sends logs to a
 * file and hands over to the session loop.
 */

import { homedir } from "node:os"
import { Args, Command, Options, Prompt } from "@effect/cli"
import { FileSystem, Path, PlatformLogger } from "@effect/platform"
import { NodeContext } from "@effect/platform-node"
import { Effect, Layer, Logger, LogLevel, Option } from "effect"
import { AppConfigLive } from "../config/AppConfig.js"
import {
	findRepositoryRoot,
	GitCommandError,
	initRepository,
	outputText,
	RepositoryNotFoundError,
} from "../core/GitService.js"
import { launchSession } from "../ui/launch.js"

// ============================================================================
// Options
// ============================================================================

const verboseOption = Options.boolean("verbose").pipe(
	Options.withAlias("v"),
	Options.withDescription("Log debug output, including every git command"),
)

const configOption = Options.file("config").pipe(
	Options.withAlias("c"),
	Options.optional,
	Options.withDescription("Path to config file (default: $XDG_CONFIG_HOME/sift/config.json)"),
)

const pathArg = Args.directory({ name: "path", exists: "yes" }).pipe(
	Args.optional,
	Args.withDescription("Directory inside the repository (default: current directory)"),
)

// ============================================================================
// Logging
// ============================================================================

/**
 * `$XDG_STATE_HOME/sift/sift.log`, directory created on demand
 */
const logFilePath = Effect.gen(function* () {
	const fs = yield* FileSystem.FileSystem
	const path = yield* Path.Path
	const base = process.env.XDG_STATE_HOME || path.join(process.env.HOME || homedir(), ".local", "state")
	const dir = path.join(base, "sift")
	yield* fs.makeDirectory(dir, { recursive: true })
	return path.join(dir, "sift.log")
})

/**
 * The terminal belongs to the UI, so logs go to a file
 */
const FileLoggerLive = Layer.unwrapEffect(
	logFilePath.pipe(
		Effect.map((file) =>
			Logger.replaceScoped(
				Logger.defaultLogger,
				Logger.logfmtLogger.pipe(PlatformLogger.toFile(file, { flag: "a" })),
			),
		),
	),
)

// ============================================================================
// Repository
// ============================================================================

/**
 * Top of the work tree containing `start`, offering to create one
 */
const resolveRepository = (start: string) =>
	Effect.gen(function* () {
		const found = yield* findRepositoryRoot(start)
		if (Option.isSome(found)) return found.value

		const create = yield* Prompt.confirm({
			message: `${start} is not inside a git repository. Initialise one here?`,
			initial: false,
		})
		if (!create) {
			return yield* Effect.fail(
				new RepositoryNotFoundError({ message: "Not inside a git repository", path: start }),
			)
		}

		const output = yield* initRepository(start)
		if (output.exitCode !== 0) {
			return yield* Effect.fail(
				new GitCommandError({
					message: "git init failed",
					command: output.command,
					stderr: outputText(output.stderr).trim(),
				}),
			)
		}
		yield* Effect.logInfo("Initialised repository").pipe(Effect.annotateLogs("path", start))
		return start
	})

// ============================================================================
// Command
// ============================================================================

const siftHandler = (args: {
	readonly path: Option.Option<string>
	readonly verbose: boolean
	readonly config: Option.Option<string>
}) =>
	Effect.gen(function* () {
		const path = yield* Path.Path
		const start = path.resolve(Option.getOrElse(args.path, () => process.cwd()))
		const root = yield* resolveRepository(start)
		yield* launchSession(root).pipe(Effect.provide(AppConfigLive(Option.getOrUndefined(args.config))))
	}).pipe(
		Logger.withMinimumLogLevel(args.verbose ? LogLevel.Debug : LogLevel.Info),
		Effect.provide(FileLoggerLive),
	)

const sift = Command.make(
	"sift",
	{
		path: pathArg,
		verbose: verboseOption,
		config: configOption,
	},
	siftHandler,
).pipe(Command.withDescription("Stage, unstage and discard git changes by file, hunk or line"))

// ============================================================================
// CLI Runner
// ============================================================================

const cliRunner = Command.run(sift, {
	name: "sift",
	version: "0.1.0",
})

/**
 * Run the CLI with the full process.argv
 */
export const run = (argv: ReadonlyArray<string>) => cliRunner(argv).pipe(Effect.provide(NodeContext.layer))
