/**
 * AppConfig - Effect service for application configuration
 *
 * Loads configuration from (in priority order):
 * 1. Explicit config path (--config flag)
 * 2. $XDG_CONFIG_HOME/sift/config.json
 * 3. ~/.config/sift/config.json
 * 4. Defaults
 *
 * Problems never stop startup: they come back as warnings next to the
 * resolved config and are shown as notices.
 */

import { homedir } from "node:os"
import { FileSystem, Path } from "@effect/platform"
import { Context, Data, Effect, Layer } from "effect"
import { ConfigWarning, decodeConfig } from "./decode.js"
import { DEFAULT_RESOLVED_CONFIG, mergeWithDefaults, type ResolvedConfig } from "./defaults.js"

// ============================================================================
// Error Types
// ============================================================================

/**
 * Error when reading or parsing the configuration file fails
 */
export class ConfigParseError extends Data.TaggedError("ConfigParseError")<{
	readonly message: string
	readonly path: string
	readonly details?: string
}> {}

// ============================================================================
// Service Definition
// ============================================================================

export interface AppConfigService {
	/** Validated configuration with defaults applied */
	readonly config: ResolvedConfig
	/** Entries that were ignored while loading */
	readonly warnings: ReadonlyArray<ConfigWarning>
	/** File the config was read from, if any */
	readonly source?: string
}

export class AppConfig extends Context.Tag("AppConfig")<AppConfig, AppConfigService>() {}

// ============================================================================
// Loading
// ============================================================================

/**
 * Default config location, following the XDG base directory convention
 */
export const defaultConfigPath = (path: Path.Path): string => {
	const base = process.env.XDG_CONFIG_HOME || path.join(process.env.HOME || homedir(), ".config")
	return path.join(base, "sift", "config.json")
}

const readJson = (
	fs: FileSystem.FileSystem,
	file: string,
): Effect.Effect<unknown, ConfigParseError> =>
	Effect.gen(function* () {
		const content = yield* fs.readFileString(file).pipe(
			Effect.mapError(
				(e) =>
					new ConfigParseError({
						message: "Failed to read config file",
						path: file,
						details: String(e),
					}),
			),
		)
		return yield* Effect.try({
			try: (): unknown => JSON.parse(content),
			catch: (e) =>
				new ConfigParseError({
					message: "Invalid JSON in config file",
					path: file,
					details: String(e),
				}),
		})
	})

/**
 * Load and resolve the config. An explicit path that does not exist is a
 * warning; a missing default file is silently skipped.
 */
export const loadAppConfig = (
	configPath?: string,
): Effect.Effect<AppConfigService, never, FileSystem.FileSystem | Path.Path> =>
	Effect.gen(function* () {
		const fs = yield* FileSystem.FileSystem
		const path = yield* Path.Path
		const file = configPath ?? defaultConfigPath(path)

		const exists = yield* fs.exists(file).pipe(Effect.catchAll(() => Effect.succeed(false)))
		if (!exists) {
			if (configPath === undefined) return { config: DEFAULT_RESOLVED_CONFIG, warnings: [] }
			return {
				config: DEFAULT_RESOLVED_CONFIG,
				warnings: [new ConfigWarning({ message: `Config file not found: ${file}` })],
			}
		}

		const raw = yield* readJson(fs, file).pipe(Effect.either)
		if (raw._tag === "Left") {
			yield* Effect.logWarning(`${raw.left.message}: ${raw.left.details ?? ""}`).pipe(
				Effect.annotateLogs("path", file),
			)
			return {
				config: DEFAULT_RESOLVED_CONFIG,
				warnings: [new ConfigWarning({ message: `${raw.left.message} (${file}); using defaults` })],
				source: file,
			}
		}

		const { config, warnings } = decodeConfig(raw.right)
		for (const warning of warnings) {
			yield* Effect.logWarning(warning.message).pipe(Effect.annotateLogs("path", file))
		}
		yield* Effect.logDebug("Loaded config").pipe(Effect.annotateLogs("path", file))
		return { config: mergeWithDefaults(config), warnings, source: file }
	})

export const AppConfigLive = (configPath?: string) =>
	Layer.effect(AppConfig, loadAppConfig(configPath))

/**
 * Fixed configuration, for tests and embedding
 */
export const AppConfigStatic = (
	config: ResolvedConfig = DEFAULT_RESOLVED_CONFIG,
	warnings: ReadonlyArray<ConfigWarning> = [],
) => Layer.succeed(AppConfig, { config, warnings })
