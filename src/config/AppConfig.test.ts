import { FileSystem, Path } from "@effect/platform"
import { Effect, Layer } from "effect"
import { describe, expect, it } from "vitest"
import { loadAppConfig } from "./AppConfig.js"
import { DEFAULT_RESOLVED_CONFIG } from "./defaults.js"

/**
 * In-memory file system holding the given files
 */
const filesLayer = (files: Record<string, string>) =>
	Layer.merge(
		FileSystem.layerNoop({
			exists: (file) => Effect.succeed(file in files),
			readFileString: (file) => Effect.succeed(files[file] ?? ""),
		}),
		Path.layer,
	)

const load = (files: Record<string, string>, configPath?: string) =>
	Effect.runPromise(loadAppConfig(configPath).pipe(Effect.provide(filesLayer(files))))

describe("loadAppConfig", () => {
	it("reads and resolves an explicit file", async () => {
		const result = await load({ "/cfg/sift.json": '{"options":{"lookahead":3},"keymap":{"stage":"a"}}' }, "/cfg/sift.json")
		expect(result.source).toBe("/cfg/sift.json")
		expect(result.warnings).toEqual([])
		expect(result.config.options.lookahead).toBe(3)
		expect(result.config.keymap).toEqual({ stage: ["a"] })
	})

	it("warns about a missing explicit file", async () => {
		const result = await load({}, "/cfg/missing.json")
		expect(result.config).toBe(DEFAULT_RESOLVED_CONFIG)
		expect(result.warnings.map((w) => w.message)).toEqual(["Config file not found: /cfg/missing.json"])
	})

	it("uses defaults quietly when no file exists at the default location", async () => {
		const result = await load({})
		expect(result).toEqual({ config: DEFAULT_RESOLVED_CONFIG, warnings: [] })
	})

	it("turns broken JSON into a warning", async () => {
		const result = await load({ "/cfg/bad.json": "{ nope" }, "/cfg/bad.json")
		expect(result.config).toBe(DEFAULT_RESOLVED_CONFIG)
		expect(result.warnings.map((w) => w.message)).toEqual([
			"Invalid JSON in config file (/cfg/bad.json); using defaults",
		])
	})

	it("passes decoding warnings on", async () => {
		const result = await load({ "/cfg/sift.json": '{"colors":{"key":"nope"}}' }, "/cfg/sift.json")
		expect(result.warnings.map((w) => w.path)).toEqual(["colors.key"])
		expect(result.config.colors.key).toEqual(DEFAULT_RESOLVED_CONFIG.colors.key)
	})
})
