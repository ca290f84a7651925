#!/usr/bin/env node

/**
 * sift CLI entry point
 */

import { NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"
import { run } from "../src/cli/index.js"

// @effect/cli expects the full process.argv and strips the binary and script path itself
Effect.suspend(() => run(process.argv)).pipe(NodeRuntime.runMain)
