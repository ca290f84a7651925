import { Data } from "effect"

/**
 * Raw status or diff text did not match the expected grammar
 */
export class ParseError extends Data.TaggedError("ParseError")<{
	readonly message: string
	/** 1-based line number in the offending input */
	readonly line?: number
	readonly input: "status" | "diff" | "head"
}> {}

/**
 * Selection resolved to nothing that can be applied
 */
export class EmptySelectionError extends Data.TaggedError("EmptySelectionError")<{
	readonly message: string
}> {}

/**
 * A source hunk's ranges disagree with its lines
 */
export class InvalidHunkStateError extends Data.TaggedError("InvalidHunkStateError")<{
	readonly message: string
	readonly path: string
	readonly hunk: number
}> {}

export type SynthesisError = EmptySelectionError | InvalidHunkStateError
