// CHANGE: Process IO behind an Effect service
// WHY: The finalizer must write, capture a stack and exit; tests replace all three with an in-process recorder
// PURITY: SHELL
// EFFECT: Layer<PluginRuntime>
// INVARIANT: outside the bin fallback, NodePluginRuntime is the only caller of process.exit
// COMPLEXITY: O(1)

import { Context, Effect, Layer } from "effect";

/**
 * Process primitives the finalizer depends on.
 */
export interface PluginRuntimeService {
	/** Writes the rendered output to stdout in one write. */
	readonly write: (text: string) => Effect.Effect<void>;
	/** Terminates the process. No caller code runs afterwards. */
	readonly exit: (code: number) => Effect.Effect<void>;
	/** Stack the fault unwound through, as text. */
	readonly stackTrace: (fault: unknown) => Effect.Effect<string>;
}

export class PluginRuntime extends Context.Tag("PluginRuntime")<
	PluginRuntime,
	PluginRuntimeService
>() {}

/**
 * Stack of an Error fault; otherwise the stack at the point of capture.
 *
 * @pure false (reads the current stack for non-Error faults)
 */
export const captureStackTrace = (fault: unknown): string => {
	if (fault instanceof Error && fault.stack !== undefined) {
		return fault.stack;
	}
	return new Error("stack trace").stack ?? "";
};

/**
 * Node.js implementation: stdout, process.exit and V8 stack traces.
 */
export const NodePluginRuntime = Layer.succeed(
	PluginRuntime,
	PluginRuntime.of({
		write: (text) =>
			Effect.async<void>((resume) => {
				// Resume after the flush so that exit cannot truncate piped output.
				process.stdout.write(text, (error) => {
					if (error instanceof Error) {
						console.error("failed to write check results:", error);
					}
					resume(Effect.void);
				});
			}),
		exit: (code) =>
			Effect.sync(() => {
				process.exit(code);
			}),
		stackTrace: (fault) => Effect.sync(() => captureStackTrace(fault)),
	}),
);
