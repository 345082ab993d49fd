#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper for emit-check-result
// WHY: APP returns once the result is written; the PluginRuntime layer exits the process
// PURITY: SHELL (BIN layer)
// INVARIANT: a failure outside the finalizer still exits UNKNOWN instead of a bare stack trace
// COMPLEXITY: O(1) (delegates to APP)

import { runEmitCheckResult } from "../app/emitCheckResult.js";
import { StateExitCode } from "../core/models.js";

/**
 * CLI entry point.
 *
 * @remarks
 * - @pure false (process termination and console I/O)
 * - @postcondition process terminates with the declared state's exit code,
 *   2 on a crash, 3 on a usage error
 */
void (async (): Promise<void> => {
	try {
		await runEmitCheckResult(process.argv.slice(2));
	} catch (error) {
		console.error("Fatal error:", error);
		process.exit(StateExitCode.UNKNOWN);
	}
})();
