// CHANGE: Convert an intercepted plugin crash into a CRITICAL result
// WHY: After a crash no value the plugin declared can be trusted
// FORMAT THEOREM: ∀s, f, t: override(s, f, t) ⇒ s.exitStatusCode = 2 ∧ s.serviceOutput = PLUGIN_CRASH_SUMMARY
// PURITY: CORE (mutates only the given state)
// INVARIANT: the override replaces summary, detail and exit code; it never merges with them
// COMPLEXITY: O(|t|)

import { Cause, Exit, Option } from "effect";
import { match, P } from "ts-pattern";

import { PanicDetected } from "./errors.js";
import {
	CHECK_OUTPUT_EOL,
	FENCED_BLOCK_DELIMITER,
	PLUGIN_CRASH_SUMMARY,
	StateExitCode,
} from "./models.js";
import { describeError } from "./render.js";
import type { ResultState } from "./result-state.js";

const stringifyFault = (fault: unknown): string => {
	try {
		return JSON.stringify(fault) ?? String(fault);
	} catch {
		// cyclic or BigInt-bearing values
		return String(fault);
	}
};

/**
 * Printable text of whatever was thrown.
 *
 * @pure true
 *
 * @example
 * ```ts
 * describeFault(new RangeError("index out of range")); // "index out of range"
 * describeFault("boom"); // "boom"
 * describeFault({ code: 7 }); // '{"code":7}'
 * ```
 */
export const describeFault = (fault: unknown): string =>
	match(fault)
		.with(P.instanceOf(Error), describeError)
		.with(P.string, (text) => text)
		.otherwise(stringifyFault);

/**
 * The fault carried by a finished plugin body, if it did not succeed.
 *
 * @remarks
 * Typed failures, defects and interruptions all count: none of them leaves a
 * declared outcome behind.
 *
 * @pure true
 */
export const faultOf = <A, E>(exit: Exit.Exit<A, E>): Option.Option<unknown> =>
	Exit.isFailure(exit) ? Option.some(Cause.squash(exit.cause)) : Option.none();

/**
 * Crash details wrapped in a fenced block, EOL on every side.
 *
 * @pure true
 */
export const crashDetails = (detail: string, stackTrace: string): string =>
	[
		FENCED_BLOCK_DELIMITER,
		CHECK_OUTPUT_EOL,
		detail,
		CHECK_OUTPUT_EOL,
		CHECK_OUTPUT_EOL,
		stackTrace,
		CHECK_OUTPUT_EOL,
		FENCED_BLOCK_DELIMITER,
	].join("");

/**
 * Overrides the state with a CRITICAL crash report.
 *
 * @param state - State to override
 * @param fault - Value the plugin body threw or failed with
 * @param stackTrace - Stack the fault unwound through
 *
 * @postcondition state.errors ends with PanicDetected wrapping fault
 * @postcondition state.exitStatusCode = CRITICAL
 */
export function applyFaultOverride(
	state: ResultState,
	fault: unknown,
	stackTrace: string,
): void {
	const detail = describeFault(fault);
	state.appendErrors(new PanicDetected({ fault, detail }));
	state.serviceOutput = PLUGIN_CRASH_SUMMARY;
	state.longServiceOutput = crashDetails(detail, stackTrace);
	state.exitStatusCode = StateExitCode.CRITICAL;
}
