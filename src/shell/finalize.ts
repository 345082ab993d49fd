// CHANGE: The finalizer ("return check results"), single exit point of a plugin run
// WHY: The supervisor reads exactly one stdout blob and one exit code
// FORMAT THEOREM: ∀s, x: returnCheckResults(s, x) writes render(s') once and exits with s'.exitStatusCode
//                 where s' = override(s) if x is a failure, else s
// PURITY: SHELL
// EFFECT: Effect<void, never, PluginRuntime>
// INVARIANT: runs at most once per ResultState; the fault never re-propagates
// COMPLEXITY: O(|output|)

import { Effect, type Exit, Option } from "effect";

import { PanicDetected } from "../core/errors.js";
import { applyFaultOverride, describeFault, faultOf } from "../core/fault.js";
import { renderCheckResults } from "../core/render.js";
import type { ResultState } from "../core/result-state.js";
import { PluginRuntime } from "./runtime.js";

const overrideWithFault = (
	state: ResultState,
	fault: unknown,
): Effect.Effect<void, never, PluginRuntime> =>
	Effect.gen(function* () {
		const runtime = yield* PluginRuntime;
		const stackTrace = yield* runtime.stackTrace(fault);
		applyFaultOverride(state, fault, stackTrace);
	});

/**
 * Renders the state. A branding callback that throws is treated as a crash:
 * the callback is dropped and the crash report is rendered instead. When the
 * report already describes a body crash, the branding fault is only added to
 * the errors and the body's crash details stay.
 */
const render = (
	state: ResultState,
	crashed: boolean,
): Effect.Effect<string, never, PluginRuntime> =>
	Effect.try({
		try: () => renderCheckResults(state),
		catch: (fault) => fault,
	}).pipe(
		Effect.catchAll((fault) =>
			Effect.gen(function* () {
				state.brandingCallback = undefined;
				if (crashed) {
					state.appendErrors(
						new PanicDetected({ fault, detail: describeFault(fault) }),
					);
				} else {
					yield* overrideWithFault(state, fault);
				}
				return renderCheckResults(state);
			}),
		),
	);

/**
 * Renders the check results, writes them to stdout and exits with the
 * recorded exit status code.
 *
 * @param state - State filled in by the plugin
 * @param outcome - How the plugin body ended; a failure of any kind is
 *                  reported as a CRITICAL crash and replaces what the plugin declared
 *
 * @remarks
 * Nothing after this effect runs when the Node.js runtime is provided. Call it
 * once, after every other cleanup step of the plugin; {@link runCheck} does so.
 * A second call on the same state does nothing.
 *
 * @effect Effect<void, never, PluginRuntime>
 */
export const returnCheckResults = <A, E>(
	state: ResultState,
	outcome?: Exit.Exit<A, E>,
): Effect.Effect<void, never, PluginRuntime> =>
	Effect.gen(function* () {
		if (!state.markFinalized()) return;

		const runtime = yield* PluginRuntime;
		const fault: Option.Option<unknown> =
			outcome === undefined ? Option.none() : faultOf(outcome);
		if (Option.isSome(fault)) {
			yield* overrideWithFault(state, fault.value);
		}

		const output = yield* render(state, Option.isSome(fault));
		yield* runtime.write(output);
		yield* runtime.exit(state.exitStatusCode);
	});
