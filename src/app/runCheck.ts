// CHANGE: Application layer composing a plugin body with the finalizer
// WHY: The finalizer must observe how the body ended, after the body's own cleanup
// PURITY: APP
// EFFECT: Effect<void, never, R | PluginRuntime>
// INVARIANT: the returned effect never fails; every outcome of the body reaches returnCheckResults
// COMPLEXITY: O(1) besides the body itself

import { Effect } from "effect";

import type { ResultState } from "../core/result-state.js";
import { returnCheckResults } from "../shell/finalize.js";
import { NodePluginRuntime, type PluginRuntime } from "../shell/runtime.js";

/**
 * Runs the plugin body, then finalizes the state with the body's outcome.
 *
 * @param state - State the body fills in
 * @param program - Plugin body; failures, defects and interruptions become a CRITICAL crash report
 *
 * @remarks
 * `Effect.exit` only resolves once every finalizer registered inside
 * `program` (`Effect.ensuring`, `Effect.acquireRelease`, scopes) has run, so
 * the finalizer is always the last step.
 *
 * @example
 * ```ts
 * const state = new ResultState();
 * const program = Effect.sync(() => {
 *   state.serviceOutput = "OK: all good";
 * });
 * await Effect.runPromise(runCheck(state, program).pipe(Effect.provide(NodePluginRuntime)));
 * ```
 */
export const runCheck = <A, E, R>(
	state: ResultState,
	program: Effect.Effect<A, E, R>,
): Effect.Effect<void, never, R | PluginRuntime> =>
	Effect.exit(program).pipe(
		Effect.flatMap((outcome) => returnCheckResults(state, outcome)),
	);

/**
 * Lifts a plain sync or async plugin body into an Effect. A throw or a
 * rejection becomes a defect.
 */
export const pluginBody = (
	body: () => void | Promise<void>,
): Effect.Effect<void> =>
	Effect.promise(async () => {
		await body();
	});

/**
 * Runs the plugin on Node.js and exits the process.
 *
 * @example
 * ```ts
 * const state = new ResultState({ brandingCallback: () => "check_disk v1.2.0" });
 * await runPlugin(state, pluginBody(async () => {
 *   state.serviceOutput = await checkDisk();
 * }));
 * ```
 */
export const runPlugin = <A, E>(
	state: ResultState,
	program: Effect.Effect<A, E>,
): Promise<void> =>
	Effect.runPromise(
		runCheck(state, program).pipe(Effect.provide(NodePluginRuntime)),
	);
